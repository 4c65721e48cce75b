#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import * as path from "path";
import type { AnalyzerConfig } from "./config/AnalyzerConfig.js";
import { ConfigurationManager } from "./config/ConfigurationManager.js";
import { SolutionSearchEngine } from "./engine/SolutionSearchEngine.js";
import type { IFileSystem } from "./platform/FileSystem.js";
import { NodeFileSystem } from "./platform/FileSystem.js";
import { ToolHandlers } from "./tools/ToolHandlers.js";
import { createLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("SolutionMapServer");

export interface SolutionMapServerOptions {
    fileSystem?: IFileSystem;
    env?: NodeJS.ProcessEnv;
}

export class SolutionMapServer {
    private readonly server: Server;
    private readonly rootPath: string;
    private readonly configurationManager: ConfigurationManager;
    private readonly engine: SolutionSearchEngine;
    private readonly handlers: ToolHandlers;
    private shutdownRequested = false;

    constructor(rootPath: string, options: SolutionMapServerOptions = {}) {
        this.server = new Server({
            name: "solution-map-mcp",
            version: "1.0.0",
        }, {
            capabilities: { tools: {} },
        });

        this.rootPath = path.resolve(rootPath);
        const fileSystem = options.fileSystem ?? new NodeFileSystem(this.rootPath);
        this.configurationManager = new ConfigurationManager(this.rootPath, { env: options.env });
        this.engine = new SolutionSearchEngine(fileSystem, this.effectiveConfig());
        this.handlers = new ToolHandlers(this.engine, this.rootPath);

        this.configurationManager.on("configChanged", () => this.engine.updateConfig(this.effectiveConfig()));
        this.configurationManager.on("ignoreChanged", () => this.engine.updateConfig(this.effectiveConfig()));

        this.setupHandlers();
        this.setupShutdownHooks(options.env ?? process.env);
    }

    public getEngine(): SolutionSearchEngine {
        return this.engine;
    }

    public getToolHandlers(): ToolHandlers {
        return this.handlers;
    }

    public async run(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error(`Solution Map MCP server running on stdio (root: ${this.rootPath})`);
    }

    public async shutdown(): Promise<void> {
        if (this.shutdownRequested) return;
        this.shutdownRequested = true;
        this.engine.dispose();
        await this.configurationManager.dispose();
        await this.server.close();
    }

    /** Ignore-file patterns extend the configured exclusions; both are relative to the server root. */
    private effectiveConfig(): AnalyzerConfig {
        return {
            ...this.configurationManager.getConfig(),
            excludePatterns: this.configurationManager.getExcludePatterns(),
            patternRoot: this.rootPath
        };
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.handlers.listTools(),
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
            return this.handlers.handle(request.params.name, request.params.arguments, extra.signal);
        });
    }

    private setupShutdownHooks(env: NodeJS.ProcessEnv): void {
        if (env.NODE_ENV === "test" || env.JEST_WORKER_ID !== undefined) {
            return;
        }
        const stop = (signal: string) => {
            logger.warn("Shutdown requested", { signal });
            this.shutdown()
                .then(() => process.exit(0))
                .catch(error => {
                    logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
                    process.exit(1);
                });
        };
        process.on("SIGTERM", () => stop("SIGTERM"));
        process.on("SIGINT", () => stop("SIGINT"));
    }
}

if (require.main === module) {
    const envRoot = process.env.SOLUTION_MAP_ROOT;
    const resolvedRoot = envRoot && envRoot.trim().length > 0 ? envRoot : process.cwd();
    const server = new SolutionMapServer(resolvedRoot);
    server.run().catch(console.error);
}
