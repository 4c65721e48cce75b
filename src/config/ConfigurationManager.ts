import * as chokidar from "chokidar";
import { EventEmitter } from "events";
import * as fs from "fs";
import * as path from "path";
import type { AnalyzerConfig, AnalyzerConfigInput } from "./AnalyzerConfig.js";
import { AnalyzerConfigSchema, applyEnvOverrides } from "./AnalyzerConfig.js";
import { createLogger } from "../utils/StructuredLogger.js";

export type ConfigurationEvent = "configChanged" | "ignoreChanged";

export interface ConfigurationEventPayloads {
    configChanged: { filePath: string; config: AnalyzerConfig };
    ignoreChanged: { filePath: string; patterns: string[] };
}

export const CONFIG_FILE = ".solution-map.json";
const IGNORE_FILES = [".gitignore", ".mcpignore"];
const IGNORE_SCAN_EXCLUDES = new Set([
    ".git",
    ".vs",
    "bin",
    "obj",
    "node_modules",
    "packages"
]);

const logger = createLogger("ConfigurationManager");

export interface ConfigurationManagerOptions {
    env?: NodeJS.ProcessEnv;
    /** Defaults to watching outside Jest and NODE_ENV=test. */
    watch?: boolean;
}

export class ConfigurationManager extends EventEmitter {
    private readonly watcher?: chokidar.FSWatcher;
    private readonly env: NodeJS.ProcessEnv;
    private config: AnalyzerConfig;
    private ignorePatterns: string[];

    constructor(private readonly rootPath: string, options: ConfigurationManagerOptions = {}) {
        super();
        this.env = options.env ?? process.env;
        this.config = this.loadConfig();
        this.ignorePatterns = this.loadIgnorePatterns();

        const isTestEnv = this.env.NODE_ENV === "test" || this.env.JEST_WORKER_ID !== undefined;
        if (options.watch ?? !isTestEnv) {
            const watchTargets = [
                path.join(this.rootPath, CONFIG_FILE),
                ...this.collectIgnoreFiles()
            ];
            this.watcher = chokidar.watch(watchTargets, {
                ignoreInitial: true,
                persistent: true,
                awaitWriteFinish: {
                    stabilityThreshold: 200,
                    pollInterval: 100
                }
            });
            this.registerWatchHandlers();
        }
    }

    public getConfig(): AnalyzerConfig {
        return this.config;
    }

    public getIgnoreGlobs(): string[] {
        return [...this.ignorePatterns];
    }

    /** Configured exclude patterns followed by the ones collected from ignore files. */
    public getExcludePatterns(): string[] {
        return [...this.config.excludePatterns, ...this.ignorePatterns];
    }

    public on<T extends ConfigurationEvent>(event: T, listener: (payload: ConfigurationEventPayloads[T]) => void): this {
        return super.on(event, listener);
    }

    public once<T extends ConfigurationEvent>(event: T, listener: (payload: ConfigurationEventPayloads[T]) => void): this {
        return super.once(event, listener);
    }

    public off<T extends ConfigurationEvent>(event: T, listener: (payload: ConfigurationEventPayloads[T]) => void): this {
        return super.off(event, listener);
    }

    public async dispose(): Promise<void> {
        if (this.watcher) {
            await this.watcher.close();
        }
        this.removeAllListeners();
    }

    private registerWatchHandlers(): void {
        if (!this.watcher) return;
        const handler = (filePath: string) => this.handleConfigChange(filePath);
        this.watcher.on("add", handler);
        this.watcher.on("change", handler);
        this.watcher.on("unlink", handler);
        this.watcher.on("error", error => {
            logger.warn("watcher error", { error: error instanceof Error ? error.message : String(error) });
        });
    }

    public handleConfigChange(filePath: string): void {
        const basename = path.basename(filePath);
        switch (basename) {
            case ".gitignore":
            case ".mcpignore": {
                this.ignorePatterns = this.loadIgnorePatterns();
                this.emit("ignoreChanged", {
                    filePath,
                    patterns: [...this.ignorePatterns]
                });
                break;
            }
            case CONFIG_FILE: {
                this.config = this.loadConfig();
                this.emit("configChanged", { filePath, config: this.config });
                break;
            }
            default:
                break;
        }
    }

    private loadConfig(): AnalyzerConfig {
        const configPath = path.join(this.rootPath, CONFIG_FILE);
        let raw: AnalyzerConfigInput = {};
        if (fs.existsSync(configPath)) {
            try {
                const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
                const validated = AnalyzerConfigSchema.safeParse(parsed);
                if (validated.success) {
                    raw = validated.data;
                } else {
                    logger.warn(`Ignoring invalid ${CONFIG_FILE}`, {
                        issues: validated.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
                    });
                }
            } catch (error) {
                logger.warn(`Failed to read ${CONFIG_FILE}`, {
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
        return AnalyzerConfigSchema.parse(applyEnvOverrides(raw, this.env));
    }

    private loadIgnorePatterns(): string[] {
        const patterns: string[] = [];
        for (const absPath of this.collectIgnoreFiles()) {
            try {
                const content = fs.readFileSync(absPath, "utf-8");
                const relDir = path.relative(this.rootPath, path.dirname(absPath)).replace(/\\/g, "/");
                const parsed = content
                    .split(/\r?\n/)
                    .map(line => line.trim())
                    .filter(line => line.length > 0 && !line.startsWith("#"))
                    .map(line => this.normalizeIgnorePattern(line, relDir));
                patterns.push(...parsed);
            } catch (error) {
                logger.warn(`Failed to read ${path.basename(absPath)}`, {
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
        return patterns;
    }

    private collectIgnoreFiles(): string[] {
        const ignoreFiles: string[] = [];
        const stack = [this.rootPath];
        let current = stack.pop();
        while (current !== undefined) {
            let entries: fs.Dirent[] = [];
            try {
                entries = fs.readdirSync(current, { withFileTypes: true });
            } catch {
                entries = [];
            }
            for (const entry of entries) {
                if (entry.isSymbolicLink()) {
                    continue;
                }
                const entryPath = path.join(current, entry.name);
                if (entry.isDirectory()) {
                    if (!IGNORE_SCAN_EXCLUDES.has(entry.name)) {
                        stack.push(entryPath);
                    }
                    continue;
                }
                if (IGNORE_FILES.includes(entry.name)) {
                    ignoreFiles.push(entryPath);
                }
            }
            current = stack.pop();
        }
        return ignoreFiles.sort();
    }

    private normalizeIgnorePattern(pattern: string, relDir: string): string {
        let negation = "";
        let normalized = pattern;
        if (normalized.startsWith("!")) {
            negation = "!";
            normalized = normalized.slice(1);
        }
        if (normalized.startsWith("/")) {
            normalized = normalized.slice(1);
        }
        if (relDir.length > 0) {
            normalized = `${relDir}/${normalized}`;
        }
        return `${negation}${normalized}`;
    }
}
