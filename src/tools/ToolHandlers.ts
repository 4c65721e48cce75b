import * as path from "path";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SolutionSearchEngine } from "../engine/SolutionSearchEngine.js";
import type { QueryOutcome } from "../errors/AnalysisError.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("ToolHandlers");

export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

export type ToolDefinition = {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, Record<string, unknown>>;
        required?: string[];
    };
};

const rootProperty = {
    type: "string",
    description: "Directory to analyze, relative to the server root. Defaults to the server root."
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
    {
        name: "find_class",
        description: "Locate a type declaration by name. 'direct' parses the file named after the type; 'deep' indexes the whole tree and reports every declaration with that name.",
        inputSchema: {
            type: "object",
            properties: {
                className: { type: "string" },
                searchType: { type: "string", enum: ["direct", "deep"] },
                root: rootProperty
            },
            required: ["className"]
        }
    },
    {
        name: "find_elements",
        description: "List declarations of one element kind (dto, service, controller, interface, enum, record, struct, class), optionally filtered by a case-insensitive name substring.",
        inputSchema: {
            type: "object",
            properties: {
                kind: { type: "string" },
                namePattern: { type: "string" },
                root: rootProperty
            },
            required: ["kind"]
        }
    },
    {
        name: "get_file_with_analysis",
        description: "Read one file and return its content with the structural analysis of its declarations.",
        inputSchema: {
            type: "object",
            properties: {
                filePath: { type: "string" },
                root: rootProperty
            },
            required: ["filePath"]
        }
    },
    {
        name: "get_solution_structure",
        description: "Summarize the tree: namespaces, element kind counts, projects and totals.",
        inputSchema: {
            type: "object",
            properties: {
                root: rootProperty
            }
        }
    }
];

const RootArgument = z.string().trim().min(1).optional();

export const FindClassArgsSchema = z.object({
    className: z.string().trim().min(1),
    searchType: z.enum(["direct", "deep"]).default("direct"),
    root: RootArgument
});

export const FindElementsArgsSchema = z.object({
    kind: z.string().trim().min(1),
    namePattern: z.string().default(""),
    root: RootArgument
});

export const GetFileArgsSchema = z.object({
    filePath: z.string().trim().min(1),
    root: RootArgument
});

export const GetStructureArgsSchema = z.object({
    root: RootArgument
});

/**
 * Validates tool arguments and renders engine outcomes as MCP tool results. Failed
 * queries come back as `isError` results; unknown tools raise `MethodNotFound`.
 */
export class ToolHandlers {
    private readonly rootPath: string;

    constructor(private readonly engine: SolutionSearchEngine, rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    public listTools(): ToolDefinition[] {
        return TOOL_DEFINITIONS;
    }

    /** `signal` is the request's abort signal; it cancels index builds and lookups. */
    public async handle(name: string, args: unknown, signal?: AbortSignal): Promise<ToolResponse> {
        const input = args ?? {};
        const options = { signal };
        try {
            switch (name) {
                case "find_class": {
                    const parsed = FindClassArgsSchema.safeParse(input);
                    if (!parsed.success) return this.invalidArguments(name, parsed.error);
                    const { className, searchType, root } = parsed.data;
                    return this.render(await this.engine.findClass(this.resolveRoot(root), className, searchType, options));
                }
                case "find_elements": {
                    const parsed = FindElementsArgsSchema.safeParse(input);
                    if (!parsed.success) return this.invalidArguments(name, parsed.error);
                    const { kind, namePattern, root } = parsed.data;
                    return this.render(await this.engine.findElements(this.resolveRoot(root), kind, namePattern, options));
                }
                case "get_file_with_analysis": {
                    const parsed = GetFileArgsSchema.safeParse(input);
                    if (!parsed.success) return this.invalidArguments(name, parsed.error);
                    const { filePath, root } = parsed.data;
                    return this.render(await this.engine.getFileWithAnalysis(this.resolveRoot(root), filePath));
                }
                case "get_solution_structure": {
                    const parsed = GetStructureArgsSchema.safeParse(input);
                    if (!parsed.success) return this.invalidArguments(name, parsed.error);
                    return this.render(await this.engine.getSolutionStructure(this.resolveRoot(parsed.data.root), options));
                }
                default:
                    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
            }
        } catch (error) {
            if (error instanceof McpError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error("Tool failed", { tool: name, message });
            return errorResponse("InternalError", message);
        }
    }

    private resolveRoot(root: string | undefined): string {
        return root ? path.resolve(this.rootPath, root) : this.rootPath;
    }

    private render<T>(outcome: QueryOutcome<T>): ToolResponse {
        if (outcome.ok) {
            return jsonResponse(outcome.value);
        }
        return errorResponse(outcome.error.code, outcome.error.message, outcome.error.details);
    }

    private invalidArguments(tool: string, error: z.ZodError): ToolResponse {
        const issues = error.issues.map(issue => `${issue.path.join(".") || "(arguments)"}: ${issue.message}`);
        return errorResponse("InvalidArgument", `Invalid arguments for ${tool}`, { issues });
    }
}

export function jsonResponse(payload: unknown): ToolResponse {
    return { content: [{ type: "text", text: JSON.stringify(payload, jsonReplacer, 2) }] };
}

export function errorResponse(errorCode: string, message: string, details?: Record<string, unknown>): ToolResponse {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ errorCode, message, details }) }]
    };
}

/** Maps serialize as plain objects and Sets as arrays. */
export function jsonReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Map) {
        return Object.fromEntries(value);
    }
    if (value instanceof Set) {
        return Array.from(value);
    }
    return value;
}
