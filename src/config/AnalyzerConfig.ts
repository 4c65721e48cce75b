import { z } from "zod";

export const DEFAULT_EXCLUDE_PATTERNS = [
    ".git/",
    ".vs/",
    "bin/",
    "obj/",
    "node_modules/",
    "packages/"
];

const nonEmptyStringList = z.array(z.string().trim().min(1));

const patternList = nonEmptyStringList.superRefine((patterns, ctx) => {
    patterns.forEach((pattern, index) => {
        try {
            new RegExp(pattern, "i");
        } catch (error) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `Invalid pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`
            });
        }
    });
});

export const ClassificationConfigSchema = z.object({
    dtoSuffixes: nonEmptyStringList.default(["Dto", "Request", "Response", "ViewModel"]),
    serviceSuffixes: nonEmptyStringList.default(["Service"]),
    /** Tested against each namespace segment (or directory segment when there is no namespace). */
    serviceNamespacePatterns: patternList.default(["^Services?$"]),
    controllerSuffixes: nonEmptyStringList.default(["Controller"]),
    /** Tested against the simple name of each base type. */
    controllerBasePatterns: patternList.default(["Controller$", "^ControllerBase$"])
});

export const AnalyzerConfigSchema = z.object({
    extensions: nonEmptyStringList
        .default([".cs"])
        .transform(list => list.map(ext => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase())),
    excludePatterns: z.array(z.string()).default(DEFAULT_EXCLUDE_PATTERNS),
    /** Directory `excludePatterns` are relative to; unset means each query's own root. */
    patternRoot: z.string().min(1).optional(),
    classification: ClassificationConfigSchema.default({}),
    indexing: z.object({
        concurrency: z.number().int().min(1).max(64).default(8),
        maxFileBytes: z.number().int().positive().default(2 * 1024 * 1024)
    }).default({}),
    cache: z.object({
        enabled: z.boolean().default(true),
        maxEntries: z.number().int().min(1).default(8),
        ttlMs: z.number().int().min(0).default(10 * 60_000)
    }).default({})
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;
export type ClassificationConfig = z.infer<typeof ClassificationConfigSchema>;

export function resolveAnalyzerConfig(input: AnalyzerConfigInput = {}): AnalyzerConfig {
    return AnalyzerConfigSchema.parse(input);
}

/**
 * Env overrides applied on top of the file configuration.
 * SOLUTION_MAP_CONCURRENCY sets indexing concurrency, SOLUTION_MAP_CACHE=false disables the index cache.
 */
export function applyEnvOverrides(input: AnalyzerConfigInput, env: NodeJS.ProcessEnv = process.env): AnalyzerConfigInput {
    const next: AnalyzerConfigInput = { ...input };
    const concurrency = Number(env.SOLUTION_MAP_CONCURRENCY);
    if (env.SOLUTION_MAP_CONCURRENCY && Number.isInteger(concurrency) && concurrency > 0) {
        next.indexing = { ...(input.indexing ?? {}), concurrency };
    }
    if (env.SOLUTION_MAP_CACHE === "false" || env.SOLUTION_MAP_CACHE === "true") {
        next.cache = { ...(input.cache ?? {}), enabled: env.SOLUTION_MAP_CACHE === "true" };
    }
    return next;
}
