import * as path from "path";
import { countLines } from "../ast/SourceMasker.js";
import { IDENTIFIER_PART_CHARS, IDENTIFIER_START_CHARS } from "../ast/SyntaxText.js";
import type { AnalyzerConfig } from "../config/AnalyzerConfig.js";
import { resolveAnalyzerConfig } from "../config/AnalyzerConfig.js";
import type { QueryOutcome } from "../errors/AnalysisError.js";
import { AnalysisError, fromFileSystemError, success, throwIfAborted, toOutcome } from "../errors/AnalysisError.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import { SolutionIndexCache } from "../indexing/SolutionIndexCache.js";
import { SolutionIndexer } from "../indexing/SolutionIndexer.js";
import { SourceFileCollector } from "../indexing/SourceFileCollector.js";
import type { FileContent, FileStats, IFileSystem, TextEncoding } from "../platform/FileSystem.js";
import type {
    AnalyzedDocument,
    ClassifiedDeclaration,
    ElementKind,
    IndexWarning,
    LineRange,
    ParseWarning,
    ProjectInfo,
    SolutionIndex,
    SolutionStats
} from "../types.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("SolutionSearchEngine");

const IDENTIFIER_PATTERN = new RegExp(`^[${IDENTIFIER_START_CHARS}][${IDENTIFIER_PART_CHARS}]*$`, "u");

const KIND_ALIASES = new Map<string, ElementKind>([
    ["dto", "DTO"],
    ["service", "Service"],
    ["controller", "Controller"],
    ["interface", "Interface"],
    ["enum", "Enum"],
    ["record", "Record"],
    ["struct", "Struct"],
    ["class", "GenericClass"],
    ["genericclass", "GenericClass"]
]);

export type SearchMode = "direct" | "deep";

export interface QueryOptions {
    signal?: AbortSignal;
}

export interface ClassMatch {
    filePath: string;
    declaration: ClassifiedDeclaration;
    primary: boolean;
}

export interface FindClassResult {
    className: string;
    mode: SearchMode;
    matches: ClassMatch[];
    ambiguous: boolean;
    /** Direct mode: every file whose name matched. Deep mode: the distinct files of the matches. */
    candidateFiles: string[];
}

export interface FindElementsResult {
    kind: ElementKind;
    namePattern: string;
    elements: ClassifiedDeclaration[];
}

export interface FileAnalysis {
    filePath: string;
    content: string;
    encoding: TextEncoding;
    size: number;
    lines: number;
    /** Null for files outside the analyzed extensions. */
    document: AnalyzedDocument | null;
    warnings: ParseWarning[];
}

export interface ElementSummary {
    name: string;
    elementKind: ElementKind;
    declarationKind: ClassifiedDeclaration["kind"];
    namespace?: string;
    filePath: string;
    span: LineRange;
    memberCount: number;
    summary?: string;
}

export interface SolutionStructure {
    rootPath: string;
    totalFiles: number;
    /** Namespace → declaration names, `<global>` for files without a namespace. */
    namespaces: Map<string, string[]>;
    kindCounts: Map<ElementKind, number>;
    byKind: Map<ElementKind, ElementSummary[]>;
    stats: SolutionStats;
    projects: ProjectInfo[];
    warnings: IndexWarning[];
}

export function parseElementKind(value: string): ElementKind | undefined {
    return KIND_ALIASES.get(value.trim().toLowerCase());
}

export function summarizeDeclaration(declaration: ClassifiedDeclaration): ElementSummary {
    return {
        name: declaration.name,
        elementKind: declaration.elementKind,
        declarationKind: declaration.kind,
        ...(declaration.namespace ? { namespace: declaration.namespace } : {}),
        filePath: declaration.containingFile,
        span: declaration.span,
        memberCount: declaration.members.length,
        ...(declaration.summary ? { summary: declaration.summary } : {})
    };
}

/**
 * Query surface over a source tree. Direct lookups and single-file analysis parse only the
 * files they need; aggregate queries go through the indexer, optionally via the cache.
 * Every method resolves to a {@link QueryOutcome}; only unexpected faults reject.
 */
export class SolutionSearchEngine {
    private indexer: SolutionIndexer;
    private cache: SolutionIndexCache;

    constructor(
        private readonly fileSystem: IFileSystem,
        private config: AnalyzerConfig = resolveAnalyzerConfig()
    ) {
        this.indexer = new SolutionIndexer(fileSystem, config);
        this.cache = new SolutionIndexCache(fileSystem, this.indexer, config.cache);
    }

    public getConfig(): AnalyzerConfig {
        return this.config;
    }

    /** Swaps the configuration; cached indexes built under the old one are dropped. */
    public updateConfig(config: AnalyzerConfig): void {
        this.cache.dispose();
        this.config = config;
        this.indexer = new SolutionIndexer(this.fileSystem, config);
        this.cache = new SolutionIndexCache(this.fileSystem, this.indexer, config.cache);
        logger.info("Configuration applied", { concurrency: config.indexing.concurrency, cache: config.cache.enabled });
    }

    public dispose(): void {
        this.cache.dispose();
    }

    public async findClass(
        root: string,
        className: string,
        mode: SearchMode = "direct",
        options: QueryOptions = {}
    ): Promise<QueryOutcome<FindClassResult>> {
        try {
            const name = className.trim();
            if (!IDENTIFIER_PATTERN.test(name)) {
                throw new AnalysisError("InvalidArgument", `className must be a type identifier, got "${className}"`, { className });
            }
            const rootPath = await this.resolveRoot(root);
            return success(mode === "deep"
                ? await this.findClassDeep(rootPath, name, options)
                : await this.findClassDirect(rootPath, name, options));
        } catch (error) {
            return toOutcome<FindClassResult>(error);
        }
    }

    public async findElements(
        root: string,
        kind: string,
        namePattern: string = "",
        options: QueryOptions = {}
    ): Promise<QueryOutcome<FindElementsResult>> {
        try {
            const elementKind = parseElementKind(kind);
            if (!elementKind) {
                throw new AnalysisError("InvalidArgument", `Unknown element kind "${kind}"`, {
                    kind,
                    accepted: Array.from(KIND_ALIASES.keys())
                });
            }
            const rootPath = await this.resolveRoot(root);
            const index = await this.cache.getOrBuild(rootPath, options);
            const needle = namePattern.trim().toLowerCase();
            const elements = (index.byKind.get(elementKind) ?? [])
                .filter(declaration => needle.length === 0 || declaration.name.toLowerCase().includes(needle))
                .map(declaration => structuredClone(declaration));
            return success({ kind: elementKind, namePattern, elements });
        } catch (error) {
            return toOutcome<FindElementsResult>(error);
        }
    }

    public async getFileWithAnalysis(root: string, filePath: string): Promise<QueryOutcome<FileAnalysis>> {
        try {
            if (filePath.trim().length === 0) {
                throw new AnalysisError("InvalidArgument", "filePath must not be empty", { filePath });
            }
            const rootPath = await this.resolveRoot(root);
            const normalizer = new PathNormalizer(rootPath, logger);
            if (!normalizer.isWithinRoot(filePath)) {
                throw new AnalysisError("NotFound", `File is outside the analysis root: ${filePath}`, { filePath, rootPath });
            }
            const relativePath = normalizer.normalize(filePath);
            const absolutePath = normalizer.toAbsolute(filePath);

            let stat: FileStats;
            try {
                stat = await this.fileSystem.stat(absolutePath);
            } catch (error) {
                throw fromFileSystemError(error, relativePath);
            }
            if (stat.isDirectory()) {
                throw new AnalysisError("NotFound", `Not a file: ${relativePath}`, { filePath: relativePath });
            }

            let file: FileContent;
            try {
                file = await this.fileSystem.readFile(absolutePath);
            } catch (error) {
                throw fromFileSystemError(error, relativePath);
            }

            const analyzed = this.indexer.isSourceFile(relativePath)
                ? this.indexer.analyzeText(file.content, relativePath)
                : undefined;
            return success({
                filePath: relativePath,
                content: file.content,
                encoding: file.encoding,
                size: stat.size,
                lines: countLines(file.content),
                document: analyzed?.document ?? null,
                warnings: analyzed?.warnings ?? []
            });
        } catch (error) {
            return toOutcome<FileAnalysis>(error);
        }
    }

    public async getSolutionStructure(root: string, options: QueryOptions = {}): Promise<QueryOutcome<SolutionStructure>> {
        try {
            const rootPath = await this.resolveRoot(root);
            const index = await this.cache.getOrBuild(rootPath, options);
            return success(this.describe(index));
        } catch (error) {
            return toOutcome<SolutionStructure>(error);
        }
    }

    private async findClassDirect(rootPath: string, className: string, options: QueryOptions): Promise<FindClassResult> {
        const collector = new SourceFileCollector(this.fileSystem, {
            extensions: this.config.extensions,
            excludePatterns: this.config.excludePatterns,
            patternRoot: this.config.patternRoot
        });
        const { sourceFiles } = await collector.collect(rootPath);
        throwIfAborted(options.signal, "file lookup");

        const baseName = (file: string) => path.posix.basename(file, path.posix.extname(file));
        let candidates = sourceFiles.filter(file => baseName(file) === className);
        if (candidates.length === 0) {
            const lower = className.toLowerCase();
            candidates = sourceFiles.filter(file => baseName(file).toLowerCase() === lower);
        }
        if (candidates.length === 0) {
            const hints = ErrorEnhancer.enhanceClassNotFound(className, sourceFiles.map(baseName), "direct");
            throw new AnalysisError("NotFound", `No source file named '${className}'`, { className, ...hints });
        }

        const filePath = candidates[0];
        const { document } = await this.indexer.analyzeFile(rootPath, filePath);
        const declaration = document.declarations.find(decl => decl.name === className)
            ?? document.declarations.find(decl => decl.name.toLowerCase() === className.toLowerCase());
        if (!declaration) {
            const hints = ErrorEnhancer.enhanceClassNotFound(
                className,
                document.declarations.map(decl => decl.name),
                "direct"
            );
            throw new AnalysisError("NotFound", `'${filePath}' does not declare '${className}'`, { className, filePath, ...hints });
        }

        return {
            className,
            mode: "direct",
            matches: [{ filePath, declaration, primary: true }],
            ambiguous: candidates.length > 1,
            candidateFiles: candidates
        };
    }

    private async findClassDeep(rootPath: string, className: string, options: QueryOptions): Promise<FindClassResult> {
        const index = await this.cache.getOrBuild(rootPath, options);
        const matches: ClassMatch[] = [];
        const knownNames: string[] = [];

        for (const [filePath, document] of index.byFile) {
            for (const declaration of document.declarations) {
                knownNames.push(declaration.name);
                if (declaration.name === className) {
                    matches.push({ filePath, declaration: structuredClone(declaration), primary: matches.length === 0 });
                }
            }
        }

        if (matches.length === 0) {
            const hints = ErrorEnhancer.enhanceClassNotFound(className, knownNames, "deep");
            throw new AnalysisError("NotFound", `No declaration named '${className}'`, { className, ...hints });
        }

        return {
            className,
            mode: "deep",
            matches,
            ambiguous: matches.length > 1,
            candidateFiles: Array.from(new Set(matches.map(match => match.filePath)))
        };
    }

    private describe(index: SolutionIndex): SolutionStructure {
        const namespaces = new Map<string, string[]>();
        for (const [namespace, declarations] of index.byNamespace) {
            namespaces.set(namespace, declarations.map(declaration => declaration.name));
        }
        const kindCounts = new Map<ElementKind, number>();
        const byKind = new Map<ElementKind, ElementSummary[]>();
        for (const [kind, declarations] of index.byKind) {
            kindCounts.set(kind, declarations.length);
            byKind.set(kind, declarations.map(summarizeDeclaration));
        }

        return {
            rootPath: index.rootPath,
            totalFiles: index.stats.totalFiles,
            namespaces,
            kindCounts,
            byKind,
            stats: index.stats,
            projects: index.projects,
            warnings: index.warnings
        };
    }

    private async resolveRoot(root: string): Promise<string> {
        const rootPath = path.resolve(root);
        let stat: FileStats;
        try {
            stat = await this.fileSystem.stat(rootPath);
        } catch (error) {
            const failure = fromFileSystemError(error, rootPath);
            throw failure.code === "NotFound"
                ? new AnalysisError("NotFound", `Analysis root does not exist: ${rootPath}`, { rootPath })
                : failure;
        }
        if (!stat.isDirectory()) {
            throw new AnalysisError("NotFound", `Analysis root is not a directory: ${rootPath}`, { rootPath });
        }
        return rootPath;
    }
}
