import * as crypto from "crypto";
import * as path from "path";
import { StructuralParser } from "../ast/StructuralParser.js";
import type { AnalyzerConfig } from "../config/AnalyzerConfig.js";
import { resolveAnalyzerConfig } from "../config/AnalyzerConfig.js";
import { ElementClassifier } from "../engine/ElementClassifier.js";
import {
    AnalysisError,
    fromFileSystemError,
    isCancelled,
    throwIfAborted
} from "../errors/AnalysisError.js";
import type { FileContent, FileStats, IFileSystem } from "../platform/FileSystem.js";
import type {
    AnalyzedDocument,
    ClassifiedDeclaration,
    ElementKind,
    IndexWarning,
    ParseWarning,
    ProjectInfo,
    SolutionIndex,
    SolutionStats
} from "../types.js";
import { ELEMENT_KINDS, GLOBAL_NAMESPACE } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { ParseQueue } from "./ParseQueue.js";
import type { CollectedFiles } from "./SourceFileCollector.js";
import { comparePaths, SourceFileCollector } from "./SourceFileCollector.js";

const logger = createLogger("SolutionIndexer");

export interface BuildOptions {
    /** Replaces the configured exclude patterns for this build. */
    excludePatterns?: readonly string[];
    signal?: AbortSignal;
}

export interface TreeSnapshot {
    rootPath: string;
    files: CollectedFiles;
    stats: Map<string, FileStats>;
    fingerprint: string;
}

export interface AnalyzedFile {
    document: AnalyzedDocument;
    warnings: ParseWarning[];
}

interface FileSlot {
    file: string;
    document?: AnalyzedDocument;
    warnings: IndexWarning[];
}

export function compareDeclarations(a: ClassifiedDeclaration, b: ClassifiedDeclaration): number {
    return comparePaths(a.containingFile, b.containingFile) || a.span.startLine - b.span.startLine;
}

/**
 * Builds a {@link SolutionIndex} for one root: parallel per-file parse and classification
 * into private slots, then a single ordered merge. The returned index is never mutated.
 */
export class SolutionIndexer {
    private readonly parser = new StructuralParser();
    private readonly classifier: ElementClassifier;

    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly config: AnalyzerConfig = resolveAnalyzerConfig()
    ) {
        this.classifier = new ElementClassifier(config.classification);
    }

    public get extensions(): readonly string[] {
        return this.config.extensions;
    }

    public isSourceFile(filePath: string): boolean {
        return this.config.extensions.includes(path.extname(filePath).toLowerCase());
    }

    public async build(rootPath: string, options: BuildOptions = {}): Promise<SolutionIndex> {
        const startedAt = Date.now();
        const { signal } = options;
        throwIfAborted(signal, "enumeration");

        const snapshot = await this.snapshot(rootPath, options);
        const { sourceFiles, projectFiles } = snapshot.files;
        const queue = new ParseQueue({ concurrency: this.config.indexing.concurrency, signal });
        const slots: FileSlot[] = new Array(sourceFiles.length);

        const settled = await Promise.allSettled(sourceFiles.map((file, index) =>
            queue.run(async () => {
                throwIfAborted(signal, file);
                slots[index] = await this.processFile(snapshot, file);
            }, { label: file })
        ));

        throwIfAborted(signal, "merge");
        for (const outcome of settled) {
            if (outcome.status === "rejected" && !isCancelled(outcome.reason)) {
                throw outcome.reason;
            }
        }

        const index = this.merge(snapshot, slots, projectFiles);
        logger.info("Solution index built", {
            rootPath: snapshot.rootPath,
            files: sourceFiles.length,
            declarations: Array.from(index.byKind.values()).reduce((sum, bucket) => sum + bucket.length, 0),
            warnings: index.warnings.length,
            concurrency: queue.peak,
            durationMs: Date.now() - startedAt
        });
        return index;
    }

    /**
     * Enumerates the tree and stats every candidate. The fingerprint changes whenever a
     * candidate file is added, removed, resized or touched.
     */
    public async snapshot(rootPath: string, options: BuildOptions = {}): Promise<TreeSnapshot> {
        const root = path.resolve(rootPath);
        await this.assertDirectory(root);

        const collector = new SourceFileCollector(this.fileSystem, {
            extensions: this.config.extensions,
            excludePatterns: options.excludePatterns ?? this.config.excludePatterns,
            patternRoot: this.config.patternRoot
        });
        const files = await collector.collect(root);
        throwIfAborted(options.signal, "enumeration");

        const stats = new Map<string, FileStats>();
        const hash = crypto.createHash("sha1");
        for (const file of [...files.sourceFiles, ...files.projectFiles]) {
            try {
                const stat = await this.fileSystem.stat(path.join(root, file));
                stats.set(file, stat);
                hash.update(`${file}:${stat.size}:${stat.mtime}\n`);
            } catch {
                hash.update(`${file}:missing\n`);
            }
        }

        return { rootPath: root, files, stats, fingerprint: hash.digest("hex") };
    }

    /** Parses and classifies one file without building an index. */
    public async analyzeFile(rootPath: string, relativePath: string): Promise<AnalyzedFile & FileContent> {
        const absolutePath = path.join(path.resolve(rootPath), relativePath);
        let file: FileContent;
        try {
            file = await this.fileSystem.readFile(absolutePath);
        } catch (error) {
            throw fromFileSystemError(error, relativePath);
        }
        return { ...this.analyzeText(file.content, relativePath), content: file.content, encoding: file.encoding };
    }

    public analyzeText(text: string, relativePath: string): AnalyzedFile {
        const { document, warnings } = this.parser.parse(text, relativePath);
        const namespace = document.namespace;
        const declarations = document.declarations.map((declaration): ClassifiedDeclaration => ({
            ...declaration,
            elementKind: this.classifier.classify(declaration, { fileName: relativePath, namespace }),
            ...(namespace ? { namespace } : {})
        }));
        return { document: { ...document, declarations }, warnings };
    }

    private async assertDirectory(root: string): Promise<void> {
        let stat: FileStats;
        try {
            stat = await this.fileSystem.stat(root);
        } catch (error) {
            throw fromFileSystemError(error, root);
        }
        if (!stat.isDirectory()) {
            throw new AnalysisError("NotFound", `Analysis root is not a directory: ${root}`, { rootPath: root });
        }
    }

    private async processFile(snapshot: TreeSnapshot, file: string): Promise<FileSlot> {
        const stat = snapshot.stats.get(file);
        if (stat && stat.size > this.config.indexing.maxFileBytes) {
            return {
                file,
                warnings: [{
                    file,
                    code: "TooLarge",
                    message: `Skipped ${stat.size} bytes (limit ${this.config.indexing.maxFileBytes})`
                }]
            };
        }

        let analyzed: AnalyzedFile;
        try {
            analyzed = await this.analyzeFile(snapshot.rootPath, file);
        } catch (error) {
            const failure = error instanceof AnalysisError ? error : fromFileSystemError(error, file);
            logger.warn("File skipped", { file, code: failure.code, message: failure.message });
            return {
                file,
                warnings: [{
                    file,
                    code: failure.code === "PermissionDenied" ? "PermissionDenied" : "ReadFailed",
                    message: failure.message
                }]
            };
        }

        return {
            file,
            document: analyzed.document,
            warnings: analyzed.warnings.map(warning => ({
                file,
                code: "ParseWarning",
                message: `${warning.code}: ${warning.message}`,
                range: warning.range
            }))
        };
    }

    private merge(snapshot: TreeSnapshot, slots: FileSlot[], projectFiles: string[]): SolutionIndex {
        const byFile = new Map<string, AnalyzedDocument>();
        const namespaces = new Map<string, ClassifiedDeclaration[]>();
        const kinds = new Map<ElementKind, ClassifiedDeclaration[]>();
        const warnings: IndexWarning[] = [];
        const stats: SolutionStats = {
            totalFiles: slots.length,
            totalClasses: 0,
            totalInterfaces: 0,
            totalEnums: 0,
            totalRecords: 0,
            totalStructs: 0,
            totalMethods: 0,
            totalProperties: 0,
            totalFields: 0,
            totalLines: 0
        };

        for (const slot of slots) {
            warnings.push(...slot.warnings);
            const document = slot.document;
            if (!document) continue;

            byFile.set(slot.file, document);
            stats.totalLines += document.metrics.totalLines;
            for (const declaration of document.declarations) {
                appendTo(namespaces, declaration.namespace ?? GLOBAL_NAMESPACE, declaration);
                appendTo(kinds, declaration.elementKind, declaration);
                switch (declaration.kind) {
                    case "class": stats.totalClasses++; break;
                    case "interface": stats.totalInterfaces++; break;
                    case "enum": stats.totalEnums++; break;
                    case "record": stats.totalRecords++; break;
                    case "struct": stats.totalStructs++; break;
                }
                for (const member of declaration.members) {
                    if (member.kind === "method") stats.totalMethods++;
                    else if (member.kind === "property") stats.totalProperties++;
                    else if (member.kind === "field") stats.totalFields++;
                }
            }
        }

        const byNamespace = new Map<string, ClassifiedDeclaration[]>();
        for (const key of Array.from(namespaces.keys()).sort(comparePaths)) {
            byNamespace.set(key, (namespaces.get(key) ?? []).sort(compareDeclarations));
        }
        const byKind = new Map<ElementKind, ClassifiedDeclaration[]>();
        for (const kind of ELEMENT_KINDS) {
            const bucket = kinds.get(kind);
            if (bucket) {
                byKind.set(kind, bucket.sort(compareDeclarations));
            }
        }

        return {
            rootPath: snapshot.rootPath,
            byNamespace,
            byKind,
            byFile,
            stats,
            warnings,
            projects: assignProjects(projectFiles, Array.from(byFile.keys())),
            fingerprint: snapshot.fingerprint,
            builtAt: Date.now()
        };
    }
}

function appendTo<K>(map: Map<K, ClassifiedDeclaration[]>, key: K, declaration: ClassifiedDeclaration): void {
    const bucket = map.get(key);
    if (bucket) {
        bucket.push(declaration);
    } else {
        map.set(key, [declaration]);
    }
}

/** Each source file belongs to the project whose directory is its longest prefix. */
export function assignProjects(projectFiles: string[], sourceFiles: string[]): ProjectInfo[] {
    const projects: ProjectInfo[] = projectFiles.map(projectFile => ({
        name: path.posix.basename(projectFile, path.posix.extname(projectFile)),
        projectFile,
        directory: path.posix.dirname(projectFile),
        files: []
    }));

    for (const file of sourceFiles) {
        let owner: ProjectInfo | undefined;
        for (const project of projects) {
            const contains = project.directory === "." || file.startsWith(`${project.directory}/`);
            const depth = project.directory === "." ? 0 : project.directory.length;
            const ownerDepth = owner === undefined ? -1 : owner.directory === "." ? 0 : owner.directory.length;
            if (contains && depth > ownerDepth) {
                owner = project;
            }
        }
        owner?.files.push(file);
    }
    return projects;
}
