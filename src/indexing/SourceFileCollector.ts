import * as path from "path";
import ignore from "ignore";
import type { IFileSystem } from "../platform/FileSystem.js";
import { toPosix } from "../utils/PathNormalizer.js";

export const PROJECT_FILE_EXTENSION = ".csproj";

export interface CollectedFiles {
    /** Root-relative, forward-slash paths in ascending order. */
    sourceFiles: string[];
    projectFiles: string[];
}

export interface SourceFileCollectorOptions {
    extensions: readonly string[];
    excludePatterns: readonly string[];
    /**
     * Directory the patterns are written against. Paths under it are matched relative to it,
     * anything else relative to the collected root. Defaults to the collected root.
     */
    patternRoot?: string;
}

/**
 * Enumerates analysis candidates under a root. Exclusions use gitignore semantics and are
 * applied while walking, so excluded directories are never entered.
 */
export class SourceFileCollector {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly options: SourceFileCollectorOptions
    ) {}

    async collect(rootPath: string): Promise<CollectedFiles> {
        const root = path.resolve(rootPath);
        const filter = ignore().add([...this.options.excludePatterns]);
        const relative = (absolutePath: string) => toPosix(path.relative(root, absolutePath));
        const base = this.options.patternRoot === undefined ? root : path.resolve(this.options.patternRoot);
        const patternPath = (absolutePath: string) => {
            const fromBase = toPosix(path.relative(base, absolutePath));
            return fromBase.length === 0 || isOutside(fromBase) ? relative(absolutePath) : fromBase;
        };
        const sourceExtensions = this.options.extensions.map(ext => ext.toLowerCase());

        const files = await this.fileSystem.listFiles(root, {
            extensions: [...sourceExtensions, PROJECT_FILE_EXTENSION],
            shouldDescend: directory => {
                const rel = relative(directory);
                return rel.length === 0 || !filter.ignores(`${patternPath(directory)}/`);
            },
            shouldInclude: file => {
                const rel = relative(file);
                return rel.length > 0 && !isOutside(rel) && !filter.ignores(patternPath(file));
            }
        });

        const sourceFiles: string[] = [];
        const projectFiles: string[] = [];
        for (const file of files) {
            const rel = relative(file);
            const extension = path.extname(rel).toLowerCase();
            if (extension === PROJECT_FILE_EXTENSION) {
                projectFiles.push(rel);
            }
            if (sourceExtensions.includes(extension)) {
                sourceFiles.push(rel);
            }
        }

        return {
            sourceFiles: sourceFiles.sort(comparePaths),
            projectFiles: projectFiles.sort(comparePaths)
        };
    }
}

/** `..` segments only; a file named `..Foo.cs` is inside. */
function isOutside(relativePath: string): boolean {
    return relativePath === ".." || relativePath.startsWith("../") || path.isAbsolute(relativePath);
}

/** Code-unit order, independent of locale. */
export function comparePaths(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
