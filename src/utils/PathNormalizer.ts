import * as path from "path";
import type { Logger } from "./StructuredLogger.js";

/**
 * PathNormalizer
 *
 * Callers hand in absolute paths (IDE integrations) or root-relative ones (CLI agents).
 * Every path is normalized to a forward-slash path relative to the analysis root, and
 * anything that escapes the root is rejected.
 *
 * - `/work/app/src/Foo.cs` with root `/work/app` → `src/Foo.cs`
 * - `src/../src/Foo.cs` → `src/Foo.cs`
 * - `../other/Foo.cs` → rejected
 */
export class PathNormalizer {
    private readonly rootDir: string;

    constructor(rootDir: string, private readonly logger?: Logger) {
        this.rootDir = path.resolve(rootDir);
    }

    /**
     * @throws {Error} when the path resolves outside the root
     */
    normalize(inputPath: string): string {
        if (!inputPath || inputPath.trim().length === 0) {
            throw new Error(`Invalid input path: "${inputPath}"`);
        }

        const absolutePath = this.toAbsolute(inputPath);
        if (!this.contains(absolutePath)) {
            this.logger?.warn("Path is outside root directory", {
                inputPath,
                absolutePath,
                rootDir: this.rootDir
            });
            throw new Error(
                `SecurityViolation: Path "${inputPath}" is outside the allowed root directory "${this.rootDir}".`
            );
        }

        const relativePath = toPosix(path.relative(this.rootDir, absolutePath));
        return relativePath === "" ? "." : relativePath;
    }

    toAbsolute(inputPath: string): string {
        return path.isAbsolute(inputPath)
            ? path.normalize(inputPath)
            : path.resolve(this.rootDir, inputPath);
    }

    isWithinRoot(inputPath: string): boolean {
        if (!inputPath || inputPath.trim().length === 0) {
            return false;
        }
        return this.contains(this.toAbsolute(inputPath));
    }

    getRootDir(): string {
        return this.rootDir;
    }

    private contains(absolutePath: string): boolean {
        const normalizedPath = toPosix(absolutePath);
        const normalizedRoot = toPosix(this.rootDir).replace(/\/+$/, "");
        return normalizedPath === normalizedRoot || normalizedPath.startsWith(normalizedRoot + "/");
    }
}

export function toPosix(value: string): string {
    return value.split(path.sep).join("/");
}
