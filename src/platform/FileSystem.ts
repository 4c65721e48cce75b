import * as path from "path";
import { promises as fsPromises, constants as fsConstants } from "fs";
import * as chokidar from "chokidar";

export type FileChangeType = "create" | "update" | "delete";

export interface FileChangeEvent {
    path: string;
    type: FileChangeType;
}

export interface FileStats {
    size: number;
    mtime: number;
    isDirectory(): boolean;
}

export type TextEncoding = "utf-8" | "latin1";

export interface FileContent {
    content: string;
    encoding: TextEncoding;
}

export interface ListFilesOptions {
    /** Lower-case extensions including the dot. Empty or absent means every file. */
    extensions?: readonly string[];
    /** Called with the absolute directory path before descending. */
    shouldDescend?: (directoryPath: string) => boolean;
    /** Called with the absolute file path of an extension match. */
    shouldInclude?: (filePath: string) => boolean;
}

/**
 * Read-only view of a source tree. The analysis core never writes; paths are absolute
 * or relative to the root the implementation was created with.
 */
export interface IFileSystem {
    readFile(path: string): Promise<FileContent>;
    exists(path: string): Promise<boolean>;
    readDir(path: string): Promise<string[]>;
    stat(path: string): Promise<FileStats>;
    watch?(path: string, onChange: (event: FileChangeEvent) => void): () => void;

    listFiles(basePath: string, options?: ListFilesOptions): Promise<string[]>;
}

const UTF8_BOM = "\uFEFF";

/**
 * Strict UTF-8 first; bytes that are not valid UTF-8 are read as a single-byte
 * legacy encoding, which maps every byte to a code point.
 */
export function decodeSourceBytes(bytes: Uint8Array): FileContent {
    try {
        const decoded = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
        return {
            content: decoded.startsWith(UTF8_BOM) ? decoded.slice(1) : decoded,
            encoding: "utf-8"
        };
    } catch {
        return { content: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
    }
}

function matchesExtension(filePath: string, extensions?: readonly string[]): boolean {
    if (!extensions || extensions.length === 0) {
        return true;
    }
    return extensions.includes(path.extname(filePath).toLowerCase());
}

export class NodeFileSystem implements IFileSystem {
    private readonly rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    private resolvePath(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    async readFile(targetPath: string): Promise<FileContent> {
        const bytes = await fsPromises.readFile(this.resolvePath(targetPath));
        return decodeSourceBytes(bytes);
    }

    async exists(targetPath: string): Promise<boolean> {
        try {
            await fsPromises.access(this.resolvePath(targetPath), fsConstants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async readDir(targetPath: string): Promise<string[]> {
        return fsPromises.readdir(this.resolvePath(targetPath));
    }

    async stat(targetPath: string): Promise<FileStats> {
        const stats = await fsPromises.stat(this.resolvePath(targetPath));
        return {
            size: stats.size,
            mtime: stats.mtimeMs,
            isDirectory: () => stats.isDirectory(),
        };
    }

    watch(targetPath: string, onChange: (event: FileChangeEvent) => void): () => void {
        const resolved = this.resolvePath(targetPath);
        const watcher = chokidar.watch(resolved, {
            ignoreInitial: true,
            persistent: false,
            ignored: ["**/.git/**", "**/bin/**", "**/obj/**", "**/node_modules/**"]
        });
        watcher.on("add", filePath => onChange({ path: filePath, type: "create" }));
        watcher.on("addDir", dirPath => onChange({ path: dirPath, type: "create" }));
        watcher.on("change", filePath => onChange({ path: filePath, type: "update" }));
        watcher.on("unlink", filePath => onChange({ path: filePath, type: "delete" }));
        watcher.on("unlinkDir", dirPath => onChange({ path: dirPath, type: "delete" }));
        watcher.on("error", error => {
            console.warn(`[FileSystem] watcher error for ${resolved}`, error);
        });
        return () => {
            void watcher.close();
        };
    }

    async listFiles(basePath: string, options: ListFilesOptions = {}): Promise<string[]> {
        const results: string[] = [];
        const resolvedBasePath = this.resolvePath(basePath);
        const entries = await fsPromises.readdir(resolvedBasePath, { withFileTypes: true });

        for (const entry of entries) {
            if (entry.isSymbolicLink()) {
                continue;
            }
            const entryPath = path.join(resolvedBasePath, entry.name);
            if (entry.isDirectory()) {
                if (options.shouldDescend && !options.shouldDescend(entryPath)) {
                    continue;
                }
                let nested: string[];
                try {
                    nested = await this.listFiles(entryPath, options);
                } catch {
                    // unreadable subdirectory: skip it, keep the rest of the walk
                    continue;
                }
                results.push(...nested);
            } else if (entry.isFile() && matchesExtension(entryPath, options.extensions)) {
                if (options.shouldInclude && !options.shouldInclude(entryPath)) {
                    continue;
                }
                results.push(entryPath);
            }
        }
        return results;
    }
}

interface MemoryFileEntry {
    bytes: Buffer;
    mtime: number;
}

interface MemoryDirectoryEntry {
    mtime: number;
}

type Watcher = {
    path: string;
    callback: (event: FileChangeEvent) => void;
};

/**
 * In-process file tree used by tests. Mutation helpers notify watchers synchronously.
 */
export class MemoryFileSystem implements IFileSystem {
    private readonly rootPath: string;
    private readonly files = new Map<string, MemoryFileEntry>();
    private readonly directories = new Map<string, MemoryDirectoryEntry>();
    private readonly unreadable = new Set<string>();
    private readonly watchers = new Map<number, Watcher>();
    private watcherSeq = 0;
    private clock = 1;

    constructor(rootPath: string = process.cwd()) {
        this.rootPath = path.resolve(rootPath);
        this.directories.set(this.rootPath, { mtime: this.tick() });
    }

    private tick(): number {
        this.clock += 1;
        return this.clock;
    }

    private resolvePath(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    private ensureParentDirectories(targetPath: string): void {
        let current = path.dirname(targetPath);
        while (!this.directories.has(current)) {
            this.directories.set(current, { mtime: this.tick() });
            const next = path.dirname(current);
            if (next === current) {
                break;
            }
            current = next;
        }
    }

    private notifyWatchers(targetPath: string, type: FileChangeType): void {
        for (const watcher of this.watchers.values()) {
            if (targetPath === watcher.path || targetPath.startsWith(watcher.path + path.sep)) {
                watcher.callback({ path: targetPath, type });
            }
        }
    }

    async writeFile(targetPath: string, content: string | Buffer): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        this.ensureParentDirectories(resolved);
        const existed = this.files.has(resolved);
        this.files.set(resolved, {
            bytes: typeof content === "string" ? Buffer.from(content, "utf-8") : content,
            mtime: this.tick(),
        });
        this.notifyWatchers(resolved, existed ? "update" : "create");
    }

    async deleteFile(targetPath: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        if (!this.files.delete(resolved)) {
            throw createErrno("ENOENT", `no such file, unlink '${resolved}'`);
        }
        this.notifyWatchers(resolved, "delete");
    }

    async createDir(targetPath: string): Promise<void> {
        const resolved = this.resolvePath(targetPath);
        this.ensureParentDirectories(resolved);
        const existed = this.directories.has(resolved);
        this.directories.set(resolved, { mtime: this.tick() });
        this.notifyWatchers(resolved, existed ? "update" : "create");
    }

    /** Makes subsequent reads of the file fail with EACCES. */
    denyRead(targetPath: string): void {
        this.unreadable.add(this.resolvePath(targetPath));
    }

    async readFile(targetPath: string): Promise<FileContent> {
        const resolved = this.resolvePath(targetPath);
        if (this.unreadable.has(resolved)) {
            throw createErrno("EACCES", `permission denied, open '${resolved}'`);
        }
        const entry = this.files.get(resolved);
        if (!entry) {
            throw createErrno("ENOENT", `no such file, open '${resolved}'`);
        }
        return decodeSourceBytes(entry.bytes);
    }

    async exists(targetPath: string): Promise<boolean> {
        const resolved = this.resolvePath(targetPath);
        return this.files.has(resolved) || this.directories.has(resolved);
    }

    async readDir(targetPath: string): Promise<string[]> {
        const resolved = this.resolvePath(targetPath);
        if (!this.directories.has(resolved)) {
            throw createErrno("ENOENT", `no such directory, scandir '${resolved}'`);
        }
        const entries = new Set<string>();
        for (const filePath of this.files.keys()) {
            if (path.dirname(filePath) === resolved) {
                entries.add(path.basename(filePath));
            }
        }
        for (const dirPath of this.directories.keys()) {
            if (dirPath === resolved) continue;
            if (path.dirname(dirPath) === resolved) {
                entries.add(path.basename(dirPath));
            }
        }
        return Array.from(entries.values()).sort();
    }

    async stat(targetPath: string): Promise<FileStats> {
        const resolved = this.resolvePath(targetPath);
        const file = this.files.get(resolved);
        if (file) {
            return {
                size: file.bytes.length,
                mtime: file.mtime,
                isDirectory: () => false,
            };
        }
        const directory = this.directories.get(resolved);
        if (directory) {
            return {
                size: 0,
                mtime: directory.mtime,
                isDirectory: () => true,
            };
        }
        throw createErrno("ENOENT", `no such file or directory, stat '${resolved}'`);
    }

    watch(targetPath: string, onChange: (event: FileChangeEvent) => void): () => void {
        const resolved = this.resolvePath(targetPath);
        const id = ++this.watcherSeq;
        this.watchers.set(id, { path: resolved, callback: onChange });
        return () => {
            this.watchers.delete(id);
        };
    }

    get watcherCount(): number {
        return this.watchers.size;
    }

    async listFiles(basePath: string, options: ListFilesOptions = {}): Promise<string[]> {
        const resolvedBasePath = this.resolvePath(basePath);
        const results: string[] = [];

        for (const entry of await this.readDir(resolvedBasePath)) {
            const entryPath = path.join(resolvedBasePath, entry);
            if (this.directories.has(entryPath)) {
                if (options.shouldDescend && !options.shouldDescend(entryPath)) {
                    continue;
                }
                results.push(...await this.listFiles(entryPath, options));
            } else if (matchesExtension(entryPath, options.extensions)) {
                if (options.shouldInclude && !options.shouldInclude(entryPath)) {
                    continue;
                }
                results.push(entryPath);
            }
        }
        return results;
    }
}

function createErrno(code: string, message: string): NodeJS.ErrnoException {
    const error: NodeJS.ErrnoException = new Error(`${code}: ${message}`);
    error.code = code;
    return error;
}
