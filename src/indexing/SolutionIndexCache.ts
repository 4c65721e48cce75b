import * as path from "path";
import { LRUCache } from "lru-cache";
import type { IFileSystem } from "../platform/FileSystem.js";
import type { SolutionIndex } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import type { BuildOptions, SolutionIndexer } from "./SolutionIndexer.js";

const logger = createLogger("SolutionIndexCache");

export interface SolutionIndexCacheOptions {
    enabled: boolean;
    maxEntries: number;
    /** 0 keeps entries until they are evicted or invalidated. */
    ttlMs: number;
}

export interface CacheStats {
    hits: number;
    misses: number;
    invalidations: number;
}

/**
 * Keeps built indexes per resolved root. An entry is dropped when the file system reports
 * a change under its root, and every read re-checks the tree fingerprint before serving it.
 * Builds with explicit exclude patterns bypass the cache.
 */
export class SolutionIndexCache {
    private readonly entries: LRUCache<string, SolutionIndex>;
    private readonly unwatchers = new Map<string, () => void>();
    private readonly counters: CacheStats = { hits: 0, misses: 0, invalidations: 0 };

    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly indexer: SolutionIndexer,
        private readonly options: SolutionIndexCacheOptions
    ) {
        this.entries = new LRUCache<string, SolutionIndex>({
            max: options.maxEntries,
            ...(options.ttlMs > 0 ? { ttl: options.ttlMs } : {}),
            dispose: (_index, root) => this.unwatch(root)
        });
    }

    public get stats(): CacheStats {
        return { ...this.counters };
    }

    public get size(): number {
        return this.entries.size;
    }

    public has(rootPath: string): boolean {
        return this.entries.has(path.resolve(rootPath));
    }

    public async getOrBuild(rootPath: string, options: BuildOptions = {}): Promise<SolutionIndex> {
        const root = path.resolve(rootPath);
        if (!this.options.enabled || options.excludePatterns !== undefined) {
            return this.indexer.build(root, options);
        }

        const cached = this.entries.get(root);
        if (cached) {
            const snapshot = await this.indexer.snapshot(root, options);
            if (snapshot.fingerprint === cached.fingerprint) {
                this.counters.hits++;
                return cached;
            }
            logger.debug("Fingerprint changed, rebuilding", { rootPath: root });
            this.invalidate(root);
        }

        this.counters.misses++;
        const index = await this.indexer.build(root, options);
        this.entries.set(root, index);
        this.watch(root);
        return index;
    }

    public invalidate(rootPath?: string): void {
        if (rootPath === undefined) {
            this.counters.invalidations += this.entries.size;
            this.entries.clear();
            return;
        }
        if (this.entries.delete(path.resolve(rootPath))) {
            this.counters.invalidations++;
        }
    }

    /** Drops every entry whose root contains the changed path. */
    public invalidatePath(changedPath: string): void {
        const target = path.resolve(changedPath);
        for (const root of Array.from(this.entries.keys())) {
            if (target === root || target.startsWith(root + path.sep)) {
                logger.debug("Index invalidated", { rootPath: root, changedPath: target });
                this.invalidate(root);
            }
        }
    }

    public dispose(): void {
        this.entries.clear();
        for (const unwatch of this.unwatchers.values()) {
            unwatch();
        }
        this.unwatchers.clear();
    }

    private watch(root: string): void {
        if (!this.fileSystem.watch || this.unwatchers.has(root)) {
            return;
        }
        const unwatch = this.fileSystem.watch(root, event => this.invalidatePath(event.path));
        this.unwatchers.set(root, unwatch);
    }

    private unwatch(root: string): void {
        const unwatch = this.unwatchers.get(root);
        if (unwatch) {
            this.unwatchers.delete(root);
            unwatch();
        }
    }
}
