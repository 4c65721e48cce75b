import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_EXCLUDE_PATTERNS } from "../../config/AnalyzerConfig.js";
import type { ConfigurationEventPayloads } from "../../config/ConfigurationManager.js";
import { CONFIG_FILE, ConfigurationManager } from "../../config/ConfigurationManager.js";

describe("ConfigurationManager", () => {
    let rootDir: string;
    let manager: ConfigurationManager | undefined;

    const writeFile = (relativePath: string, content: string) => {
        const target = path.join(rootDir, relativePath);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content, "utf-8");
    };

    const open = (env: NodeJS.ProcessEnv = {}) => {
        manager = new ConfigurationManager(rootDir, { env, watch: false });
        return manager;
    };

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "solution-map-config-"));
    });

    afterEach(async () => {
        await manager?.dispose();
        manager = undefined;
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it("uses defaults without a configuration file", () => {
        const current = open();
        const config = current.getConfig();

        expect(config.extensions).toEqual([".cs"]);
        expect(config.indexing).toEqual({ concurrency: 8, maxFileBytes: 2 * 1024 * 1024 });
        expect(config.cache).toEqual({ enabled: true, maxEntries: 8, ttlMs: 600_000 });
        expect(current.getExcludePatterns()).toEqual(DEFAULT_EXCLUDE_PATTERNS);
    });

    it("reads the configuration file and normalizes extensions", () => {
        writeFile(CONFIG_FILE, JSON.stringify({
            extensions: ["CS", ".csx"],
            excludePatterns: ["gen/"],
            indexing: { concurrency: 2 }
        }));

        const config = open().getConfig();

        expect(config.extensions).toEqual([".cs", ".csx"]);
        expect(config.excludePatterns).toEqual(["gen/"]);
        expect(config.indexing.concurrency).toBe(2);
    });

    it("falls back to defaults for an invalid file", () => {
        writeFile(CONFIG_FILE, JSON.stringify({ indexing: { concurrency: 0 } }));
        expect(open().getConfig().indexing.concurrency).toBe(8);

        writeFile(CONFIG_FILE, "{ not json");
        expect(open().getConfig().indexing.concurrency).toBe(8);
    });

    it("applies environment overrides on top of the file", () => {
        writeFile(CONFIG_FILE, JSON.stringify({ indexing: { concurrency: 2 } }));

        const config = open({ SOLUTION_MAP_CONCURRENCY: "3", SOLUTION_MAP_CACHE: "false" }).getConfig();

        expect(config.indexing.concurrency).toBe(3);
        expect(config.cache.enabled).toBe(false);
    });

    it("collects ignore files relative to their directory", () => {
        writeFile(".gitignore", "# build output\n/Generated/\n*.tmp.cs\n");
        writeFile("sub/.mcpignore", "!Keep.cs\nlocal/\n");
        writeFile("bin/.gitignore", "skipped/\n");

        const current = open();

        expect(current.getIgnoreGlobs()).toEqual(["Generated/", "*.tmp.cs", "!sub/Keep.cs", "sub/local/"]);
        expect(current.getExcludePatterns()).toEqual([
            ...DEFAULT_EXCLUDE_PATTERNS,
            "Generated/",
            "*.tmp.cs",
            "!sub/Keep.cs",
            "sub/local/"
        ]);
    });

    it("reloads and notifies when the configuration file changes", () => {
        const current = open();
        const events: Array<ConfigurationEventPayloads["configChanged"]> = [];
        current.on("configChanged", payload => events.push(payload));

        writeFile(CONFIG_FILE, JSON.stringify({ cache: { enabled: false } }));
        current.handleConfigChange(path.join(rootDir, CONFIG_FILE));

        expect(events).toHaveLength(1);
        expect(events[0].config.cache.enabled).toBe(false);
        expect(current.getConfig().cache.enabled).toBe(false);
    });

    it("reloads ignore patterns and ignores unrelated files", () => {
        const current = open();
        const patterns: string[][] = [];
        current.on("ignoreChanged", payload => patterns.push(payload.patterns));

        writeFile(".mcpignore", "Scratch/\n");
        current.handleConfigChange(path.join(rootDir, ".mcpignore"));
        current.handleConfigChange(path.join(rootDir, "README.md"));

        expect(patterns).toEqual([["Scratch/"]]);
    });
});
