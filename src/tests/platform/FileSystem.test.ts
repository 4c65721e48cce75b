import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { FileChangeEvent } from "../../platform/FileSystem.js";
import { MemoryFileSystem, NodeFileSystem, decodeSourceBytes } from "../../platform/FileSystem.js";

describe("decodeSourceBytes", () => {
    it("strips a UTF-8 byte order mark", () => {
        expect(decodeSourceBytes(Buffer.from("\uFEFFclass A { }", "utf-8"))).toEqual({
            content: "class A { }",
            encoding: "utf-8"
        });
    });

    it("reads invalid UTF-8 as latin1", () => {
        expect(decodeSourceBytes(Buffer.from([0x63, 0xe9]))).toEqual({ content: "cé", encoding: "latin1" });
    });
});

describe("NodeFileSystem", () => {
    let rootDir: string;

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "solution-map-fs-"));
        fs.mkdirSync(path.join(rootDir, "src", "bin"), { recursive: true });
        fs.writeFileSync(path.join(rootDir, "src", "A.cs"), "\uFEFFclass A { }");
        fs.writeFileSync(path.join(rootDir, "src", "notes.txt"), "notes");
        fs.writeFileSync(path.join(rootDir, "src", "bin", "B.cs"), "class B { }");
    });

    afterEach(() => {
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it("reads files relative to the root", async () => {
        const fileSystem = new NodeFileSystem(rootDir);

        expect(await fileSystem.readFile("src/A.cs")).toEqual({ content: "class A { }", encoding: "utf-8" });
        expect(await fileSystem.exists("src/missing.cs")).toBe(false);
        expect((await fileSystem.stat("src")).isDirectory()).toBe(true);
    });

    it("lists matching files and honours the descend filter", async () => {
        const fileSystem = new NodeFileSystem(rootDir);

        const files = await fileSystem.listFiles(rootDir, {
            extensions: [".cs"],
            shouldDescend: directory => path.basename(directory) !== "bin"
        });

        expect(files).toEqual([path.join(rootDir, "src", "A.cs")]);
    });
});

describe("MemoryFileSystem", () => {
    it("notifies watchers under the watched path until unsubscribed", async () => {
        const fileSystem = new MemoryFileSystem("/mem");
        const events: FileChangeEvent[] = [];
        const unwatch = fileSystem.watch("/mem/src", event => events.push(event));

        await fileSystem.writeFile("/mem/src/A.cs", "class A { }");
        await fileSystem.writeFile("/mem/src/A.cs", "class A { int x; }");
        await fileSystem.writeFile("/mem/other/B.cs", "class B { }");
        await fileSystem.deleteFile("/mem/src/A.cs");
        unwatch();
        await fileSystem.writeFile("/mem/src/C.cs", "class C { }");

        expect(events).toEqual([
            { path: "/mem/src/A.cs", type: "create" },
            { path: "/mem/src/A.cs", type: "update" },
            { path: "/mem/src/A.cs", type: "delete" }
        ]);
        expect(fileSystem.watcherCount).toBe(0);
    });

    it("fails like the real file system", async () => {
        const fileSystem = new MemoryFileSystem("/mem");
        await fileSystem.writeFile("/mem/Secret.cs", "class Secret { }");
        fileSystem.denyRead("/mem/Secret.cs");

        await expect(fileSystem.readFile("/mem/Secret.cs")).rejects.toMatchObject({ code: "EACCES" });
        await expect(fileSystem.stat("/mem/Nope.cs")).rejects.toMatchObject({ code: "ENOENT" });
        await expect(fileSystem.readDir("/mem/Secret.cs")).rejects.toMatchObject({ code: "ENOENT" });
    });
});
