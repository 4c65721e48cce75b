import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { SolutionMapServer } from "../index.js";

describe("SolutionMapServer", () => {
    let rootDir: string;
    let server: SolutionMapServer;

    const writeFile = (relativePath: string, content: string) => {
        const target = path.join(rootDir, relativePath);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content, "utf-8");
    };

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "solution-map-server-"));
        writeFile("Shop.csproj", "<Project />");
        writeFile("Orders/OrderService.cs", "namespace Shop.Orders;\npublic class OrderService { }");
        writeFile("bin/Debug/Copy.cs", "public class OrderService { }");
        writeFile("Generated/Auto.cs", "public class Auto { }");
        writeFile(".gitignore", "Generated/\n");
        writeFile(".solution-map.json", JSON.stringify({ cache: { enabled: false } }));
        server = new SolutionMapServer(rootDir, { env: { NODE_ENV: "test" } });
    });

    afterEach(async () => {
        await server.shutdown();
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it("applies configuration and ignore files from the root", async () => {
        const config = server.getEngine().getConfig();

        expect(config.cache.enabled).toBe(false);
        expect(config.excludePatterns).toContain("Generated/");
    });

    it("answers tool calls against the real file system", async () => {
        const handlers = server.getToolHandlers();

        const structure = JSON.parse((await handlers.handle("get_solution_structure", {})).content[0].text);
        expect(structure.totalFiles).toBe(1);
        expect(structure.namespaces).toEqual({ "Shop.Orders": ["OrderService"] });
        expect(structure.projects).toEqual([{
            name: "Shop",
            projectFile: "Shop.csproj",
            directory: ".",
            files: ["Orders/OrderService.cs"]
        }]);

        const found = JSON.parse((await handlers.handle("find_class", { className: "OrderService", searchType: "deep" })).content[0].text);
        expect(found.candidateFiles).toEqual(["Orders/OrderService.cs"]);
    });

    it("applies nested ignore files to queries rooted in a subdirectory", async () => {
        writeFile("Orders/Scaffold/Stub.cs", "public class Stub { }");
        writeFile("Orders/.gitignore", "Scaffold/\n");
        const scoped = new SolutionMapServer(rootDir, { env: { NODE_ENV: "test" } });
        try {
            const handlers = scoped.getToolHandlers();

            const structure = JSON.parse((await handlers.handle("get_solution_structure", { root: "Orders" })).content[0].text);
            expect(structure.totalFiles).toBe(1);
            expect(structure.namespaces).toEqual({ "Shop.Orders": ["OrderService"] });

            const stub = JSON.parse((await handlers.handle("find_class", { className: "Stub", root: "Orders" })).content[0].text);
            expect(stub.errorCode).toBe("NotFound");
        } finally {
            await scoped.shutdown();
        }
    });
});
