import { describe, expect, it } from "@jest/globals";
import { StructuralParser } from "../../ast/StructuralParser.js";

const joinLines = (lines: string[]): string => lines.join("\n");

const ORDER_SERVICE = joinLines([
    "using System;",
    "using System.Collections.Generic;",
    "using Acme.Core;",
    "",
    "namespace Acme.Orders",
    "{",
    "    /// <summary>",
    "    /// Handles <see cref=\"T:Acme.Orders.Order\"/> lifecycle.",
    "    /// </summary>",
    "    [Serializable]",
    "    [Obsolete(\"old\")]",
    "    public sealed partial class OrderService : ServiceBase<Order>, IOrderService",
    "    {",
    "        private readonly IRepository _repo;",
    "        public const int MaxItems = 10, MinItems = 1;",
    "        public event EventHandler Changed;",
    "",
    "        public OrderService(IRepository repo)",
    "        {",
    "            _repo = repo;",
    "        }",
    "",
    "        public string Name { get; set; } = \"orders\";",
    "",
    "        public int Count => _repo.Count;",
    "",
    "        public async Task<Order> GetAsync(int id, CancellationToken token = default)",
    "        {",
    "            if (id < 0)",
    "            {",
    "                throw new ArgumentException(\"id\");",
    "            }",
    "            return await _repo.FindAsync(id, token);",
    "        }",
    "",
    "        public class Nested",
    "        {",
    "            public int Value;",
    "        }",
    "    }",
    "}"
]);

const MODELS = joinLines([
    "namespace Acme.Models;",
    "",
    "public record OrderDto(int Id, string Name);",
    "",
    "public readonly record struct Point(int X, int Y);",
    "",
    "public record struct Size(int W, int H);",
    "",
    "public enum Status",
    "{",
    "    Active = 1,",
    "    [Obsolete] Retired,",
    "}",
    "",
    "public interface IOrderService",
    "{",
    "    Task<OrderDto> GetAsync(int id);",
    "    string Name { get; }",
    "}",
    "",
    "internal struct Range<T> where T : IComparable<T>",
    "{",
    "    public T Start;",
    "}"
]);

describe("StructuralParser", () => {
    const parser = new StructuralParser();

    describe("block-scoped namespace with a documented class", () => {
        const { document, warnings } = parser.parse(ORDER_SERVICE, "src/Orders/OrderService.cs");
        const [service, nested] = document.declarations;

        it("records namespace, sorted imports and declaration order", () => {
            expect(warnings).toEqual([]);
            expect(document.namespace).toBe("Acme.Orders");
            expect(document.imports).toEqual(["Acme.Core", "System", "System.Collections.Generic"]);
            expect(document.declarations.map(decl => decl.name)).toEqual(["OrderService", "Nested"]);
        });

        it("captures header details of the outer class", () => {
            expect(service.kind).toBe("class");
            expect(service.modifiers).toEqual(["public", "partial", "sealed"]);
            expect(service.baseTypes).toEqual(["ServiceBase<Order>", "IOrderService"]);
            expect(service.attributes).toEqual(["Serializable", "Obsolete"]);
            expect(service.summary).toBe("Handles Acme.Orders.Order lifecycle.");
            expect(service.span).toEqual({ startLine: 12, endLine: 40 });
            expect(service.containingFile).toBe("src/Orders/OrderService.cs");
            expect(service.bodyStyle).toBe("block");
            expect(service.parent).toBeUndefined();
        });

        it("lists members at the top level of the body only", () => {
            expect(service.members.map(member => `${member.kind}:${member.name}`)).toEqual([
                "field:_repo",
                "field:MaxItems",
                "field:MinItems",
                "field:Changed",
                "constructor:OrderService",
                "property:Name",
                "property:Count",
                "method:GetAsync"
            ]);
        });

        it("describes fields, events and properties", () => {
            const byName = new Map(service.members.map(member => [member.name, member]));
            expect(byName.get("_repo")?.signature).toBe("private readonly IRepository _repo");
            expect(byName.get("_repo")?.line).toBe(14);
            expect(byName.get("MinItems")?.signature).toBe("public const int MinItems");
            expect(byName.get("Changed")?.modifiers).toEqual(["public", "event"]);
            expect(byName.get("Changed")?.returnType).toBe("EventHandler");
            expect(byName.get("Name")?.signature).toBe("public string Name { get; set; }");
            expect(byName.get("Name")?.accessors).toEqual({ get: true, set: true, init: false });
            expect(byName.get("Count")?.signature).toBe("public int Count { get; }");
        });

        it("measures constructor and method bodies", () => {
            const ctor = service.members.find(member => member.kind === "constructor");
            expect(ctor?.parameters).toEqual([{ type: "IRepository", name: "repo" }]);
            expect(ctor?.line).toBe(18);
            expect(ctor?.endLine).toBe(21);
            expect(ctor?.body).toEqual({ lines: 3, statements: 1, branches: 0 });

            const method = service.members.find(member => member.name === "GetAsync");
            expect(method?.returnType).toBe("Task<Order>");
            expect(method?.isAsync).toBe(true);
            expect(method?.modifiers).toEqual(["public", "async"]);
            expect(method?.signature).toBe("public async Task<Order> GetAsync(int id, CancellationToken token = default)");
            expect(method?.parameters).toEqual([
                { type: "int", name: "id" },
                { type: "CancellationToken", name: "token" }
            ]);
            expect(method?.body).toEqual({ lines: 7, statements: 2, branches: 1 });
        });

        it("links nested declarations to their container", () => {
            expect(nested.parent).toBe("OrderService");
            expect(nested.span).toEqual({ startLine: 36, endLine: 39 });
            expect(nested.members.map(member => member.signature)).toEqual(["public int Value"]);
        });

        it("computes file metrics", () => {
            expect(document.metrics).toEqual({
                totalLines: 41,
                codeLines: 32,
                commentLines: 3,
                blankLines: 6,
                hasXmlDocs: true,
                branchCount: 1,
                complexity: "Low"
            });
        });
    });

    describe("file-scoped namespace with records, enums and interfaces", () => {
        const { document } = parser.parse(MODELS, "Models.cs");
        const byName = new Map(document.declarations.map(decl => [decl.name, decl]));

        it("finds every declaration", () => {
            expect(document.namespace).toBe("Acme.Models");
            expect(document.declarations.map(decl => `${decl.kind}:${decl.name}`)).toEqual([
                "record:OrderDto",
                "record:Point",
                "record:Size",
                "enum:Status",
                "interface:IOrderService",
                "struct:Range"
            ]);
        });

        it("turns positional record parameters into properties", () => {
            const dto = byName.get("OrderDto");
            expect(dto?.bodyStyle).toBe("terse");
            expect(dto?.span).toEqual({ startLine: 3, endLine: 3 });
            expect(dto?.members.map(member => member.signature)).toEqual([
                "public int Id { get; init; }",
                "public string Name { get; init; }"
            ]);
            expect(byName.get("Point")?.members[0].accessors).toEqual({ get: true, set: false, init: true });
            expect(byName.get("Point")?.modifiers).toEqual(["public"]);
            expect(byName.get("Size")?.members[1].signature).toBe("public int H { get; set; }");
        });

        it("records enum values as fields of the enum type", () => {
            const values = byName.get("Status")?.members ?? [];
            expect(values.map(value => value.name)).toEqual(["Active", "Retired"]);
            expect(values[0]).toMatchObject({ kind: "field", signature: "Active = 1", returnType: "Status", line: 11 });
            expect(values[1].signature).toBe("Retired");
            expect(values[1].line).toBe(12);
        });

        it("records interface members without bodies", () => {
            const members = byName.get("IOrderService")?.members ?? [];
            expect(members[0]).toMatchObject({
                name: "GetAsync",
                kind: "method",
                returnType: "Task<OrderDto>",
                parameters: [{ type: "int", name: "id" }]
            });
            expect(members[0].body).toBeUndefined();
            expect(members[1].signature).toBe("string Name { get; }");
        });

        it("keeps type parameters and ignores constraint clauses", () => {
            const range = byName.get("Range");
            expect(range?.typeParameters).toEqual(["T"]);
            expect(range?.baseTypes).toEqual([]);
            expect(range?.modifiers).toEqual(["internal"]);
            expect(range?.members.map(member => member.returnType)).toEqual(["T"]);
        });
    });

    it("reads names with letters outside ASCII", () => {
        const { document } = parser.parse(
            "namespace Tienda.Configuración; public class Configuración { public string Año {get;set;} public void Guardar(int año){} }"
        );

        expect(document.namespace).toBe("Tienda.Configuración");
        expect(document.declarations.map(decl => decl.name)).toEqual(["Configuración"]);
        const members = document.declarations[0].members;
        expect(members.map(member => `${member.kind}:${member.name}`)).toEqual(["property:Año", "method:Guardar"]);
        expect(members[1].parameters).toEqual([{ type: "int", name: "año" }]);
    });

    it("keeps every value of a flags enum built from shifts", () => {
        const { document } = parser.parse(joinLines([
            "[Flags]",
            "public enum Access { None = 0, Read = 1 << 0, Write = 1 << 1, Exec = 1 << 2 }"
        ]));

        const access = document.declarations[0];
        expect(access.attributes).toEqual(["Flags"]);
        expect(access.members.map(member => member.name)).toEqual(["None", "Read", "Write", "Exec"]);
        expect(access.members[2].signature).toBe("Write = 1 << 1");
    });

    it("ignores braces inside string and char literals", () => {
        const { document } = parser.parse(joinLines([
            "public class Weird",
            "{",
            "    private string s = \"}{\";",
            "    public void Run() { var x = '{'; }",
            "}",
            "public class After { }"
        ]));

        expect(document.declarations.map(decl => [decl.name, decl.span])).toEqual([
            ["Weird", { startLine: 1, endLine: 5 }],
            ["After", { startLine: 6, endLine: 6 }]
        ]);
        expect(document.declarations[0].members.map(member => member.name)).toEqual(["s", "Run"]);
        expect(document.declarations[0].members[1].body?.statements).toBe(1);
    });

    it("closes an unbalanced body at end of file and reports it", () => {
        const { document, warnings } = parser.parse("public class Broken\n{\n    public void A() {\n");

        expect(warnings.map(warning => warning.code)).toEqual(["UnbalancedBraces"]);
        expect(document.declarations[0].span).toEqual({ startLine: 1, endLine: 3 });
        expect(document.declarations[0].members.map(member => member.name)).toEqual(["A"]);
        expect(document.recoveredRanges).toEqual([{ startLine: 1, endLine: 3 }]);
    });

    it("never throws on malformed input", () => {
        const { document } = parser.parse("}}}{{ class ; record (");
        expect(document.declarations).toEqual([]);
    });

    it("does not read declarations out of comments or strings", () => {
        const { document } = parser.parse(joinLines([
            "// public class Ghost { }",
            "var text = \"class Phantom { }\";",
            "public class Real { }"
        ]));
        expect(document.declarations.map(decl => decl.name)).toEqual(["Real"]);
    });
});
