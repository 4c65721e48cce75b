import { describe, expect, it } from "@jest/globals";
import { countBranches, countStatements, parseParameters } from "../../ast/MemberScanner.js";
import { parseSource } from "../../ast/StructuralParser.js";

const joinLines = (lines: string[]): string => lines.join("\n");

describe("MemberScanner", () => {
    const { document } = parseSource(joinLines([
        "public class Money",
        "{",
        "    public static Money operator +(Money a, Money b) => new Money();",
        "    public static bool operator <(Money a, Money b) => false;",
        "    public static implicit operator decimal(Money m) => 0m;",
        "    public int this[int index] => index;",
        "    ~Money() { }",
        "    public (int, string) Pair() => (1, \"a\");",
        "    [JsonIgnore] public List<string> Tags { get; init; } = new() { \"x\" };",
        "    public Func<int, int> Twice = x => { return x * 2; };",
        "}"
    ]));
    const members = document.declarations[0].members;
    const byName = new Map(members.map(member => [member.name, member]));

    it("recognizes every member shape", () => {
        expect(members.map(member => `${member.kind}:${member.name}`)).toEqual([
            "method:operator +",
            "method:operator <",
            "method:operator decimal",
            "property:this[]",
            "method:~Money",
            "method:Pair",
            "property:Tags",
            "field:Twice"
        ]);
    });

    it("reads operator return types", () => {
        expect(byName.get("operator +")?.returnType).toBe("Money");
        expect(byName.get("operator <")?.returnType).toBe("bool");
        expect(byName.get("operator decimal")?.returnType).toBe("decimal");
        expect(byName.get("operator +")?.signature).toBe("public static Money operator +(Money a, Money b)");
        expect(byName.get("operator +")?.body).toEqual({ lines: 1, statements: 1, branches: 0 });
    });

    it("reads indexers, tuple return types and initialized properties", () => {
        expect(byName.get("this[]")?.signature).toBe("public int this[int index] { get; }");
        expect(byName.get("this[]")?.returnType).toBe("int");
        expect(byName.get("Pair")?.returnType).toBe("(int, string)");
        expect(byName.get("Tags")?.accessors).toEqual({ get: true, set: false, init: true });
        expect(byName.get("Tags")?.signature).toBe("public List<string> Tags { get; init; }");
        expect(byName.get("Twice")?.returnType).toBe("Func<int, int>");
    });
});

describe("body measurements", () => {
    it("counts statements outside parentheses", () => {
        expect(countStatements("for (int i = 0; i < 3; i++) { x++; }")).toBe(1);
        expect(countStatements("a(); b(); c();")).toBe(3);
    });

    it("counts branch keywords and short-circuit operators", () => {
        expect(countBranches("if (a && b || c) { } else if (d) { }")).toBe(4);
        expect(countBranches("switch (x) { case 1: break; case 2: break; }")).toBe(3);
        expect(countBranches("var notification = elsewhere;")).toBe(0);
    });
});

describe("parseParameters", () => {
    it("keeps parameter modifiers with the type and drops defaults and attributes", () => {
        expect(parseParameters("this string value, ref int count, params object[] rest, [NotNull] string name = null")).toEqual([
            { type: "this string", name: "value" },
            { type: "ref int", name: "count" },
            { type: "params object[]", name: "rest" },
            { type: "string", name: "name" }
        ]);
    });

    it("splits generic parameter types at the right space", () => {
        expect(parseParameters("Dictionary<string, List<int>> map")).toEqual([
            { type: "Dictionary<string, List<int>>", name: "map" }
        ]);
    });
});
