import { describe, expect, it } from "@jest/globals";
import { complexityOf, computeMetrics, extractSummary } from "../../ast/DocumentMetrics.js";
import { maskSource } from "../../ast/SourceMasker.js";

describe("DocumentMetrics", () => {
    it("classifies lines as code, comment or blank", () => {
        const metrics = computeMetrics(maskSource([
            "int a; // trailing",
            "",
            "// only a comment",
            "/* block",
            "   continues */",
            "if (x) { }",
            ""
        ].join("\n")));

        expect(metrics).toEqual({
            totalLines: 6,
            codeLines: 2,
            commentLines: 3,
            blankLines: 1,
            hasXmlDocs: false,
            branchCount: 1,
            complexity: "Low"
        });
    });

    it("ignores branch keywords inside literals", () => {
        const metrics = computeMetrics(maskSource("var s = \"if (x) while (y)\";\nwhile (true) { }"));
        expect(metrics.branchCount).toBe(1);
    });

    it("maps branch counts onto complexity bands", () => {
        expect(complexityOf(0)).toBe("Low");
        expect(complexityOf(4)).toBe("Low");
        expect(complexityOf(5)).toBe("Medium");
        expect(complexityOf(14)).toBe("Medium");
        expect(complexityOf(15)).toBe("High");
    });
});

describe("extractSummary", () => {
    it("keeps reference targets and decodes entities", () => {
        expect(extractSummary("<summary>Returns <paramref name=\"id\"/> &amp; more.</summary><remarks>x</remarks>"))
            .toBe("Returns id & more.");
    });

    it("falls back to the whole block without a summary element", () => {
        expect(extractSummary(" Plain\n text ")).toBe("Plain text");
    });

    it("returns undefined for an empty summary", () => {
        expect(extractSummary("<summary>  </summary>")).toBeUndefined();
    });
});
