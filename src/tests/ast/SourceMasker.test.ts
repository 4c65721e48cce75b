import { describe, expect, it } from "@jest/globals";
import { countLines, maskSource } from "../../ast/SourceMasker.js";

const joinLines = (lines: string[]): string => lines.join("\n");

describe("SourceMasker", () => {
    it("blanks literals and comments without moving offsets", () => {
        const text = joinLines([
            "var s = \"a;b\"; // x;y",
            "int c;"
        ]);
        const source = maskSource(text);

        expect(source.masked).toHaveLength(text.length);
        expect(source.masked).toBe("var s =      ;       \nint c;");
        expect(source.commentFree).toBe("var s = \"a;b\";       \nint c;");
        expect(Array.from(source.commentLines)).toEqual([1]);
        expect(source.warnings).toEqual([]);
    });

    it("treats doubled quotes inside verbatim strings as part of the literal", () => {
        const source = maskSource("x = @\"a \"\"b\"\" c\";");
        expect(source.masked).toBe(`x = ${" ".repeat(12)};`);
    });

    it("skips interpolation holes that contain their own literals", () => {
        const source = maskSource("s = $\"a {f(\"}\")} b\";");
        expect(source.masked).toBe(`s = ${" ".repeat(15)};`);
    });

    it("masks raw string literals across lines and keeps the line breaks", () => {
        const text = joinLines([
            "x = \"\"\"",
            "hi \"there\"",
            "\"\"\";"
        ]);
        const source = maskSource(text);
        expect(source.masked.split("\n")).toEqual(["x =    ", " ".repeat(10), "   ;"]);
    });

    it("masks char literals holding brace characters", () => {
        expect(maskSource("c = '}';").masked).toBe("c =    ;");
    });

    it("reports an unterminated string and stops masking at the end of its line", () => {
        const source = maskSource(joinLines([
            "a = \"oops",
            "int b;"
        ]));

        expect(source.masked.split("\n")).toEqual(["a =      ", "int b;"]);
        expect(source.warnings).toHaveLength(1);
        expect(source.warnings[0].code).toBe("UnterminatedString");
        expect(source.warnings[0].range).toEqual({ startLine: 1, endLine: 1 });
    });

    it("reports an unterminated block comment and masks to the end of the file", () => {
        const source = maskSource(joinLines([
            "int a;",
            "/* open",
            "int b;"
        ]));

        expect(source.masked.split("\n")).toEqual(["int a;", "       ", "      "]);
        expect(source.warnings.map(warning => warning.code)).toEqual(["UnterminatedComment"]);
        expect(source.warnings[0].range).toEqual({ startLine: 2, endLine: 3 });
        expect(Array.from(source.commentLines).sort()).toEqual([2, 3]);
    });

    it("blanks preprocessor lines in the masked text only", () => {
        const source = maskSource(joinLines([
            "#if DEBUG",
            "int a;",
            "  #endregion"
        ]));

        expect(source.masked.split("\n")).toEqual(["         ", "int a;", "            "]);
        expect(source.commentFree.split("\n")[0]).toBe("#if DEBUG");
    });

    it("maps offsets to lines", () => {
        const source = maskSource("ab\ncd\nef");
        expect(source.lineAt(0)).toBe(1);
        expect(source.lineAt(3)).toBe(2);
        expect(source.lineAt(7)).toBe(3);
        expect(source.offsetOfLine(3)).toBe(6);
        expect(source.lineText(2)).toBe("cd");
    });

    it("does not count a trailing line break as another line", () => {
        expect(countLines("")).toBe(0);
        expect(countLines("a")).toBe(1);
        expect(countLines("a\nb\n")).toBe(2);
        expect(countLines("\n")).toBe(1);
        expect(maskSource("a\nb\n").lineCount).toBe(2);
    });
});
