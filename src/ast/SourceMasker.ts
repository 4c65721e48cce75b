import type { LineRange, ParseWarning } from "../types.js";

/**
 * Result of masking one source file. `masked` blanks comments, string/char literal
 * contents and preprocessor lines; `commentFree` blanks comments only. Both keep the
 * original length and every line break, so offsets and line numbers carry over.
 */
export class MaskedSource {
    private readonly lineStarts: number[];

    constructor(
        public readonly original: string,
        public readonly masked: string,
        public readonly commentFree: string,
        /** 1-based lines that contain any comment text. */
        public readonly commentLines: ReadonlySet<number>,
        public readonly warnings: ParseWarning[]
    ) {
        this.lineStarts = computeLineStarts(original);
    }

    /** Number of lines; a trailing line break does not open another line. */
    get lineCount(): number {
        return countLines(this.original);
    }

    /** Offset of the first character of a 1-based line. */
    offsetOfLine(line: number): number {
        return this.lineStarts[Math.min(Math.max(line, 1), this.lineStarts.length) - 1];
    }

    /** 1-based line of a character offset. */
    lineAt(offset: number): number {
        return lineOfOffset(this.lineStarts, offset);
    }

    lineText(line: number, source: "original" | "masked" = "original"): string {
        const text = source === "original" ? this.original : this.masked;
        const start = this.lineStarts[line - 1];
        if (start === undefined) return "";
        const next = this.lineStarts[line];
        const end = next === undefined ? text.length : next - 1;
        return text.slice(start, end).replace(/\r$/, "");
    }
}

function lineOfOffset(lineStarts: number[], offset: number): number {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
        const mid = (low + high + 1) >> 1;
        if (lineStarts[mid] <= offset) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }
    return low + 1;
}

/** Line count where a trailing line break does not open another line. */
export function countLines(text: string): number {
    if (text.length === 0) return 0;
    let count = 1;
    for (let i = 0; i < text.length - 1; i++) {
        if (text.charCodeAt(i) === 10) count++;
    }
    return count;
}

function computeLineStarts(text: string): number[] {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
        if (text.charCodeAt(i) === 10) {
            starts.push(i + 1);
        }
    }
    return starts;
}

interface LiteralScan {
    end: number;
    terminated: boolean;
}

export class SourceMasker {
    private text = "";
    private masked: string[] = [];
    private commentFree: string[] = [];
    private commentLines = new Set<number>();
    private warnings: ParseWarning[] = [];
    private lineStarts: number[] = [0];

    mask(text: string): MaskedSource {
        this.text = text;
        this.masked = text.split("");
        this.commentFree = text.split("");
        this.commentLines = new Set<number>();
        this.warnings = [];
        this.lineStarts = computeLineStarts(text);

        const n = text.length;
        let atLineStart = true;
        let i = 0;
        while (i < n) {
            const ch = text[i];
            const next = text[i + 1];

            if (ch === "\n") {
                atLineStart = true;
                i++;
                continue;
            }
            if (atLineStart && ch === "#") {
                const end = this.endOfLine(i);
                this.blank(this.masked, i, end);
                i = end;
                continue;
            }
            if (ch === "/" && next === "/") {
                const end = this.endOfLine(i);
                this.blankComment(i, end);
                i = end;
                continue;
            }
            if (ch === "/" && next === "*") {
                const close = text.indexOf("*/", i + 2);
                const end = close < 0 ? n : close + 2;
                if (close < 0) {
                    this.warn("UnterminatedComment", "Block comment is never closed", i, n);
                }
                this.blankComment(i, end);
                i = end;
                continue;
            }
            if (this.startsLiteral(i)) {
                const scan = this.scanLiteral(i);
                if (!scan.terminated) {
                    this.warn("UnterminatedString", "Literal is never closed", i, scan.end);
                }
                this.blank(this.masked, i, scan.end);
                i = Math.max(scan.end, i + 1);
                atLineStart = false;
                continue;
            }
            if (ch !== " " && ch !== "\t" && ch !== "\r") {
                atLineStart = false;
            }
            i++;
        }

        return new MaskedSource(
            text,
            this.masked.join(""),
            this.commentFree.join(""),
            this.commentLines,
            this.warnings
        );
    }

    private startsLiteral(index: number): boolean {
        const ch = this.text[index];
        if (ch === "\"" || ch === "'") {
            return true;
        }
        if (ch !== "@" && ch !== "$") {
            return false;
        }
        let p = index;
        while (this.text[p] === "$" || this.text[p] === "@") {
            p++;
        }
        return this.text[p] === "\"";
    }

    private scanLiteral(start: number): LiteralScan {
        const text = this.text;
        let p = start;
        let dollars = 0;
        let verbatim = false;
        while (text[p] === "$" || text[p] === "@") {
            if (text[p] === "$") dollars++;
            else verbatim = true;
            p++;
        }

        if (text[p] === "'") {
            return this.scanCharLiteral(p);
        }

        let quotes = 0;
        while (text[p + quotes] === "\"") {
            quotes++;
        }
        if (quotes >= 3) {
            return this.scanRawLiteral(p, quotes);
        }
        return this.scanQuoted(p, verbatim, dollars > 0);
    }

    private scanCharLiteral(openQuote: number): LiteralScan {
        const text = this.text;
        let p = openQuote + 1;
        while (p < text.length) {
            const ch = text[p];
            if (ch === "\\") {
                p += 2;
                continue;
            }
            if (ch === "'") {
                return { end: p + 1, terminated: true };
            }
            if (ch === "\n") {
                return { end: p, terminated: false };
            }
            p++;
        }
        return { end: text.length, terminated: false };
    }

    private scanRawLiteral(openQuote: number, quotes: number): LiteralScan {
        const closing = "\"".repeat(quotes);
        const close = this.text.indexOf(closing, openQuote + quotes);
        if (close < 0) {
            return { end: this.text.length, terminated: false };
        }
        let end = close + quotes;
        while (this.text[end] === "\"") {
            end++;
        }
        return { end, terminated: true };
    }

    private scanQuoted(openQuote: number, verbatim: boolean, interpolated: boolean): LiteralScan {
        const text = this.text;
        let p = openQuote + 1;
        while (p < text.length) {
            const ch = text[p];
            if (!verbatim && ch === "\\") {
                p += 2;
                continue;
            }
            if (ch === "\"") {
                if (verbatim && text[p + 1] === "\"") {
                    p += 2;
                    continue;
                }
                return { end: p + 1, terminated: true };
            }
            if (!verbatim && ch === "\n") {
                return { end: p, terminated: false };
            }
            if (interpolated && ch === "{") {
                if (text[p + 1] === "{") {
                    p += 2;
                    continue;
                }
                p = this.skipInterpolationHole(p + 1);
                continue;
            }
            p++;
        }
        return { end: text.length, terminated: false };
    }

    /** Returns the offset just past the `}` that closes a hole opened before `from`. */
    private skipInterpolationHole(from: number): number {
        const text = this.text;
        let depth = 1;
        let p = from;
        while (p < text.length && depth > 0) {
            const ch = text[p];
            if (this.startsLiteral(p)) {
                p = Math.max(this.scanLiteral(p).end, p + 1);
                continue;
            }
            if (ch === "{") depth++;
            else if (ch === "}") depth--;
            p++;
        }
        return p;
    }

    private endOfLine(from: number): number {
        const newline = this.text.indexOf("\n", from);
        return newline < 0 ? this.text.length : newline;
    }

    private blank(buffer: string[], start: number, end: number): void {
        for (let k = start; k < end; k++) {
            const ch = this.text[k];
            if (ch !== "\n" && ch !== "\r") {
                buffer[k] = " ";
            }
        }
    }

    private blankComment(start: number, end: number): void {
        this.blank(this.masked, start, end);
        this.blank(this.commentFree, start, end);
        const first = this.lineOf(start);
        const last = this.lineOf(Math.max(start, end - 1));
        for (let line = first; line <= last; line++) {
            this.commentLines.add(line);
        }
    }

    private warn(code: ParseWarning["code"], message: string, start: number, end: number): void {
        const range: LineRange = {
            startLine: this.lineOf(start),
            endLine: this.lineOf(Math.max(start, end - 1))
        };
        this.warnings.push({ code, message: `${message} (line ${range.startLine})`, range });
    }

    private lineOf(offset: number): number {
        return lineOfOffset(this.lineStarts, offset);
    }
}

export function maskSource(text: string): MaskedSource {
    return new SourceMasker().mask(text);
}
