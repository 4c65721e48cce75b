// Small scanning helpers over masked source text. Literal and comment contents are
// already blanked, so bracket characters seen here are structural.

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}", "<": ">" };

/** Character class bodies for C# identifiers; patterns built from them need the `u` flag. */
export const IDENTIFIER_START_CHARS = "\\p{L}\\p{Nl}_";
export const IDENTIFIER_PART_CHARS = "\\p{L}\\p{Nl}\\p{Mn}\\p{Mc}\\p{Nd}\\p{Pc}\\p{Cf}";
/** One identifier with an optional verbatim `@`. */
export const IDENTIFIER = `@?[${IDENTIFIER_START_CHARS}][${IDENTIFIER_PART_CHARS}]*`;
/** Dotted name such as a namespace or qualified member name. */
export const QUALIFIED_NAME = `@?[${IDENTIFIER_START_CHARS}][${IDENTIFIER_PART_CHARS}.]*`;

const IDENTIFIER_ONLY = new RegExp(`^${IDENTIFIER}$`, "u");
const IDENTIFIER_CHAR = new RegExp(`[${IDENTIFIER_PART_CHARS}]`, "u");

export function isIdentifier(text: string): boolean {
    return IDENTIFIER_ONLY.test(text);
}

/**
 * Offset of the bracket closing the one at `open`, or -1. Angle brackets are only
 * balanced against each other; other kinds nest freely inside them.
 */
export function findClosing(text: string, open: number, limit: number = text.length): number {
    const opener = text[open];
    const closer = OPENERS[opener];
    if (!closer) return -1;
    let depth = 0;
    for (let i = open; i < limit; i++) {
        const ch = text[i];
        if (ch === opener) {
            depth++;
        } else if (ch === closer) {
            depth--;
            if (depth === 0) return i;
        } else if (opener === "<" && (ch === ";" || ch === "{" || ch === "}")) {
            return -1;
        }
    }
    return -1;
}

/** `<` that can open a type argument list: not part of `<<`, `<=` or `<<=`. */
function opensTypeArguments(text: string, i: number): boolean {
    return text[i] === "<" && text[i + 1] !== "<" && text[i + 1] !== "=" && text[i - 1] !== "<";
}

/**
 * Calls `visit` with every index outside (), [] and {} and, when `angles` is set, outside
 * type argument lists. Shift and comparison operators never open a level, and a `>` with
 * no open `<` is an operator. Stops when `visit` returns true.
 */
function forEachTopLevel(text: string, angles: boolean, visit: (index: number) => boolean): void {
    let depth = 0;
    let angle = 0;
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === "(" || ch === "[" || ch === "{") {
            depth++;
        } else if (ch === ")" || ch === "]" || ch === "}") {
            depth = Math.max(0, depth - 1);
        } else if (angles && opensTypeArguments(text, i)) {
            angle++;
        } else if (angles && ch === ">" && angle > 0 && text[i - 1] !== "=") {
            angle--;
        } else if (depth === 0 && angle === 0 && visit(i)) {
            return;
        }
    }
}

/**
 * Splits at separators that sit outside (), [], {} and, unless `angles` is false,
 * outside type argument lists.
 */
export function splitTopLevel(text: string, separator: string = ",", angles: boolean = true): string[] {
    return splitTopLevelWithOffsets(text, 0, separator, angles).map(part => part.text);
}

/**
 * Index of the first `=` assignment (not `==`, `=>`, `<=`, `>=`, `!=`, `<<=`, `>>=`)
 * outside any bracket, or -1.
 */
export function findTopLevelAssignment(text: string): number {
    let found = -1;
    forEachTopLevel(text, true, i => {
        if (text[i] !== "=") return false;
        const prev = text[i - 1];
        const next = text[i + 1];
        if (next === "=" || next === ">" || prev === "=" || prev === "!" || prev === "<" || prev === ">") {
            return false;
        }
        found = i;
        return true;
    });
    return found;
}

/** Index of the first top-level `=>`, or -1. */
export function findTopLevelArrow(text: string): number {
    let depth = 0;
    for (let i = 0; i < text.length - 1; i++) {
        const ch = text[i];
        if (ch === "(" || ch === "[" || ch === "{") {
            depth++;
        } else if (ch === ")" || ch === "]" || ch === "}") {
            depth = Math.max(0, depth - 1);
        } else if (ch === "=" && text[i + 1] === ">" && depth === 0) {
            return i;
        }
    }
    return -1;
}

/**
 * Index of the `(` that opens a parameter list: outside angle brackets and directly
 * after a name or generic argument list. A leading tuple type is skipped. -1 if none.
 */
export function findParameterListParen(text: string): number {
    let angle = 0;
    let depth = 0;
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === "<") angle++;
        else if (ch === ">") angle = Math.max(0, angle - 1);
        else if (ch === ")") depth = Math.max(0, depth - 1);
        else if (ch === "(") {
            if (angle === 0 && depth === 0) {
                let j = i - 1;
                while (j >= 0 && text[j] === " ") j--;
                if (j >= 0 && (text[j] === ">" || IDENTIFIER_CHAR.test(text[j]))) {
                    return i;
                }
            }
            depth++;
        }
    }
    return -1;
}

/**
 * Length of the leading attribute sections (`[...]`) and whitespace of `text`.
 */
export function leadingAttributesLength(text: string): number {
    let i = 0;
    for (;;) {
        while (i < text.length && /\s/.test(text[i])) i++;
        if (text[i] !== "[") return i;
        const close = findClosing(text, i);
        if (close < 0) return i;
        i = close + 1;
    }
}

const ATTRIBUTE_NAME = new RegExp(`^(?:[a-z]+\\s*:\\s*)?(${QUALIFIED_NAME})`, "u");

/** Attribute type names in `[A, B(x)][C]`, without the `target:` prefix. */
export function attributeNames(text: string): string[] {
    const names: string[] = [];
    let i = 0;
    while (i < text.length) {
        const open = text.indexOf("[", i);
        if (open < 0) break;
        const close = findClosing(text, open);
        if (close < 0) break;
        for (const part of splitTopLevel(text.slice(open + 1, close))) {
            const match = ATTRIBUTE_NAME.exec(part);
            if (match) {
                names.push(match[1]);
            }
        }
        i = close + 1;
    }
    return names;
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/** Drops generic arguments and namespace qualifiers: `Ns.Base<T>` → `Base`. */
export function simpleTypeName(typeText: string): string {
    const withoutGenerics = typeText.replace(/<[^<>]*(?:<[^<>]*>[^<>]*)*>/g, "").replace(/\(.*$/s, "").trim();
    const segments = withoutGenerics.split(".");
    return segments[segments.length - 1].trim().replace(/^@/, "");
}

export function truncate(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max - 3).trimEnd()}...`;
}

export interface TextPart {
    text: string;
    /** Offset of the first non-whitespace character, relative to the scanned string's base. */
    start: number;
}

/**
 * Like {@link splitTopLevel} but keeps each part's offset so callers can map back to lines.
 */
export function splitTopLevelWithOffsets(
    text: string,
    base: number,
    separator: string = ",",
    angles: boolean = true
): TextPart[] {
    const parts: TextPart[] = [];
    let start = 0;
    const push = (end: number) => {
        const raw = text.slice(start, end);
        const lead = raw.length - raw.trimStart().length;
        const trimmed = raw.trim();
        if (trimmed.length > 0) {
            parts.push({ text: trimmed, start: base + start + lead });
        }
    };
    forEachTopLevel(text, angles, i => {
        if (text[i] === separator) {
            push(i);
            start = i + 1;
        }
        return false;
    });
    push(text.length);
    return parts;
}

/**
 * Splits `type name` text at the last whitespace outside angle brackets.
 * `Dictionary<string, int> Items` → `{ type: "Dictionary<string, int>", name: "Items" }`.
 */
export function splitTypeAndName(text: string): { type: string; name: string } {
    const trimmed = text.trim();
    let angle = 0;
    for (let i = trimmed.length - 1; i >= 0; i--) {
        const ch = trimmed[i];
        if (ch === ">") angle++;
        else if (ch === "<") angle = Math.max(0, angle - 1);
        else if (/\s/.test(ch) && angle === 0) {
            return { type: trimmed.slice(0, i).trim(), name: trimmed.slice(i + 1).trim() };
        }
    }
    return { type: "", name: trimmed };
}

/** Blanks the contents of nested `{...}` blocks, keeping the outer level readable. */
export function topLevelOnly(text: string): string {
    let depth = 0;
    let result = "";
    for (const ch of text) {
        if (ch === "{") {
            depth++;
            result += depth === 1 ? ch : " ";
            continue;
        }
        if (ch === "}") {
            result += depth === 1 ? ch : " ";
            depth = Math.max(0, depth - 1);
            continue;
        }
        result += depth === 0 ? ch : " ";
    }
    return result;
}
