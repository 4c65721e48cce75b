import type { Member, MemberBody, MemberParameter, PropertyAccessors } from "../types.js";
import type { MaskedSource } from "./SourceMasker.js";
import {
    collapseWhitespace,
    findClosing,
    findTopLevelArrow,
    findTopLevelAssignment,
    findParameterListParen,
    IDENTIFIER,
    isIdentifier,
    leadingAttributesLength,
    QUALIFIED_NAME,
    splitTopLevel,
    splitTopLevelWithOffsets,
    splitTypeAndName,
    topLevelOnly,
    truncate
} from "./SyntaxText.js";

export const MAX_SIGNATURE_LENGTH = 160;

const MEMBER_MODIFIER_PATTERN = /^(public|private|protected|internal|static|abstract|sealed|partial|virtual|override|readonly|const|volatile|async|extern|new|unsafe|required|fixed|file)\s+/;
const NON_MEMBER_PATTERN = /^(delegate|using|namespace|class|struct|interface|enum|record)\b/;
const LEADING_IDENTIFIER = new RegExp(`^${IDENTIFIER}`, "u");
const METHOD_NAME = new RegExp(`^~?${QUALIFIED_NAME}$`, "u");
const PROPERTY_NAME = new RegExp(`^${QUALIFIED_NAME}$|^this\\[\\]$`, "u");
const BRANCH_PATTERN = /\b(?:if|for|foreach|while|switch|case|catch)\b|&&|\|\|/g;

interface HeaderSlice {
    /** Offset of the first character after leading attributes. */
    start: number;
    end: number;
    masked: string;
    commentFree: string;
}

type Terminator =
    | { kind: "statement"; end: number }
    | { kind: "block"; open: number; close: number; end: number };

/**
 * Recovers members from the body of one type declaration. Only the outermost level of
 * the body is examined: member bodies and nested type declarations are skipped whole.
 */
export class MemberScanner {
    constructor(
        private readonly source: MaskedSource,
        private readonly braceMatch: ReadonlyMap<number, number>
    ) {}

    /**
     * @param open offset of the body's `{`
     * @param close exclusive end of the body (offset of its `}` or end of text)
     * @param nested start offset → last offset of nested declarations inside the body
     */
    scanBody(open: number, close: number, nested: ReadonlyMap<number, number>): Member[] {
        const masked = this.source.masked;
        const members: Member[] = [];
        let segStart = open + 1;
        let depth = 0;
        let i = open + 1;

        while (i < close) {
            const nestedEnd = nested.get(i);
            if (nestedEnd !== undefined) {
                i = nestedEnd + 1;
                segStart = i;
                depth = 0;
                continue;
            }

            const ch = masked[i];
            if (ch === "(" || ch === "[") {
                depth++;
            } else if (ch === ")" || ch === "]") {
                depth = Math.max(0, depth - 1);
            } else if (depth === 0 && ch === "{") {
                const matched = this.braceMatch.get(i);
                const blockClose = matched !== undefined && matched < close ? matched : close - 1;
                const header = masked.slice(segStart, i);
                if (findTopLevelAssignment(header) >= 0 || findTopLevelArrow(header) >= 0) {
                    // initializer or lambda braces belong to the running statement
                    i = blockClose + 1;
                    continue;
                }
                let end = blockClose;
                const initializerEnd = this.findInitializerEnd(blockClose + 1, close);
                if (initializerEnd >= 0) {
                    end = initializerEnd;
                }
                members.push(...this.buildMembers(segStart, i, { kind: "block", open: i, close: blockClose, end }));
                i = end + 1;
                segStart = i;
                continue;
            } else if (depth === 0 && ch === ";") {
                members.push(...this.buildMembers(segStart, i, { kind: "statement", end: i }));
                i++;
                segStart = i;
                continue;
            } else if (depth === 0 && ch === "}") {
                segStart = i + 1;
            }
            i++;
        }

        return members;
    }

    /** Enum bodies are comma-separated value lists, recorded as fields. */
    scanEnum(enumName: string, open: number, close: number): Member[] {
        const inner = this.source.masked.slice(open + 1, close);
        const members: Member[] = [];
        // values are never generic, so `<` and `>` here are always operators (`1 << 2`)
        for (const part of splitTopLevelWithOffsets(inner, open + 1, ",", false)) {
            const attrLen = leadingAttributesLength(part.text);
            const body = part.text.slice(attrLen);
            const match = LEADING_IDENTIFIER.exec(body);
            if (!match) continue;
            const start = part.start + attrLen;
            const commentFree = this.source.commentFree.slice(start, part.start + part.text.length);
            const line = this.source.lineAt(start);
            members.push({
                name: match[0].replace(/^@/, ""),
                kind: "field",
                modifiers: [],
                signature: truncate(collapseWhitespace(commentFree), MAX_SIGNATURE_LENGTH) || match[0],
                line,
                endLine: this.source.lineAt(part.start + part.text.length - 1),
                returnType: enumName,
                isAsync: false
            });
        }
        return members;
    }

    /** `{ get; set; } = value;` → offset of the `;` ending the initializer, else -1. */
    private findInitializerEnd(from: number, close: number): number {
        const masked = this.source.masked;
        let p = from;
        while (p < close && /\s/.test(masked[p])) p++;
        if (masked[p] !== "=" || masked[p + 1] === ">") {
            return -1;
        }
        let depth = 0;
        for (let k = p; k < close; k++) {
            const ch = masked[k];
            if (ch === "(" || ch === "[" || ch === "{") depth++;
            else if (ch === ")" || ch === "]" || ch === "}") depth = Math.max(0, depth - 1);
            else if (ch === ";" && depth === 0) return k;
        }
        return -1;
    }

    private sliceHeader(segStart: number, headerEnd: number): HeaderSlice | null {
        const raw = this.source.masked.slice(segStart, headerEnd);
        const start = segStart + leadingAttributesLength(raw);
        const masked = this.source.masked.slice(start, headerEnd);
        if (masked.trim().length === 0) {
            return null;
        }
        return {
            start,
            end: headerEnd,
            masked,
            commentFree: this.source.commentFree.slice(start, headerEnd)
        };
    }

    private buildMembers(segStart: number, headerEnd: number, terminator: Terminator): Member[] {
        const header = this.sliceHeader(segStart, headerEnd);
        if (!header) {
            return [];
        }

        let rest = collapseWhitespace(header.masked);
        const modifiers: string[] = [];
        let modifier = MEMBER_MODIFIER_PATTERN.exec(rest);
        while (modifier) {
            modifiers.push(modifier[1]);
            rest = rest.slice(modifier[0].length);
            modifier = MEMBER_MODIFIER_PATTERN.exec(rest);
        }
        if (rest.length === 0 || NON_MEMBER_PATTERN.test(rest)) {
            return [];
        }

        const line = this.source.lineAt(header.start);
        const endLine = this.source.lineAt(terminator.end);
        const isAsync = modifiers.includes("async");
        const signatureText = collapseWhitespace(header.commentFree);

        if (rest.startsWith("event ")) {
            return this.buildFields(rest.slice("event ".length), [...modifiers, "event"], line, endLine);
        }

        // operator symbols such as `<` or `==` would read as generics or assignments
        const operatorSymbol = /\boperator\s*([^\s(]+)/.exec(rest)?.[1];
        const shape = operatorSymbol
            ? rest.replace(/\boperator\s*[^\s(]+/, text => text.replace(/[^\s\w]/g, "_"))
            : rest;
        const arrow = findTopLevelArrow(shape);
        const assignment = findTopLevelAssignment(shape);
        const cutoff = Math.min(
            arrow >= 0 ? arrow : rest.length,
            assignment >= 0 ? assignment : rest.length
        );
        // `=>` after a top-level `=` belongs to a lambda initializer
        const expressionBodied = arrow >= 0 && (assignment < 0 || arrow < assignment);
        const paren = findParameterListParen(shape);
        const isIndexer = /(^|\s)this\s*\[/.test(rest.slice(0, cutoff));

        if (paren >= 0 && paren < cutoff && !isIndexer) {
            const before = rest.slice(0, paren).trim();
            const operator = operatorSymbol
                ? /^(.*?)\b(?:(implicit|explicit)\s+)?operator\s*\S+$/.exec(before)
                : null;
            let name: string;
            let returnType: string;
            if (operator && operatorSymbol) {
                name = `operator ${operatorSymbol}`;
                returnType = operator[2] ? operatorSymbol : operator[1].trim();
            } else if (before.startsWith("~")) {
                name = before.replace(/\s+/g, "");
                returnType = "";
            } else {
                const split = splitTypeAndName(before);
                name = split.name.replace(/<.*$/, "");
                returnType = split.type;
            }
            if (!METHOD_NAME.test(name) && !operator) {
                return [];
            }
            const closeParen = findClosing(shape, paren);
            const parameters = parseParameters(closeParen > paren ? rest.slice(paren + 1, closeParen) : rest.slice(paren + 1));
            const kind = returnType === "" && !before.startsWith("~") ? "constructor" : "method";
            const signature = cutAt(signatureText, findTopLevelArrow(signatureText));
            return [{
                name: name.replace(/^@/, ""),
                kind,
                modifiers,
                signature: truncate(signature, MAX_SIGNATURE_LENGTH) || name,
                line,
                endLine,
                ...(returnType ? { returnType } : {}),
                parameters,
                isAsync,
                body: this.measureBody(terminator, rest, arrow, line, endLine)
            }];
        }

        if (terminator.kind === "block" || expressionBodied || isIndexer) {
            const head = rest.slice(0, expressionBodied ? arrow : rest.length).trim();
            const split = isIndexer
                ? { type: head.slice(0, head.search(/(^|\s)this\s*\[/)).trim(), name: "this[]" }
                : splitTypeAndName(head);
            if (!split.type || !PROPERTY_NAME.test(split.name)) {
                return [];
            }
            const accessors = terminator.kind === "block" && !expressionBodied
                ? this.readAccessors(terminator.open, terminator.close)
                : { get: true, set: false, init: false };
            const accessorText = [
                accessors.get ? "get;" : "",
                accessors.set ? "set;" : "",
                accessors.init ? "init;" : ""
            ].filter(Boolean).join(" ");
            const declared = cutAt(cutAt(signatureText, findTopLevelArrow(signatureText)), findTopLevelAssignment(signatureText));
            const signature = `${declared} { ${accessorText} }`.replace("{  }", "{ }");
            return [{
                name: split.name.replace(/^@/, ""),
                kind: "property",
                modifiers,
                signature: truncate(signature, MAX_SIGNATURE_LENGTH),
                line,
                endLine,
                returnType: split.type,
                isAsync: false,
                accessors
            }];
        }

        return this.buildFields(rest, modifiers, line, endLine);
    }

    private buildFields(declaration: string, modifiers: string[], line: number, endLine: number): Member[] {
        const declarators = splitTopLevel(declaration);
        if (declarators.length === 0) {
            return [];
        }
        const first = declarators[0];
        const firstAssign = findTopLevelAssignment(first);
        const { type, name } = splitTypeAndName(firstAssign >= 0 ? first.slice(0, firstAssign) : first);
        if (!type || !isIdentifier(name)) {
            return [];
        }
        const names = [name];
        for (const declarator of declarators.slice(1)) {
            const assign = findTopLevelAssignment(declarator);
            const extra = (assign >= 0 ? declarator.slice(0, assign) : declarator).trim();
            if (isIdentifier(extra)) {
                names.push(extra);
            }
        }
        return names.map(fieldName => ({
            name: fieldName.replace(/^@/, ""),
            kind: "field" as const,
            modifiers,
            signature: truncate([...modifiers, type, fieldName].join(" "), MAX_SIGNATURE_LENGTH),
            line,
            endLine,
            returnType: type,
            isAsync: false
        }));
    }

    private readAccessors(open: number, close: number): PropertyAccessors {
        const inner = topLevelOnly(this.source.masked.slice(open + 1, close));
        return {
            get: /\bget\b/.test(inner),
            set: /\bset\b/.test(inner),
            init: /\binit\b/.test(inner)
        };
    }

    private measureBody(terminator: Terminator, header: string, arrow: number, line: number, endLine: number): MemberBody | undefined {
        if (terminator.kind === "block") {
            const text = this.source.masked.slice(terminator.open + 1, terminator.close);
            return {
                lines: this.source.lineAt(terminator.close) - this.source.lineAt(terminator.open) + 1,
                statements: countStatements(text),
                branches: countBranches(text)
            };
        }
        if (arrow >= 0) {
            const expression = header.slice(arrow + 2);
            return {
                lines: endLine - line + 1,
                statements: 1,
                branches: countBranches(expression)
            };
        }
        return undefined;
    }
}

function cutAt(text: string, index: number): string {
    return index >= 0 ? text.slice(0, index).trim() : text;
}

/** `;` terminators outside parentheses, so `for (;;)` counts once. */
export function countStatements(body: string): number {
    let depth = 0;
    let count = 0;
    for (const ch of body) {
        if (ch === "(") depth++;
        else if (ch === ")") depth = Math.max(0, depth - 1);
        else if (ch === ";" && depth === 0) count++;
    }
    return count;
}

export function countBranches(body: string): number {
    return body.match(BRANCH_PATTERN)?.length ?? 0;
}

const PARAMETER_MODIFIERS = /^(?:this|ref|out|in|params|scoped|readonly)\s+/;

export function parseParameters(text: string): MemberParameter[] {
    const parameters: MemberParameter[] = [];
    for (const part of splitTopLevel(text)) {
        let declaration = part.slice(leadingAttributesLength(part));
        const assign = findTopLevelAssignment(declaration);
        if (assign >= 0) {
            declaration = declaration.slice(0, assign);
        }
        declaration = declaration.trim();
        let modifierMatch = PARAMETER_MODIFIERS.exec(declaration);
        const modifiers: string[] = [];
        while (modifierMatch) {
            modifiers.push(modifierMatch[0].trim());
            declaration = declaration.slice(modifierMatch[0].length);
            modifierMatch = PARAMETER_MODIFIERS.exec(declaration);
        }
        const { type, name } = splitTypeAndName(declaration);
        if (!name) continue;
        parameters.push({
            type: [...modifiers, type].join(" ").trim(),
            name: name.replace(/^@/, "")
        });
    }
    return parameters;
}
