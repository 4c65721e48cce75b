import type {
    DeclarationKind,
    LineRange,
    Member,
    ParseResult,
    ParseWarning,
    TypeDeclaration
} from "../types.js";
import { TYPE_MODIFIERS } from "../types.js";
import { MaskedSource, SourceMasker } from "./SourceMasker.js";
import { MemberScanner, parseParameters } from "./MemberScanner.js";
import { computeMetrics, extractSummary } from "./DocumentMetrics.js";
import {
    attributeNames,
    collapseWhitespace,
    findClosing,
    findParameterListParen,
    IDENTIFIER,
    IDENTIFIER_PART_CHARS,
    QUALIFIED_NAME,
    splitTopLevel,
    splitTopLevelWithOffsets
} from "./SyntaxText.js";

const RESERVED_NAMES = new Set([
    "where", "new", "class", "struct", "interface", "enum", "record", "namespace",
    "public", "private", "protected", "internal", "static", "abstract", "sealed", "partial"
]);

interface DeclarationSite {
    declaration: TypeDeclaration;
    headerOffset: number;
    /** Offset of the body's `{`, -1 for terse declarations. */
    bodyOpen: number;
    /** Offset of the closing `}` or `;`; text length when the body never closes. */
    bodyEnd: number;
    primaryParameters?: { text: string; offset: number };
    recordStruct: boolean;
}

/**
 * Heuristic structural parser for C# source. Recovers namespaces, usings, type declarations
 * and their members from text with comments and literals masked out. Never throws: malformed
 * input produces a partial document plus warnings.
 */
export class StructuralParser {
    private readonly HEADER_PATTERN = new RegExp(
        `(?<![${IDENTIFIER_PART_CHARS}@.])((?:(?:public|private|protected|internal|static|abstract|sealed|partial|new|unsafe|readonly|ref|file)\\s+)*)(class|interface|enum|struct|record(?:\\s+(?:class|struct))?)\\s+(${IDENTIFIER})`,
        "gu"
    );
    private readonly NAMESPACE_PATTERN = new RegExp(`(?<![${IDENTIFIER_PART_CHARS}@.])namespace\\s+(${QUALIFIED_NAME})\\s*[;{]`, "u");
    private readonly USING_PATTERN = new RegExp(
        `^[ \\t]*(?:global\\s+)?using\\s+(?:static\\s+)?(?:${IDENTIFIER}\\s*=\\s*)?(${QUALIFIED_NAME}(?:<[^;]*>)?)\\s*;`,
        "gmu"
    );

    private readonly masker = new SourceMasker();

    parse(text: string, fileName: string = ""): ParseResult {
        const source = this.masker.mask(text);
        const warnings: ParseWarning[] = [...source.warnings];
        const braceMatch = matchBraces(source.masked);

        const namespaceMatch = this.NAMESPACE_PATTERN.exec(source.masked);
        const sites = this.findDeclarations(source, braceMatch, fileName, warnings);
        this.assignParents(sites);

        const scanner = new MemberScanner(source, braceMatch);
        for (const site of sites) {
            site.declaration.members = this.scanMembers(site, sites, scanner, source);
        }

        return {
            document: {
                ...(namespaceMatch ? { namespace: namespaceMatch[1].replace(/@/g, "") } : {}),
                declarations: sites.map(site => site.declaration),
                imports: this.extractImports(source.masked),
                recoveredRanges: warnings.map(warning => warning.range),
                metrics: computeMetrics(source)
            },
            warnings
        };
    }

    private extractImports(masked: string): string[] {
        const imports = new Set<string>();
        this.USING_PATTERN.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = this.USING_PATTERN.exec(masked)) !== null) {
            imports.add(match[1].replace(/\s+/g, ""));
        }
        return Array.from(imports).sort();
    }

    private findDeclarations(
        source: MaskedSource,
        braceMatch: ReadonlyMap<number, number>,
        fileName: string,
        warnings: ParseWarning[]
    ): DeclarationSite[] {
        const masked = source.masked;
        const sites: DeclarationSite[] = [];
        this.HEADER_PATTERN.lastIndex = 0;
        let match: RegExpExecArray | null;

        while ((match = this.HEADER_PATTERN.exec(masked)) !== null) {
            const headerOffset = match.index;
            const name = match[3].replace(/^@/, "");
            if (RESERVED_NAMES.has(name) || !startsStatement(masked, headerOffset)) {
                continue;
            }

            const keyword = collapseWhitespace(match[2]);
            const kind: DeclarationKind = keyword.startsWith("record") ? "record" : toDeclarationKind(keyword);
            const modifierWords = match[1].trim().split(/\s+/).filter(Boolean);
            const modifiers = TYPE_MODIFIERS.filter(modifier => modifierWords.includes(modifier));

            let p = skipSpaces(masked, headerOffset + match[0].length);
            let typeParameters: string[] = [];
            if (masked[p] === "<") {
                const close = findClosing(masked, p);
                if (close > p) {
                    typeParameters = splitTopLevel(masked.slice(p + 1, close))
                        .map(param => param.replace(/^\[[^\]]*\]\s*/, "").replace(/^(?:in|out)\s+/, "").trim());
                    p = skipSpaces(masked, close + 1);
                }
            }

            let primaryParameters: DeclarationSite["primaryParameters"];
            if (masked[p] === "(") {
                const close = findClosing(masked, p);
                if (close > p) {
                    primaryParameters = { text: masked.slice(p + 1, close), offset: p + 1 };
                    p = close + 1;
                }
            }

            const terminator = findHeaderTerminator(masked, p);
            const baseTypes = parseBaseList(masked.slice(p, terminator.index));
            const startLine = source.lineAt(headerOffset);

            let bodyOpen = -1;
            let bodyEnd: number;
            let bodyStyle: TypeDeclaration["bodyStyle"] = "terse";
            if (terminator.char === "{") {
                bodyOpen = terminator.index;
                bodyStyle = "block";
                const close = braceMatch.get(terminator.index);
                if (close === undefined) {
                    bodyEnd = masked.length;
                    const range: LineRange = { startLine, endLine: Math.max(startLine, source.lineCount) };
                    warnings.push({
                        code: "UnbalancedBraces",
                        message: `Body of ${keyword} ${name} is never closed; closing at end of file`,
                        range
                    });
                } else {
                    bodyEnd = close;
                }
            } else if (terminator.char === ";") {
                bodyEnd = terminator.index;
            } else {
                bodyEnd = masked.length;
                warnings.push({
                    code: "UnbalancedBraces",
                    message: `Declaration header of ${name} has no body`,
                    range: { startLine, endLine: Math.max(startLine, source.lineCount) }
                });
            }

            const leading = this.collectLeadingTrivia(source, headerOffset, startLine);
            const declaration: TypeDeclaration = {
                name,
                kind,
                modifiers,
                members: [],
                span: {
                    startLine,
                    endLine: source.lineAt(Math.max(headerOffset, Math.min(bodyEnd, masked.length - 1)))
                },
                containingFile: fileName,
                baseTypes,
                typeParameters,
                attributes: leading.attributes,
                bodyStyle
            };
            if (leading.summary) {
                declaration.summary = leading.summary;
            }

            sites.push({
                declaration,
                headerOffset,
                bodyOpen,
                bodyEnd,
                primaryParameters,
                recordStruct: keyword === "record struct"
            });
        }

        return sites;
    }

    private assignParents(sites: DeclarationSite[]): void {
        const open: DeclarationSite[] = [];
        for (const site of sites) {
            while (open.length > 0 && open[open.length - 1].bodyEnd < site.headerOffset) {
                open.pop();
            }
            const container = open[open.length - 1];
            if (container && container.bodyOpen < site.headerOffset) {
                site.declaration.parent = container.declaration.name;
            }
            if (site.bodyOpen >= 0) {
                open.push(site);
            }
        }
    }

    private scanMembers(site: DeclarationSite, sites: DeclarationSite[], scanner: MemberScanner, source: MaskedSource): Member[] {
        const members: Member[] = [];
        if (site.declaration.kind === "record" && site.primaryParameters) {
            members.push(...this.positionalProperties(site, source));
        }
        if (site.bodyOpen < 0) {
            return members;
        }
        if (site.declaration.kind === "enum") {
            return scanner.scanEnum(site.declaration.name, site.bodyOpen, site.bodyEnd);
        }

        const nested = new Map<number, number>();
        for (const other of sites) {
            if (other !== site && other.headerOffset > site.bodyOpen && other.headerOffset < site.bodyEnd) {
                nested.set(other.headerOffset, Math.min(other.bodyEnd, site.bodyEnd - 1));
            }
        }
        members.push(...scanner.scanBody(site.bodyOpen, site.bodyEnd, nested));
        return members;
    }

    /** `record Point(int X, int Y)` declares public properties X and Y. */
    private positionalProperties(site: DeclarationSite, source: MaskedSource): Member[] {
        const parameters = site.primaryParameters;
        if (!parameters) return [];
        const mutable = site.recordStruct && !/\breadonly\b/.test(source.masked.slice(site.headerOffset, parameters.offset));
        const accessor = mutable ? "set" : "init";

        return splitTopLevelWithOffsets(parameters.text, parameters.offset).flatMap(part => {
            const [parameter] = parseParameters(part.text);
            if (!parameter || !parameter.type) return [];
            const line = source.lineAt(part.start);
            return [{
                name: parameter.name,
                kind: "property" as const,
                modifiers: ["public"],
                signature: `public ${parameter.type} ${parameter.name} { get; ${accessor}; }`,
                line,
                endLine: line,
                returnType: parameter.type,
                isAsync: false,
                accessors: { get: true, set: mutable, init: !mutable }
            }];
        });
    }

    /**
     * Attribute names on the header line and the attribute-only lines above it, then the
     * summary from contiguous `///` lines above those.
     */
    private collectLeadingTrivia(source: MaskedSource, headerOffset: number, headerLine: number): { attributes: string[]; summary?: string } {
        const attributes: string[] = [];
        const sameLinePrefix = source.masked.slice(source.offsetOfLine(headerLine), headerOffset);
        if (sameLinePrefix.includes("[")) {
            attributes.push(...attributeNames(sameLinePrefix));
        }

        let line = headerLine - 1;
        const attributeLines: string[][] = [];
        while (line >= 1) {
            const maskedLine = source.lineText(line, "masked").trim();
            if (maskedLine.startsWith("[") && maskedLine.endsWith("]")) {
                attributeLines.unshift(attributeNames(maskedLine));
                line--;
                continue;
            }
            break;
        }
        const ordered = [...attributeLines.flat(), ...attributes];

        const docLines: string[] = [];
        while (line >= 1) {
            const original = source.lineText(line).trim();
            if (!original.startsWith("///")) break;
            docLines.unshift(original.slice(3));
            line--;
        }

        const summary = docLines.length > 0 ? extractSummary(docLines.join("\n")) : undefined;
        return summary ? { attributes: ordered, summary } : { attributes: ordered };
    }
}

/** Maps every `{` to its matching `}`. Unmatched braces are left out. */
export function matchBraces(masked: string): Map<number, number> {
    const matches = new Map<number, number>();
    const stack: number[] = [];
    for (let i = 0; i < masked.length; i++) {
        const ch = masked[i];
        if (ch === "{") {
            stack.push(i);
        } else if (ch === "}") {
            const open = stack.pop();
            if (open !== undefined) {
                matches.set(open, i);
            }
        }
    }
    return matches;
}

function toDeclarationKind(keyword: string): DeclarationKind {
    switch (keyword) {
        case "interface":
            return "interface";
        case "enum":
            return "enum";
        case "struct":
            return "struct";
        default:
            return "class";
    }
}

/** A declaration header follows the start of text, `;`, `{`, `}` or an attribute's `]`. */
function startsStatement(masked: string, offset: number): boolean {
    let i = offset - 1;
    while (i >= 0 && /\s/.test(masked[i])) i--;
    return i < 0 || masked[i] === ";" || masked[i] === "{" || masked[i] === "}" || masked[i] === "]";
}

function skipSpaces(text: string, from: number): number {
    let p = from;
    while (p < text.length && /\s/.test(text[p])) p++;
    return p;
}

/** First `{` or `;` outside parentheses; `}` is treated as a terse end of a broken header. */
function findHeaderTerminator(masked: string, from: number): { index: number; char: "{" | ";" | "" } {
    let depth = 0;
    for (let i = from; i < masked.length; i++) {
        const ch = masked[i];
        if (ch === "(") depth++;
        else if (ch === ")") depth = Math.max(0, depth - 1);
        else if (depth === 0 && ch === "{") return { index: i, char: "{" };
        else if (depth === 0 && (ch === ";" || ch === "}")) return { index: i, char: ";" };
    }
    return { index: masked.length, char: "" };
}

/** `: Base(x), IFoo<T> where T : new()` → `["Base", "IFoo<T>"]`. */
function parseBaseList(tail: string): string[] {
    const trimmed = tail.trim();
    if (!trimmed.startsWith(":")) {
        return [];
    }
    let list = trimmed.slice(1);
    const where = list.search(/\bwhere\b/);
    if (where >= 0) {
        list = list.slice(0, where);
    }
    return splitTopLevel(list)
        .map(base => {
            const paren = findParameterListParen(base);
            return collapseWhitespace(paren >= 0 ? base.slice(0, paren) : base);
        })
        .filter(base => base.length > 0);
}

export function parseSource(text: string, fileName?: string): ParseResult {
    return new StructuralParser().parse(text, fileName);
}
