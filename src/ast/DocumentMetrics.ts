import type { Complexity, FileMetrics } from "../types.js";
import type { MaskedSource } from "./SourceMasker.js";

const BRANCH_HEADER_PATTERN = /\b(?:if|for|foreach|while|switch)\s*\(/g;

export function complexityOf(branchCount: number): Complexity {
    if (branchCount < 5) return "Low";
    if (branchCount < 15) return "Medium";
    return "High";
}

/**
 * Line classification: blank when empty, comment when only comment text remains
 * after masking, code otherwise (preprocessor lines and literal continuations included).
 */
export function computeMetrics(source: MaskedSource): FileMetrics {
    let codeLines = 0;
    let commentLines = 0;
    let blankLines = 0;
    const totalLines = source.lineCount;

    for (let line = 1; line <= totalLines; line++) {
        if (source.lineText(line).trim().length === 0) {
            blankLines++;
        } else if (source.commentLines.has(line) && source.lineText(line, "masked").trim().length === 0) {
            commentLines++;
        } else {
            codeLines++;
        }
    }

    const branchCount = source.masked.match(BRANCH_HEADER_PATTERN)?.length ?? 0;
    return {
        totalLines,
        codeLines,
        commentLines,
        blankLines,
        hasXmlDocs: /^[ \t]*\/\/\//m.test(source.original),
        branchCount,
        complexity: complexityOf(branchCount)
    };
}

const ENTITIES: Record<string, string> = {
    "&lt;": "<",
    "&gt;": ">",
    "&amp;": "&",
    "&quot;": "\"",
    "&apos;": "'"
};

/**
 * Plain text of an XML documentation block: the `<summary>` element when present,
 * otherwise the whole block. References keep their target name.
 */
export function extractSummary(xml: string): string | undefined {
    const summary = /<summary>([\s\S]*?)<\/summary>/i.exec(xml);
    const text = (summary ? summary[1] : xml)
        .replace(/<(?:see|seealso|paramref|typeparamref)\s+(?:cref|langword|name|href)\s*=\s*"(?:[A-Z]:)?([^"]*)"\s*\/>/g, "$1")
        .replace(/<[^>]+>/g, " ")
        .replace(/&(?:lt|gt|amp|quot|apos);/g, entity => ENTITIES[entity] ?? entity)
        .replace(/\s+/g, " ")
        .trim();
    return text.length > 0 ? text : undefined;
}
