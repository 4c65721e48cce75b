export interface NotFoundHints {
    similarNames: string[];
    nextActionHint: string;
    toolSuggestions: ToolSuggestion[];
}

export interface ToolSuggestion {
    toolName: string;
    rationale: string;
    exampleArgs: Record<string, unknown>;
}

export class ErrorEnhancer {
    /**
     * Hints for a `find_class` miss: closest declared names plus the tool call
     * most likely to succeed next.
     */
    static enhanceClassNotFound(className: string, knownNames: Iterable<string>, mode: "direct" | "deep"): NotFoundHints {
        const similarNames = ErrorEnhancer.findSimilarNames(className, knownNames, 5);
        const toolSuggestions: ToolSuggestion[] = [];

        if (mode === "direct") {
            toolSuggestions.push({
                toolName: "find_class",
                rationale: "Direct mode only checks file names. Deep mode scans every declaration.",
                exampleArgs: { className, searchType: "deep" }
            });
        }
        if (similarNames.length > 0) {
            toolSuggestions.push({
                toolName: "find_class",
                rationale: "A declaration with a similar name exists.",
                exampleArgs: { className: similarNames[0], searchType: "deep" }
            });
        }

        return {
            similarNames,
            nextActionHint: similarNames.length > 0
                ? `Class '${className}' not found. Did you mean ${similarNames.map(name => `'${name}'`).join(", ")}?`
                : `Class '${className}' not found. Check the spelling or the analysis root.`,
            toolSuggestions
        };
    }

    static findSimilarNames(query: string, candidates: Iterable<string>, limit: number): string[] {
        const lowerQuery = query.toLowerCase();
        const scored: Array<{ name: string; distance: number }> = [];
        const seen = new Set<string>();

        for (const name of candidates) {
            if (seen.has(name) || name === query) continue;
            seen.add(name);
            const lowerName = name.toLowerCase();
            const distance = ErrorEnhancer.levenshteinDistance(lowerQuery, lowerName);
            const threshold = Math.max(2, Math.floor(Math.max(lowerQuery.length, lowerName.length) / 3));
            const contains = lowerName.includes(lowerQuery) || lowerQuery.includes(lowerName);
            if (distance <= threshold || contains) {
                scored.push({ name, distance: contains ? Math.min(distance, 1) : distance });
            }
        }

        scored.sort((a, b) => a.distance - b.distance || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        return scored.slice(0, limit).map(entry => entry.name);
    }

    static levenshteinDistance(a: string, b: string): number {
        const matrix: number[][] = [];

        for (let i = 0; i <= b.length; i++) {
            matrix[i] = [i];
        }
        for (let j = 0; j <= a.length; j++) {
            matrix[0][j] = j;
        }

        for (let i = 1; i <= b.length; i++) {
            for (let j = 1; j <= a.length; j++) {
                if (b.charAt(i - 1) === a.charAt(j - 1)) {
                    matrix[i][j] = matrix[i - 1][j - 1];
                } else {
                    matrix[i][j] = Math.min(
                        matrix[i - 1][j - 1] + 1, // substitution
                        matrix[i][j - 1] + 1,     // insertion
                        matrix[i - 1][j] + 1      // deletion
                    );
                }
            }
        }

        return matrix[b.length][a.length];
    }
}
