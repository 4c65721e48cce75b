import { describe, expect, it } from "@jest/globals";
import { ErrorEnhancer } from "../../errors/ErrorEnhancer.js";

describe("ErrorEnhancer", () => {
    it("computes edit distance", () => {
        expect(ErrorEnhancer.levenshteinDistance("kitten", "sitting")).toBe(3);
        expect(ErrorEnhancer.levenshteinDistance("", "abc")).toBe(3);
    });

    it("ranks close and containing names, once each", () => {
        expect(ErrorEnhancer.findSimilarNames("OrderServce", ["OrderService", "OrderService", "PaymentGateway"], 5))
            .toEqual(["OrderService"]);
        expect(ErrorEnhancer.findSimilarNames("Order", ["OrderService", "Order2", "Zebra"], 5))
            .toEqual(["Order2", "OrderService"]);
        expect(ErrorEnhancer.findSimilarNames("A", ["Ab", "Ac", "Ad"], 2)).toEqual(["Ab", "Ac"]);
    });

    it("suggests deep search after a direct miss", () => {
        const hints = ErrorEnhancer.enhanceClassNotFound("Ledgr", ["Ledger"], "direct");

        expect(hints.similarNames).toEqual(["Ledger"]);
        expect(hints.nextActionHint).toBe("Class 'Ledgr' not found. Did you mean 'Ledger'?");
        expect(hints.toolSuggestions.map(suggestion => suggestion.exampleArgs)).toEqual([
            { className: "Ledgr", searchType: "deep" },
            { className: "Ledger", searchType: "deep" }
        ]);
    });

    it("falls back to a generic hint when nothing is close", () => {
        const hints = ErrorEnhancer.enhanceClassNotFound("Zzz", ["Foo"], "deep");

        expect(hints).toEqual({
            similarNames: [],
            nextActionHint: "Class 'Zzz' not found. Check the spelling or the analysis root.",
            toolSuggestions: []
        });
    });
});
