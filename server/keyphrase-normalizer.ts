import type { NormalizedPhrase, RejectionReason, RunConfig } from "@shared/schema";

export const DEFAULT_WORD_COUNT_RANGE = { min: 1, max: 5 } as const;

export type NormalizeResult =
    | { status: "normalized"; phrase: NormalizedPhrase }
    | { status: "rejected"; reason: RejectionReason; canonicalText: string };

type NormalizerConfig = Pick<RunConfig, "categories" | "stoplist" | "acronymTable" | "acronyms">;

/**
 * Key used for every equality and similarity comparison. Casing retained
 * for acronyms and identifiers never splits two phrases apart.
 */
export function comparisonKey(text: string): string {
    return text.toLowerCase();
}

export function splitWords(text: string): string[] {
    return text.trim().split(/\s+/).filter(word => word.length > 0);
}

/**
 * Field and parameter identifiers keep their casing: anything with an
 * underscore, or camel/mixed case such as "FedNow" or "INSTPYMT-Read".
 */
export function isIdentifierToken(token: string): boolean {
    if (token.includes("_")) return true;
    if (!/[a-z]/.test(token)) return false;
    return token.split("-").some(segment => /[A-Z]/.test(segment.slice(1)));
}

export class KeyphraseNormalizer {
    private readonly preservedTokens = new Map<string, string>();
    private readonly properNouns: string[][];
    private readonly stoplist: Set<string>;
    private readonly ranges = new Map<string, { min: number; max: number }>();

    constructor(config: NormalizerConfig) {
        for (const token of config.acronyms) {
            this.preservedTokens.set(token.toLowerCase(), token);
        }
        for (const { acronym } of config.acronymTable) {
            this.preservedTokens.set(acronym.toLowerCase(), acronym);
        }
        this.properNouns = config.acronymTable
            .map(pair => splitWords(pair.fullName))
            .filter(words => words.length > 0);
        this.stoplist = new Set(config.stoplist.map(term => comparisonKey(splitWords(term).join(" "))));
        for (const category of config.categories) {
            this.ranges.set(category.name, category.wordCountRange);
        }
    }

    /**
     * Trim, collapse whitespace and apply the casing rules. Pure and idempotent.
     */
    canonicalize(rawText: string): string {
        const words = splitWords(rawText).map(token => this.caseToken(token));
        return this.applyProperNouns(words).join(" ");
    }

    normalize(rawText: string, category: string, sourceDocumentId: string): NormalizeResult {
        const canonicalText = this.canonicalize(rawText);
        const count = canonicalText.length === 0 ? 0 : splitWords(canonicalText).length;
        const range = this.wordCountRange(category);

        if (count < range.min) {
            return { status: "rejected", reason: "TooShort", canonicalText };
        }
        if (count > range.max) {
            return { status: "rejected", reason: "TooLong", canonicalText };
        }
        if (this.stoplist.has(comparisonKey(canonicalText))) {
            return { status: "rejected", reason: "Stoplisted", canonicalText };
        }

        return {
            status: "normalized",
            phrase: {
                canonicalText,
                originalText: rawText.trim(),
                sourceDocumentId,
                category,
            },
        };
    }

    wordCountRange(category: string): { min: number; max: number } {
        return this.ranges.get(category) ?? DEFAULT_WORD_COUNT_RANGE;
    }

    private caseToken(token: string): string {
        const preserved = this.preservedTokens.get(token.toLowerCase());
        if (preserved !== undefined) return preserved;
        if (isIdentifierToken(token)) return token;
        return token.toLowerCase();
    }

    // Full names from the acronym table are proper nouns: restore their casing wherever they occur
    private applyProperNouns(words: string[]): string[] {
        const result = [...words];
        for (const noun of this.properNouns) {
            const target = noun.map(comparisonKey);
            for (let start = 0; start + target.length <= result.length; start++) {
                const matches = target.every((word, offset) => comparisonKey(result[start + offset]) === word);
                if (matches) {
                    result.splice(start, target.length, ...noun);
                    start += target.length - 1;
                }
            }
        }
        return result;
    }
}
