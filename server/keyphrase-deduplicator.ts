/**
 * Keyphrase Deduplication
 *
 * Groups normalized phrases into clusters of variants that represent the same
 * search term. Rules are checked in order and the first match wins:
 *   1. exact match of the canonical text
 *   2. singular/plural equivalence ("payment" / "payments", "address" / "addresses")
 *   3. whitespace-bounded containment against the cluster's representative, within
 *      related categories: the longer phrase represents the cluster
 *   4. acronym/full-name pairing: both forms survive as separate, linked clusters
 */

import type {
    AcronymPair,
    ClusterSnapshot,
    KeyphraseCluster,
    NormalizedPhrase,
} from "@shared/schema";
import { comparisonKey, splitWords } from "./keyphrase-normalizer";

export type MergeRule = "exact" | "plural" | "containment";

export type MergeDecision =
    | { kind: "merge"; rule: MergeRule; cluster: KeyphraseCluster; promote: boolean }
    | { kind: "new"; pairedWith: KeyphraseCluster[] };

export interface AdmitResult {
    clusterId: string;
    decision: MergeDecision;
}

const MIN_PLURAL_STEM_LENGTH = 3;

export function isPluralVariant(a: string, b: string): boolean {
    const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
    if (shorter.length < MIN_PLURAL_STEM_LENGTH) return false;
    return longer === `${shorter}s` || longer === `${shorter}es`;
}

/**
 * True when `inner` occurs in `outer` on word boundaries and the two differ.
 */
export function isContainedIn(inner: string, outer: string): boolean {
    if (inner === outer || inner.length === 0) return false;
    return ` ${outer} `.includes(` ${inner} `);
}

/**
 * Drop repeated phrases within one document's output, keeping the first.
 * Returns the kept phrases and the repeats.
 */
export function deduplicateWithinDocument(phrases: NormalizedPhrase[]): {
    unique: NormalizedPhrase[];
    duplicates: NormalizedPhrase[];
} {
    const seen = new Set<string>();
    const unique: NormalizedPhrase[] = [];
    const duplicates: NormalizedPhrase[] = [];

    for (const phrase of phrases) {
        const key = comparisonKey(phrase.canonicalText);
        if (seen.has(key)) {
            duplicates.push(phrase);
            continue;
        }
        seen.add(key);
        unique.push(phrase);
    }

    return { unique, duplicates };
}

export class SimilarityMerger {
    private readonly clusters: KeyphraseCluster[] = [];
    private readonly partners = new Map<string, string[]>();
    private readonly commonCategory?: string;
    private nextOrder = 0;

    constructor(acronymTable: AcronymPair[] = [], options: { commonCategory?: string } = {}) {
        this.commonCategory = options.commonCategory;
        for (const { acronym, fullName } of acronymTable) {
            const a = comparisonKey(acronym);
            const f = comparisonKey(splitWords(fullName).join(" "));
            this.partners.set(a, [...(this.partners.get(a) ?? []), f]);
            this.partners.set(f, [...(this.partners.get(f) ?? []), a]);
        }
    }

    get size(): number {
        return this.clusters.length;
    }

    /**
     * Decide where a phrase would land without mutating anything.
     */
    match(phrase: NormalizedPhrase): MergeDecision {
        const key = comparisonKey(phrase.canonicalText);

        const exact = this.clusters.find(c => c.memberKeys.has(key));
        if (exact) {
            return { kind: "merge", rule: "exact", cluster: exact, promote: false };
        }

        const plural = this.clusters.find(c => someMember(c, member => isPluralVariant(member, key)));
        if (plural) {
            return { kind: "merge", rule: "plural", cluster: plural, promote: false };
        }

        for (const cluster of this.clusters) {
            if (!this.isRelated(cluster, phrase.category)) continue;
            const representative = comparisonKey(cluster.representative);
            if (isContainedIn(representative, key)) {
                // The more specific phrase takes over
                return { kind: "merge", rule: "containment", cluster, promote: true };
            }
            if (isContainedIn(key, representative)) {
                return { kind: "merge", rule: "containment", cluster, promote: false };
            }
        }

        const partnerKeys = this.partners.get(key) ?? [];
        const pairedWith = this.clusters.filter(c => partnerKeys.some(partner => c.memberKeys.has(partner)));
        return { kind: "new", pairedWith };
    }

    apply(phrase: NormalizedPhrase, decision: MergeDecision, options: { overQuota?: boolean } = {}): KeyphraseCluster {
        const key = comparisonKey(phrase.canonicalText);

        if (decision.kind === "merge") {
            const cluster = decision.cluster;
            cluster.memberKeys.add(key);
            cluster.variants.add(phrase.originalText);
            cluster.categoryVotes.set(phrase.category, (cluster.categoryVotes.get(phrase.category) ?? 0) + 1);
            cluster.sourceDocuments.add(phrase.sourceDocumentId);
            if (decision.promote) {
                cluster.representative = phrase.canonicalText;
            }
            return cluster;
        }

        const order = this.nextOrder++;
        const cluster: KeyphraseCluster = {
            id: `kp-${order}`,
            representative: phrase.canonicalText,
            memberKeys: new Set([key]),
            variants: new Set([phrase.originalText]),
            categoryVotes: new Map([[phrase.category, 1]]),
            sourceDocuments: new Set([phrase.sourceDocumentId]),
            firstSeenOrder: order,
            quotaCategory: phrase.category,
            overQuota: options.overQuota ?? false,
            paired: decision.pairedWith.length > 0,
            pairedWith: decision.pairedWith.map(c => c.id),
        };
        for (const partner of decision.pairedWith) {
            partner.paired = true;
            partner.pairedWith.push(cluster.id);
        }
        this.clusters.push(cluster);
        return cluster;
    }

    admit(phrase: NormalizedPhrase, options: { overQuota?: boolean } = {}): AdmitResult {
        const decision = this.match(phrase);
        const cluster = this.apply(phrase, decision, options);
        return { clusterId: cluster.id, decision };
    }

    // Containment only folds within a category that already voted for the cluster; common terms relate to all
    private isRelated(cluster: KeyphraseCluster, category: string): boolean {
        if (cluster.categoryVotes.has(category)) return true;
        return this.commonCategory !== undefined
            && (category === this.commonCategory || cluster.categoryVotes.has(this.commonCategory));
    }

    /**
     * Detached, frozen copies of the clusters in first-seen order.
     */
    snapshot(): ClusterSnapshot {
        return this.clusters.map(cluster => Object.freeze({
            ...cluster,
            memberKeys: new Set(cluster.memberKeys),
            variants: new Set(cluster.variants),
            categoryVotes: new Map(cluster.categoryVotes),
            sourceDocuments: new Set(cluster.sourceDocuments),
            pairedWith: [...cluster.pairedWith],
        }));
    }
}

function someMember(cluster: KeyphraseCluster, predicate: (member: string) => boolean): boolean {
    for (const member of cluster.memberKeys) {
        if (predicate(member)) return true;
    }
    return false;
}
