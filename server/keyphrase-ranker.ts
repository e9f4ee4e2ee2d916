/**
 * Keyphrase Ranker
 *
 * Score = breadth weight * distinct source documents
 *       + priority weight of the cluster's category
 *       - over-quota penalty (if the cluster was admitted over its category quota)
 *       + how-to bonus (if the representative starts with a configured prefix)
 *
 * Sorted by score descending, then first-seen order ascending, and truncated
 * to the global target. A shortfall is returned as-is.
 */

import type { ClusterSnapshot, KeyphraseCluster, RankedKeyphrase, RunConfig } from "@shared/schema";
import { comparisonKey } from "./keyphrase-normalizer";

type RankerConfig = Pick<RunConfig, "categories" | "scoring" | "howToPrefixes">;

export function dominantCategory(cluster: Readonly<KeyphraseCluster>): string {
    let best = cluster.quotaCategory;
    let bestVotes = -1;
    // Map iteration follows first-vote order, so ties go to the earliest voter
    for (const [category, votes] of cluster.categoryVotes) {
        if (votes > bestVotes) {
            best = category;
            bestVotes = votes;
        }
    }
    return best;
}

export class KeyphraseRanker {
    private readonly priorityWeights: Map<string, number>;
    private readonly howToPrefixes: string[];

    constructor(private readonly config: RankerConfig) {
        this.priorityWeights = new Map(config.categories.map(c => [c.name, c.priorityWeight]));
        this.howToPrefixes = config.howToPrefixes.map(prefix => comparisonKey(prefix.trim()));
    }

    isHowTo(text: string): boolean {
        const key = comparisonKey(text);
        return this.howToPrefixes.some(prefix => key === prefix || key.startsWith(`${prefix} `));
    }

    score(cluster: Readonly<KeyphraseCluster>): number {
        const { breadthWeight, overQuotaPenalty, howToBonus } = this.config.scoring;
        const breadth = breadthWeight * cluster.sourceDocuments.size;
        const priority = this.priorityWeights.get(dominantCategory(cluster)) ?? 0;
        const penalty = cluster.overQuota ? overQuotaPenalty : 0;
        const bonus = this.isHowTo(cluster.representative) ? howToBonus : 0;
        return Number((breadth + priority - penalty + bonus).toFixed(4));
    }

    finalize(clusters: ClusterSnapshot, globalTarget: number): RankedKeyphrase[] {
        const scored = clusters.map(cluster => ({
            cluster,
            category: dominantCategory(cluster),
            score: this.score(cluster),
        }));

        scored.sort((a, b) => b.score - a.score || a.cluster.firstSeenOrder - b.cluster.firstSeenOrder);

        return scored
            .slice(0, Math.max(0, globalTarget))
            .map(({ cluster, category, score }) => Object.freeze({
                text: cluster.representative,
                category,
                score,
            }));
    }
}
