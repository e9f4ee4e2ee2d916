import type { CategoryConfig, QuotaDecision } from "@shared/schema";
import { ConfigurationError } from "./errors";

/**
 * Per-category cluster counts for one run. Created at run start and handed
 * to the tracker by reference; only the aggregator writes through it.
 */
export class CategoryCounter {
    private readonly counts = new Map<string, number>();
    private runningTotal = 0;

    increment(category: string): void {
        this.counts.set(category, (this.counts.get(category) ?? 0) + 1);
        this.runningTotal++;
    }

    count(category: string): number {
        return this.counts.get(category) ?? 0;
    }

    get total(): number {
        return this.runningTotal;
    }

    toRecord(): Record<string, number> {
        return Object.fromEntries(this.counts);
    }
}

/**
 * Soft quotas: a category past its target is still admitted, flagged, until it
 * also exhausts its overflow margin while the global budget is spent.
 */
export class QuotaTracker {
    private readonly quotas: Map<string, Pick<CategoryConfig, "softTarget" | "overflowMargin">>;

    constructor(
        categories: ReadonlyArray<Pick<CategoryConfig, "name" | "softTarget" | "overflowMargin">>,
        private readonly globalTarget: number,
        private readonly counter: CategoryCounter = new CategoryCounter(),
    ) {
        this.quotas = new Map(categories.map(c => [c.name, c]));
    }

    shouldAdmit(category: string): QuotaDecision {
        const quota = this.quotas.get(category);
        if (!quota) {
            throw new ConfigurationError(`No quota configured for category "${category}"`);
        }

        const current = this.counter.count(category);
        if (current < quota.softTarget) {
            return "admit";
        }
        if (current < quota.softTarget + quota.overflowMargin) {
            return "admit_over_quota";
        }
        return this.counter.total >= this.globalTarget ? "reject" : "admit_over_quota";
    }

    record(category: string): void {
        this.counter.increment(category);
    }

    counts(): Record<string, number> {
        return this.counter.toRecord();
    }

    get total(): number {
        return this.counter.total;
    }
}
