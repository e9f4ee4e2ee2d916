import type {
    AuditEntry,
    CandidatePhrase,
    ClusterSnapshot,
    Document,
    NormalizedPhrase,
    RunConfig,
} from "@shared/schema";
import { SimilarityMerger, deduplicateWithinDocument } from "./keyphrase-deduplicator";
import { KeyphraseNormalizer, comparisonKey } from "./keyphrase-normalizer";
import { CategoryCounter, QuotaTracker } from "./quota-tracker";
import { logger } from "./utils/logger";

/**
 * Replay order for buffered per-document results: common-category documents in
 * a first pass, then everything else, each group in arrival order.
 */
export function orderForReplay<T extends { document: Document }>(items: T[], commonCategory: string): T[] {
    return [
        ...items.filter(item => item.document.category === commonCategory),
        ...items.filter(item => item.document.category !== commonCategory),
    ];
}

/**
 * Single writer of the corpus-wide cluster set for one run.
 *
 * Per phrase: canonicalize, drop common-section terms, validate, drop repeats
 * within the document, then admit through the merger with quota gating for
 * phrases that would open a new cluster.
 */
export class KeyphraseAggregator {
    private readonly normalizer: KeyphraseNormalizer;
    private readonly merger: SimilarityMerger;
    private readonly quota: QuotaTracker;
    private readonly auditLog: AuditEntry[] = [];
    private readonly exclusionSet = new Set<string>();
    private readonly commonCategory: string;

    constructor(config: RunConfig, counter: CategoryCounter = new CategoryCounter()) {
        this.normalizer = new KeyphraseNormalizer(config);
        this.merger = new SimilarityMerger(config.acronymTable, { commonCategory: config.commonCategory });
        this.quota = new QuotaTracker(config.categories, config.globalTarget, counter);
        this.commonCategory = config.commonCategory;
    }

    ingest(document: Document, candidates: CandidatePhrase[]): void {
        const isCommon = document.category === this.commonCategory;
        const normalized: NormalizedPhrase[] = [];

        for (const candidate of candidates) {
            const canonical = this.normalizer.canonicalize(candidate.text);
            if (!isCommon && this.exclusionSet.has(comparisonKey(canonical))) {
                this.audit("ExcludedCommonTerm", candidate.text, document);
                continue;
            }

            const result = this.normalizer.normalize(candidate.text, document.category, document.id);
            if (result.status === "rejected") {
                this.audit(result.reason, candidate.text, document);
                continue;
            }
            normalized.push(result.phrase);
        }

        const { unique, duplicates } = deduplicateWithinDocument(normalized);
        for (const duplicate of duplicates) {
            this.audit("DuplicateInDocument", duplicate.originalText, document);
        }

        let admitted = 0;
        for (const phrase of unique) {
            if (this.admit(phrase, document)) {
                admitted++;
                if (isCommon) {
                    this.exclusionSet.add(comparisonKey(phrase.canonicalText));
                }
            }
        }

        logger.debug("Ingested document", {
            documentId: document.id,
            category: document.category,
            candidates: candidates.length,
            admitted,
            clusters: this.merger.size,
        });
    }

    recordAudit(entry: AuditEntry): void {
        this.auditLog.push(entry);
    }

    snapshot(): ClusterSnapshot {
        return this.merger.snapshot();
    }

    getAuditLog(): readonly AuditEntry[] {
        return this.auditLog;
    }

    categoryCounts(): Record<string, number> {
        return this.quota.counts();
    }

    isExcluded(text: string): boolean {
        return this.exclusionSet.has(comparisonKey(this.normalizer.canonicalize(text)));
    }

    private admit(phrase: NormalizedPhrase, document: Document): boolean {
        const decision = this.merger.match(phrase);
        if (decision.kind === "merge") {
            // Merging never consumes quota
            this.merger.apply(phrase, decision);
            return true;
        }

        const verdict = this.quota.shouldAdmit(phrase.category);
        if (verdict === "reject") {
            this.audit("QuotaExhausted", phrase.originalText, document, `category ${phrase.category} and global target exhausted`);
            return false;
        }

        this.merger.apply(phrase, decision, { overQuota: verdict === "admit_over_quota" });
        this.quota.record(phrase.category);
        return true;
    }

    private audit(reason: AuditEntry["reason"], text: string, document: Document, detail?: string): void {
        this.auditLog.push({
            reason,
            text,
            documentId: document.id,
            category: document.category,
            ...(detail !== undefined && { detail }),
        });
    }
}
