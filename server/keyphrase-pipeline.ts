import {
    documentSchema,
    extractionResponseSchema,
    type CandidatePhrase,
    type Document,
    type DocumentReport,
    type ExtractionResult,
    type RunConfig,
    type RunResult,
    type RunSummary,
} from "@shared/schema";
import { findCategory } from "./config/run-config";
import {
    EXTRACTION_CONCURRENCY,
    EXTRACTION_TIMEOUT_MS,
    MAX_RETRY_ATTEMPTS,
    RETRY_INITIAL_DELAY_MS,
    RETRY_MAX_DELAY_MS,
} from "./config/keyphrase-extraction";
import { ConfigurationError, ExtractionTimeoutError } from "./errors";
import { KeyphraseAggregator, orderForReplay } from "./keyphrase-aggregator";
import type { KeyphraseExtractor } from "./keyphrase-extractor";
import { KeyphraseRanker } from "./keyphrase-ranker";
import { logger } from "./utils/logger";
import { RetryAbortedError, retryWithBackoff } from "./utils/retry";

export interface PipelineOptions {
    concurrency?: number;
    timeoutMs?: number;
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    signal?: AbortSignal;
}

interface DocumentOutcome {
    document: Document;
    result: ExtractionResult;
    malformed: boolean;
}

// Helper function to time pipeline stages
async function timeStage<T>(stageName: string, fn: () => Promise<T> | T, details?: Record<string, number>): Promise<T> {
    const start = Date.now();
    try {
        const result = await fn();
        logger.perf(stageName, Date.now() - start, details);
        return result;
    } catch (error) {
        const duration = Date.now() - start;
        logger.error(`[PERF-ERROR] ${stageName} failed after ${duration}ms`, error, { stage: stageName, duration });
        throw error;
    }
}

/**
 * Remove list numbering, bullets and surrounding quotes an extractor may leave on a phrase.
 */
export function cleanCandidateText(text: string): string {
    return text
        .trim()
        .replace(/^\d+[\.\)]\s*/, '')
        .replace(/^[-*•]\s*/, '')
        .replace(/^["']|["']$/g, '')
        .trim();
}

/**
 * Reduce an extractor response to plain candidate texts, or null when the shape is not recognised.
 */
export function reduceExtractionResponse(response: unknown): string[] | null {
    const parsed = extractionResponseSchema.safeParse(response);
    return parsed.success ? parsed.data.map(cleanCandidateText) : null;
}

export function validateDocuments(documents: Document[], config: RunConfig): void {
    const issues: string[] = [];
    const ids = new Set<string>();

    documents.forEach((document, index) => {
        const parsed = documentSchema.safeParse(document);
        if (!parsed.success) {
            issues.push(`documents.${index}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
            return;
        }
        if (!findCategory(config, document.category)) {
            issues.push(`documents.${index}: category "${document.category}" is not configured`);
        }
        if (ids.has(document.id)) {
            issues.push(`documents.${index}: duplicate document id "${document.id}"`);
        }
        ids.add(document.id);
    });

    if (issues.length > 0) {
        throw new ConfigurationError("Documents reference invalid configuration", issues);
    }
}

/**
 * Run one extraction attempt under a timeout. The attempt gets its own signal,
 * aborted when the timeout fires.
 */
async function attemptWithTimeout<T>(
    call: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    documentId: string
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new ExtractionTimeoutError(documentId, timeoutMs);
            controller.abort(error);
            reject(error);
        }, Math.max(1, timeoutMs));
    });
    try {
        return await Promise.race([call(controller.signal), timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Call the extractor for one document with timeout and bounded retries.
 * Never throws: exhaustion degrades to an explicit result, and retries cut
 * short by cancellation come back as cancelled.
 */
export async function extractDocument(
    document: Document,
    config: RunConfig,
    extractor: KeyphraseExtractor,
    options: PipelineOptions = {}
): Promise<DocumentOutcome> {
    const category = findCategory(config, document.category);
    const maxAttempts = Math.max(1, options.maxAttempts ?? MAX_RETRY_ATTEMPTS);
    let attempts = 0;

    try {
        const response = await retryWithBackoff(
            async () => {
                attempts++;
                return attemptWithTimeout(
                    signal => extractor.extract({
                        documentId: document.id,
                        category: document.category,
                        content: document.rawContent,
                        targetCount: category?.targetPerDocument,
                        focus: category?.extractionFocus,
                        signal,
                    }),
                    options.timeoutMs ?? EXTRACTION_TIMEOUT_MS,
                    document.id
                );
            },
            {
                maxAttempts,
                initialDelay: options.initialDelayMs ?? RETRY_INITIAL_DELAY_MS,
                maxDelay: options.maxDelayMs ?? RETRY_MAX_DELAY_MS,
                signal: options.signal,
            }
        );

        const texts = reduceExtractionResponse(response);
        if (texts === null) {
            logger.warn("Malformed extraction response, treating as empty", { documentId: document.id });
            return { document, result: { status: "success", phrases: [] }, malformed: true };
        }

        const phrases: CandidatePhrase[] = texts.map(text => ({
            text,
            sourceDocumentId: document.id,
            category: document.category,
        }));
        return { document, result: { status: "success", phrases }, malformed: false };
    } catch (error) {
        if (error instanceof RetryAbortedError) {
            logger.info("Extraction abandoned on cancellation", { documentId: document.id, attempts });
            return { document, result: { status: "cancelled", attempts }, malformed: false };
        }
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn("Extraction failed after retries, degrading to empty", {
            documentId: document.id,
            category: document.category,
            attempts,
            reason,
        });
        return { document, result: { status: "degraded", reason, attempts }, malformed: false };
    }
}

/**
 * Run one keyphrase aggregation pass over a corpus.
 *
 * Extraction calls run concurrently in batches bounded by `concurrency`; results are
 * buffered and replayed into the single-writer aggregator in document order, common
 * documents first. Cancellation stops new batches and further retries, lets calls
 * already in flight finish and ranks whatever was ingested.
 */
export async function runKeyphrasePipeline(
    documents: Document[],
    config: RunConfig,
    extractor: KeyphraseExtractor,
    options: PipelineOptions = {}
): Promise<RunResult> {
    const concurrency = options.concurrency ?? EXTRACTION_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigurationError(`Extraction concurrency must be a positive integer, got ${concurrency}`);
    }
    validateDocuments(documents, config);

    logger.info("=== KEYPHRASE PIPELINE START ===", {
        documents: documents.length,
        globalTarget: config.globalTarget,
        concurrency,
    });

    const outcomes: Array<DocumentOutcome | undefined> = new Array(documents.length);
    let cancelled = false;

    await timeStage("extraction", async () => {
        const totalBatches = Math.ceil(documents.length / concurrency);
        for (let batchStart = 0; batchStart < documents.length; batchStart += concurrency) {
            if (options.signal?.aborted) {
                cancelled = true;
                logger.info("Run cancelled, no further extraction calls will be issued", {
                    attempted: batchStart,
                    remaining: documents.length - batchStart,
                });
                break;
            }

            const batchNumber = batchStart / concurrency + 1;
            const batch = documents.slice(batchStart, batchStart + concurrency);
            logger.debug(`[Batch ${batchNumber}/${totalBatches}] Starting batch`, { batchStart, batchSize: batch.length });

            const settled = await Promise.allSettled(
                batch.map(document => extractDocument(document, config, extractor, options))
            );
            settled.forEach((entry, offset) => {
                const document = batch[offset];
                outcomes[batchStart + offset] = entry.status === "fulfilled"
                    ? entry.value
                    : {
                        document,
                        result: { status: "degraded", reason: String(entry.reason), attempts: 0 },
                        malformed: false,
                    };
            });
        }
        if (options.signal?.aborted) {
            cancelled = true;
        }
    }, { documents: documents.length });

    const aggregator = new KeyphraseAggregator(config);
    const byDocument: Record<string, DocumentReport> = {};
    const completed = outcomes.filter((outcome): outcome is DocumentOutcome => outcome !== undefined);

    await timeStage("aggregation", () => {
        for (const { document, result, malformed } of orderForReplay(completed, config.commonCategory)) {
            if (result.status === "cancelled") {
                continue;
            }
            if (result.status === "degraded") {
                aggregator.recordAudit({
                    reason: "ExtractionFailure",
                    text: "",
                    documentId: document.id,
                    category: document.category,
                    detail: `${result.reason} (${result.attempts} attempt(s))`,
                });
                continue;
            }
            if (malformed) {
                aggregator.recordAudit({
                    reason: "MalformedResponse",
                    text: "",
                    documentId: document.id,
                    category: document.category,
                });
            }
            aggregator.ingest(document, result.phrases);
        }
    }, { documents: completed.length });

    documents.forEach((document, index) => {
        const outcome = outcomes[index];
        if (!outcome || outcome.result.status === "cancelled") {
            byDocument[document.id] = { category: document.category, status: "skipped", keyphrases: [] };
        } else if (outcome.result.status === "degraded") {
            byDocument[document.id] = {
                category: document.category,
                status: "degraded",
                keyphrases: [],
                error: outcome.result.reason,
            };
        } else {
            byDocument[document.id] = {
                category: document.category,
                status: "success",
                keyphrases: outcome.result.phrases.map(p => p.text),
            };
        }
    });

    const clusters = aggregator.snapshot();
    const ranker = new KeyphraseRanker(config);
    const keyphrases = await timeStage("ranking", () => ranker.finalize(clusters, config.globalTarget), {
        clusters: clusters.length,
    });

    const categories: Record<string, number> = Object.fromEntries(config.categories.map(c => [c.name, 0]));
    for (const keyphrase of keyphrases) {
        categories[keyphrase.category] = (categories[keyphrase.category] ?? 0) + 1;
    }

    const reports = Object.values(byDocument);
    const summary: RunSummary = {
        admittedCount: keyphrases.length,
        globalTarget: config.globalTarget,
        discrepancy: config.globalTarget - keyphrases.length,
        categories,
        clusterCount: clusters.length,
        documentsProcessed: reports.filter(r => r.status === "success").length,
        documentsDegraded: reports.filter(r => r.status === "degraded").length,
        documentsSkipped: reports.filter(r => r.status === "skipped").length,
        cancelled,
    };

    if (summary.discrepancy !== 0) {
        logger.info("Admitted count differs from global target", {
            admittedCount: summary.admittedCount,
            globalTarget: summary.globalTarget,
        });
    }
    logger.info("=== KEYPHRASE PIPELINE COMPLETE ===", { ...summary });

    return {
        keyphrases,
        auditLog: [...aggregator.getAuditLog()],
        summary,
        byDocument,
    };
}
