import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { CircuitOpenError } from "./errors";
import { CircuitBreaker } from "./utils/circuit-breaker";
import { logger } from "./utils/logger";
import { EXTRACTION_MODEL } from "./config/keyphrase-extraction";

export interface ExtractionRequest {
    documentId: string;
    category: string;
    content: string;
    targetCount?: number;
    focus?: string;
    // aborted when the attempt times out
    signal?: AbortSignal;
}

/**
 * Maps one document to candidate phrases. The response shape is not trusted:
 * the pipeline reduces it to plain text candidates and treats anything it
 * cannot read as an empty, malformed response.
 */
export interface KeyphraseExtractor {
    extract(request: ExtractionRequest): Promise<unknown>;
}

export interface ChatCompletionClient {
    chat: {
        completions: {
            create(params: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
        };
    };
}

export const EXTRACTION_SYSTEM_PROMPT = `You extract search keyphrases from banking and payments API documentation. Return the phrases developers and integration teams would type into a documentation search box when looking for specific functionality.

Return ONLY a JSON object, no markdown and no commentary:
{"document_name": "<document id>", "type": "<category>", "keyphrases": ["phrase1", "phrase2"]}

Extract, in order of value:
- API and product names ("Instant Payments API", "ACH Payments", "Account Balance")
- Operations ("create credit transfer", "verify routing number", "retrieve balance")
- Endpoint paths ("credit-transfers", "routing-numbers/verify")
- API-specific fields ("uetr", "payment_id", "end_to_end_id")
- Business concepts and rails ("real-time payments", "RTP", "FedNow", "same-day ACH")
- Status values, SEC codes and scopes ("PENDING", "CCD", "PPD", "ACH-All")
- Integration terms ("webhook listener", "consent authorization")
- Task phrases built from the use cases ("how to initiate ACH payment", "how to refresh access token")

Skip generic material that appears on every page: bearer tokens, OAuth, API keys, standard headers, certificates, HTTP error codes, sandbox or production environments, Postman and Swagger references.

Formatting: lowercase except acronyms and proper nouns, keep field names exactly as written, 1-4 words per phrase (5 at most for complex concepts).

Quotas are soft. If a page has fewer valuable terms, return fewer; never pad with generic terms.`;

export function buildExtractionPrompt(request: ExtractionRequest): string {
    const target = request.targetCount !== undefined ? `~${request.targetCount} keyphrases` : 'a handful of keyphrases';
    const focus = request.focus ? ` (focus on: ${request.focus})` : '';
    return `Extract search keyphrases from this API documentation.

Target: ${target}${focus}

Document: ${request.documentId}
Type: ${request.category}

${request.content}`;
}

/**
 * Parse the JSON body of a completion, tolerating a markdown code fence.
 * Unparseable content is returned as-is so the pipeline records it as malformed.
 */
export function parseCompletionContent(content: string): unknown {
    const unfenced = content.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
    try {
        return JSON.parse(unfenced);
    } catch (error) {
        logger.warn("Extraction response is not valid JSON", {
            error: error instanceof Error ? error.message : String(error),
            preview: unfenced.substring(0, 80),
        });
        return unfenced;
    }
}

export class OpenAIKeyphraseExtractor implements KeyphraseExtractor {
    private readonly client: ChatCompletionClient;
    private readonly model: string;
    private readonly circuitBreaker: CircuitBreaker;

    constructor(options: { client?: ChatCompletionClient; model?: string; circuitBreaker?: CircuitBreaker } = {}) {
        this.client = options.client ?? new OpenAI({
            apiKey: process.env.AI_INTEGRATIONS_OPENAI_API_KEY,
            baseURL: process.env.AI_INTEGRATIONS_OPENAI_BASE_URL,
        });
        this.model = options.model ?? EXTRACTION_MODEL;
        this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker();
    }

    async extract(request: ExtractionRequest): Promise<unknown> {
        // Check circuit breaker
        if (!this.circuitBreaker.canAttempt()) {
            logger.warn("Circuit breaker is open, skipping API call", { documentId: request.documentId });
            throw new CircuitOpenError();
        }

        const apiCallStartTime = Date.now();
        let response: ChatCompletion;
        try {
            response = await this.client.chat.completions.create({
                model: this.model,
                messages: [
                    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
                    { role: 'user', content: buildExtractionPrompt(request) },
                ],
                temperature: 0.2,
                max_tokens: 1024,
                response_format: { type: 'json_object' },
            }, { signal: request.signal });
            this.circuitBreaker.recordSuccess();
        } catch (error) {
            this.circuitBreaker.recordFailure();
            throw error;
        }

        logger.debug("Extraction API call completed", {
            documentId: request.documentId,
            duration: Date.now() - apiCallStartTime,
        });

        const content = response.choices[0]?.message?.content || '';
        if (!content) {
            logger.warn("Empty response from LLM", { documentId: request.documentId });
            return [];
        }
        return parseCompletionContent(content);
    }
}
