/**
 * Configuration constants for the keyphrase extraction pipeline
 */

// Extraction worker pool
export const EXTRACTION_CONCURRENCY = parseInt(process.env.EXTRACTION_CONCURRENCY || '4', 10);
export const EXTRACTION_TIMEOUT_MS = parseInt(process.env.EXTRACTION_TIMEOUT_MS || '60000', 10);
export const EXTRACTION_MODEL = process.env.EXTRACTION_MODEL || 'gpt-4o-mini';

// Fallback when the run configuration omits global_target
export const TARGET_KEYPHRASE_COUNT = parseInt(process.env.TARGET_KEYPHRASE_COUNT || '300', 10);

// Run configuration file, relative to the working directory
export const KEYPHRASE_CONFIG_PATH = process.env.KEYPHRASE_CONFIG_PATH || 'config/keyphrases.json';

// Retry configuration
export const MAX_RETRY_ATTEMPTS = parseInt(process.env.MAX_RETRY_ATTEMPTS || '3', 10);
export const RETRY_INITIAL_DELAY_MS = parseInt(process.env.RETRY_INITIAL_DELAY_MS || '1000', 10);
export const RETRY_MAX_DELAY_MS = parseInt(process.env.RETRY_MAX_DELAY_MS || '10000', 10);

// Circuit breaker for the extraction API
export const CIRCUIT_FAILURE_THRESHOLD = parseInt(process.env.CIRCUIT_FAILURE_THRESHOLD || '5', 10);
export const CIRCUIT_RESET_TIMEOUT_MS = parseInt(process.env.CIRCUIT_RESET_TIMEOUT_MS || '60000', 10);

// Document summaries sent to the extractor
export const MAX_SUMMARY_CHARS = parseInt(process.env.MAX_SUMMARY_CHARS || '15000', 10);
