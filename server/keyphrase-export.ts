import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { RankedKeyphrase, RunResult } from "@shared/schema";
import { logger } from "./utils/logger";

export interface RunOutputOptions {
    outputPath: string;
    csvPath?: string;
    configuration?: Record<string, unknown>;
}

export function buildRunOutput(result: RunResult, configuration: Record<string, unknown> = {}) {
    return {
        configuration,
        summary: result.summary,
        keyphrases: result.keyphrases,
        auditLog: result.auditLog,
        byDocument: result.byDocument,
    };
}

export function keyphrasesToCsv(keyphrases: readonly RankedKeyphrase[]): string {
    return stringify(
        keyphrases.map(k => ({ text: k.text, category: k.category, score: k.score })),
        { header: true, columns: ['text', 'category', 'score'] }
    );
}

/**
 * Write the run as JSON (and optionally the keyphrase list as CSV), creating parent directories.
 */
export function writeRunOutput(result: RunResult, options: RunOutputOptions): void {
    fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
    fs.writeFileSync(options.outputPath, JSON.stringify(buildRunOutput(result, options.configuration), null, 2));
    logger.info("Run output saved", { outputPath: options.outputPath, keyphrases: result.keyphrases.length });

    if (options.csvPath) {
        fs.mkdirSync(path.dirname(options.csvPath), { recursive: true });
        fs.writeFileSync(options.csvPath, keyphrasesToCsv(result.keyphrases));
        logger.info("Keyphrase CSV saved", { csvPath: options.csvPath });
    }
}
