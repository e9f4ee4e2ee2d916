import fs from 'fs';
import path from 'path';
import type { Document, RunConfig } from "@shared/schema";
import { MAX_SUMMARY_CHARS } from "./config/keyphrase-extraction";
import { logger } from "./utils/logger";

// Keys whose text is collected before the rest of a documentation page
const PRIORITY_KEYS = [
    'header', 'pageTitleSuffix', 'introductionHeader', 'introductionBodyText',
    'useCaseHeader', 'useCaseBodyText', 'useCaseEndpoint', 'useCaseMethod',
    'sectionHeader', 'bodyText', 'subSectionHeader',
    'parameter', 'details',
];

const MAX_DEPTH = 10;

export function stripHtmlTags(text: string): string {
    if (!text) return '';
    return text.replace(/<[^>]+>/g, ' ').replace(/\s+/g, ' ').trim();
}

function collectText(data: unknown, depth: number): string {
    if (depth <= 0) return '';

    const texts: string[] = [];
    if (Array.isArray(data)) {
        for (const item of data) {
            texts.push(collectText(item, depth - 1));
        }
    } else if (typeof data === 'object' && data !== null) {
        const record = Object.entries(data);
        for (const key of PRIORITY_KEYS) {
            const value = record.find(([k]) => k === key)?.[1];
            if (typeof value === 'string') {
                texts.push(stripHtmlTags(value));
            } else if (typeof value === 'object' && value !== null) {
                texts.push(collectText(value, depth - 1));
            }
        }
        for (const [key, value] of record) {
            if (!PRIORITY_KEYS.includes(key) && typeof value === 'object' && value !== null) {
                texts.push(collectText(value, depth - 1));
            }
        }
    }
    return texts.filter(text => text.length > 0).join(' ');
}

/**
 * Flatten a JSON documentation page into plain text for the extractor.
 */
export function summarizeDocument(content: unknown, maxChars: number = MAX_SUMMARY_CHARS): string {
    const text = typeof content === 'string' ? stripHtmlTags(content) : collectText(content, MAX_DEPTH);
    return text.length > maxChars ? `${text.substring(0, maxChars)}...[truncated]` : text;
}

function listJsonFiles(dir: string): string[] {
    const files: string[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...listJsonFiles(fullPath));
        } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.json')) {
            files.push(fullPath);
        }
    }
    return files;
}

/**
 * Category of a file from its folder names, nearest folder first.
 */
export function resolveCategory(relativePath: string, config: Pick<RunConfig, 'categories'>): string | undefined {
    const folders = relativePath.split(/[\\/]/).slice(0, -1).reverse();
    for (const folder of folders) {
        const lower = folder.toLowerCase();
        const match = config.categories.find(c => c.folders.some(f => f.toLowerCase() === lower));
        if (match) return match.name;
    }
    return undefined;
}

/**
 * Load every JSON documentation page under `inputDir`, sorted by id so that
 * arrival order is stable across runs.
 */
export function loadDocuments(
    inputDir: string,
    config: Pick<RunConfig, 'categories'>,
    options: { excludePaths?: string[] } = {}
): Document[] {
    if (!fs.existsSync(inputDir)) {
        throw new Error(`Input directory does not exist: ${inputDir}`);
    }

    const excluded = new Set((options.excludePaths ?? []).map(p => path.resolve(p)));
    const documents: Document[] = [];

    for (const filePath of listJsonFiles(inputDir)) {
        if (excluded.has(path.resolve(filePath))) continue;

        const id = path.relative(inputDir, filePath).split(path.sep).join('/');
        const category = resolveCategory(id, config);
        if (!category) {
            logger.warn("No category matches document folder, skipping", { documentId: id });
            continue;
        }

        let content: unknown;
        try {
            content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (error) {
            logger.warn("Skipping unreadable document", {
                documentId: id,
                error: error instanceof Error ? error.message : String(error),
            });
            continue;
        }

        documents.push({ id, category, rawContent: summarizeDocument(content) });
    }

    documents.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    logger.info("Loaded documents", { inputDir, count: documents.length });
    return documents;
}
