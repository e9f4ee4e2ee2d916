import fs from 'fs';
import path from 'path';
import { runConfigSchema, type RunConfig } from "@shared/schema";
import { ConfigurationError } from "../errors";
import { logger } from "../utils/logger";
import { KEYPHRASE_CONFIG_PATH, TARGET_KEYPHRASE_COUNT } from "./keyphrase-extraction";

/**
 * Validate a raw run configuration. Fails fast with every issue zod reports.
 */
export function parseRunConfig(raw: unknown): RunConfig {
    const withTarget = isPlainObject(raw) && raw.global_target === undefined
        ? { ...raw, global_target: TARGET_KEYPHRASE_COUNT }
        : raw;

    const parsed = runConfigSchema.safeParse(withTarget);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${where}: ${issue.message}`;
        });
        throw new ConfigurationError("Invalid keyphrase configuration", issues);
    }
    return parsed.data;
}

export function loadRunConfig(configPath: string = KEYPHRASE_CONFIG_PATH): RunConfig {
    const resolved = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigurationError(`Keyphrase configuration not found at ${resolved}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(
            `Keyphrase configuration at ${resolved} is not valid JSON`,
            [error instanceof Error ? error.message : String(error)],
        );
    }

    const config = parseRunConfig(raw);
    logger.info("Loaded keyphrase configuration", {
        configPath: resolved,
        categories: config.categories.map(c => c.name),
        globalTarget: config.globalTarget,
    });
    return config;
}

export function findCategory(config: RunConfig, name: string) {
    return config.categories.find(c => c.name === name);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
