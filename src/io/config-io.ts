import * as fs from 'fs/promises';
import * as path from 'node:path';
import {
    type IndexConfig,
    type PartialIndexConfig,
    partialIndexConfigSchema,
    describeIssue,
} from '../types/config.js';
import { hasErrorCode } from './fs-errors.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * Loads index thresholds from a JSON file.
 * Every key is optional; unknown keys and out-of-range values are rejected.
 * Cross-field rules (min ≤ max) are checked once the result is merged into a full config.
 *
 * @param filePath - Absolute path to the config file
 */
export async function loadConfigFile(filePath: string): Promise<PartialIndexConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (e: unknown) {
        if (hasErrorCode(e, 'ENOENT')) {
            throw new DomainError(errors.configFileNotFound(filePath));
        }
        throw e;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch {
        throw new DomainError(errors.invalidConfigFile(filePath, 'Not valid JSON.'));
    }

    const result = partialIndexConfigSchema.safeParse(parsed);
    if (!result.success) {
        throw new DomainError(errors.invalidConfigFile(filePath, describeIssue(result.error)));
    }
    return result.data;
}

/**
 * Saves a config as pretty-printed JSON, creating the parent directory if needed.
 *
 * @param filePath - Absolute path to the config file
 */
export async function saveConfigFile(filePath: string, config: IndexConfig): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(config, null, 2), 'utf8');
}
