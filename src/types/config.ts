import { z } from 'zod';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * Construction-time thresholds of a bucket index.
 * Keys are snake_case because they are read from config files and tool arguments as-is.
 */
export interface IndexConfig {
    /** Max color distance for an element to join an existing bucket instead of opening a new one */
    distance_threshold: number;
    /** Buckets smaller than this become merge candidates when balancing */
    min_bucket_size: number;
    /** Buckets larger than this are split when balancing */
    max_bucket_size: number;
    /** Max distance between two small buckets' averages for them to be merged */
    merge_threshold: number;
}

/** The subset of the config that balancing reads. */
export type BalanceOptions = Pick<IndexConfig, 'min_bucket_size' | 'max_bucket_size' | 'merge_threshold'>;

export const DEFAULT_CONFIG: Readonly<IndexConfig> = {
    distance_threshold: 20,
    min_bucket_size: 5,
    max_bucket_size: 40,
    merge_threshold: 40,
};

const threshold = z
    .number({ invalid_type_error: 'must be a number', required_error: 'is required' })
    .finite('must be finite')
    .positive('must be greater than 0');

const size = z
    .number({ invalid_type_error: 'must be a number', required_error: 'is required' })
    .int('must be an integer');

/**
 * Field shapes shared by the full config, balance options and config files.
 */
export const indexConfigShape = {
    distance_threshold: threshold,
    min_bucket_size: size.min(0, 'must be at least 0'),
    max_bucket_size: size.min(1, 'must be at least 1'),
    merge_threshold: threshold,
};

const sizeOrder = (c: { min_bucket_size: number; max_bucket_size: number }) =>
    c.min_bucket_size <= c.max_bucket_size;

const sizeOrderIssue = {
    message: 'must not exceed max_bucket_size',
    path: ['min_bucket_size'],
};

export const indexConfigSchema = z.object(indexConfigShape).strict().refine(sizeOrder, sizeOrderIssue);

export const balanceOptionsSchema = z
    .object({
        min_bucket_size: indexConfigShape.min_bucket_size,
        max_bucket_size: indexConfigShape.max_bucket_size,
        merge_threshold: indexConfigShape.merge_threshold,
    })
    .strict()
    .refine(sizeOrder, sizeOrderIssue);

/** Every key optional; used for config files and partial updates. */
export const partialIndexConfigSchema = z.object(indexConfigShape).partial().strict();

export type PartialIndexConfig = z.infer<typeof partialIndexConfigSchema>;

/**
 * Formats the first zod issue as `key: message`.
 */
export function describeIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    if (issue === undefined) {
        return 'unknown validation failure';
    }
    return issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message;
}

/**
 * Validates a full config. Throws `invalidConfig` on failure.
 */
export function parseIndexConfig(data: unknown): IndexConfig {
    const result = indexConfigSchema.safeParse(data);
    if (!result.success) {
        throw new DomainError(errors.invalidConfig(describeIssue(result.error)));
    }
    return result.data;
}

/**
 * Validates balance options. Throws `invalidConfig` on failure.
 */
export function parseBalanceOptions(data: unknown): BalanceOptions {
    const result = balanceOptionsSchema.safeParse(data);
    if (!result.success) {
        throw new DomainError(errors.invalidConfig(describeIssue(result.error)));
    }
    return result.data;
}
