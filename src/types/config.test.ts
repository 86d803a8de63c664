import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  parseIndexConfig,
  parseBalanceOptions,
  partialIndexConfigSchema,
} from './config.js';
import { DomainError } from '../errors.js';

function parseError(fn: () => unknown): DomainError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DomainError) return e;
    throw e;
  }
  throw new Error('expected a DomainError');
}

describe('parseIndexConfig', () => {
  it('accepts the defaults', () => {
    expect(parseIndexConfig({ ...DEFAULT_CONFIG })).toEqual(DEFAULT_CONFIG);
  });

  it('accepts min_bucket_size equal to max_bucket_size', () => {
    const config = { distance_threshold: 1, min_bucket_size: 4, max_bucket_size: 4, merge_threshold: 1 };
    expect(parseIndexConfig(config)).toEqual(config);
  });

  it('rejects min_bucket_size greater than max_bucket_size', () => {
    const err = parseError(() =>
      parseIndexConfig({ ...DEFAULT_CONFIG, min_bucket_size: 50, max_bucket_size: 40 }),
    );
    expect(err.message).toBe(
      'Invalid index configuration: min_bucket_size must not exceed max_bucket_size',
    );
  });

  it('rejects a zero distance threshold', () => {
    const err = parseError(() => parseIndexConfig({ ...DEFAULT_CONFIG, distance_threshold: 0 }));
    expect(err.message).toBe('Invalid index configuration: distance_threshold must be greater than 0');
  });

  it('rejects a negative merge threshold', () => {
    const err = parseError(() => parseIndexConfig({ ...DEFAULT_CONFIG, merge_threshold: -3 }));
    expect(err.message).toBe('Invalid index configuration: merge_threshold must be greater than 0');
  });

  it('rejects non-integer sizes', () => {
    const err = parseError(() => parseIndexConfig({ ...DEFAULT_CONFIG, max_bucket_size: 2.5 }));
    expect(err.message).toBe('Invalid index configuration: max_bucket_size must be an integer');
  });

  it('rejects a max_bucket_size of 0', () => {
    const err = parseError(() =>
      parseIndexConfig({ ...DEFAULT_CONFIG, min_bucket_size: 0, max_bucket_size: 0 }),
    );
    expect(err.message).toBe('Invalid index configuration: max_bucket_size must be at least 1');
  });

  it('rejects missing keys', () => {
    const { merge_threshold: _omit, ...rest } = DEFAULT_CONFIG;
    const err = parseError(() => parseIndexConfig(rest));
    expect(err.message).toBe('Invalid index configuration: merge_threshold is required');
  });

  it('rejects non-numeric values', () => {
    const err = parseError(() => parseIndexConfig({ ...DEFAULT_CONFIG, distance_threshold: 'far' }));
    expect(err.message).toBe('Invalid index configuration: distance_threshold must be a number');
  });
});

describe('parseBalanceOptions', () => {
  it('accepts valid options', () => {
    const options = { min_bucket_size: 10, max_bucket_size: 40, merge_threshold: 5 };
    expect(parseBalanceOptions(options)).toEqual(options);
  });

  it('rejects inverted sizes', () => {
    const err = parseError(() =>
      parseBalanceOptions({ min_bucket_size: 10, max_bucket_size: 5, merge_threshold: 5 }),
    );
    expect(err.message).toBe(
      'Invalid index configuration: min_bucket_size must not exceed max_bucket_size',
    );
  });
});

describe('partialIndexConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(partialIndexConfigSchema.safeParse({}).success).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(partialIndexConfigSchema.safeParse({ bucket_size: 3 }).success).toBe(false);
  });
});
