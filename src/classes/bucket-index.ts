import { type Rgb, isValidRgb } from '../types/color.js';
import {
    type IndexConfig,
    type BalanceOptions,
    parseIndexConfig,
    parseBalanceOptions,
} from '../types/config.js';
import { colorDistance } from '../algorithms/color-math.js';
import { type ElementClass, ElementStore } from './element.js';
import { BucketClass } from './bucket.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * What a balancing pass changed.
 */
export interface BalanceReport {
    /** Oversized buckets that were replaced */
    bucketsSplit: number;
    /** Buckets created from those splits */
    bucketsFromSplits: number;
    /** Merged buckets created */
    mergeGroups: number;
    /** Small buckets absorbed into merged buckets */
    bucketsMerged: number;
    /** Bucket count after the pass */
    bucketCount: number;
}

/**
 * The element chosen for a target color and the bucket it came from.
 */
export interface ClosestMatch<T> {
    element: ElementClass<T>;
    bucketColor: Rgb;
}

export interface IndexSummary {
    bucketCount: number;
    elementCount: number;
    buckets: Array<{ avgColor: Rgb; size: number }>;
}

/**
 * Color-bucket index over candidate images.
 *
 * Load phase: elements are routed one by one into the nearest bucket, or into a new one
 * when no bucket average lies within `distance_threshold`. Routing is a single greedy
 * pass, so insertion order shapes the clustering.
 *
 * A single balanceBuckets() call then splits oversized buckets and merges undersized
 * ones, after which the bucket set is frozen.
 *
 * Query phase: getClosestElement() scans bucket averages for the nearest bucket and
 * delegates to it, costing O(#buckets) + O(bucket size) regardless of corpus size.
 */
export class BucketIndexClass<T> {
    readonly config: Readonly<IndexConfig>;

    private readonly _store = new ElementStore<T>();
    private _buckets: Array<BucketClass<T>> = [];
    private _balanced = false;

    /**
     * Throws `invalidConfig` if the config fails validation.
     */
    constructor(config: IndexConfig) {
        this.config = parseIndexConfig(config);
    }

    // ------------------------------------------------------------------------
    // Getters
    // ------------------------------------------------------------------------

    get buckets(): ReadonlyArray<BucketClass<T>> {
        return this._buckets;
    }

    get elementCount(): number {
        return this._store.size;
    }

    get isBalanced(): boolean {
        return this._balanced;
    }

    // ------------------------------------------------------------------------
    // Load phase
    // ------------------------------------------------------------------------

    /**
     * Creates an element and places it in the nearest bucket within
     * `distance_threshold`, or in a new bucket of its own.
     * Throws `indexFrozen` once the index has been balanced, and `invalidColor` unless
     * every channel is an integer in 0..255.
     */
    addElement(color: Rgb, handle: T): ElementClass<T> {
        if (this._balanced) {
            throw new DomainError(errors.indexFrozen());
        }
        if (!isValidRgb(color)) {
            throw new DomainError(errors.invalidColor());
        }

        const element = this._store.create(color, handle);
        const nearest = this.findNearestBucket(element.color);

        if (nearest !== undefined && nearest.distance <= this.config.distance_threshold) {
            nearest.bucket.add(element.id);
        } else {
            this._buckets.push(BucketClass.withSeed(this._store, element.id));
        }

        return element;
    }

    // ------------------------------------------------------------------------
    // Query phase
    // ------------------------------------------------------------------------

    /**
     * Returns the bucket whose average is nearest to `target` (first-seen on ties).
     * Throws `emptyIndex` if nothing has been added.
     */
    getClosestBucket(target: Rgb): BucketClass<T> {
        const nearest = this.findNearestBucket(target);
        if (nearest === undefined) {
            throw new DomainError(errors.emptyIndex());
        }
        return nearest.bucket;
    }

    /**
     * Returns the element chosen by the nearest bucket for `target`.
     * Updates use counts inside that bucket.
     */
    getClosestElement(target: Rgb): ElementClass<T> {
        return this.getClosestMatch(target).element;
    }

    /**
     * Like getClosestElement(), also reporting the average color of the bucket searched.
     */
    getClosestMatch(target: Rgb): ClosestMatch<T> {
        const bucket = this.getClosestBucket(target);
        const element = bucket.closest(target);
        if (element === undefined) {
            throw new DomainError(errors.emptyBucket());
        }
        return { element, bucketColor: bucket.avgColor };
    }

    private findNearestBucket(target: Rgb): { bucket: BucketClass<T>; distance: number } | undefined {
        let best: BucketClass<T> | undefined;
        let bestDist = Infinity;

        for (const bucket of this._buckets) {
            const dist = colorDistance(bucket.avgColor, target);
            if (dist < bestDist) {
                best = bucket;
                bestDist = dist;
            }
        }

        return best === undefined ? undefined : { bucket: best, distance: bestDist };
    }

    // ------------------------------------------------------------------------
    // Balancing
    // ------------------------------------------------------------------------

    /**
     * Splits every bucket larger than `max_bucket_size`, then merges buckets smaller
     * than `min_bucket_size` whose averages lie within `merge_threshold` of each other.
     *
     * Splits cut members in insertion order, not by color. The merge pass is a single
     * greedy sweep; a merged bucket is not reconsidered in the same call.
     *
     * Runs once per index: a second call throws `alreadyBalanced`.
     *
     * @param options Overrides for the construction-time sizes and merge threshold.
     */
    balanceBuckets(options?: BalanceOptions): BalanceReport {
        if (this._balanced) {
            throw new DomainError(errors.alreadyBalanced());
        }

        const opts = parseBalanceOptions(
            options ?? {
                min_bucket_size: this.config.min_bucket_size,
                max_bucket_size: this.config.max_bucket_size,
                merge_threshold: this.config.merge_threshold,
            },
        );

        const split = this.splitOversized(opts.max_bucket_size);
        const merged = this.mergeUndersized(opts.min_bucket_size, opts.merge_threshold);
        this._balanced = true;

        return {
            bucketsSplit: split.replaced,
            bucketsFromSplits: split.created,
            mergeGroups: merged.groups,
            bucketsMerged: merged.absorbed,
            bucketCount: this._buckets.length,
        };
    }

    private splitOversized(maxSize: number): { replaced: number; created: number } {
        const oversized = this._buckets.filter((b) => b.size > maxSize);
        if (oversized.length === 0) {
            return { replaced: 0, created: 0 };
        }

        const created: Array<BucketClass<T>> = [];
        for (const bucket of oversized) {
            const ids = bucket.elementIds;
            const splits = Math.ceil(ids.length / maxSize);
            const base = Math.floor(ids.length / splits);
            // the last `extra` slices take one more id each, so no slice exceeds maxSize
            const extra = ids.length % splits;

            let start = 0;
            for (let i = 0; i < splits; i++) {
                const end = start + base + (i >= splits - extra ? 1 : 0);
                created.push(BucketClass.fromElements(this._store, ids.slice(start, end)));
                start = end;
            }
        }

        const removed = new Set(oversized);
        this._buckets = this._buckets.filter((b) => !removed.has(b)).concat(created);

        return { replaced: oversized.length, created: created.length };
    }

    private mergeUndersized(minSize: number, mergeThreshold: number): { groups: number; absorbed: number } {
        const candidates = this._buckets.filter((b) => b.size < minSize);
        const merged = new Set<BucketClass<T>>();
        const created: Array<BucketClass<T>> = [];

        for (let i = 0; i < candidates.length; i++) {
            const seed = candidates[i];
            if (merged.has(seed)) continue;

            const matches: Array<BucketClass<T>> = [];
            for (let j = i + 1; j < candidates.length; j++) {
                const other = candidates[j];
                if (merged.has(other)) continue;
                if (colorDistance(seed.avgColor, other.avgColor) <= mergeThreshold) {
                    matches.push(other);
                }
            }

            if (matches.length === 0) continue;

            const group = [seed, ...matches];
            for (const b of group) {
                merged.add(b);
            }
            created.push(BucketClass.fromElements(this._store, group.flatMap((b) => [...b.elementIds])));
        }

        if (created.length > 0) {
            this._buckets = this._buckets.filter((b) => !merged.has(b)).concat(created);
        }

        return { groups: created.length, absorbed: merged.size };
    }

    // ------------------------------------------------------------------------
    // Diagnostics
    // ------------------------------------------------------------------------

    /**
     * Returns bucket count, element count, and each bucket's average and size.
     */
    summarize(): IndexSummary {
        return {
            bucketCount: this._buckets.length,
            elementCount: this._store.size,
            buckets: this._buckets.map((b) => ({ avgColor: b.avgColor, size: b.size })),
        };
    }
}
