import { type Rgb } from '../types/color.js';
import { colorDistance, meanColor } from '../algorithms/color-math.js';
import { type ElementClass, type ElementStore } from './element.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * An element may win a closer match this many times before a less-used
 * alternative is preferred.
 */
export const REPEAT_CEILING = 3;

/**
 * A group of elements with similar average color.
 *
 * Holds element ids into a shared ElementStore and caches the rounded mean of its
 * members' colors. A bucket is never empty: every constructor takes at least one id.
 */
export class BucketClass<T> {
    private readonly _store: ElementStore<T>;
    private readonly _ids: number[];
    private _avgColor: Rgb = [0, 0, 0];

    /**
     * Internal constructor. Use static withSeed() or fromElements().
     */
    private constructor(store: ElementStore<T>, ids: readonly number[]) {
        if (ids.length === 0) {
            throw new DomainError(errors.emptyBucket());
        }
        this._store = store;
        this._ids = [...ids];
        this.recompute();
    }

    /**
     * Creates a bucket holding a single element. Its average is that element's color.
     */
    static withSeed<T>(store: ElementStore<T>, id: number): BucketClass<T> {
        return new BucketClass(store, [id]);
    }

    /**
     * Creates a bucket from a non-empty list of element ids.
     * Throws `emptyBucket` if the list is empty.
     */
    static fromElements<T>(store: ElementStore<T>, ids: readonly number[]): BucketClass<T> {
        return new BucketClass(store, ids);
    }

    // ------------------------------------------------------------------------
    // Getters
    // ------------------------------------------------------------------------

    get avgColor(): Rgb {
        return this._avgColor;
    }

    get size(): number {
        return this._ids.length;
    }

    /** Member ids in insertion order. */
    get elementIds(): readonly number[] {
        return [...this._ids];
    }

    // ------------------------------------------------------------------------
    // Mutation
    // ------------------------------------------------------------------------

    /**
     * Appends an element and recomputes the average over all members.
     */
    add(id: number): void {
        this._ids.push(id);
        this.recompute();
    }

    private recompute(): void {
        this._avgColor = meanColor(this._ids.map((id) => this._store.get(id).color));
    }

    // ------------------------------------------------------------------------
    // Retrieval
    // ------------------------------------------------------------------------

    /**
     * Returns the member closest to `target`, steering away from over-used elements.
     *
     * Members are scanned in insertion order. A candidate strictly closer than the current
     * best replaces it only if its use count is below REPEAT_CEILING or below the best's;
     * otherwise its count is decremented and the scan moves on. If every closer candidate
     * was refused, the nearest member is returned anyway. The returned element's count is
     * incremented.
     *
     * @returns The chosen element, or undefined if the bucket is empty.
     */
    closest(target: Rgb): ElementClass<T> | undefined {
        let best: ElementClass<T> | undefined;
        let bestDist = Infinity;
        let nearest: ElementClass<T> | undefined;
        let nearestDist = Infinity;

        for (const id of this._ids) {
            const candidate = this._store.get(id);
            const dist = colorDistance(candidate.color, target);

            if (dist < nearestDist) {
                nearest = candidate;
                nearestDist = dist;
            }

            if (dist >= bestDist) continue;

            if (
                candidate.useCount < REPEAT_CEILING ||
                (best !== undefined && candidate.useCount < best.useCount)
            ) {
                best = candidate;
                bestDist = dist;
            } else {
                candidate.penalize();
            }
        }

        const chosen = best ?? nearest;
        if (chosen !== undefined) {
            chosen.markUsed();
        }
        return chosen;
    }
}
