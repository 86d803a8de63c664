import { type Rgb } from '../types/color.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/**
 * One candidate image: its precomputed average color, an opaque handle to the image,
 * and a usage counter.
 *
 * The counter is read-only from outside. Only the retrieval logic of the bucket that
 * holds the element moves it, through markUsed() and penalize().
 */
export class ElementClass<T> {
    readonly id: number;
    readonly color: Rgb;
    readonly handle: T;
    private _useCount = 0;

    constructor(id: number, color: Rgb, handle: T) {
        this.id = id;
        this.color = [color[0], color[1], color[2]];
        this.handle = handle;
    }

    get useCount(): number {
        return this._useCount;
    }

    /** @internal Called by the owning bucket when it returns this element. */
    markUsed(): void {
        this._useCount++;
    }

    /** @internal Called by the owning bucket when it refuses this element. Never below zero. */
    penalize(): void {
        if (this._useCount > 0) {
            this._useCount--;
        }
    }
}

/**
 * Append-only arena of elements, addressed by a stable integer id.
 * Buckets hold ids into the store rather than element references, so moving an
 * element between buckets never changes who owns it.
 */
export class ElementStore<T> {
    private readonly _elements: Array<ElementClass<T>> = [];

    /**
     * Creates an element and assigns it the next id.
     */
    create(color: Rgb, handle: T): ElementClass<T> {
        const element = new ElementClass(this._elements.length, color, handle);
        this._elements.push(element);
        return element;
    }

    /**
     * Returns the element with the given id. Throws `unknownElement` if none exists.
     */
    get(id: number): ElementClass<T> {
        const element = Number.isInteger(id) && id >= 0 ? this._elements.at(id) : undefined;
        if (element === undefined) {
            throw new DomainError(errors.unknownElement(id));
        }
        return element;
    }

    get size(): number {
        return this._elements.length;
    }
}
