/**
 * Shared Error Factory for tilematch domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.noIndexLoaded();
 *
 * Core classes throw a DomainError wrapping the same response, so the handler
 * can hand it back unchanged.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

/**
 * Thrown by core classes. Carries the response a tool handler should return.
 */
export class DomainError extends Error {
    readonly response: DomainErrorResponse;

    constructor(response: DomainErrorResponse) {
        super(response.content[0].text);
        this.name = 'DomainError';
        this.response = response;
    }
}

/**
 * Converts anything caught in a tool handler into an error response.
 */
export function toErrorResponse(e: unknown): DomainErrorResponse {
    if (e instanceof DomainError) {
        return e.response;
    }
    return domainError(e instanceof Error ? e.message : String(e));
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// index
// ----------------------------------------------------------------------------

export function emptyIndex(): DomainErrorResponse {
    return domainError('Index is empty. Add at least one element before querying.');
}

export function emptyBucket(): DomainErrorResponse {
    return domainError('Bucket has no elements. Buckets must be created with at least one element.');
}

export function unknownElement(id: number): DomainErrorResponse {
    return domainError(`Element ${String(id)} does not exist in the element store.`);
}

export function indexFrozen(): DomainErrorResponse {
    return domainError('Index has been balanced. No further elements can be added.');
}

export function alreadyBalanced(): DomainErrorResponse {
    return domainError('Index has already been balanced. Balancing runs once per index.');
}

export function invalidConfig(detail: string): DomainErrorResponse {
    return domainError(`Invalid index configuration: ${detail}`);
}

// ----------------------------------------------------------------------------
// session
// ----------------------------------------------------------------------------

export function noIndexLoaded(): DomainErrorResponse {
    return domainError('No tiles loaded. Call mosaic_index load_tiles or add_color first.');
}

export function indexNotBalanced(): DomainErrorResponse {
    return domainError('Index is not balanced yet. Call mosaic_index balance before querying.');
}

export function invalidColor(): DomainErrorResponse {
    return domainError('Invalid RGB color. Expected [r, g, b] with each channel 0–255.');
}

// ----------------------------------------------------------------------------
// files
// ----------------------------------------------------------------------------

export function configFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Config file not found: ${path}`);
}

export function invalidConfigFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid config file: ${path}. ${detail}`);
}

export function imageFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Image file not found: ${path}`);
}

export function invalidImageFile(path: string): DomainErrorResponse {
    return domainError(`Failed to decode PNG: ${path}`);
}

export function tileDirectoryNotFound(path: string): DomainErrorResponse {
    return domainError(`Tile directory not found: ${path}`);
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}
