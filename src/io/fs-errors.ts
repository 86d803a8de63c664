/**
 * Returns true if `e` is a Node system error with the given errno code (e.g. 'ENOENT').
 */
export function hasErrorCode(e: unknown, ...codes: string[]): boolean {
    if (!(e instanceof Error) || !('code' in e)) return false;
    return typeof e.code === 'string' && codes.includes(e.code);
}
