/**
 * @format
 * Lookup Errors
 */

/**
 * Raised when the instance query itself fails (credentials, transport,
 * malformed request). Fatal for the invocation: no partial instance list
 * is usable after it.
 */
export class LookupError extends Error {
    readonly searchName: string;
    readonly region: string;

    constructor(searchName: string, region: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to query instances named "${searchName}" in ${region}: ${reason}`, { cause });
        this.name = 'LookupError';
        this.searchName = searchName;
        this.region = region;
    }
}

/** Narrow an unknown thrown value to a printable message */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
