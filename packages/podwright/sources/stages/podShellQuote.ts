const SHELL_SAFE = /^[A-Za-z0-9._/:=@+,-]+$/;

/**
 * Quotes one shell word for a RUN instruction; safe words pass through unchanged.
 */
export function podShellQuote(value: string): string {
    if (SHELL_SAFE.test(value)) {
        return value;
    }
    return `'${value.replace(/'/g, `'\\''`)}'`;
}
