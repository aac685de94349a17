const DURATION_PATTERN = /^(\d+)(ms|s|m)?$/;

const UNIT_MS: Readonly<Record<string, number>> = {
    ms: 1,
    s: 1000,
    m: 60_000,
};

/**
 * Parses `250`, `250ms`, `30s` or `2m` into milliseconds. Returns null for
 * anything else, including zero.
 */
export function parseDuration(input: string | number): number | null {
    if (typeof input === "number") {
        return Number.isInteger(input) && input > 0 ? input : null;
    }
    const match = DURATION_PATTERN.exec(input.trim());
    if (!match?.[1]) {
        return null;
    }
    const amount = Number.parseInt(match[1], 10);
    const multiplier = UNIT_MS[match[2] ?? "ms"] ?? 1;
    const ms = amount * multiplier;
    return ms > 0 ? ms : null;
}
