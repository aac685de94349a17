export const DANGEROUS_KEYS: ReadonlySet<string> = new Set([
    "__proto__",
    "constructor",
    "prototype",
]);
const MAX_DEPTH = 64;

export interface SanitizedJson {
    readonly value: unknown;
    readonly strippedPaths: readonly string[];
}

function sanitize(
    value: unknown,
    path: string,
    depth: number,
    stripped: string[],
): unknown {
    if (value === null || typeof value !== "object") {
        return value;
    }
    if (depth > MAX_DEPTH) {
        throw new Error(`nesting deeper than ${MAX_DEPTH} levels at ${path}`);
    }
    if (Array.isArray(value)) {
        return value.map((item, index) =>
            sanitize(item, `${path}[${index}]`, depth + 1, stripped),
        );
    }
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
        if (DANGEROUS_KEYS.has(key)) {
            stripped.push(`${path}.${key}`);
            continue;
        }
        result[key] = sanitize(val, `${path}.${key}`, depth + 1, stripped);
    }
    return result;
}

/**
 * Drops prototype-polluting keys from parsed JSON and records where they were.
 * Paths are rooted at `$`.
 */
export function stripDangerousKeys(value: unknown): SanitizedJson {
    const strippedPaths: string[] = [];
    const sanitized = sanitize(value, "$", 0, strippedPaths);
    return { value: sanitized, strippedPaths };
}
