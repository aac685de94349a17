import type { Parameters } from "../entities/declaration.js";
import type { FieldChange } from "../entities/outcome.js";

export const UNKNOWN_VALUE_PREFIX = "(known after apply: ";

export function unknownValue(key: string): string {
    return `${UNKNOWN_VALUE_PREFIX}${key})`;
}

function isUnknown(value: unknown): boolean {
    return typeof value === "string" && value.includes(UNKNOWN_VALUE_PREFIX);
}

/**
 * Compares only the declared fields; anything the provider reports beyond
 * them is provider-managed and ignored.
 */
export function detectDrift(
    declared: Parameters,
    observed: Parameters,
): FieldChange[] {
    const changes: FieldChange[] = [];
    for (const [field, to] of Object.entries(declared)) {
        const from = observed[field];
        if (isUnknown(to) || from !== to) {
            changes.push({ field, from, to });
        }
    }
    return changes;
}

export function changedParameters(
    changes: readonly FieldChange[],
): Parameters {
    const result: Record<string, string | number | boolean> = {};
    for (const change of changes) {
        result[change.field] = change.to;
    }
    return result;
}
