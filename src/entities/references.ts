import type { ParameterValue, Parameters } from "./declaration.js";

export interface AttributeReference {
    readonly declarationId: string;
    readonly attribute: string;
}

// The id may itself contain dots; the attribute is always the last segment.
const REFERENCE_PATTERN = /\{\{\s*([^{}\s]+)\.([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function referenceKey(ref: AttributeReference): string {
    return `${ref.declarationId}.${ref.attribute}`;
}

export function findReferences(value: ParameterValue): AttributeReference[] {
    if (typeof value !== "string") {
        return [];
    }
    const refs: AttributeReference[] = [];
    for (const match of value.matchAll(REFERENCE_PATTERN)) {
        const [, declarationId, attribute] = match;
        if (declarationId !== undefined && attribute !== undefined) {
            refs.push({ declarationId, attribute });
        }
    }
    return refs;
}

export function referencesIn(parameters: Parameters): AttributeReference[] {
    const seen = new Set<string>();
    const refs: AttributeReference[] = [];
    for (const value of Object.values(parameters)) {
        for (const ref of findReferences(value)) {
            const key = referenceKey(ref);
            if (!seen.has(key)) {
                seen.add(key);
                refs.push(ref);
            }
        }
    }
    return refs;
}

/**
 * Substitutes resolved attribute values into a parameter. A parameter that is
 * exactly one reference takes the resolved value's own type.
 */
export function substituteReferences(
    value: ParameterValue,
    resolved: ReadonlyMap<string, ParameterValue>,
): ParameterValue {
    if (typeof value !== "string") {
        return value;
    }
    const whole = [...value.matchAll(REFERENCE_PATTERN)];
    const only = whole[0];
    if (whole.length === 1 && only && only[0] === value.trim()) {
        const [, declarationId, attribute] = only;
        const hit = resolved.get(`${declarationId}.${attribute}`);
        if (hit !== undefined) {
            return hit;
        }
    }
    return value.replace(
        REFERENCE_PATTERN,
        (placeholder: string, declarationId: string, attribute: string) => {
            const hit = resolved.get(`${declarationId}.${attribute}`);
            return hit === undefined ? placeholder : String(hit);
        },
    );
}
