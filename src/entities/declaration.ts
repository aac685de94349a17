export const RESOURCE_KINDS = [
    "Zone",
    "Record",
    "DbInstance",
    "DbDatabase",
    "Container",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type ParameterValue = string | number | boolean;

export type Parameters = Readonly<Record<string, ParameterValue>>;

export interface Declaration {
    readonly id: string;
    readonly kind: ResourceKind;
    readonly parameters: Parameters;
    readonly requires: readonly string[];
}

// Raw manifest records before validation; property names match the manifest format
export interface RawDeclaration {
    readonly id: string;
    readonly kind: string;
    readonly parameters: Readonly<Record<string, unknown>>;
    readonly requires: readonly string[];
}

export function isResourceKind(value: string): value is ResourceKind {
    return RESOURCE_KINDS.some((kind) => kind === value);
}

export function isParameterValue(value: unknown): value is ParameterValue {
    if (typeof value === "string" || typeof value === "boolean") {
        return true;
    }
    return typeof value === "number" && Number.isInteger(value);
}
