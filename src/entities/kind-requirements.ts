import type { Parameters, ResourceKind } from "./declaration.js";

export interface KindRequirement {
    readonly kind: ResourceKind;
    readonly required: readonly string[];
    readonly identity: readonly string[];
    readonly attributes: readonly string[];
}

const KIND_REQUIREMENTS: Readonly<Record<ResourceKind, KindRequirement>> = {
    Zone: {
        kind: "Zone",
        required: ["name", "email_address"],
        identity: ["name"],
        attributes: ["id", "nameservers"],
    },
    Record: {
        kind: "Record",
        required: ["zone_name", "record_type", "data"],
        identity: ["zone_name", "name", "record_type"],
        attributes: ["id"],
    },
    DbInstance: {
        kind: "DbInstance",
        required: ["name", "flavor", "size"],
        identity: ["name"],
        attributes: ["id", "hostname", "status"],
    },
    DbDatabase: {
        kind: "DbDatabase",
        required: ["instance_name", "name"],
        identity: ["instance_name", "name"],
        attributes: ["id"],
    },
    Container: {
        kind: "Container",
        required: ["name"],
        identity: ["name"],
        attributes: ["id", "cdn_uri"],
    },
};

export function requirementFor(kind: ResourceKind): KindRequirement {
    return KIND_REQUIREMENTS[kind];
}

/**
 * Picks the identifying subset of a declaration's parameters. Identity fields
 * the declaration leaves out (such as a Record's `name`) are omitted.
 */
export function identityOf(
    kind: ResourceKind,
    parameters: Parameters,
): Parameters {
    const identity: Record<string, string | number | boolean> = {};
    for (const key of requirementFor(kind).identity) {
        const value = parameters[key];
        if (value !== undefined) {
            identity[key] = value;
        }
    }
    return identity;
}

export function extraRequirements(
    kind: ResourceKind,
    parameters: Parameters,
): readonly string[] {
    if (kind === "Record" && parameters.record_type === "MX") {
        return ["priority"];
    }
    return [];
}
