import { readFile, writeFile } from "node:fs/promises";
import { ZodError } from "zod";
import type {
    Declaration,
    ParameterValue,
    Parameters,
    ResourceKind,
} from "../entities/declaration.js";
import { ConfigurationError, FatalError } from "../entities/errors.js";
import { identityOf, requirementFor } from "../entities/kind-requirements.js";
import { NOT_FOUND, type ResourceState } from "../entities/resource-state.js";
import { stripDangerousKeys } from "../entities/sanitize-json.js";
import type {
    ProviderAdapter,
    ProviderSession,
} from "../use-cases/provider-adapter.port.js";
import {
    type LocalCloudState,
    LocalCloudStateSchema,
    type StoredResource,
} from "./local-cloud-state.schema.js";

export const MINIMUM_TTL = 300;
export const MAX_DB_VOLUME_SIZE = 150;

const DB_FLAVORS: ReadonlySet<string> = new Set([
    "512MB Instance",
    "1GB Instance",
    "2GB Instance",
    "4GB Instance",
    "8GB Instance",
    "16GB Instance",
]);

const NAMESERVERS = "ns1.example.net,ns2.example.net";

export interface LocalCloudProvider extends ProviderAdapter {
    snapshot(): LocalCloudState;
}

function matchesIdentity(
    resource: StoredResource,
    kind: ResourceKind,
    identity: Parameters,
): boolean {
    if (resource.kind !== kind) {
        return false;
    }
    // An identity field left out (an apex Record's name) must be absent too
    return requirementFor(kind).identity.every(
        (key) => resource.parameters[key] === identity[key],
    );
}

function describeResource(kind: ResourceKind, identity: Parameters): string {
    const parts = Object.entries(identity).map(
        ([key, value]) => `${key}=${String(value)}`,
    );
    return `${kind} (${parts.join(", ")})`;
}

function validateTtl(parameters: Parameters): void {
    const ttl = parameters.ttl;
    if (ttl === undefined) {
        return;
    }
    if (typeof ttl !== "number" || ttl < MINIMUM_TTL) {
        throw new FatalError(`ttl has a minimum value of ${MINIMUM_TTL}`);
    }
}

function validateDbInstance(parameters: Parameters): void {
    const { flavor, size } = parameters;
    if (typeof flavor !== "string" || !DB_FLAVORS.has(flavor)) {
        throw new FatalError(`Invalid flavor "${String(flavor)}"`);
    }
    if (typeof size !== "number" || size < 1 || size > MAX_DB_VOLUME_SIZE) {
        throw new FatalError(
            `Volume size must be between 1 and ${MAX_DB_VOLUME_SIZE}`,
        );
    }
}

export function createLocalCloudProvider(
    initial: LocalCloudState = { resources: [] },
): LocalCloudProvider {
    const resources: StoredResource[] = initial.resources.map((resource) => ({
        kind: resource.kind,
        parameters: { ...resource.parameters },
        attributes: { ...resource.attributes },
    }));
    let sequence = resources.length;

    const find = (
        kind: ResourceKind,
        identity: Parameters,
    ): StoredResource | undefined =>
        resources.find((resource) => matchesIdentity(resource, kind, identity));

    const requireParent = (
        kind: ResourceKind,
        name: ParameterValue | undefined,
    ): void => {
        if (name === undefined || !find(kind, { name })) {
            throw new FatalError(`${kind} "${String(name)}" does not exist`);
        }
    };

    const validate = (kind: ResourceKind, parameters: Parameters): void => {
        switch (kind) {
            case "Zone":
                validateTtl(parameters);
                return;
            case "Record":
                validateTtl(parameters);
                if (
                    parameters.record_type === "MX" &&
                    parameters.priority === undefined
                ) {
                    throw new FatalError("priority required for MX records");
                }
                return;
            case "DbInstance":
                validateDbInstance(parameters);
                return;
            case "DbDatabase":
            case "Container":
                return;
        }
    };

    const deriveAttributes = (
        kind: ResourceKind,
        id: string,
    ): Record<string, ParameterValue> => {
        switch (kind) {
            case "Zone":
                return { id, nameservers: NAMESERVERS };
            case "DbInstance":
                return {
                    id,
                    hostname: `${id}.db.example.net`,
                    status: "ACTIVE",
                };
            case "Container":
                return { id, cdn_uri: `https://${id}.cdn.example.net` };
            case "Record":
            case "DbDatabase":
                return { id };
        }
    };

    return {
        async lookup(
            kind: ResourceKind,
            identity: Parameters,
        ): Promise<ResourceState> {
            const resource = find(kind, identity);
            if (!resource) {
                return NOT_FOUND;
            }
            return { exists: true, parameters: { ...resource.parameters } };
        },

        async create(kind: ResourceKind, parameters: Parameters): Promise<void> {
            const identity = identityOf(kind, parameters);
            if (find(kind, identity)) {
                throw new FatalError(
                    `${describeResource(kind, identity)} already exists`,
                );
            }
            validate(kind, parameters);
            if (kind === "Record") {
                requireParent("Zone", parameters.zone_name);
            }
            if (kind === "DbDatabase") {
                requireParent("DbInstance", parameters.instance_name);
            }

            sequence += 1;
            const id = `${kind.toLowerCase()}-${sequence}`;
            resources.push({
                kind,
                parameters: { ...parameters },
                attributes: deriveAttributes(kind, id),
            });
        },

        async update(
            kind: ResourceKind,
            identity: Parameters,
            changes: Parameters,
        ): Promise<void> {
            const resource = find(kind, identity);
            if (!resource) {
                throw new FatalError(
                    `${describeResource(kind, identity)} does not exist`,
                );
            }
            const identityFields = requirementFor(kind).identity;
            const immutable = Object.keys(changes).filter((field) =>
                identityFields.includes(field),
            );
            if (immutable.length > 0) {
                throw new FatalError(
                    `Cannot change identifying field(s) ${immutable.join(", ")} of ${describeResource(kind, identity)}`,
                );
            }
            const merged = { ...resource.parameters, ...changes };
            validate(kind, merged);
            resource.parameters = merged;
        },

        async resolve(
            declaration: Declaration,
            attribute: string,
        ): Promise<ParameterValue> {
            const identity = identityOf(
                declaration.kind,
                declaration.parameters,
            );
            const resource = find(declaration.kind, identity);
            if (!resource) {
                throw new FatalError(
                    `Cannot resolve ${declaration.id}.${attribute}: ${describeResource(declaration.kind, identity)} does not exist`,
                );
            }
            const value =
                resource.attributes[attribute] ?? resource.parameters[attribute];
            if (value === undefined) {
                throw new FatalError(
                    `${declaration.kind} "${declaration.id}" has no attribute "${attribute}"`,
                );
            }
            return value;
        },

        snapshot(): LocalCloudState {
            return {
                resources: resources.map((resource) => ({
                    kind: resource.kind,
                    parameters: { ...resource.parameters },
                    attributes: { ...resource.attributes },
                })),
            };
        },
    };
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadLocalCloudState(
    path: string,
): Promise<LocalCloudState> {
    let content: string;
    try {
        content = await readFile(path, "utf-8");
    } catch (error) {
        if (isMissingFile(error)) {
            return { resources: [] };
        }
        throw error;
    }

    try {
        const sanitized = stripDangerousKeys(JSON.parse(content)).value;
        return LocalCloudStateSchema.parse(sanitized);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new ConfigurationError(
                `Invalid state file ${path}: ${details}`,
            );
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid state file ${path}: ${message}`);
    }
}

export async function saveLocalCloudState(
    path: string,
    state: LocalCloudState,
): Promise<void> {
    await writeFile(path, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
}

export async function openLocalCloudSession(
    statePath: string | undefined,
): Promise<ProviderSession> {
    const initial =
        statePath === undefined
            ? { resources: [] }
            : await loadLocalCloudState(statePath);
    const provider = createLocalCloudProvider(initial);

    return {
        adapter: provider,
        async persist(): Promise<void> {
            if (statePath !== undefined) {
                await saveLocalCloudState(statePath, provider.snapshot());
            }
        },
    };
}
