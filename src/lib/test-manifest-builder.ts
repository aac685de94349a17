import {
    type Declaration,
    type ParameterValue,
    type ResourceKind,
    isResourceKind,
} from "../entities/declaration.js";

const DEFAULT_PARAMETERS: Readonly<
    Record<ResourceKind, Readonly<Record<string, ParameterValue>>>
> = {
    Zone: { name: "example.test", email_address: "hostmaster@example.test" },
    Record: { zone_name: "example.test", record_type: "A", data: "192.0.2.10" },
    DbInstance: { name: "primary", flavor: "1GB Instance", size: 10 },
    DbDatabase: { instance_name: "primary", name: "app" },
    Container: { name: "static-assets" },
};

interface DeclarationInput {
    readonly id: string;
    readonly kind: ResourceKind;
    readonly parameters?: Readonly<Record<string, ParameterValue>>;
    readonly requires?: readonly string[];
}

export function buildDeclaration(input: DeclarationInput): Declaration {
    return {
        id: input.id,
        kind: input.kind,
        parameters: input.parameters ?? DEFAULT_PARAMETERS[input.kind],
        requires: input.requires ?? [],
    };
}

export function buildDeclarations(
    inputs: readonly DeclarationInput[],
): Declaration[] {
    return inputs.map(buildDeclaration);
}

export function buildManifestJson(
    inputs: readonly {
        readonly id: string;
        readonly kind: string;
        readonly parameters?: Readonly<Record<string, unknown>>;
        readonly requires?: readonly string[];
    }[],
): string {
    const declarations = inputs.map((input) => ({
        id: input.id,
        kind: input.kind,
        parameters:
            input.parameters ??
            (isResourceKind(input.kind) ? DEFAULT_PARAMETERS[input.kind] : {}),
        requires: input.requires ?? [],
    }));

    return JSON.stringify({ declarations });
}
