import type {
    Declaration,
    ParameterValue,
    Parameters,
    ResourceKind,
} from "../entities/declaration.js";
import type { ResourceState } from "../entities/resource-state.js";

export interface ProviderCallContext {
    /** Aborted when the per-call timeout elapses. */
    readonly signal: AbortSignal;
}

/**
 * Boundary to the cloud API. Implementations throw `TransientError` for
 * failures worth retrying and `FatalError` for permanent rejections; anything
 * else is treated as fatal.
 */
export interface ProviderAdapter {
    lookup(
        kind: ResourceKind,
        identity: Parameters,
        context: ProviderCallContext,
    ): Promise<ResourceState>;
    create(
        kind: ResourceKind,
        parameters: Parameters,
        context: ProviderCallContext,
    ): Promise<void>;
    update(
        kind: ResourceKind,
        identity: Parameters,
        changes: Parameters,
        context: ProviderCallContext,
    ): Promise<void>;
    resolve(
        declaration: Declaration,
        attribute: string,
        context: ProviderCallContext,
    ): Promise<ParameterValue>;
}

export interface ProviderSession {
    readonly adapter: ProviderAdapter;
    /** Called after a run that was not a dry run. */
    persist(): Promise<void>;
}

export type ProviderSessionFactory = (
    statePath: string | undefined,
) => Promise<ProviderSession>;
