export interface BackoffConfig {
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
}

export interface ConvergeConfig {
    readonly maxRetries: number;
    readonly timeoutMs: number;
    readonly concurrency: number;
    readonly backoff: BackoffConfig;
    readonly templateVariables: Readonly<Record<string, string>>;
}

export interface ConvergeConfigOverrides {
    readonly maxRetries?: string | undefined;
    readonly timeout?: string | undefined;
    readonly concurrency?: string | undefined;
}
