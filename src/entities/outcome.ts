import type { ParameterValue } from "./declaration.js";

export type OutcomeStatus =
    | "unchanged"
    | "created"
    | "updated"
    | "failed"
    | "cancelled";

export type FailureCause = "transient" | "fatal" | "upstream";

export interface FieldChange {
    readonly field: string;
    readonly from: ParameterValue | undefined;
    readonly to: ParameterValue;
}

export interface UnchangedOutcome {
    readonly status: "unchanged";
}

export interface CreatedOutcome {
    readonly status: "created";
}

export interface UpdatedOutcome {
    readonly status: "updated";
    readonly changes: readonly FieldChange[];
}

export interface FailedOutcome {
    readonly status: "failed";
    readonly cause: FailureCause;
    readonly reason: string;
}

export interface CancelledOutcome {
    readonly status: "cancelled";
}

export type Outcome =
    | UnchangedOutcome
    | CreatedOutcome
    | UpdatedOutcome
    | FailedOutcome
    | CancelledOutcome;

export const UPSTREAM_FAILURE_REASON = "upstream dependency failed";

export interface RecordedOutcome {
    readonly outcome: Outcome;
    readonly attempts: number;
}
