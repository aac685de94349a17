import type { ResourceKind } from "./declaration.js";
import type { Outcome, OutcomeStatus } from "./outcome.js";

export interface RunReportEntry {
    readonly id: string;
    readonly kind: ResourceKind;
    readonly outcome: Outcome;
    readonly attempts: number;
}

export type OutcomeCounts = Readonly<Record<OutcomeStatus, number>>;

export interface RunReport {
    readonly success: boolean;
    readonly dryRun: boolean;
    readonly cancelled: boolean;
    readonly counts: OutcomeCounts;
    readonly entries: readonly RunReportEntry[];
}
