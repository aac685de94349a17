import type { Outcome } from "../entities/outcome.js";
import type { RunReport, RunReportEntry } from "../entities/run-report.js";

export interface RunReportSerializer {
    serialize(report: RunReport): string;
    summarize(report: RunReport): string;
}

function toSnakeCaseOutcome(outcome: Outcome) {
    switch (outcome.status) {
        case "failed":
            return {
                status: outcome.status,
                cause: outcome.cause,
                reason: outcome.reason,
            };
        case "updated":
            return {
                status: outcome.status,
                changes: outcome.changes.map((change) => ({
                    field: change.field,
                    from: change.from ?? null,
                    to: change.to,
                })),
            };
        default:
            return { status: outcome.status };
    }
}

function toSnakeCaseEntry(entry: RunReportEntry) {
    return {
        id: entry.id,
        kind: entry.kind,
        ...toSnakeCaseOutcome(entry.outcome),
        attempts: entry.attempts,
    };
}

export function createRunReportSerializer(): RunReportSerializer {
    return {
        serialize(report: RunReport): string {
            const output = {
                success: report.success,
                dry_run: report.dryRun,
                cancelled: report.cancelled,
                counts: { ...report.counts },
                outcomes: report.entries.map(toSnakeCaseEntry),
            };

            return JSON.stringify(output, null, 2);
        },

        summarize(report: RunReport): string {
            const { counts } = report;
            const prefix = report.dryRun ? "Dry run: " : "";
            return (
                `${prefix}${counts.created} created, ${counts.updated} updated, ` +
                `${counts.unchanged} unchanged, ${counts.failed} failed, ` +
                `${counts.cancelled} cancelled`
            );
        },
    };
}
