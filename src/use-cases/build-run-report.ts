import type { Declaration } from "../entities/declaration.js";
import type { OutcomeStatus, RecordedOutcome } from "../entities/outcome.js";
import type { RunReport, RunReportEntry } from "../entities/run-report.js";

export interface RunReportOptions {
    readonly dryRun: boolean;
}

export interface RunReportBuilder {
    build(
        order: readonly Declaration[],
        outcomes: ReadonlyMap<string, RecordedOutcome>,
        options: RunReportOptions,
    ): RunReport;
}

export function createRunReportBuilder(): RunReportBuilder {
    return {
        build(
            order: readonly Declaration[],
            outcomes: ReadonlyMap<string, RecordedOutcome>,
            options: RunReportOptions,
        ): RunReport {
            const counts: Record<OutcomeStatus, number> = {
                unchanged: 0,
                created: 0,
                updated: 0,
                failed: 0,
                cancelled: 0,
            };

            const entries: RunReportEntry[] = order.map((declaration) => {
                const recorded = outcomes.get(declaration.id);
                if (!recorded) {
                    throw new Error(
                        `No outcome was recorded for "${declaration.id}"`,
                    );
                }
                counts[recorded.outcome.status] += 1;
                return {
                    id: declaration.id,
                    kind: declaration.kind,
                    outcome: recorded.outcome,
                    attempts: recorded.attempts,
                };
            });

            return {
                success: counts.failed === 0,
                dryRun: options.dryRun,
                cancelled: counts.cancelled > 0,
                counts,
                entries,
            };
        },
    };
}
