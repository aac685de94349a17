import type { RecordedOutcome } from "../entities/outcome.js";

export interface OutcomeStore {
    record(id: string, recorded: RecordedOutcome): void;
    get(id: string): RecordedOutcome | undefined;
    has(id: string): boolean;
    snapshot(): ReadonlyMap<string, RecordedOutcome>;
}

/** Each declaration's outcome is written exactly once per run. */
export function createOutcomeStore(): OutcomeStore {
    const outcomes = new Map<string, RecordedOutcome>();

    return {
        record(id: string, recorded: RecordedOutcome): void {
            if (outcomes.has(id)) {
                throw new Error(`Outcome for "${id}" was already recorded`);
            }
            outcomes.set(id, Object.freeze({ ...recorded }));
        },
        get(id: string): RecordedOutcome | undefined {
            return outcomes.get(id);
        },
        has(id: string): boolean {
            return outcomes.has(id);
        },
        snapshot(): ReadonlyMap<string, RecordedOutcome> {
            return new Map(outcomes);
        },
    };
}
