export type UnitStatus =
    | 'pending'
    | 'building'
    | 'succeeded'
    | 'failed'
    | 'skipped'
    | 'unchanged';

export interface UnitOutcome {
    unit: string;
    status: UnitStatus;
    image?: string;
    error?: string;
    /** Units whose failure caused this one to be skipped */
    blockedBy?: string;
    durationMs?: number;
}

export interface RunSummary {
    ok: boolean;
    outcomes: UnitOutcome[];
}
