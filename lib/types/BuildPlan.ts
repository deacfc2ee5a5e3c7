/**
 * Linearized ancestry of a unit: dependencies first, the unit itself last.
 * Holds names only; recipe text stays in the registry.
 */
export interface EffectiveBuildPlan {
    unit: string;
    entries: string[];
    baseReference?: string;
}

export type PlanReason =
    | 'forced'
    | 'never-built'
    | 'fingerprint-unknown'
    | 'changed'
    | 'dependency-rebuilt'
    | 'unchanged';

export interface PlanDecision {
    unit: string;
    reason: PlanReason;
}

export interface BuildPlan {
    /** Units to build, dependencies before dependents */
    order: string[];
    /** Every candidate considered, in topological order */
    decisions: PlanDecision[];
}
