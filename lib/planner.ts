import { UnknownUnitError } from './errors.js';
import type { FingerprintResult } from './fingerprint.js';
import type { DependencyGraph } from './graph.js';
import type {
    BuildPlan,
    BuildRecord,
    PlanDecision,
    PlanReason,
} from './types/index.js';

export interface PlanInput {
    graph: DependencyGraph;
    /** Units requested; their dependencies are considered too. Defaults to every unit. */
    targets?: readonly string[];
    fingerprints: ReadonlyMap<string, FingerprintResult>;
    records: ReadonlyMap<string, BuildRecord>;
    /** Rebuild every candidate regardless of fingerprints */
    force?: boolean;
}

/**
 * Decide which units to build and in what order.
 *
 * A candidate is built when it is forced, has never been built, cannot be
 * fingerprinted, has a fingerprint different from its record, or requires a
 * unit that is being built. Candidates are ordered topologically, ties broken
 * by declaration order.
 */
export function planBuild(input: PlanInput): BuildPlan {
    const { graph, fingerprints, records, force = false } = input;
    const candidates = collectCandidates(graph, input.targets ?? graph.names);

    const decisions: PlanDecision[] = [];
    const included = new Set<string>();
    for (const unit of topologicalOrder(graph, candidates)) {
        const reason = decide(
            unit,
            force,
            fingerprints.get(unit),
            records.get(unit),
            graph.dependenciesOf(unit).some((dep) => included.has(dep)),
        );
        if (reason !== 'unchanged') {
            included.add(unit);
        }
        decisions.push({ unit, reason });
    }

    return {
        order: decisions
            .filter((decision) => decision.reason !== 'unchanged')
            .map((decision) => decision.unit),
        decisions,
    };
}

function decide(
    unit: string,
    force: boolean,
    fingerprint: FingerprintResult | undefined,
    record: BuildRecord | undefined,
    dependencyRebuilt: boolean,
): PlanReason {
    if (force) return 'forced';
    if (!record) return 'never-built';
    if (!fingerprint || fingerprint.status === 'unknown') {
        return 'fingerprint-unknown';
    }
    if (fingerprint.digest !== record.fingerprint) return 'changed';
    if (dependencyRebuilt) return 'dependency-rebuilt';
    return 'unchanged';
}

function collectCandidates(
    graph: DependencyGraph,
    targets: readonly string[],
): Set<string> {
    const candidates = new Set<string>();
    for (const target of targets) {
        if (!graph.has(target)) {
            throw new UnknownUnitError(target);
        }
        candidates.add(target);
        for (const dependency of graph.transitiveDependencies(target)) {
            candidates.add(dependency);
        }
    }
    return candidates;
}

// Kahn's algorithm; the ready set is kept sorted by declaration index
function topologicalOrder(
    graph: DependencyGraph,
    candidates: ReadonlySet<string>,
): string[] {
    const remaining = new Map<string, number>();
    for (const unit of candidates) {
        const dependencies = new Set(graph.dependenciesOf(unit));
        remaining.set(
            unit,
            [...dependencies].filter((dep) => candidates.has(dep)).length,
        );
    }

    const byIndex = (a: string, b: string) =>
        graph.indexOf(a) - graph.indexOf(b);
    const ready = [...remaining]
        .filter(([, count]) => count === 0)
        .map(([unit]) => unit)
        .sort(byIndex);

    const order: string[] = [];
    while (ready.length > 0) {
        const unit = ready.shift();
        if (unit === undefined) break;
        order.push(unit);
        for (const dependent of new Set(graph.dependentsOf(unit))) {
            const count = remaining.get(dependent);
            if (count === undefined) continue;
            remaining.set(dependent, count - 1);
            if (count - 1 === 0) {
                ready.push(dependent);
                ready.sort(byIndex);
            }
        }
    }
    return order;
}
