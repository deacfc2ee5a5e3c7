import * as path from 'node:path';
import type { DependencyGraph } from './graph.js';
import type { UnitRegistry } from './registry.js';
import type { EffectiveBuildPlan } from './types/index.js';

/**
 * Linearize the ancestry of a unit.
 *
 * Post-order walk of the `requires` edges: each requirement's own requirements
 * come first, then the requirement, and the unit itself last. A unit reached
 * again through another path (a diamond) keeps its first position. Siblings
 * keep their `requires` declaration order.
 *
 * The graph must already be validated; cycles are not checked here.
 */
export function linearize(
    graph: DependencyGraph,
    registry: UnitRegistry,
    unit: string,
): EffectiveBuildPlan {
    const entries: string[] = [];
    const seen = new Set<string>();

    const visit = (name: string): void => {
        if (seen.has(name)) {
            return;
        }
        seen.add(name);
        for (const dependency of graph.dependenciesOf(name)) {
            visit(dependency);
        }
        entries.push(name);
    };
    visit(unit);

    let baseReference: string | undefined;
    for (const entry of entries) {
        baseReference ??= registry.lookup(entry).baseReference;
    }

    return { unit, entries, baseReference };
}

/**
 * Render the effective Dockerfile of a plan: the inherited base followed by
 * every entry's steps, each introduced by a `# <unit>` marker line.
 */
export function composeDockerfile(
    registry: UnitRegistry,
    plan: EffectiveBuildPlan,
): string {
    const lines: string[] = [];
    if (plan.baseReference !== undefined) {
        lines.push(`FROM ${plan.baseReference}`);
    }
    for (const entry of plan.entries) {
        lines.push(`# ${entry}`);
        const steps = registry.lookup(entry).buildSteps.trimEnd();
        if (steps !== '') {
            lines.push(steps);
        }
    }
    return lines.join('\n') + '\n';
}

/**
 * Build directories of a plan's entries, resolved against `root`, in plan order.
 * Later directories take precedence when the context is merged.
 */
export function contextDirectories(
    registry: UnitRegistry,
    plan: EffectiveBuildPlan,
    root: string,
): string[] {
    const directories: string[] = [];
    for (const entry of plan.entries) {
        const directory = registry.lookup(entry).buildDirectory;
        if (directory !== undefined) {
            directories.push(path.resolve(root, directory));
        }
    }
    return directories;
}
