import chalk, { type ChalkInstance } from 'chalk';
import type { DependencyGraph } from './graph.js';
import type { UnitRegistry } from './registry.js';
import type {
    BuildRecord,
    PlanDecision,
    PlanReason,
    RunSummary,
    UnitOutcome,
    UnitStatus,
} from './types/index.js';
import { formatDuration } from './util.js';

const REASONS: Record<PlanReason, string> = {
    forced: 'forced',
    'never-built': 'never built',
    'fingerprint-unknown': 'build context unreadable',
    changed: 'recipe or context changed',
    'dependency-rebuilt': 'dependency rebuilt',
    unchanged: 'up to date',
};

function paintStatus(colors: ChalkInstance, status: UnitStatus): string {
    const label = status.padEnd(9);
    switch (status) {
        case 'succeeded':
            return colors.green(label);
        case 'failed':
            return colors.red(label);
        case 'skipped':
            return colors.yellow(label);
        case 'unchanged':
            return colors.dim(label);
        default:
            return colors.cyan(label);
    }
}

/**
 * One line per candidate: `build <unit> (reason)` or `keep <unit> (up to date)`
 */
export function formatPlan(
    decisions: readonly PlanDecision[],
    colors: ChalkInstance = chalk,
): string[] {
    if (decisions.length === 0) {
        return ['nothing to consider'];
    }
    return decisions.map(({ unit, reason }) =>
        reason === 'unchanged'
            ? colors.dim(`keep  ${unit} (${REASONS[reason]})`)
            : `${colors.bold('build')} ${unit} (${REASONS[reason]})`,
    );
}

export function formatOutcome(
    outcome: Readonly<UnitOutcome>,
    colors: ChalkInstance = chalk,
): string {
    let detail = '';
    if (outcome.status === 'failed' && outcome.error) {
        detail = ` ${outcome.error}`;
    } else if (outcome.status === 'skipped' && outcome.blockedBy) {
        detail = ` (requires failed unit ${outcome.blockedBy})`;
    } else if (outcome.status === 'succeeded' && outcome.image) {
        detail = ` ${outcome.image.slice(0, 19)}`;
    }
    const duration =
        outcome.durationMs === undefined
            ? ''
            : colors.dim(` [${formatDuration(outcome.durationMs)}]`);
    return `${paintStatus(colors, outcome.status)} ${outcome.unit}${detail}${duration}`;
}

export function formatSummary(
    summary: RunSummary,
    colors: ChalkInstance = chalk,
): string[] {
    const count = (status: UnitStatus) =>
        summary.outcomes.filter((outcome) => outcome.status === status).length;
    const totals = [
        `${count('succeeded')} built`,
        `${count('unchanged')} up to date`,
        `${count('failed')} failed`,
        `${count('skipped')} skipped`,
    ].join(', ');
    return [
        ...summary.outcomes.map((outcome) => formatOutcome(outcome, colors)),
        summary.ok ? colors.green(totals) : colors.red(totals),
    ];
}

/**
 * Units with their requirements, description and last successful build
 */
export function formatUnitList(
    registry: UnitRegistry,
    graph: DependencyGraph,
    records: ReadonlyMap<string, BuildRecord>,
    colors: ChalkInstance = chalk,
): string[] {
    return registry.units().map((unit) => {
        const parts = [colors.bold(unit.name)];
        const requires = graph.dependenciesOf(unit.name);
        if (requires.length > 0) {
            parts.push(`<- ${requires.join(', ')}`);
        }
        const record = records.get(unit.name);
        parts.push(colors.dim(record ? `built ${record.builtAt}` : 'never built'));
        const line = parts.join(' ');
        const description = unit.description?.split('\n')[0];
        return description ? `${line}\n    ${description}` : line;
    });
}
