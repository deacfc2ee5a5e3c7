import { imageName, type BuildRequest, type ImageBuilder } from './builder.js';
import { DEFAULT_TAG } from './config.js';
import { Executor } from './executor.js';
import { fingerprintAll, type FingerprintResult } from './fingerprint.js';
import { buildGraph, type DependencyGraph } from './graph.js';
import { composeDockerfile, contextDirectories, linearize } from './linearizer.js';
import { createLogger } from './logger.js';
import type { Manifest } from './manifest.js';
import { planBuild } from './planner.js';
import type { BuildRecordStore } from './record-store.js';
import { UnitRegistry } from './registry.js';
import type {
    BuildPlan,
    BuildRecord,
    RunSummary,
    UnitOutcome,
} from './types/index.js';
import { getErrorMessage } from './util.js';

const log = createLogger('orchestrator');

export interface OrchestratorOptions {
    manifest: Manifest;
    builder: ImageBuilder;
    records: BuildRecordStore;
    concurrency?: number;
    timeoutMs?: number;
    repository?: string;
    tag?: string;
    noCache?: boolean;
    /** Rebuild every requested unit and its dependencies */
    force?: boolean;
    onTransition?: (outcome: Readonly<UnitOutcome>) => void;
}

export interface PlanResult {
    plan: BuildPlan;
    fingerprints: Map<string, FingerprintResult>;
}

/**
 * Wires the pipeline together: registry, graph, fingerprints, plan and
 * execution. Structural problems in the manifest surface from the
 * constructor, before anything is built.
 */
export class Orchestrator {
    public readonly registry: UnitRegistry;
    public readonly graph: DependencyGraph;

    constructor(private readonly options: OrchestratorOptions) {
        this.registry = UnitRegistry.from(options.manifest.units);
        this.graph = buildGraph(this.registry);
    }

    /**
     * Targets to consider: the ones requested, else the manifest's `_ALL_`
     * list, else every unit.
     */
    public targets(requested?: readonly string[]): string[] {
        if (requested && requested.length > 0) {
            for (const name of requested) {
                this.registry.lookup(name);
            }
            return [...requested];
        }
        return this.options.manifest.defaultTargets ?? this.registry.names();
    }

    public dockerfile(unit: string): string {
        return composeDockerfile(
            this.registry,
            linearize(this.graph, this.registry, unit),
        );
    }

    public requestFor(unit: string): BuildRequest {
        const plan = linearize(this.graph, this.registry, unit);
        return {
            unit,
            dockerfile: composeDockerfile(this.registry, plan),
            contextDirectories: contextDirectories(
                this.registry,
                plan,
                this.options.manifest.root,
            ),
            image: imageName(unit, {
                repository: this.options.repository,
                tag: this.options.tag ?? DEFAULT_TAG,
            }),
            noCache: this.options.noCache ?? false,
        };
    }

    public async plan(requested?: readonly string[]): Promise<PlanResult> {
        const targets = this.targets(requested);
        const fingerprints = await fingerprintAll(
            this.registry,
            this.graph,
            this.options.manifest.root,
        );
        const records = await this.readRecords();
        const plan = planBuild({
            graph: this.graph,
            targets,
            fingerprints,
            records,
            force: this.options.force,
        });
        log.info('build plan ready', {
            targets: targets.length,
            candidates: plan.decisions.length,
            planned: plan.order.length,
        });
        return { plan, fingerprints };
    }

    public async run(requested?: readonly string[]): Promise<RunSummary> {
        const { plan, fingerprints } = await this.plan(requested);

        const executor = new Executor({
            graph: this.graph,
            builder: this.options.builder,
            records: this.options.records,
            fingerprints,
            requestFor: (unit) => this.requestFor(unit),
            concurrency: this.options.concurrency,
            timeoutMs: this.options.timeoutMs,
            onTransition: this.options.onTransition,
        });
        const executed = new Map(
            (await executor.run(plan.order)).map((outcome) => [outcome.unit, outcome]),
        );

        const outcomes = plan.decisions.map(
            ({ unit }): UnitOutcome =>
                executed.get(unit) ?? { unit, status: 'unchanged' },
        );
        const ok = outcomes.every(
            (outcome) => outcome.status === 'succeeded' || outcome.status === 'unchanged',
        );
        log.info('run finished', {
            ok,
            built: outcomes.filter((o) => o.status === 'succeeded').length,
            failed: outcomes.filter((o) => o.status === 'failed').length,
            skipped: outcomes.filter((o) => o.status === 'skipped').length,
        });
        return { ok, outcomes };
    }

    // An unreadable record counts as missing: the unit is rebuilt
    private async readRecords(): Promise<Map<string, BuildRecord>> {
        const records = new Map<string, BuildRecord>();
        for (const unit of this.graph.names) {
            try {
                const record = await this.options.records.get(unit);
                if (record) {
                    records.set(unit, record);
                }
            } catch (error) {
                log.warn('cannot read build record, unit will be rebuilt', {
                    unit,
                    error: getErrorMessage(error),
                });
            }
        }
        return records;
    }
}
