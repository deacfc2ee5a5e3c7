import type { BuildRequest, ImageBuilder, ImageHandle } from './builder.js';
import { BuildError, BuildTimeoutError, ImagesmithError } from './errors.js';
import type { FingerprintResult } from './fingerprint.js';
import type { DependencyGraph } from './graph.js';
import { createLogger } from './logger.js';
import type { BuildRecordStore } from './record-store.js';
import type { UnitOutcome, UnitStatus } from './types/index.js';
import { getErrorMessage } from './util.js';

const log = createLogger('executor');

export const DEFAULT_CONCURRENCY = 2;

export interface ExecutorOptions {
    graph: DependencyGraph;
    builder: ImageBuilder;
    records: BuildRecordStore;
    fingerprints: ReadonlyMap<string, FingerprintResult>;
    /** Composes the builder input of a unit when it starts */
    requestFor: (unit: string) => BuildRequest;
    /** Maximum number of builds in flight */
    concurrency?: number;
    /** Deadline of a single builder call; exceeding it fails the unit */
    timeoutMs?: number;
    now?: () => Date;
    onTransition?: (outcome: Readonly<UnitOutcome>) => void;
}

/**
 * Runs the builder over a planned set of units.
 *
 * A unit starts once every unit it requires that is part of the plan has
 * succeeded, with at most `concurrency` builds running. When a unit fails,
 * units depending on it are skipped; builds already running finish and
 * unrelated branches carry on. The build record of a unit is written only
 * after its own build succeeds.
 */
export class Executor {
    private readonly concurrency: number;
    private readonly now: () => Date;

    constructor(private readonly options: ExecutorOptions) {
        const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(
                `Concurrency must be a positive integer, got ${concurrency}`,
            );
        }
        this.concurrency = concurrency;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * @param order units to build, dependencies before dependents
     * @returns one outcome per unit, in the order given
     */
    public async run(order: readonly string[]): Promise<UnitOutcome[]> {
        const { graph } = this.options;
        const inPlan = new Set(order);
        const outcomes = new Map<string, UnitOutcome>(
            order.map((unit) => [unit, { unit, status: 'pending' }]),
        );
        const running = new Map<string, Promise<void>>();

        const statusOf = (unit: string): UnitStatus | undefined =>
            outcomes.get(unit)?.status;
        const isReady = (unit: string): boolean =>
            graph
                .dependenciesOf(unit)
                .every(
                    (dep) => !inPlan.has(dep) || statusOf(dep) === 'succeeded',
                );

        for (;;) {
            for (const unit of order) {
                if (running.size >= this.concurrency) break;
                const outcome = outcomes.get(unit);
                if (outcome?.status !== 'pending' || !isReady(unit)) continue;
                running.set(
                    unit,
                    this.execute(outcome, inPlan, outcomes).finally(() => {
                        running.delete(unit);
                    }),
                );
            }
            if (running.size === 0) break;
            await Promise.race(running.values());
        }

        for (const outcome of outcomes.values()) {
            if (outcome.status === 'pending') {
                this.transition(outcome, 'skipped');
            }
        }
        return order.map((unit) => outcomes.get(unit) ?? { unit, status: 'skipped' });
    }

    private async execute(
        outcome: UnitOutcome,
        inPlan: ReadonlySet<string>,
        outcomes: ReadonlyMap<string, UnitOutcome>,
    ): Promise<void> {
        const { unit } = outcome;
        const started = this.now().getTime();
        this.transition(outcome, 'building');

        let handle: ImageHandle;
        try {
            handle = await this.invoke(this.options.requestFor(unit));
        } catch (error) {
            const failure =
                error instanceof BuildError
                    ? error
                    : new BuildError(
                          unit,
                          getErrorMessage(error) ?? 'unknown error',
                          error,
                      );
            outcome.error = failure.message;
            outcome.durationMs = this.now().getTime() - started;
            log.error('build failed', { unit, error: failure.message });
            this.transition(outcome, 'failed');
            this.skipDependents(unit, inPlan, outcomes);
            return;
        }

        outcome.image = handle.id;
        outcome.durationMs = this.now().getTime() - started;
        await this.record(unit, handle);
        this.transition(outcome, 'succeeded');
    }

    private async invoke(request: BuildRequest): Promise<ImageHandle> {
        const { builder, timeoutMs } = this.options;
        const controller = new AbortController();
        if (timeoutMs === undefined) {
            return builder.build(request, controller.signal);
        }

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new BuildTimeoutError(request.unit, timeoutMs));
            }, timeoutMs);
        });
        try {
            return await Promise.race([
                builder.build(request, controller.signal),
                deadline,
            ]);
        } finally {
            clearTimeout(timer);
        }
    }

    // A failed write is logged; the unit stays succeeded
    private async record(unit: string, handle: ImageHandle): Promise<void> {
        const fingerprint = this.options.fingerprints.get(unit);
        if (fingerprint?.status !== 'ok') {
            log.warn('no fingerprint, build record not written', { unit });
            return;
        }
        try {
            await this.options.records.put(unit, {
                fingerprint: fingerprint.digest,
                builtAt: this.now().toISOString(),
                image: handle.id,
            });
        } catch (error) {
            log.warn('failed to write build record', {
                unit,
                error:
                    error instanceof ImagesmithError && error.cause
                        ? getErrorMessage(error.cause)
                        : getErrorMessage(error),
            });
        }
    }

    private skipDependents(
        failed: string,
        inPlan: ReadonlySet<string>,
        outcomes: ReadonlyMap<string, UnitOutcome>,
    ): void {
        for (const dependent of this.options.graph.transitiveDependents(failed)) {
            if (!inPlan.has(dependent)) continue;
            const outcome = outcomes.get(dependent);
            if (outcome?.status !== 'pending') continue;
            outcome.blockedBy = failed;
            log.info('skipping unit, dependency failed', {
                unit: dependent,
                dependency: failed,
            });
            this.transition(outcome, 'skipped');
        }
    }

    private transition(outcome: UnitOutcome, status: UnitStatus): void {
        outcome.status = status;
        log.debug('unit transition', { unit: outcome.unit, status });
        this.options.onTransition?.(outcome);
    }
}
