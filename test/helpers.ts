import { promises as fsPromises } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { BuildRequest, ImageBuilder, ImageHandle } from '../lib/builder.js';
import type { ImageUnit } from '../lib/types/index.js';

export function unit(
    name: string,
    fields: Partial<Omit<ImageUnit, 'name'>> = {},
): ImageUnit {
    return { name, requires: [], buildSteps: '', ...fields };
}

export async function makeTempDir(): Promise<string> {
    return fsPromises.mkdtemp(path.join(os.tmpdir(), 'imagesmith-test-'));
}

export async function writeFiles(
    root: string,
    files: Record<string, string>,
): Promise<void> {
    for (const [name, content] of Object.entries(files)) {
        const file = path.join(root, name);
        await fsPromises.mkdir(path.dirname(file), { recursive: true });
        await fsPromises.writeFile(file, content);
    }
}

/**
 * Builder that records every request and answers from a per-unit script.
 */
export class FakeBuilder implements ImageBuilder {
    public readonly requests: BuildRequest[] = [];
    public running = 0;
    public maxRunning = 0;
    private readonly failures = new Map<string, Error>();
    private readonly delays = new Map<string, number>();
    private readonly hanging = new Set<string>();

    public failOn(unit: string, error: Error = new Error('step failed')): this {
        this.failures.set(unit, error);
        return this;
    }

    public delay(unit: string, ms: number): this {
        this.delays.set(unit, ms);
        return this;
    }

    /** The build of `unit` only ends when its signal aborts */
    public hang(unit: string): this {
        this.hanging.add(unit);
        return this;
    }

    public built(): string[] {
        return this.requests.map((request) => request.unit);
    }

    public async build(
        request: BuildRequest,
        signal: AbortSignal,
    ): Promise<ImageHandle> {
        this.requests.push(request);
        this.running++;
        this.maxRunning = Math.max(this.maxRunning, this.running);
        try {
            if (this.hanging.has(request.unit)) {
                await new Promise<void>((_, reject) => {
                    signal.addEventListener('abort', () =>
                        reject(new Error('aborted')),
                    );
                });
            }
            await new Promise((resolve) =>
                setTimeout(resolve, this.delays.get(request.unit) ?? 1),
            );
            const failure = this.failures.get(request.unit);
            if (failure) {
                throw failure;
            }
            return { id: `sha256:id-${request.unit}`, image: request.image };
        } finally {
            this.running--;
        }
    }
}

type ErrorClass<T extends Error> = new (...args: never[]) => T;

export function catchError<T extends Error>(
    fn: () => unknown,
    type: ErrorClass<T>,
): T {
    try {
        fn();
    } catch (error) {
        if (error instanceof type) {
            return error;
        }
        throw error;
    }
    throw new Error(`expected ${type.name} to be thrown`);
}

export async function catchAsyncError<T extends Error>(
    promise: Promise<unknown>,
    type: ErrorClass<T>,
): Promise<T> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof type) {
            return error;
        }
        throw error;
    }
    throw new Error(`expected ${type.name} to be thrown`);
}
