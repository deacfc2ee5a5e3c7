import { createHash, type Hash } from 'node:crypto';
import * as path from 'node:path';
import { listContextFiles, openContextFile, type ContextFile } from './context.js';
import { UnreadableFileError } from './errors.js';
import type { DependencyGraph } from './graph.js';
import { linearize } from './linearizer.js';
import { createLogger } from './logger.js';
import type { UnitRegistry } from './registry.js';
import type { EffectiveBuildPlan } from './types/index.js';

const log = createLogger('fingerprint');

export const DIGEST_PREFIX = 'sha256:';

export type FingerprintResult =
    | { status: 'ok'; digest: string }
    | { status: 'unknown'; error: UnreadableFileError };

interface FileDigest {
    relativePath: string;
    digest: string;
}

// Length-prefixed so that adjacent fields cannot run into each other
function frame(hash: Hash, label: string, value: string): void {
    hash.update(`${label} ${Buffer.byteLength(value, 'utf8')}\n`);
    hash.update(value, 'utf8');
    hash.update('\n');
}

/**
 * Content fingerprints for units.
 *
 * A fingerprint covers, for every entry of the unit's effective plan in
 * order, the entry's name, base image, recipe text and the sorted
 * `(path, sha256)` list of its build directory. It does not depend on
 * timestamps or on the order the filesystem lists files in.
 *
 * Directory listings are cached for the lifetime of the engine, so create
 * one engine per invocation.
 */
async function digestFile(file: ContextFile): Promise<string> {
    const { stream } = await openContextFile(file);
    const hash = createHash('sha256');
    try {
        for await (const chunk of stream) {
            hash.update(chunk);
        }
    } catch (error) {
        throw new UnreadableFileError(file.absolutePath, error);
    }
    return hash.digest('hex');
}

export class FingerprintEngine {
    private readonly directories = new Map<string, Promise<FileDigest[]>>();

    constructor(
        private readonly registry: UnitRegistry,
        private readonly root: string,
    ) {}

    /**
     * @throws UnreadableFileError if a build directory file cannot be read
     */
    public async fingerprint(plan: EffectiveBuildPlan): Promise<string> {
        const hash = createHash('sha256');
        for (const entry of plan.entries) {
            const unit = this.registry.lookup(entry);
            frame(hash, 'unit', unit.name);
            frame(hash, 'from', unit.baseReference ?? '');
            frame(hash, 'steps', unit.buildSteps);
            const files =
                unit.buildDirectory === undefined
                    ? []
                    : await this.hashDirectory(
                          path.resolve(this.root, unit.buildDirectory),
                      );
            hash.update(`files ${files.length}\n`);
            for (const file of files) {
                frame(hash, 'path', file.relativePath);
                frame(hash, 'sha256', file.digest);
            }
        }
        return DIGEST_PREFIX + hash.digest('hex');
    }

    private hashDirectory(directory: string): Promise<FileDigest[]> {
        let pending = this.directories.get(directory);
        if (!pending) {
            pending = this.readDirectory(directory);
            this.directories.set(directory, pending);
        }
        return pending;
    }

    private async readDirectory(directory: string): Promise<FileDigest[]> {
        const files = await listContextFiles(directory);
        const digests: FileDigest[] = [];
        for (const file of files) {
            digests.push({
                relativePath: file.relativePath,
                digest: await digestFile(file),
            });
        }
        log.debug('hashed build directory', {
            directory,
            files: digests.length,
        });
        return digests;
    }
}

/**
 * Fingerprint every registered unit. A unit whose build context cannot be
 * read gets an `unknown` result instead of failing the whole run.
 */
export async function fingerprintAll(
    registry: UnitRegistry,
    graph: DependencyGraph,
    root: string,
): Promise<Map<string, FingerprintResult>> {
    const engine = new FingerprintEngine(registry, root);
    const results = new Map<string, FingerprintResult>();
    for (const name of graph.names) {
        const plan = linearize(graph, registry, name);
        try {
            results.set(name, {
                status: 'ok',
                digest: await engine.fingerprint(plan),
            });
        } catch (error) {
            if (!(error instanceof UnreadableFileError)) {
                throw error;
            }
            log.warn('cannot fingerprint unit, it will be rebuilt', {
                unit: name,
                path: error.path,
            });
            results.set(name, { status: 'unknown', error });
        }
    }
    return results;
}
