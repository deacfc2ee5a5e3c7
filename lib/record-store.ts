import { randomBytes } from 'node:crypto';
import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { RecordStoreError } from './errors.js';
import { createLogger } from './logger.js';
import type { BuildRecord } from './types/index.js';
import { getErrorMessage, isFileNotFoundError } from './util.js';

const log = createLogger('records');

const buildRecordSchema = z.object({
    fingerprint: z.string().min(1),
    builtAt: z.string().datetime(),
    image: z.string().optional(),
});

/**
 * Durable mapping from unit name to its last successful build.
 * Writes are per key; there is no cross-unit transaction.
 */
export interface BuildRecordStore {
    get(unit: string): Promise<BuildRecord | undefined>;
    /**
     * Replace the record of one unit. Either the new record is fully
     * written or the previous one is left as it was.
     * @throws RecordStoreError
     */
    put(unit: string, record: BuildRecord): Promise<void>;
    entries(): Promise<Map<string, BuildRecord>>;
}

export class MemoryRecordStore implements BuildRecordStore {
    private readonly records = new Map<string, BuildRecord>();

    constructor(initial?: Iterable<[string, BuildRecord]>) {
        for (const [unit, record] of initial ?? []) {
            this.records.set(unit, { ...record });
        }
    }

    public async get(unit: string): Promise<BuildRecord | undefined> {
        const record = this.records.get(unit);
        return record ? { ...record } : undefined;
    }

    public async put(unit: string, record: BuildRecord): Promise<void> {
        this.records.set(unit, { ...record });
    }

    public async entries(): Promise<Map<string, BuildRecord>> {
        return new Map(
            [...this.records].map(([unit, record]) => [unit, { ...record }]),
        );
    }
}

const RECORD_SUFFIX = '.json';

/**
 * One JSON file per unit under a directory. A write goes to a temporary file
 * in the same directory and is renamed over the record.
 */
export class FileRecordStore implements BuildRecordStore {
    constructor(public readonly directory: string) {}

    private fileFor(unit: string): string {
        return path.join(
            this.directory,
            encodeURIComponent(unit) + RECORD_SUFFIX,
        );
    }

    public async get(unit: string): Promise<BuildRecord | undefined> {
        const file = this.fileFor(unit);
        let content: string;
        try {
            content = await fsPromises.readFile(file, 'utf8');
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return undefined;
            }
            throw error;
        }
        return this.parse(unit, file, content);
    }

    public async put(unit: string, record: BuildRecord): Promise<void> {
        const file = this.fileFor(unit);
        const tmp = `${file}.tmp.${randomBytes(4).toString('hex')}`;
        try {
            await fsPromises.mkdir(this.directory, { recursive: true });
            await fsPromises.writeFile(
                tmp,
                JSON.stringify(record, null, 2) + '\n',
                'utf8',
            );
            await fsPromises.rename(tmp, file);
        } catch (error) {
            await fsPromises.rm(tmp, { force: true }).catch((cleanupError) => {
                log.debug('failed to remove temporary record', {
                    file: tmp,
                    error: getErrorMessage(cleanupError),
                });
            });
            throw new RecordStoreError(unit, error);
        }
    }

    public async entries(): Promise<Map<string, BuildRecord>> {
        const records = new Map<string, BuildRecord>();
        let files: string[];
        try {
            files = await fsPromises.readdir(this.directory);
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return records;
            }
            throw error;
        }
        for (const name of files.sort()) {
            if (!name.endsWith(RECORD_SUFFIX)) continue;
            const unit = decodeURIComponent(name.slice(0, -RECORD_SUFFIX.length));
            const record = await this.get(unit);
            if (record) {
                records.set(unit, record);
            }
        }
        return records;
    }

    // Unreadable records read as missing
    private parse(
        unit: string,
        file: string,
        content: string,
    ): BuildRecord | undefined {
        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (error) {
            log.warn('ignoring corrupt build record', {
                unit,
                file,
                error: getErrorMessage(error),
            });
            return undefined;
        }
        const result = buildRecordSchema.safeParse(data);
        if (!result.success) {
            log.warn('ignoring malformed build record', {
                unit,
                file,
                issues: result.error.issues.map((issue) => issue.message),
            });
            return undefined;
        }
        return result.data;
    }
}
