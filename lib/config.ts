/**
 * Run configuration.
 *
 * Values come from command line options, then the environment, then the
 * defaults below:
 *
 *   IMAGESMITH_MANIFEST     manifest file (default: imagesmith.yml)
 *   IMAGESMITH_RECORDS      build record directory (default: .imagesmith/records next to the manifest)
 *   IMAGESMITH_CONCURRENCY  parallel builds (default: 2)
 *   IMAGESMITH_TIMEOUT      per-build deadline in seconds (default: none)
 *   IMAGESMITH_REPOSITORY   repository prefix of built images
 *   IMAGESMITH_TAG          tag of built images (default: latest)
 *   IMAGESMITH_PULL         1 to pull newer base images on every build
 *   IMAGESMITH_PLATFORM     target platform of built images, e.g. linux/arm64
 *   IMAGESMITH_LOG_LEVEL    error|warn|info|debug|silent (default: info)
 *   IMAGESMITH_LOG_JSON     1 for JSON log lines
 *   DOCKER_HOST             engine address; otherwise the Docker config decides
 */

import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_CONCURRENCY } from './executor.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_MANIFEST = 'imagesmith.yml';
export const DEFAULT_TAG = 'latest';
export const RECORDS_DIRECTORY = path.join('.imagesmith', 'records');

export interface ImagesmithConfig {
    manifest: string;
    records: string;
    concurrency: number;
    timeoutMs?: number;
    repository?: string;
    tag: string;
    noCache: boolean;
    pull: boolean;
    platform?: string;
    force: boolean;
    dockerHost?: string;
    logLevel: LogLevel;
    logJson: boolean;
}

/** Options as the command line delivers them */
export interface ConfigOptions {
    file?: string;
    records?: string;
    concurrency?: string | number;
    timeout?: string | number;
    repository?: string;
    tag?: string;
    cache?: boolean;
    pull?: boolean;
    platform?: string;
    force?: boolean;
    logLevel?: string;
    logJson?: boolean;
    host?: string;
}

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const configSchema = z.object({
    manifest: z.string().min(1),
    records: z.string().min(1).optional(),
    concurrency: z.coerce
        .number({ invalid_type_error: 'must be a number' })
        .int('must be a whole number')
        .positive('must be at least 1'),
    timeout: z.preprocess(
        blankToUndefined,
        z.coerce.number().positive('must be a positive number of seconds').optional(),
    ),
    repository: z.preprocess(
        blankToUndefined,
        z
            .string()
            .regex(
                /^[a-z0-9]+([._-][a-z0-9]+)*(:[0-9]+)?(\/[a-z0-9]+([._-][a-z0-9]+)*)*$/,
                'must be a lowercase repository path',
            )
            .optional(),
    ),
    tag: z
        .string()
        .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, 'must be a valid image tag'),
    noCache: z.boolean(),
    pull: z.boolean(),
    platform: z.preprocess(
        blankToUndefined,
        z
            .string()
            .regex(/^[a-z0-9_-]+\/[a-z0-9_-]+(\/[a-z0-9_.-]+)?$/, 'must look like os/arch[/variant]')
            .optional(),
    ),
    force: z.boolean(),
    dockerHost: z.preprocess(blankToUndefined, z.string().optional()),
    logLevel: z.enum(LOG_LEVELS),
    logJson: z.boolean(),
});

/**
 * Merge command line options with the environment and validate the result.
 * @throws ConfigError listing every invalid setting
 */
export function resolveConfig(
    options: ConfigOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): ImagesmithConfig {
    const result = configSchema.safeParse({
        manifest: options.file ?? env.IMAGESMITH_MANIFEST ?? DEFAULT_MANIFEST,
        records: options.records ?? env.IMAGESMITH_RECORDS,
        concurrency:
            options.concurrency ?? env.IMAGESMITH_CONCURRENCY ?? DEFAULT_CONCURRENCY,
        timeout: options.timeout ?? env.IMAGESMITH_TIMEOUT,
        repository: options.repository ?? env.IMAGESMITH_REPOSITORY,
        tag: options.tag ?? env.IMAGESMITH_TAG ?? DEFAULT_TAG,
        noCache: options.cache === false,
        pull: options.pull ?? env.IMAGESMITH_PULL === '1',
        platform: options.platform ?? env.IMAGESMITH_PLATFORM,
        force: options.force ?? false,
        dockerHost: options.host ?? env.DOCKER_HOST,
        logLevel: (options.logLevel ?? env.IMAGESMITH_LOG_LEVEL ?? 'info').toLowerCase(),
        logJson: options.logJson ?? env.IMAGESMITH_LOG_JSON === '1',
    });

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(
                (issue) => `${issue.path.join('.')}: ${issue.message}`,
            ),
        );
    }

    const raw = result.data;
    const manifest = path.resolve(raw.manifest);
    return {
        manifest,
        records: path.resolve(
            raw.records ?? path.join(path.dirname(manifest), RECORDS_DIRECTORY),
        ),
        concurrency: raw.concurrency,
        timeoutMs:
            raw.timeout === undefined
                ? undefined
                : Math.max(1, Math.ceil(raw.timeout * 1000)),
        repository: raw.repository,
        tag: raw.tag,
        noCache: raw.noCache,
        pull: raw.pull,
        platform: raw.platform,
        force: raw.force,
        dockerHost: raw.dockerHost,
        logLevel: raw.logLevel,
        logJson: raw.logJson,
    };
}
