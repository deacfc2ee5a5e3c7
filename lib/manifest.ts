/**
 * Manifest loading.
 *
 * A manifest is a YAML mapping from unit name to recipe:
 *
 * ```yaml
 * _ALL_:            # default targets
 *   - notebook
 * base:
 *   FROM: debian:bookworm
 * python_install:
 *   requires: [base]
 *   build: |
 *     RUN apt-get update && apt-get install -y python3
 * notebook:
 *   description: Jupyter server
 *   requires: [python_install]
 *   build_directory: notebook
 *   build: |
 *     COPY jupyter_config.py /etc/jupyter/
 * ```
 */

import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ManifestError } from './errors.js';
import type { ImageUnit } from './types/index.js';
import { getErrorMessage } from './util.js';

export const ALL_TARGETS_KEY = '_ALL_';

const unitName = z
    .string()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9_.-]*$/, 'must be a lowercase image name component');

const unitSchema = z
    .object({
        FROM: z.string().min(1).optional(),
        requires: z
            .array(unitName)
            .refine((names) => new Set(names).size === names.length, {
                message: 'lists a unit more than once',
            })
            .optional(),
        build: z.string().optional(),
        build_directory: z.string().min(1).optional(),
        description: z.string().optional(),
    })
    .strict()
    .nullable();

type Recipe = NonNullable<z.infer<typeof unitSchema>>;

const targetsSchema = z.array(unitName);

export interface Manifest {
    /** Where the manifest came from, for messages */
    source: string;
    /** Directory build directories are resolved against */
    root: string;
    units: ImageUnit[];
    /** The `_ALL_` list, when the manifest has one */
    defaultTargets?: string[];
}

function formatIssues(prefix: string, error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const where = [prefix, ...issue.path].join('.');
        return `${where}: ${issue.message}`;
    });
}

/**
 * Parse manifest text.
 * @param root directory relative `build_directory` values resolve against
 * @throws ManifestError listing every problem found
 */
export function parseManifest(
    text: string,
    source: string,
    root: string,
): Manifest {
    let document: unknown;
    try {
        document = parseYaml(text);
    } catch (error) {
        if (error instanceof YAMLParseError) {
            throw new ManifestError(source, [error.message]);
        }
        throw error;
    }

    if (document === null || typeof document !== 'object' || Array.isArray(document)) {
        throw new ManifestError(source, ['top level must be a mapping of unit names']);
    }

    const issues: string[] = [];
    const units: ImageUnit[] = [];
    let defaultTargets: string[] | undefined;

    for (const [key, value] of Object.entries(document)) {
        if (key === ALL_TARGETS_KEY) {
            const targets = targetsSchema.safeParse(value);
            if (targets.success) {
                defaultTargets = targets.data;
            } else {
                issues.push(...formatIssues(key, targets.error));
            }
            continue;
        }

        const name = unitName.safeParse(key);
        if (!name.success) {
            issues.push(...formatIssues(key, name.error));
            continue;
        }

        const parsed = unitSchema.safeParse(value);
        if (!parsed.success) {
            issues.push(...formatIssues(key, parsed.error));
            continue;
        }
        const recipe: Recipe = parsed.data ?? {};
        units.push({
            name: key,
            baseReference: recipe.FROM,
            requires: recipe.requires ?? [],
            buildDirectory: recipe.build_directory,
            buildSteps: recipe.build ?? '',
            description: recipe.description?.trim(),
        });
    }

    const names = new Set(units.map((unit) => unit.name));
    for (const target of defaultTargets ?? []) {
        if (!names.has(target)) {
            issues.push(`${ALL_TARGETS_KEY}: unknown unit '${target}'`);
        }
    }

    if (issues.length > 0) {
        throw new ManifestError(source, issues);
    }
    return { source, root, units, defaultTargets };
}

/**
 * Read and parse a manifest file; build directories resolve against the
 * file's directory.
 */
export async function loadManifest(file: string): Promise<Manifest> {
    const absolute = path.resolve(file);
    let text: string;
    try {
        text = await fsPromises.readFile(absolute, 'utf8');
    } catch (error) {
        throw new ManifestError(absolute, [
            `cannot read file: ${getErrorMessage(error) ?? 'unknown error'}`,
        ]);
    }
    return parseManifest(text, absolute, path.dirname(absolute));
}
