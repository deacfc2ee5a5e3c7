import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { assert, describe, test } from 'vitest';
import { ManifestError } from '../lib/errors.js';
import { loadManifest, parseManifest } from '../lib/manifest.js';
import { catchAsyncError, catchError, makeTempDir } from './helpers.js';

const MANIFEST = `
_ALL_:
  - notebook

base:
  FROM: debian:bookworm
  build: |
    RUN apt-get update

python_install:
  requires:
    - base
  build: |
    RUN apt-get install -y python3

notebook:
  description: |
    Jupyter server
    with extensions
  requires: [python_install]
  build_directory: notebook
  build: |
    COPY jupyter_config.py /etc/jupyter/

empty:
`;

describe('parseManifest', () => {
    test('maps recipes to units in declaration order', () => {
        const manifest = parseManifest(MANIFEST, 'images.yml', '/work');
        assert.equal(manifest.root, '/work');
        assert.deepEqual(manifest.defaultTargets, ['notebook']);
        assert.deepEqual(
            manifest.units.map((unit) => unit.name),
            ['base', 'python_install', 'notebook', 'empty'],
        );
        assert.deepEqual(manifest.units[0], {
            name: 'base',
            baseReference: 'debian:bookworm',
            requires: [],
            buildDirectory: undefined,
            buildSteps: 'RUN apt-get update\n',
            description: undefined,
        });
        assert.deepEqual(manifest.units[2], {
            name: 'notebook',
            baseReference: undefined,
            requires: ['python_install'],
            buildDirectory: 'notebook',
            buildSteps: 'COPY jupyter_config.py /etc/jupyter/\n',
            description: 'Jupyter server\nwith extensions',
        });
        assert.deepEqual(manifest.units[3]?.requires, []);
        assert.equal(manifest.units[3]?.buildSteps, '');
    });

    test('a manifest without _ALL_ has no default targets', () => {
        const manifest = parseManifest('base:\n  FROM: alpine:3\n', 'm.yml', '/');
        assert.isUndefined(manifest.defaultTargets);
    });

    test('collects every problem into one error', () => {
        const text = [
            '_ALL_: [base, ghost]',
            'base:',
            '  FROM: alpine:3',
            'lib:',
            '  requries: [base]',
            'Upper:',
            '  build: RUN true',
            'app:',
            '  requires: [base, base]',
        ].join('\n');
        const error = catchError(() => parseManifest(text, 'm.yml', '/'), ManifestError);
        assert.equal(error.source, 'm.yml');
        assert.deepEqual(error.issues, [
            "lib: Unrecognized key(s) in object: 'requries'",
            'Upper: must be a lowercase image name component',
            'app.requires: lists a unit more than once',
            "_ALL_: unknown unit 'ghost'",
        ]);
    });

    test('rejects YAML that does not parse', () => {
        const error = catchError(
            () => parseManifest('base: [unclosed', 'm.yml', '/'),
            ManifestError,
        );
        assert.lengthOf(error.issues, 1);
    });

    test('rejects a unit defined twice', () => {
        const text = [
            'base:',
            '  FROM: alpine:3',
            'tools:',
            '  requires: [base]',
            'base:',
            '  FROM: debian:12',
        ].join('\n');
        const error = catchError(() => parseManifest(text, 'm.yml', '/'), ManifestError);
        assert.lengthOf(error.issues, 1);
        assert.match(error.issues[0] ?? '', /^Map keys must be unique/);
    });

    test('rejects a document that is not a mapping', () => {
        const error = catchError(
            () => parseManifest('- base\n- app\n', 'm.yml', '/'),
            ManifestError,
        );
        assert.deepEqual(error.issues, ['top level must be a mapping of unit names']);
    });
});

describe('loadManifest', () => {
    test('resolves build directories against the manifest location', async () => {
        const root = await makeTempDir();
        try {
            const file = path.join(root, 'imagesmith.yml');
            await fsPromises.writeFile(file, MANIFEST);
            const manifest = await loadManifest(file);
            assert.equal(manifest.root, root);
            assert.equal(manifest.source, file);
        } finally {
            await fsPromises.rm(root, { recursive: true, force: true });
        }
    });

    test('a missing file is a manifest error', async () => {
        const error = await catchAsyncError(
            loadManifest('/nonexistent/imagesmith.yml'),
            ManifestError,
        );
        assert.match(error.issues[0] ?? '', /^cannot read file: ENOENT/);
    });
});
