import { Chalk } from 'chalk';
import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { afterEach, assert, beforeEach, describe, test } from 'vitest';
import {
    createProgram,
    EXIT_BUILD_FAILED,
    EXIT_INVALID,
    EXIT_OK,
    runCli,
    type CliDependencies,
    type CliOptions,
} from '../lib/cli.js';
import type { ImagesmithConfig } from '../lib/config.js';
import { FakeBuilder, makeTempDir, writeFiles } from './helpers.js';

const MANIFEST = `
_ALL_: [notebook]
base:
  FROM: debian:12
  description: Base image
  build: RUN apt-get update
python_install:
  requires: [base]
  build: RUN apt-get install -y python3
notebook:
  requires: [python_install]
  build_directory: notebook
  build: |
    COPY jupyter_config.py /etc/jupyter/
`;

describe('imagesmith command', () => {
    let root: string;
    let lines: string[];
    let builder: FakeBuilder;
    let opened: number;
    let closed: number;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeFiles(root, {
            'imagesmith.yml': MANIFEST,
            'notebook/jupyter_config.py': 'c.port = 8888\n',
        });
        lines = [];
        builder = new FakeBuilder();
        opened = 0;
        closed = 0;
    });

    afterEach(async () => {
        await fsPromises.rm(root, { recursive: true, force: true });
    });

    function deps(): CliDependencies {
        return {
            write: (line) => lines.push(line),
            colors: new Chalk({ level: 0 }),
            openBuilder: async () => {
                opened++;
                return {
                    builder,
                    close: async () => {
                        closed++;
                    },
                };
            },
        };
    }

    function run(targets: string[], options: CliOptions = {}): Promise<number> {
        return runCli(
            targets,
            { file: path.join(root, 'imagesmith.yml'), ...options },
            deps(),
        );
    }

    test('--list prints every unit', async () => {
        assert.equal(await run([], { list: true }), EXIT_OK);
        assert.deepEqual(lines, [
            'base never built\n    Base image',
            'python_install <- base never built',
            'notebook <- python_install never built',
        ]);
        assert.equal(opened, 0);
    });

    test('--print-dockerfile prints the composed recipe', async () => {
        assert.equal(await run(['python_install'], { printDockerfile: true }), EXIT_OK);
        assert.deepEqual(lines, [
            '# ----- python_install -----',
            'FROM debian:12\n# base\nRUN apt-get update\n# python_install\nRUN apt-get install -y python3',
        ]);
    });

    test('--dry-run prints the plan without building', async () => {
        assert.equal(await run([], { dryRun: true }), EXIT_OK);
        assert.deepEqual(lines, [
            'build base (never built)',
            'build python_install (never built)',
            'build notebook (never built)',
        ]);
        assert.equal(opened, 0);
    });

    test('builds, records, and then has nothing left to do', async () => {
        assert.equal(await run([]), EXIT_OK);
        assert.deepEqual(builder.built(), ['base', 'python_install', 'notebook']);
        assert.equal(lines.at(-1), '3 built, 0 up to date, 0 failed, 0 skipped');
        assert.equal(opened, 1);
        assert.equal(closed, 1);
        assert.sameMembers(
            await fsPromises.readdir(path.join(root, '.imagesmith', 'records')),
            ['base.json', 'notebook.json', 'python_install.json'],
        );

        lines = [];
        assert.equal(await run([]), EXIT_OK);
        assert.equal(lines.at(-1), '0 built, 3 up to date, 0 failed, 0 skipped');
        assert.equal(opened, 1);
    });

    test('a failed build exits with 1', async () => {
        builder.failOn('python_install');
        assert.equal(await run([]), EXIT_BUILD_FAILED);
        assert.equal(lines.at(-1), '1 built, 0 up to date, 1 failed, 1 skipped');
        assert.equal(closed, 1);
    });

    test('invalid input exits with 2', async () => {
        assert.equal(await run(['jupyter']), EXIT_INVALID);
        assert.equal(await run([], { concurrency: '0' }), EXIT_INVALID);
        assert.equal(
            await runCli([], { file: path.join(root, 'missing.yml') }, deps()),
            EXIT_INVALID,
        );

        await writeFiles(root, {
            'imagesmith.yml': 'a:\n  requires: [b]\nb:\n  requires: [a]\n',
        });
        assert.equal(await run([]), EXIT_INVALID);

        await writeFiles(root, {
            'imagesmith.yml': 'tools:\n  build: RUN make install\n',
        });
        assert.equal(await run([]), EXIT_INVALID);
        assert.deepEqual(builder.built(), []);
    });

    test('--pull and --platform are passed to the builder', async () => {
        const seen: ImagesmithConfig[] = [];
        const program = createProgram({
            ...deps(),
            openBuilder: async (config) => {
                seen.push(config);
                return { builder, close: async () => {} };
            },
        }).exitOverride();
        try {
            await program.parseAsync([
                'node',
                'imagesmith',
                '-f',
                path.join(root, 'imagesmith.yml'),
                '--pull',
                '--platform',
                'linux/arm64',
                'base',
            ]);
            assert.equal(process.exitCode, EXIT_OK);
        } finally {
            process.exitCode = undefined;
        }
        assert.lengthOf(seen, 1);
        assert.isTrue(seen[0]?.pull);
        assert.equal(seen[0]?.platform, 'linux/arm64');
        assert.deepEqual(builder.built(), ['base']);
    });

    test('parses the command line', async () => {
        const program = createProgram(deps()).exitOverride();
        try {
            await program.parseAsync([
                'node',
                'imagesmith',
                '--dry-run',
                '-f',
                path.join(root, 'imagesmith.yml'),
                '--records',
                path.join(root, 'records'),
                'python_install',
            ]);
            assert.equal(process.exitCode, EXIT_OK);
        } finally {
            process.exitCode = undefined;
        }
        assert.deepEqual(lines, [
            'build base (never built)',
            'build python_install (never built)',
        ]);
    });
});
