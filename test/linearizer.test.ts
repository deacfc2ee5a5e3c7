import * as path from 'node:path';
import { assert, describe, test } from 'vitest';
import { MissingBaseError } from '../lib/errors.js';
import { buildGraph } from '../lib/graph.js';
import {
    composeDockerfile,
    contextDirectories,
    linearize,
} from '../lib/linearizer.js';
import { UnitRegistry } from '../lib/registry.js';
import { catchError, unit } from './helpers.js';

const registry = UnitRegistry.from([
    unit('base', {
        baseReference: 'debian:12',
        buildSteps: 'RUN apt-get update\n',
    }),
    unit('python_install', {
        requires: ['base'],
        buildSteps: 'RUN apt-get install -y python3\n\n',
        buildDirectory: 'python',
    }),
    unit('tools', { requires: ['base'], buildSteps: 'RUN echo tools' }),
    unit('notebook', {
        requires: ['python_install', 'tools'],
        buildDirectory: 'notebook',
        buildSteps: 'COPY config.py /etc/jupyter/',
    }),
    unit('empty', { requires: ['base'] }),
]);
const graph = buildGraph(registry);

describe('linearize', () => {
    test('a unit without requirements is its own plan', () => {
        assert.deepEqual(linearize(graph, registry, 'base'), {
            unit: 'base',
            entries: ['base'],
            baseReference: 'debian:12',
        });
    });

    test('ancestors come first and shared ones appear once', () => {
        const plan = linearize(graph, registry, 'notebook');
        assert.deepEqual(plan.entries, [
            'base',
            'python_install',
            'tools',
            'notebook',
        ]);
        assert.equal(plan.baseReference, 'debian:12');
    });

    test('a chain without any base is rejected before linearizing', () => {
        const local = UnitRegistry.from([
            unit('a', { buildSteps: 'RUN true\n' }),
            unit('b', { requires: ['a'] }),
        ]);
        const error = catchError(() => buildGraph(local), MissingBaseError);
        assert.equal(error.unit, 'a');
    });
});

describe('composeDockerfile', () => {
    test('inherited steps precede the unit, each under a marker', () => {
        const dockerfile = composeDockerfile(
            registry,
            linearize(graph, registry, 'notebook'),
        );
        assert.equal(
            dockerfile,
            [
                'FROM debian:12',
                '# base',
                'RUN apt-get update',
                '# python_install',
                'RUN apt-get install -y python3',
                '# tools',
                'RUN echo tools',
                '# notebook',
                'COPY config.py /etc/jupyter/',
                '',
            ].join('\n'),
        );
    });

    test('an entry without steps contributes only its marker', () => {
        const dockerfile = composeDockerfile(
            registry,
            linearize(graph, registry, 'empty'),
        );
        assert.equal(
            dockerfile,
            'FROM debian:12\n# base\nRUN apt-get update\n# empty\n',
        );
    });
});

describe('contextDirectories', () => {
    test('resolves build directories in plan order', () => {
        const root = path.resolve('/work/images');
        assert.deepEqual(
            contextDirectories(
                registry,
                linearize(graph, registry, 'notebook'),
                root,
            ),
            [path.join(root, 'python'), path.join(root, 'notebook')],
        );
    });
});
