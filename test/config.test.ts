import * as path from 'node:path';
import { assert, describe, test } from 'vitest';
import { resolveConfig } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import { catchError } from './helpers.js';

describe('resolveConfig', () => {
    test('falls back to defaults', () => {
        const config = resolveConfig({}, {});
        const manifest = path.resolve('imagesmith.yml');
        assert.deepEqual(config, {
            manifest,
            records: path.join(path.dirname(manifest), '.imagesmith', 'records'),
            concurrency: 2,
            timeoutMs: undefined,
            repository: undefined,
            tag: 'latest',
            noCache: false,
            pull: false,
            platform: undefined,
            force: false,
            dockerHost: undefined,
            logLevel: 'info',
            logJson: false,
        });
    });

    test('reads the environment', () => {
        const config = resolveConfig(
            {},
            {
                IMAGESMITH_MANIFEST: '/srv/images/stack.yml',
                IMAGESMITH_RECORDS: '/var/cache/records',
                IMAGESMITH_CONCURRENCY: '4',
                IMAGESMITH_TIMEOUT: '1.5',
                IMAGESMITH_REPOSITORY: 'registry.example.com:5000/team',
                IMAGESMITH_TAG: 'v1.2',
                IMAGESMITH_PULL: '1',
                IMAGESMITH_PLATFORM: 'linux/arm64',
                IMAGESMITH_LOG_LEVEL: 'DEBUG',
                IMAGESMITH_LOG_JSON: '1',
                DOCKER_HOST: 'tcp://127.0.0.1:2375',
            },
        );
        assert.equal(config.manifest, path.resolve('/srv/images/stack.yml'));
        assert.equal(config.records, path.resolve('/var/cache/records'));
        assert.equal(config.concurrency, 4);
        assert.equal(config.timeoutMs, 1500);
        assert.equal(config.repository, 'registry.example.com:5000/team');
        assert.equal(config.tag, 'v1.2');
        assert.isTrue(config.pull);
        assert.equal(config.platform, 'linux/arm64');
        assert.equal(config.logLevel, 'debug');
        assert.isTrue(config.logJson);
        assert.equal(config.dockerHost, 'tcp://127.0.0.1:2375');
    });

    test('options take precedence over the environment', () => {
        const config = resolveConfig(
            {
                concurrency: '3',
                tag: 'dev',
                cache: false,
                force: true,
                host: 'unix:/tmp/d.sock',
                platform: 'linux/amd64',
            },
            {
                IMAGESMITH_CONCURRENCY: '8',
                IMAGESMITH_TAG: 'prod',
                IMAGESMITH_PLATFORM: 'linux/arm/v7',
                DOCKER_HOST: 'tcp://remote:2375',
            },
        );
        assert.equal(config.platform, 'linux/amd64');
        assert.equal(config.concurrency, 3);
        assert.equal(config.tag, 'dev');
        assert.isTrue(config.noCache);
        assert.isTrue(config.force);
        assert.equal(config.dockerHost, 'unix:/tmp/d.sock');
    });

    test('blank values count as unset', () => {
        const config = resolveConfig({}, { IMAGESMITH_REPOSITORY: '', IMAGESMITH_TIMEOUT: ' ' });
        assert.isUndefined(config.repository);
        assert.isUndefined(config.timeoutMs);
    });

    test('a sub-millisecond timeout still leaves a deadline', () => {
        assert.equal(resolveConfig({ timeout: '0.0001' }, {}).timeoutMs, 1);
        assert.equal(resolveConfig({ timeout: '0.0025' }, {}).timeoutMs, 3);
    });

    test('rejects a malformed platform', () => {
        const error = catchError(
            () => resolveConfig({ platform: 'arm64' }, {}),
            ConfigError,
        );
        assert.deepEqual(error.issues, ['platform: must look like os/arch[/variant]']);
    });

    test('reports every invalid setting', () => {
        const error = catchError(
            () => resolveConfig({ concurrency: '0', tag: 'bad tag!' }, {}),
            ConfigError,
        );
        assert.deepEqual(error.issues, [
            'concurrency: must be at least 1',
            'tag: must be a valid image tag',
        ]);
    });

    test('rejects an unknown log level', () => {
        const error = catchError(
            () => resolveConfig({ logLevel: 'loud' }, {}),
            ConfigError,
        );
        assert.lengthOf(error.issues, 1);
        assert.match(error.issues[0] ?? '', /^logLevel: /);
    });
});
