import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { afterEach, assert, beforeEach, describe, test } from 'vitest';
import {
    listContextFiles,
    mergeContextFiles,
    openContextFile,
} from '../lib/context.js';
import { UnreadableFileError } from '../lib/errors.js';
import { catchAsyncError, makeTempDir, writeFiles } from './helpers.js';

describe('build context files', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeFiles(root, {
            'base/etc/motd': 'base motd',
            'base/setup.sh': 'echo base',
            'app/setup.sh': 'echo app',
            'app/src/main.py': 'print(1)',
            'app/B.txt': 'upper',
        });
    });

    afterEach(async () => {
        await fsPromises.rm(root, { recursive: true, force: true });
    });

    test('lists files recursively with slash separated relative paths', async () => {
        const files = await listContextFiles(path.join(root, 'app'));
        assert.deepEqual(
            files.map((file) => file.relativePath),
            ['B.txt', 'setup.sh', 'src/main.py'],
        );
        assert.equal(files[2]?.absolutePath, path.join(root, 'app', 'src', 'main.py'));
    });

    test('follows links to files but not to directories', async () => {
        await fsPromises.symlink(
            path.join(root, 'base', 'setup.sh'),
            path.join(root, 'app', 'linked.sh'),
        );
        await fsPromises.symlink(path.join(root, 'base'), path.join(root, 'app', 'basedir'));
        const files = await listContextFiles(path.join(root, 'app'));
        assert.deepEqual(
            files.map((file) => file.relativePath),
            ['B.txt', 'linked.sh', 'setup.sh', 'src/main.py'],
        );
    });

    test('later directories win when merging', async () => {
        const files = await mergeContextFiles([
            path.join(root, 'base'),
            path.join(root, 'app'),
        ]);
        assert.deepEqual(
            files.map((file) => file.relativePath),
            ['B.txt', 'etc/motd', 'setup.sh', 'src/main.py'],
        );
        const setup = files.find((file) => file.relativePath === 'setup.sh');
        assert.equal(setup?.absolutePath, path.join(root, 'app', 'setup.sh'));
    });

    test('opened files report their size and stream their content', async () => {
        const content = 'x'.repeat(200_000);
        await writeFiles(root, { 'big/blob.bin': content });
        const [blob] = await listContextFiles(path.join(root, 'big'));
        assert.isDefined(blob);
        if (blob) {
            const { size, stream } = await openContextFile(blob);
            assert.equal(size, 200_000);
            const chunks: Buffer[] = await stream.toArray();
            assert.equal(Buffer.concat(chunks).toString(), content);
        }
    });

    test('a file that cannot be opened is unreadable', async () => {
        const gone = { relativePath: 'gone.txt', absolutePath: path.join(root, 'gone.txt') };
        const error = await catchAsyncError(openContextFile(gone), UnreadableFileError);
        assert.equal(error.path, gone.absolutePath);
    });

    test('a missing directory is unreadable', async () => {
        const missing = path.join(root, 'nope');
        const error = await catchAsyncError(listContextFiles(missing), UnreadableFileError);
        assert.equal(error.path, missing);
    });
});
