import { promises as fsPromises, type Dirent, type Stats } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { UnreadableFileError } from './errors.js';

export interface ContextFile {
    /** Path relative to the build directory, `/`-separated */
    relativePath: string;
    absolutePath: string;
}

function byRelativePath(a: ContextFile, b: ContextFile): number {
    if (a.relativePath < b.relativePath) return -1;
    if (a.relativePath > b.relativePath) return 1;
    return 0;
}

/**
 * List the regular files under a build directory, sorted by relative path.
 * Symbolic links to files are included; linked directories are not walked.
 * @throws UnreadableFileError if the directory or one of its entries cannot be read
 */
export async function listContextFiles(
    directory: string,
): Promise<ContextFile[]> {
    const files: ContextFile[] = [];

    const walk = async (current: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await fsPromises.readdir(current, { withFileTypes: true });
        } catch (error) {
            throw new UnreadableFileError(current, error);
        }
        for (const entry of entries) {
            const absolutePath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                await walk(absolutePath);
                continue;
            }
            if (entry.isSymbolicLink()) {
                let target: Stats;
                try {
                    target = await fsPromises.stat(absolutePath);
                } catch (error) {
                    throw new UnreadableFileError(absolutePath, error);
                }
                if (!target.isFile()) continue;
            } else if (!entry.isFile()) {
                continue;
            }
            files.push({
                relativePath: path
                    .relative(directory, absolutePath)
                    .split(path.sep)
                    .join('/'),
                absolutePath,
            });
        }
    };

    await walk(directory);
    return files.sort(byRelativePath);
}

/**
 * Merge the files of several build directories into one context. When two
 * directories hold the same relative path, the later directory wins.
 */
export async function mergeContextFiles(
    directories: readonly string[],
): Promise<ContextFile[]> {
    const merged = new Map<string, ContextFile>();
    for (const directory of directories) {
        for (const file of await listContextFiles(directory)) {
            merged.set(file.relativePath, file);
        }
    }
    return [...merged.values()].sort(byRelativePath);
}

export interface OpenedContextFile {
    size: number;
    stream: Readable;
}

/**
 * Open a context file for streaming. The size is taken from the opened
 * handle, so it describes the same file the stream reads.
 * @throws UnreadableFileError if the file cannot be opened
 */
export async function openContextFile(file: ContextFile): Promise<OpenedContextFile> {
    let handle: FileHandle | undefined;
    try {
        handle = await fsPromises.open(file.absolutePath, 'r');
        const { size } = await handle.stat();
        return { size, stream: handle.createReadStream() };
    } catch (error) {
        await handle?.close();
        throw new UnreadableFileError(file.absolutePath, error);
    }
}
