import { Readable } from 'node:stream';
import { pack as createTarPack, type Pack } from 'tar-stream';
import type { BuildRequest, ImageBuilder, ImageHandle } from './builder.js';
import {
    mergeContextFiles,
    openContextFile,
    type ContextFile,
} from './context.js';
import type { DockerClient } from './docker-client.js';
import { BuildError, UnreadableFileError } from './errors.js';
import { createLogger } from './logger.js';
import { getErrorMessage } from './util.js';

const log = createLogger('docker-builder');

/** Where the composed Dockerfile is placed inside the build context */
export const DOCKERFILE_PATH = '.imagesmith/Dockerfile';

export const UNIT_LABEL = 'imagesmith.unit';

export type ImageBuildApi = Pick<DockerClient, 'imageBuild'>;

function addEntry(pack: Pack, name: string, content: string): Promise<void> {
    return new Promise((resolve, reject) => {
        pack.entry({ name, mode: 0o644 }, content, (err) => {
            if (err) reject(err);
            else resolve();
        });
    });
}

async function addFileEntry(pack: Pack, file: ContextFile): Promise<void> {
    const { size, stream } = await openContextFile(file);
    return new Promise((resolve, reject) => {
        const entry = pack.entry(
            { name: file.relativePath, size, mode: 0o644 },
            (err) => {
                if (err) reject(err);
                else resolve();
            },
        );
        stream.on('error', (error) => {
            entry.destroy(error);
            reject(new UnreadableFileError(file.absolutePath, error));
        });
        stream.pipe(entry);
    });
}

async function fillContext(
    pack: Pack,
    files: readonly ContextFile[],
    dockerfile: string,
): Promise<void> {
    for (const file of files) {
        if (file.relativePath === DOCKERFILE_PATH) continue;
        await addFileEntry(pack, file);
    }
    await addEntry(pack, DOCKERFILE_PATH, dockerfile);
    pack.finalize();
}

/**
 * ImageBuilder backed by the Docker Engine API. The build directories of the
 * request are merged into one tar context, streamed to the engine while it
 * is being packed, next to the composed Dockerfile.
 */
export class DockerImageBuilder implements ImageBuilder {
    constructor(
        private readonly client: ImageBuildApi,
        private readonly options: { pull?: boolean; platform?: string } = {},
    ) {}

    public async build(
        request: BuildRequest,
        signal: AbortSignal,
    ): Promise<ImageHandle> {
        const unitLog = log.child({ unit: request.unit });
        try {
            const files = await mergeContextFiles(request.contextDirectories);
            unitLog.debug('packing build context', { files: files.length });

            const pack = createTarPack();
            const filling = fillContext(pack, files, request.dockerfile).catch(
                (error: unknown) => {
                    pack.destroy(error instanceof Error ? error : undefined);
                    throw error;
                },
            );

            const building = this.client
                .imageBuild(
                    Readable.toWeb(pack),
                    {
                        dockerfile: DOCKERFILE_PATH,
                        tag: request.image,
                        nocache: request.noCache,
                        rm: true,
                        forcerm: true,
                        pull: this.options.pull,
                        platform: this.options.platform,
                        labels: { [UNIT_LABEL]: request.unit },
                        signal,
                    },
                    (event) => {
                        const line = event.stream?.trimEnd();
                        if (line) {
                            unitLog.debug(line);
                        } else if (event.status) {
                            unitLog.debug(event.status, { progress: event.progress });
                        }
                    },
                )
                .catch((error: unknown) => {
                    pack.destroy();
                    throw error;
                });

            const [id] = await Promise.all([building, filling]);
            unitLog.info('image built', { image: request.image, id });
            return { id, image: request.image };
        } catch (error) {
            if (error instanceof BuildError) {
                throw error;
            }
            throw new BuildError(
                request.unit,
                getErrorMessage(error) ?? 'unknown error',
                error,
            );
        }
    }
}
