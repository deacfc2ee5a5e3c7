import { promises as fsPromises } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { ReadableStream } from 'node:stream/web';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { agentForHost } from './connection.js';
import { APPLICATION_TAR, HTTPClient } from './http.js';
import { jsonMessages } from './json-stream.js';
import { createLogger } from './logger.js';
import type { BuildInfo } from './types/index.js';
import { getErrorMessage, isFileNotFoundError } from './util.js';

const log = createLogger('docker-client');

const DEFAULT_USER_AGENT = 'imagesmith';
const DEFAULT_SOCKET = 'unix:/var/run/docker.sock';

const contextMetaSchema = z.object({
    Name: z.string(),
    Endpoints: z
        .object({
            docker: z.object({ Host: z.string() }).partial().optional(),
        })
        .passthrough()
        .optional(),
});

const dockerConfigSchema = z
    .object({ currentContext: z.string().optional() })
    .passthrough();

// The engine reported an error in the build progress stream
export class ImageBuildError extends Error {
    constructor(
        message: string,
        public readonly code?: number,
    ) {
        super(message);
        this.name = 'ImageBuildError';
    }
}

export interface ImageBuildOptions {
    /** Path of the Dockerfile within the context */
    dockerfile?: string;
    /** `name:tag` to apply to the image */
    tag?: string;
    nocache?: boolean;
    /** Remove intermediate containers after a successful build */
    rm?: boolean;
    /** Always remove intermediate containers, even upon failure */
    forcerm?: boolean;
    pull?: boolean;
    /** Labels to set on the image */
    labels?: Record<string, string>;
    platform?: string;
    signal?: AbortSignal;
}

/**
 * Client for the parts of the Docker Engine API the orchestrator drives:
 * connectivity, image builds and image bookkeeping.
 */
export class DockerClient {
    private api: HTTPClient;

    constructor(dispatcher: Dispatcher, userAgent: string = DEFAULT_USER_AGENT) {
        this.api = new HTTPClient(dispatcher, userAgent);
    }

    /**
     * Create a DockerClient instance from a Docker host string
     * @param dockerHost e.g. "unix:/var/run/docker.sock", "tcp://localhost:2376" or "ssh://user@host[:port][/path/to/docker.sock]"
     * @param certificates Optional directory containing ca.pem, cert.pem and key.pem for TCP connections
     */
    static async fromDockerHost(
        dockerHost: string,
        certificates?: string,
        userAgent?: string,
    ): Promise<DockerClient> {
        try {
            return new DockerClient(
                await agentForHost(dockerHost, certificates),
                userAgent,
            );
        } catch (error) {
            throw new Error(
                `Failed to create Docker client for ${dockerHost}: ${getErrorMessage(error)}`,
                { cause: error },
            );
        }
    }

    /**
     * Create a DockerClient instance from a Docker context name
     * @param contextName Docker context to use, defaults to the DOCKER_CONTEXT environment variable
     */
    static async fromDockerContext(
        contextName?: string,
        userAgent?: string,
    ): Promise<DockerClient> {
        const targetContext = contextName || process.env.DOCKER_CONTEXT;
        if (!targetContext) {
            throw new Error(
                'No context name provided and DOCKER_CONTEXT environment variable is not set',
            );
        }

        const configDir = process.env.DOCKER_CONFIG || join(homedir(), '.docker');
        const contextsDir = join(configDir, 'contexts', 'meta');
        const tlsDir = join(configDir, 'contexts', 'tls');

        let contextDirs: string[];
        try {
            const entries = await fsPromises.readdir(contextsDir, {
                withFileTypes: true,
            });
            contextDirs = entries
                .filter((dirent) => dirent.isDirectory())
                .map((dirent) => dirent.name);
        } catch (error) {
            if (isFileNotFoundError(error)) {
                throw new Error(
                    `Docker contexts directory not found: ${contextsDir}`,
                );
            }
            throw error;
        }

        for (const contextDir of contextDirs) {
            const meta = await readContextMeta(
                join(contextsDir, contextDir, 'meta.json'),
            );
            if (meta?.Name !== targetContext) {
                continue;
            }
            const dockerHost = meta.Endpoints?.docker?.Host;
            if (!dockerHost) {
                throw new Error(
                    `Docker context '${targetContext}' found but has no valid Docker endpoint`,
                );
            }
            const tls = join(tlsDir, contextDir);
            const certificates = await fsPromises.access(tls).then(
                () => tls,
                () => undefined,
            );
            return DockerClient.fromDockerHost(dockerHost, certificates, userAgent);
        }

        throw new Error(`Docker context '${targetContext}' not found`);
    }

    /**
     * Connect the way the docker CLI would: DOCKER_HOST first, then the
     * current context of the Docker config, then the default socket.
     */
    static async fromDockerConfig(userAgent?: string): Promise<DockerClient> {
        if (process.env.DOCKER_HOST) {
            return DockerClient.fromDockerHost(
                process.env.DOCKER_HOST,
                process.env.DOCKER_CERT_PATH,
                userAgent,
            );
        }

        const configPath = join(
            process.env.DOCKER_CONFIG || join(homedir(), '.docker'),
            'config.json',
        );

        let content: string;
        try {
            content = await fsPromises.readFile(configPath, 'utf8');
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return DockerClient.fromDockerHost(DEFAULT_SOCKET, undefined, userAgent);
            }
            throw error;
        }

        let config: z.infer<typeof dockerConfigSchema>;
        try {
            config = dockerConfigSchema.parse(JSON.parse(content));
        } catch (error) {
            throw new Error(`Invalid Docker config file: ${configPath}`, {
                cause: error,
            });
        }

        if (config.currentContext && config.currentContext !== 'default') {
            return DockerClient.fromDockerContext(config.currentContext, userAgent);
        }
        return DockerClient.fromDockerHost(DEFAULT_SOCKET, undefined, userAgent);
    }

    public close(): Promise<void> {
        return this.api.close();
    }

    // --- System API

    /**
     * This is a dummy endpoint you can use to test if the server is accessible.
     * @returns the engine's API version
     */
    public async systemPing(): Promise<string> {
        const response = await this.api.head('/_ping');
        return response.headers.get('api-version') ?? '';
    }

    // --- Images API

    /**
     * Build an image from a tar archive with a `Dockerfile` in it.
     * The build is canceled if the connection is dropped, which happens when
     * `options.signal` aborts.
     *
     * @param buildContext tar archive of the build context
     * @param onProgress receives every progress message of the build
     * @returns the ID of the built image
     * @throws ImageBuildError if the engine reports a build error
     */
    public async imageBuild(
        buildContext: ReadableStream<Uint8Array>,
        options?: ImageBuildOptions,
        onProgress?: (event: BuildInfo) => void,
    ): Promise<string> {
        const response = await this.api.post(
            '/build',
            {
                dockerfile: options?.dockerfile,
                t: options?.tag,
                nocache: options?.nocache,
                rm: options?.rm,
                forcerm: options?.forcerm,
                pull: options?.pull,
                labels: options?.labels
                    ? JSON.stringify(options.labels)
                    : undefined,
                platform: options?.platform,
            },
            buildContext,
            {
                headers: { 'Content-Type': APPLICATION_TAR },
                signal: options?.signal,
            },
        );

        let imageID: string | undefined;
        for await (const event of jsonMessages<BuildInfo>(response)) {
            onProgress?.(event);
            if (event.error || event.errorDetail) {
                throw new ImageBuildError(
                    event.errorDetail?.message ?? event.error ?? 'unknown build error',
                    event.errorDetail?.code,
                );
            }
            if (event.aux?.ID) {
                imageID = event.aux.ID;
            }
        }

        if (!imageID) {
            throw new ImageBuildError('Build finished without reporting an image ID');
        }
        return imageID;
    }
}

async function readContextMeta(
    file: string,
): Promise<z.infer<typeof contextMetaSchema> | undefined> {
    try {
        const content = await fsPromises.readFile(file, 'utf8');
        return contextMetaSchema.parse(JSON.parse(content));
    } catch (error) {
        log.debug('skipping context metadata', {
            file,
            error: getErrorMessage(error),
        });
        return undefined;
    }
}
