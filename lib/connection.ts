import { promises as fsPromises } from 'node:fs';
import * as net from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';
import type { SecureContextOptions } from 'node:tls';
import { connect as tlsConnect } from 'node:tls';
import { Client } from 'ssh2';
import { Agent } from 'undici';
import { createLogger } from './logger.js';
import { getErrorMessage, isFileNotFoundError, parseDockerHost } from './util.js';

const log = createLogger('connection');

export type SocketFactory = () => net.Socket;

/**
 * undici Agent whose connections come from a socket factory, so that the
 * same pooled HTTP client works over unix sockets, TCP, TLS and SSH tunnels.
 */
export class SocketAgent extends Agent {
    constructor(createSocket: SocketFactory) {
        super({
            connect: (_options, callback) => {
                const socket = createSocket();
                socket.once('connect', () => callback(null, socket));
                socket.once('error', (err) => callback(err, null));
                return socket;
            },
        });
    }
}

/**
 * Read `ca.pem`, `cert.pem` and `key.pem` from a certificate directory.
 * Missing files are left out; any other read error is fatal.
 */
export async function loadTlsOptions(
    certPath: string,
): Promise<SecureContextOptions> {
    const read = async (file: string): Promise<Buffer | undefined> => {
        try {
            return await fsPromises.readFile(path.join(certPath, file));
        } catch (error) {
            if (isFileNotFoundError(error)) {
                return undefined;
            }
            throw new Error(
                `Failed to load TLS certificates from ${certPath}: ${getErrorMessage(error)}`,
            );
        }
    };
    const [ca, cert, key] = await Promise.all([
        read('ca.pem'),
        read('cert.pem'),
        read('key.pem'),
    ]);
    return { ca, cert, key };
}

export interface SshTarget {
    user: string;
    host: string;
    port: number;
    socketPath: string;
}

/**
 * Parse `ssh://[user@]host[:port][/path/to/docker.sock]`
 */
export function parseSshHost(sshHost: string): SshTarget {
    const address = sshHost.replace(/^ssh:\/\//, '');
    const at = address.indexOf('@');
    const user = at === -1 ? 'root' : address.slice(0, at);
    const hostPart = at === -1 ? address : address.slice(at + 1);

    const slash = hostPart.indexOf('/');
    const hostPort = slash === -1 ? hostPart : hostPart.slice(0, slash);
    const socketPath =
        slash === -1 ? '/var/run/docker.sock' : hostPart.slice(slash);

    const colon = hostPort.lastIndexOf(':');
    const host = colon === -1 ? hostPort : hostPort.slice(0, colon);
    const port =
        colon === -1 ? 22 : parseInt(hostPort.slice(colon + 1)) || 22;

    if (!host) {
        throw new Error(`Invalid SSH host: ${sshHost}`);
    }
    return { user, host, port, socketPath };
}

async function findPrivateKey(): Promise<Buffer | undefined> {
    for (const name of ['id_ed25519', 'id_ecdsa', 'id_rsa']) {
        try {
            return await fsPromises.readFile(
                path.join(os.homedir(), '.ssh', name),
            );
        } catch (error) {
            log.debug('ssh key not usable', {
                key: name,
                error: getErrorMessage(error),
            });
        }
    }
    return undefined;
}

/**
 * Socket factory tunnelling to the engine's unix socket through SSH
 */
export async function sshSocketFactory(
    sshHost: string,
): Promise<SocketFactory> {
    const target = parseSshHost(sshHost);
    const privateKey = await findPrivateKey();

    return () => {
        const conn = new Client();
        const socket = new net.Socket();

        conn.on('ready', () => {
            conn.openssh_forwardOutStreamLocal(
                target.socketPath,
                (err, stream) => {
                    if (err) {
                        conn.end();
                        socket.emit(
                            'error',
                            new Error(
                                `Failed to create SSH tunnel to ${target.socketPath}: ${err.message}`,
                            ),
                        );
                        return;
                    }
                    stream.pipe(socket);
                    socket.pipe(stream);
                    socket.on('close', () => conn.end());
                    socket.emit('connect');
                },
            );
        });

        conn.on('error', (err) => {
            socket.emit(
                'error',
                new Error(
                    `SSH connection failed to ${target.user}@${target.host}:${target.port}: ${err.message}`,
                ),
            );
        });

        conn.connect({
            host: target.host,
            port: target.port,
            username: target.user,
            privateKey,
        });

        return socket;
    };
}

/**
 * Build the agent for an engine address: `unix:`, `tcp:` (TLS when
 * certificates are given) or `ssh:`.
 */
export async function agentForHost(
    dockerHost: string,
    certificates?: string,
): Promise<SocketAgent> {
    if (dockerHost.startsWith('unix:')) {
        const socketPath = dockerHost.replace(/^unix:(\/\/)?/, '');
        return new SocketAgent(() => net.createConnection(socketPath));
    }
    if (dockerHost.startsWith('tcp:')) {
        const { host, port } = parseDockerHost(
            dockerHost,
            certificates ? 2376 : 2375,
        );
        if (certificates) {
            const tlsOptions = await loadTlsOptions(certificates);
            return new SocketAgent(() =>
                tlsConnect({ host, port, ...tlsOptions }),
            );
        }
        return new SocketAgent(() => net.createConnection({ host, port }));
    }
    if (dockerHost.startsWith('ssh:')) {
        return new SocketAgent(await sshSocketFactory(dockerHost));
    }
    throw new Error(
        `Unsupported Docker host format: ${dockerHost}. Must start with "unix:", "tcp:", or "ssh:"`,
    );
}
