import SftpClient from 'ssh2-sftp-client';
import ssh2, { type SFTPWrapper } from 'ssh2';
import net from 'net';
import type { TransferClient, ConnectOptions, RemoteStats, RemoteFileWriter } from './TransferClient.js';
import { AuthError, ConnectionError, HandshakeError, withCause } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

type SftpConnectConfig = Parameters<SftpClient['connect']>[0];

// ssh2's own default
const DEFAULT_READY_TIMEOUT = 20000;

const logger = createLogger('sftp');

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
    return typeof value === 'object' && value !== null && key in value;
}

function isAuthFailure(err: unknown): boolean {
    if (hasProperty(err, 'level') && err.level === 'client-authentication') {
        return true;
    }
    return err instanceof Error && /authentication/i.test(err.message);
}

function isNoSuchFile(err: unknown): boolean {
    if (hasProperty(err, 'code') && (err.code === 'ENOENT' || err.code === 2)) {
        return true;
    }
    return err instanceof Error && /no such file/i.test(err.message);
}

/** Rejects keys ssh2 cannot use (wrong format, or encrypted) before any socket is opened. */
function checkPrivateKey(privateKey: Buffer): void {
    const parsed = ssh2.utils.parseKey(privateKey);
    if (parsed instanceof Error) {
        throw new AuthError(withCause('SSH key authentication failed', parsed), { cause: parsed });
    }
}

export function openSocket(host: string, port: number, timeout: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const sock = net.connect({ host, port });
        const fail = (err: Error) => {
            sock.destroy();
            reject(new ConnectionError(withCause(`Failed to connect to ${host}:${port}`, err), { cause: err }));
        };
        sock.setTimeout(timeout, () => fail(new Error(`timed out after ${timeout}ms`)));
        sock.once('error', fail);
        sock.once('connect', () => {
            sock.setTimeout(0);
            sock.off('error', fail);
            resolve(sock);
        });
    });
}

/**
 * Best effort. Node exposes no SO_SNDBUF/SO_RCVBUF knob for TCP sockets, so
 * bulk throughput is left to ssh2's channel window; we only disable Nagle.
 */
export function tuneSocket(sock: net.Socket): void {
    try {
        sock.setNoDelay(true);
        sock.setKeepAlive(true);
    } catch (err) {
        logger.debug(withCause('Socket tuning skipped', err));
    }
}

class SftpFileWriter implements RemoteFileWriter {
    private position = 0;

    constructor(private sftp: SFTPWrapper, private handle: Buffer) { }

    write(chunk: Buffer): Promise<number> {
        return new Promise((resolve, reject) => {
            this.sftp.write(this.handle, chunk, 0, chunk.length, this.position, err => {
                if (err) {
                    reject(err);
                    return;
                }
                this.position += chunk.length;
                resolve(chunk.length);
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.sftp.close(this.handle, err => (err ? reject(err) : resolve()));
        });
    }
}

export class SftpClientAdapter implements TransferClient {
    private client: SftpClient;
    private sftp: SFTPWrapper | null = null;
    private _closed: boolean = true;

    constructor() {
        this.client = new SftpClient();
    }

    async connect(options: ConnectOptions): Promise<void> {
        const readyTimeout = options.readyTimeout ?? DEFAULT_READY_TIMEOUT;
        if (options.auth.method === 'publickey') {
            checkPrivateKey(options.auth.privateKey);
        }

        logger.debug(`Connecting to ${options.host}:${options.port}`);
        const sock = await openSocket(options.host, options.port, readyTimeout);
        tuneSocket(sock);

        const connectConfig: SftpConnectConfig = {
            sock,
            host: options.host,
            port: options.port,
            username: options.username,
            readyTimeout,
            retries: 0,
        };

        // Only one credential is ever handed to ssh2, so it cannot fall back to the other.
        if (options.auth.method === 'password') {
            connectConfig.password = options.auth.password;
        } else {
            connectConfig.privateKey = options.auth.privateKey;
        }

        logger.debug(`Performing SSH handshake with ${options.host} (${options.auth.method} auth)`);
        try {
            this.sftp = await this.client.connect(connectConfig);
        } catch (err) {
            sock.destroy();
            if (isAuthFailure(err)) {
                throw new AuthError(withCause(`${options.auth.method === 'password' ? 'Password' : 'SSH key'} authentication failed`, err), { cause: err });
            }
            throw new HandshakeError(withCause('SSH handshake failed', err), { cause: err });
        }
        this._closed = false;
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this.sftp = null;
        await this.client.end();
    }

    async stat(remotePath: string): Promise<RemoteStats | null> {
        try {
            const stats = await this.client.stat(remotePath);
            return {
                path: remotePath,
                size: stats.size,
                isDirectory: stats.isDirectory
            };
        } catch (err) {
            if (isNoSuchFile(err)) {
                return null;
            }
            throw err;
        }
    }

    async mkdir(remotePath: string, mode: number): Promise<void> {
        const sftp = this.requireSftp();
        return new Promise((resolve, reject) => {
            sftp.mkdir(remotePath, { mode }, err => (err ? reject(err) : resolve()));
        });
    }

    async openWrite(remotePath: string): Promise<RemoteFileWriter> {
        const sftp = this.requireSftp();
        return new Promise((resolve, reject) => {
            sftp.open(remotePath, 'w', (err, handle) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(new SftpFileWriter(sftp, handle));
            });
        });
    }

    get authenticated(): boolean {
        return this.sftp !== null;
    }

    get closed(): boolean {
        return this._closed;
    }

    private requireSftp(): SFTPWrapper {
        if (!this.sftp) {
            throw new Error('SFTP session is not open');
        }
        return this.sftp;
    }
}
