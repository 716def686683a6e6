export interface RemoteStats {
    path: string;
    size: number;
    isDirectory: boolean;
}

export type AuthOptions =
    | { method: 'password'; password: string }
    | { method: 'publickey'; privateKey: Buffer };

export interface ConnectOptions {
    host: string;
    port: number;
    username: string;
    auth: AuthOptions;
    readyTimeout?: number;
}

/**
 * An open remote file. `write` resolves with the number of bytes the server
 * accepted for this chunk.
 */
export interface RemoteFileWriter {
    write(chunk: Buffer): Promise<number>;
    close(): Promise<void>;
}

export interface TransferClient {
    connect(options: ConnectOptions): Promise<void>;
    close(): Promise<void>;
    /** Resolves `null` when nothing exists at `remotePath`. */
    stat(remotePath: string): Promise<RemoteStats | null>;
    mkdir(remotePath: string, mode: number): Promise<void>;
    openWrite(remotePath: string): Promise<RemoteFileWriter>;
    readonly authenticated: boolean;
    readonly closed: boolean;
}
