export type Credential =
  | { type: 'password'; password: string }
  | { type: 'privateKey' };

export interface Destination {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly remotePath: string;
  readonly credential: Credential;
}

/**
 * One file to move. `relativePath` always uses POSIX separators.
 */
export interface TransferTask {
  localPath: string;
  relativePath: string;
  remotePath: string;
}

export interface TransferStats {
  readonly bytesTransferred: number;
  readonly durationSecs: number;
}

export type TransferSummary =
  | { kind: 'file'; fileName: string }
  | { kind: 'directory'; fileCount: number };

export interface TransferObserver {
  onFileStart?(destination: string, task: TransferTask, index: number, total: number): void;
  onFileComplete?(destination: string, task: TransferTask, bytes: number): void;
  onComplete?(destination: string, summary: TransferSummary): void;
  /** After the session is closed, successful destinations only. */
  onDestinationComplete?(destination: string, stats: TransferStats): void;
}

/** On-disk shape of a destination, as written by the setup wizard. */
export interface DestinationRecord {
  name: string;
  host: string;
  port: number;
  username: string;
  remote_path: string;
  password?: string;
}

export interface AppConfig {
  ssh_key_path: string;
  destinations: DestinationRecord[];
}
