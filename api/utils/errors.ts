export type TransferErrorCode =
  | 'PATH_ERROR'
  | 'CONNECTION_ERROR'
  | 'HANDSHAKE_ERROR'
  | 'AUTH_ERROR'
  | 'REMOTE_DIR_ERROR'
  | 'LOCAL_IO_ERROR'
  | 'REMOTE_IO_ERROR'
  | 'UNEXPECTED_ERROR';

export interface TransferErrorOptions {
  destination?: string;
  cause?: unknown;
}

/**
 * Base class for everything the transfer engine throws. `destination` is
 * filled in by the orchestrator once the failing target is known.
 */
export class TransferError extends Error {
  public readonly code: TransferErrorCode;
  public destination?: string;

  constructor(message: string, code: TransferErrorCode = 'UNEXPECTED_ERROR', options: TransferErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransferError';
    this.code = code;
    this.destination = options.destination;
  }
}

export class PathError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'PATH_ERROR', options);
    this.name = 'PathError';
  }
}

export class ConnectionError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'CONNECTION_ERROR', options);
    this.name = 'ConnectionError';
  }
}

export class HandshakeError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'HANDSHAKE_ERROR', options);
    this.name = 'HandshakeError';
  }
}

export class AuthError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'AUTH_ERROR', options);
    this.name = 'AuthError';
  }
}

export class RemoteDirError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'REMOTE_DIR_ERROR', options);
    this.name = 'RemoteDirError';
  }
}

export class LocalIOError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 'LOCAL_IO_ERROR', options);
    this.name = 'LocalIOError';
  }
}

export class RemoteIOError extends TransferError {
  public readonly remotePath: string;

  constructor(message: string, remotePath: string, options?: TransferErrorOptions) {
    super(message, 'REMOTE_IO_ERROR', options);
    this.name = 'RemoteIOError';
    this.remotePath = remotePath;
  }
}

/** Raised outside the engine, for unreadable or invalid configuration. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Appends the underlying cause to a step description, e.g.
 * `Failed to open local file: ENOENT: no such file or directory`.
 */
export function withCause(step: string, cause: unknown): string {
  return `${step}: ${errorMessage(cause)}`;
}

export function toTransferError(error: unknown, destination?: string): TransferError {
  if (isTransferError(error)) {
    if (destination && !error.destination) {
      error.destination = destination;
    }
    return error;
  }
  return new TransferError(withCause('Transfer task crashed', error), 'UNEXPECTED_ERROR', {
    destination,
    cause: error,
  });
}
