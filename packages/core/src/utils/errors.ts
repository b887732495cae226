/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * The inference endpoint could not be reached, or did not answer in time.
 */
export class ConnectionError extends Error {
  readonly endpoint: string;
  readonly code?: string;

  constructor(
    message: string,
    endpoint: string,
    options: { code?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
    this.code = options.code;
  }
}

/**
 * The endpoint answered, but not with what the API promises.
 */
export class ProtocolError extends Error {
  readonly endpoint: string;
  readonly status?: number;

  constructor(
    message: string,
    endpoint: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProtocolError';
    this.endpoint = endpoint;
    this.status = options.status;
  }
}

/**
 * The caller aborted an in-flight request.
 */
export class CancelledError extends Error {
  constructor(message = 'Request cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class NotFoundError extends Error {
  readonly sessionName: string;

  constructor(sessionName: string) {
    super(`Session '${sessionName}' not found`);
    this.name = 'NotFoundError';
    this.sessionName = sessionName;
  }
}

export class InvalidSessionNameError extends Error {
  constructor(readonly sessionName: string) {
    super(`Invalid session name '${sessionName}'`);
    this.name = 'InvalidSessionNameError';
  }
}

export class SessionFormatError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SessionFormatError';
    this.path = path;
  }
}

/**
 * Errors that end the process. The CLI entry point exits with `exitCode`.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'FatalError';
  }
}

export class FatalInputError extends FatalError {
  constructor(message: string) {
    super(message, 42);
    this.name = 'FatalInputError';
  }
}

export class FatalConfigError extends FatalError {
  constructor(message: string) {
    super(message, 52);
    this.name = 'FatalConfigError';
  }
}

export class FatalCancellationError extends FatalError {
  constructor(message: string) {
    super(message, 130);
    this.name = 'FatalCancellationError';
  }
}
