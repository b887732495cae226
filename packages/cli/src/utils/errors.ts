/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  CancelledError,
  ConnectionError,
  FatalCancellationError,
  FatalConfigError,
  FatalError,
  FatalInputError,
  InvalidSessionNameError,
  NotFoundError,
  ProtocolError,
  SessionFormatError,
  getErrorMessage,
} from '@ask-cli/core';

/**
 * One or two lines describing a failed request or session operation,
 * with a hint where the user can do something about it.
 */
export function describeError(error: unknown): string {
  if (error instanceof ConnectionError) {
    const hint =
      error.code === 'ETIMEDOUT'
        ? ''
        : '\nTip: Is Ollama running? Try: ollama serve';
    return `Error: ${error.message}${hint}`;
  }
  if (error instanceof ProtocolError) {
    const hint =
      error.status === 404 ? '\nTip: Pull the model with: ollama pull <model>' : '';
    return `Error: ${error.message}${hint}`;
  }
  if (error instanceof CancelledError) {
    return '(interrupted)';
  }
  return `Error: ${getErrorMessage(error)}`;
}

/**
 * Maps a library error to the fatal error the one-shot front-ends exit
 * with. Errors that are already fatal pass through.
 */
export function toFatalError(error: unknown): FatalError {
  if (error instanceof FatalError) {
    return error;
  }
  if (error instanceof CancelledError) {
    return new FatalCancellationError(describeError(error));
  }
  if (error instanceof SessionFormatError) {
    return new FatalConfigError(`Error: ${error.message}`);
  }
  if (error instanceof NotFoundError || error instanceof InvalidSessionNameError) {
    return new FatalInputError(`Error: ${error.message}`);
  }
  return new FatalError(describeError(error), 1);
}
