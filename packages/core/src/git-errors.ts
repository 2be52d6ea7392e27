/**
 * Git failure mapping
 */

import { GitCommandError } from '@shiplog/git';
import { ResolutionError, errorMessage, isShiplogError } from '@shiplog/utils';

/**
 * Wrap a failed repository read as a ResolutionError
 *
 * shiplog errors pass through unchanged; git's stderr is kept verbatim.
 */
export function toResolutionError(error: unknown, context: string): Error {
  if (isShiplogError(error)) {
    return error;
  }

  const detail = error instanceof GitCommandError
    ? error.stderr.trim() || error.message
    : errorMessage(error);

  return new ResolutionError(`${context}\n${detail}`, { cause: error });
}
