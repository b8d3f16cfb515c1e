import type { ErrorInfo } from './types.js';

/**
 * Error taxonomy shared by the registry, resolver, discovery and dispatcher.
 *
 * Each error carries a `.code` for matching across the MCP boundary and a `_tag`
 * for `switch`-style narrowing inside the process.
 */
export type HubErrorCode =
  | 'NOT_FOUND'
  | 'UNSUPPORTED_SCHEME'
  | 'CONTENT_RESOLUTION_FAILED'
  | 'DISCOVERY_SOURCE_FAILED'
  | 'CONSTRUCTION_FAILED'
  | 'INVALID_ARGUMENTS'
  | 'STATE_FILE_INVALID';

export abstract class HubError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: HubErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export class NotFoundError extends HubError {
  readonly _tag = 'NotFoundError' as const;
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly resourceId: string, what = 'Resource') {
    super(`${what} not found: ${resourceId}`);
  }
}

export class UnsupportedSchemeError extends HubError {
  readonly _tag = 'UnsupportedSchemeError' as const;
  readonly code = 'UNSUPPORTED_SCHEME' as const;

  constructor(readonly url: string, detail?: string) {
    super(detail ? `Unsupported resource identifier '${url}': ${detail}` : `Unsupported scheme in '${url}'`);
  }
}

export class ContentResolutionError extends HubError {
  readonly _tag = 'ContentResolutionError' as const;
  readonly code = 'CONTENT_RESOLUTION_FAILED' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class DiscoverySourceError extends HubError {
  readonly _tag = 'DiscoverySourceError' as const;
  readonly code = 'DISCOVERY_SOURCE_FAILED' as const;

  constructor(readonly source: string, cause: unknown) {
    super(`Discovery source '${source}' failed: ${getErrorMessage(cause)}`, { cause });
  }
}

export class ConstructionError extends HubError {
  readonly _tag = 'ConstructionError' as const;
  readonly code = 'CONSTRUCTION_FAILED' as const;
}

export class InvalidArgumentsError extends HubError {
  readonly _tag = 'InvalidArgumentsError' as const;
  readonly code = 'INVALID_ARGUMENTS' as const;
}

export class StateFileError extends HubError {
  readonly _tag = 'StateFileError' as const;
  readonly code = 'STATE_FILE_INVALID' as const;

  constructor(readonly filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`State file ${filePath}: ${detail}`, options);
  }
}

export function isHubError(e: unknown): e is HubError {
  return e instanceof HubError;
}

export function getErrorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  return 'An unknown error occurred';
}

// Errors outside the taxonomy surface as INTERNAL
export function toErrorInfo(e: unknown): ErrorInfo {
  if (isHubError(e)) return e.toJSON();
  return { code: 'INTERNAL', message: getErrorMessage(e) };
}
