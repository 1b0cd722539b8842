export type ConfigErrorCode = 'MISSING_SOURCE' | 'MISSING_KEY' | 'INVALID_CONFIG';
export type CipherErrorCode = 'INVALID_KEY' | 'INVALID_TOKEN' | 'INVALID_UTF8';
export type IoErrorCode = 'READ_FAILED';
export type RequestErrorCode = 'NETWORK' | 'HTTP_STATUS' | 'MALFORMED_RESPONSE';

export type ScriptdocErrorCode = ConfigErrorCode | CipherErrorCode | IoErrorCode | RequestErrorCode;

/**
 * Base class for every classified failure
 */
export abstract class ScriptdocError extends Error {
  abstract readonly code: ScriptdocErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Whether running the same operation again could succeed
   */
  get retryable(): boolean {
    return false;
  }
}

export class ConfigError extends ScriptdocError {
  readonly code: ConfigErrorCode;
  readonly key?: string;
  readonly searched: string[];

  constructor(
    code: ConfigErrorCode,
    message: string,
    extra: { key?: string; searched?: string[]; cause?: unknown } = {}
  ) {
    super(message, { cause: extra.cause });
    this.code = code;
    this.key = extra.key;
    this.searched = extra.searched ?? [];
  }

  static missingSource(searched: string[]): ConfigError {
    const list = searched.map((p) => `\n  - ${p}`).join('');
    return new ConfigError('MISSING_SOURCE', `Could not find a .env file. Searched:${list}`, {
      searched,
    });
  }

  static missingKey(key: string): ConfigError {
    return new ConfigError('MISSING_KEY', `Missing required entry ${key}`, { key });
  }

  static invalid(message: string, cause?: unknown): ConfigError {
    return new ConfigError('INVALID_CONFIG', message, { cause });
  }
}

export class CipherError extends ScriptdocError {
  readonly code: CipherErrorCode;

  constructor(code: CipherErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class IoError extends ScriptdocError {
  readonly code: IoErrorCode = 'READ_FAILED';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error && 'code' in cause ? String(cause.code) : undefined;
    super(`Failed to read ${path}${reason ? ` (${reason})` : ''}`, { cause });
    this.path = path;
  }
}

export class RequestError extends ScriptdocError {
  readonly code: RequestErrorCode;
  readonly status?: number;
  readonly detail?: string;

  private constructor(
    code: RequestErrorCode,
    message: string,
    extra: { status?: number; detail?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: extra.cause });
    this.code = code;
    this.status = extra.status;
    this.detail = extra.detail;
  }

  override get retryable(): boolean {
    return this.code === 'NETWORK';
  }

  static network(message: string, cause?: unknown): RequestError {
    return new RequestError('NETWORK', message, { cause });
  }

  static httpStatus(status: number, detail?: string): RequestError {
    return new RequestError('HTTP_STATUS', `Completion service returned HTTP ${status}`, {
      status,
      detail,
    });
  }

  static malformedResponse(message: string, cause?: unknown): RequestError {
    return new RequestError('MALFORMED_RESPONSE', message, { cause });
  }
}

export function isScriptdocError(error: unknown): error is ScriptdocError {
  return error instanceof ScriptdocError;
}
