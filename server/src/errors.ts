/**
 * Error taxonomy shared by the engine, the router and the file formats.
 */

export type LightControlErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_ID'
  | 'UNKNOWN_PARAMETER'
  | 'PARSE_ERROR'
  | 'SCHEMA_ERROR'
  | 'TYPE_MISMATCH'
  | 'QUEUE_OVERFLOW'
  | 'ACTIVE_SCENE';

export class LightControlError extends Error {
  public readonly code: LightControlErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: LightControlErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LightControlError';
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends LightControlError {
  constructor(kind: 'scene' | 'effect' | 'segment' | 'palette', id: string) {
    super('NOT_FOUND', `${kind} "${id}" not found`, { kind, id });
    this.name = 'NotFoundError';
  }
}

export class DuplicateIdError extends LightControlError {
  constructor(kind: 'scene' | 'effect' | 'segment', id: string) {
    super('DUPLICATE_ID', `${kind} "${id}" already exists`, { kind, id });
    this.name = 'DuplicateIdError';
  }
}

export class UnknownParameterError extends LightControlError {
  constructor(target: string, parameter: string) {
    super('UNKNOWN_PARAMETER', `Unknown ${target} parameter "${parameter}"`, { target, parameter });
    this.name = 'UnknownParameterError';
  }
}

export class ParseError extends LightControlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, details);
    this.name = 'ParseError';
  }
}

export class SchemaError extends LightControlError {
  /** JSON path of the offending value, e.g. `effects[0].segments[2].length` */
  public readonly path: string;

  constructor(path: string, message: string) {
    super('SCHEMA_ERROR', path ? `${path}: ${message}` : message, { path });
    this.name = 'SchemaError';
    this.path = path;
  }
}

export class TypeMismatchError extends LightControlError {
  constructor(parameter: string, expected: string, received: string) {
    super('TYPE_MISMATCH', `"${parameter}" expects (${expected}), got (${received})`, {
      parameter,
      expected,
      received,
    });
    this.name = 'TypeMismatchError';
  }
}

export class QueueOverflowError extends LightControlError {
  constructor(label: string, dropped: number) {
    super('QUEUE_OVERFLOW', `Command queue full, dropped "${label}" (${dropped} dropped so far)`, {
      label,
      dropped,
    });
    this.name = 'QueueOverflowError';
  }
}

export class ActiveSceneError extends LightControlError {
  constructor(id: string) {
    super('ACTIVE_SCENE', `Scene "${id}" is active and cannot be removed`, { id });
    this.name = 'ActiveSceneError';
  }
}

/** Coerce anything thrown into an Error instance */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
