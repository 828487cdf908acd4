// Error taxonomy shared by tree construction and query resolution.
export type OscQueryErrorCode =
  | 'INVALID_PATH'
  | 'PATH_CONFLICT'
  | 'NOT_FOUND'
  | 'UNKNOWN_ATTRIBUTE'
  | 'TREE_PUBLISHED'
  | 'INVALID_HOST_INFO'
  | 'INVALID_UNIT';

export class OscQueryError extends Error {
  readonly code: OscQueryErrorCode;
  readonly status: number;

  constructor(code: OscQueryErrorCode, message: string, status = 500) {
    super(message);
    this.name = 'OscQueryError';
    this.code = code;
    this.status = status;
  }
}

export class InvalidPathError extends OscQueryError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('INVALID_PATH', `Invalid OSC path "${path}": ${reason}`, 400);
    this.name = 'InvalidPathError';
    this.path = path;
  }
}

export class PathConflictError extends OscQueryError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('PATH_CONFLICT', `Cannot insert "${path}": ${reason}`, 409);
    this.name = 'PathConflictError';
    this.path = path;
  }
}

export class NotFoundError extends OscQueryError {
  readonly path: string;

  constructor(path: string) {
    super('NOT_FOUND', `No node at "${path}"`, 404);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export class UnknownAttributeError extends OscQueryError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('UNKNOWN_ATTRIBUTE', `Unknown attribute "${attribute}"`, 400);
    this.name = 'UnknownAttributeError';
    this.attribute = attribute;
  }
}

export class TreePublishedError extends OscQueryError {
  constructor() {
    super('TREE_PUBLISHED', 'The address tree has been published and can no longer change');
    this.name = 'TreePublishedError';
  }
}

export class InvalidHostInfoError extends OscQueryError {
  constructor(message: string) {
    super('INVALID_HOST_INFO', `Invalid host info: ${message}`);
    this.name = 'InvalidHostInfoError';
  }
}

export class InvalidUnitError extends OscQueryError {
  constructor(unit: string) {
    super('INVALID_UNIT', `Unknown OSCQuery unit "${unit}"`);
    this.name = 'InvalidUnitError';
  }
}

export function isOscQueryError(error: unknown): error is OscQueryError {
  return error instanceof OscQueryError;
}
