/**
 * Error hierarchy shared by every FlatGraph component.
 *
 * Missing identifiers are not errors: lookups return `undefined` or an empty
 * sequence instead.
 */

export type FlatGraphErrorCode =
  | 'ERR_CONFIG'
  | 'ERR_REFERENTIAL_INTEGRITY'
  | 'ERR_STRUCTURE'
  | 'ERR_VALIDATION';

export class FlatGraphError extends Error {
  readonly code: FlatGraphErrorCode;

  constructor(code: FlatGraphErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Type registration conflicts and use of an unfinalized schema. */
export class ConfigError extends FlatGraphError {
  constructor(message: string) {
    super('ERR_CONFIG', message);
  }
}

/** An edge write names a pid that does not resolve to an existing row. */
export class ReferentialIntegrityError extends FlatGraphError {
  readonly missing: readonly string[];

  constructor(missing: readonly string[], message?: string) {
    super(
      'ERR_REFERENTIAL_INTEGRITY',
      message ?? `Unresolved pid(s) referenced by edge: ${missing.join(', ')}`,
    );
    this.missing = [...missing];
  }
}

/** The decomposition of a composite object cannot terminate. */
export class StructuralError extends FlatGraphError {
  constructor(message: string) {
    super('ERR_STRUCTURE', message);
  }
}

export class ValidationError extends FlatGraphError {
  constructor(message: string) {
    super('ERR_VALIDATION', message);
  }
}
