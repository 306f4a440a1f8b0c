export type UlidErrorKind =
  | 'InvalidLength'
  | 'InvalidTimestamp'
  | 'InvalidRandomLength'
  // also a 10-character time block above 7ZZZZZZZZZ, which would not fit 48 bits
  | 'InvalidCharacter'
  | 'InvalidInput'
  | 'RandomOverflow';

/**
 * Raised synchronously by every codec and factory in this package.
 * `kind` identifies the failure; the message carries the detail.
 */
export class UlidError extends Error {
  readonly kind: UlidErrorKind;

  constructor(kind: UlidErrorKind, message: string) {
    super(message);
    this.name = 'UlidError';
    this.kind = kind;
  }
}

export function isUlidError(err: unknown, kind?: UlidErrorKind): err is UlidError {
  if (!(err instanceof UlidError)) return false;
  return kind === undefined || err.kind === kind;
}
