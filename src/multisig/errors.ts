export enum MultisigErrorKind {
  LengthMismatch = "LengthMismatch",
  InvalidThreshold = "InvalidThreshold",
  InvalidWeight = "InvalidWeight",
  InvalidKeyBytes = "InvalidKeyBytes",
  InvalidKeyLength = "InvalidKeyLength",
  InvalidKeyFlag = "InvalidKeyFlag",
  TooManyKeys = "TooManyKeys",
  NoPermutationMatches = "NoPermutationMatches",
}

/**
 * Raised by every derivation, validation and resolution failure.
 * Callers branch on `kind` rather than on the message text.
 */
export class MultisigError extends Error {
  readonly kind: MultisigErrorKind;

  constructor(kind: MultisigErrorKind, message: string) {
    super(message);
    this.name = "MultisigError";
    this.kind = kind;
  }
}
