import { normalizeSuiAddress } from "@mysten/sui/utils";
import { MAX_THRESHOLD, MAX_WEIGHT } from "./constants";
import { encodeMultisigPublicKey } from "./encoding";
import { MultisigError, MultisigErrorKind } from "./errors";
import { hashToAddress } from "./hash";
import { assertKeyBytes } from "./keys";
import type { Address, MultisigAddressEvent, MultisigHostContext, MultisigSpec, PublicKeyBytes } from "./types";

/**
 * Checks the structural rules every derivation relies on. Key entries must be
 * byte values; key lengths and flags are not checked here.
 *
 * The weight sum is taken over plain numbers, so it never wraps; a threshold
 * above the true sum is always rejected.
 */
export function assertValidMultisigSpec({ pks, weights, threshold }: MultisigSpec): void {
  if (pks.length !== weights.length) {
    throw new MultisigError(
      MultisigErrorKind.LengthMismatch,
      `The number of public keys (${pks.length}) and weights (${weights.length}) must be the same.`,
    );
  }

  pks.forEach((pk, i) => assertKeyBytes(pk, i));

  weights.forEach((weight, i) => {
    if (!Number.isInteger(weight) || weight < 0 || weight > MAX_WEIGHT) {
      throw new MultisigError(
        MultisigErrorKind.InvalidWeight,
        `Weight at index ${i} must be an integer between 0 and ${MAX_WEIGHT}, got ${weight}`,
      );
    }
  });

  if (!Number.isInteger(threshold) || threshold > MAX_THRESHOLD) {
    throw new MultisigError(
      MultisigErrorKind.InvalidThreshold,
      `Threshold must be an integer between 1 and ${MAX_THRESHOLD}, got ${threshold}`,
    );
  }

  const totalWeight = weights.reduce((sum, weight) => sum + weight, 0);

  if (threshold <= 0 || threshold > totalWeight) {
    throw new MultisigError(
      MultisigErrorKind.InvalidThreshold,
      `Threshold ${threshold} must be positive and at most the total weight ${totalWeight}`,
    );
  }
}

/** Derives the multisig address without emitting anything. */
export function deriveMultisigAddressQuiet(
  pks: readonly PublicKeyBytes[],
  weights: readonly number[],
  threshold: number,
): Address {
  const spec = { pks, weights, threshold };
  assertValidMultisigSpec(spec);

  return hashToAddress(encodeMultisigPublicKey(spec));
}

/**
 * Derives the multisig address and emits one `MultisigAddressEvent` for it.
 * Nothing is emitted when validation fails.
 */
export function deriveMultisigAddress(
  pks: readonly PublicKeyBytes[],
  weights: readonly number[],
  threshold: number,
  context: Pick<MultisigHostContext, "emit">,
): Address {
  const multisigAddress = deriveMultisigAddressQuiet(pks, weights, threshold);

  const event: MultisigAddressEvent = Object.freeze({
    pks: Object.freeze(pks.map((pk) => Object.freeze(Array.from(pk)))),
    weights: Object.freeze(Array.from(weights)),
    threshold,
    multisigAddress,
  });
  context.emit(event);

  return multisigAddress;
}

export function checkMultisigAddressEq(
  pks: readonly PublicKeyBytes[],
  weights: readonly number[],
  threshold: number,
  expected: Address,
): boolean {
  return deriveMultisigAddressQuiet(pks, weights, threshold) === normalizeSuiAddress(expected);
}

/** Whether the invoking principal is the multisig account described by the keys. */
export function checkIfSenderIsMultisigAddress(
  pks: readonly PublicKeyBytes[],
  weights: readonly number[],
  threshold: number,
  context: Pick<MultisigHostContext, "sender">,
): boolean {
  return checkMultisigAddressEq(pks, weights, threshold, context.sender);
}
