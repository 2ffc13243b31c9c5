import { normalizeSuiAddress } from "@mysten/sui/utils";
import { assertValidMultisigSpec } from "./address";
import { MAX_SIGNER_IN_MULTISIG } from "./constants";
import { encodeMultisigPublicKey } from "./encoding";
import { MultisigError, MultisigErrorKind } from "./errors";
import { hashToAddress } from "./hash";
import { permutations } from "./permutations";
import type { Address, OrderPksOptions, OrderPksResult, PublicKeyBytes } from "./types";

/**
 * Searches the orderings of `pks` for the one whose multisig address equals
 * `expectedAddress`.
 *
 * Only the keys move: `weights[i]` stays paired with whichever key lands at
 * index `i`. Orderings are tried in `permutations` order and the search stops
 * at the first match.
 *
 * Invalid inputs throw a `MultisigError`; an exhausted search is reported as
 * `{ ok: false }` with a `NoPermutationMatches` error.
 */
export function resolvePkOrder<T extends PublicKeyBytes>(
  expectedAddress: Address,
  pks: readonly T[],
  weights: readonly number[],
  threshold: number,
  { maxKeys = MAX_SIGNER_IN_MULTISIG }: OrderPksOptions = {},
): OrderPksResult<T> {
  if (!Number.isInteger(maxKeys) || maxKeys < 0) {
    throw new RangeError(`maxKeys must be a non-negative integer, got ${maxKeys}`);
  }

  if (pks.length > maxKeys) {
    throw new MultisigError(
      MultisigErrorKind.TooManyKeys,
      `Cannot search orderings of ${pks.length} keys, the limit is ${maxKeys}`,
    );
  }

  // Validity does not depend on key order, so one check covers every candidate.
  assertValidMultisigSpec({ pks, weights, threshold });

  const target = normalizeSuiAddress(expectedAddress);

  for (const candidate of permutations(pks)) {
    if (hashToAddress(encodeMultisigPublicKey({ pks: candidate, weights, threshold })) === target) {
      return { ok: true, pks: candidate };
    }
  }

  return {
    ok: false,
    error: new MultisigError(
      MultisigErrorKind.NoPermutationMatches,
      `No ordering of the ${pks.length} public keys derives ${target}`,
    ),
  };
}

/** Like `resolvePkOrder`, but throws when no ordering matches. */
export function orderPks<T extends PublicKeyBytes>(
  expectedAddress: Address,
  pks: readonly T[],
  weights: readonly number[],
  threshold: number,
  options?: OrderPksOptions,
): T[] {
  const result = resolvePkOrder(expectedAddress, pks, weights, threshold, options);

  if (!result.ok) {
    throw result.error;
  }

  return result.pks;
}
