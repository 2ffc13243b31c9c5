import { bcs } from "@mysten/sui/bcs";
import { MULTISIG_FLAG } from "./constants";
import type { MultisigSpec } from "./types";

/**
 * Serializes a multisig key set into the address preimage:
 * `[0x03] || u16_le(threshold) || pk_0 || weight_0 || pk_1 || weight_1 ...`
 *
 * Keys are written without a length prefix, so a boundary is only recoverable
 * because every supported scheme has a fixed key size. Keys and weights are
 * taken as given; call `assertValidMultisigSpec` first.
 */
export function encodeMultisigPublicKey({ pks, weights, threshold }: MultisigSpec): Uint8Array {
  const thresholdBytes = bcs.u16().serialize(threshold).toBytes();
  const keysLength = pks.reduce((total, pk) => total + pk.length + 1, 0);

  const buffer = new Uint8Array(1 + thresholdBytes.length + keysLength);
  buffer[0] = MULTISIG_FLAG;
  buffer.set(thresholdBytes, 1);

  let offset = 1 + thresholdBytes.length;
  pks.forEach((pk, i) => {
    buffer.set(pk, offset);
    offset += pk.length;
    buffer[offset++] = weights[i];
  });

  return buffer;
}
