import { blake2b } from "@noble/hashes/blake2b";
import { normalizeSuiAddress, toHex } from "@mysten/sui/utils";
import type { Address } from "./types";

const ADDRESS_LENGTH = 32;

/** Hashes a preimage with blake2b-256; the raw digest is the address. */
export function hashToAddress(bytes: Uint8Array): Address {
  return normalizeSuiAddress(toHex(blake2b(bytes, { dkLen: ADDRESS_LENGTH })));
}
