import { fromBase64 } from "@mysten/sui/utils";
import type { PublicKey } from "@mysten/sui/cryptography";
import { Ed25519PublicKey } from "@mysten/sui/keypairs/ed25519";
import { Secp256k1PublicKey } from "@mysten/sui/keypairs/secp256k1";
import { Secp256r1PublicKey } from "@mysten/sui/keypairs/secp256r1";
import { type KeyScheme, PUBLIC_KEY_LENGTHS, SIGNATURE_FLAGS, schemeFromFlag } from "./constants";
import { MultisigError, MultisigErrorKind } from "./errors";
import { hashToAddress } from "./hash";
import type { Address, PublicKeyBytes } from "./types";

/**
 * Rejects key entries that are not byte values. A `Uint8Array` would reduce
 * them modulo 256, so such a key would alias a different, valid key.
 * @param index - Position of the key in its key set, for the message.
 */
export function assertKeyBytes(pk: PublicKeyBytes, index?: number): void {
  for (let i = 0; i < pk.length; i++) {
    const byte = pk[i];

    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      const where = index === undefined ? "Public key" : `Public key at index ${index}`;
      throw new MultisigError(
        MultisigErrorKind.InvalidKeyBytes,
        `${where} has an invalid byte at position ${i}: ${byte}`,
      );
    }
  }
}

/**
 * Checks a flagged key against an expected total length and flag byte.
 * @param pk - Flag byte followed by the raw key.
 * @param expectedLength - Total length including the flag byte.
 * @param expectedFlag - Flag byte the key must start with.
 */
export function assertKeyShape(pk: PublicKeyBytes, expectedLength: number, expectedFlag: number): void {
  assertKeyBytes(pk);

  if (pk.length !== expectedLength) {
    throw new MultisigError(
      MultisigErrorKind.InvalidKeyLength,
      `Invalid public key length: expected ${expectedLength} bytes, got ${pk.length}`,
    );
  }

  if (pk[0] !== expectedFlag) {
    throw new MultisigError(
      MultisigErrorKind.InvalidKeyFlag,
      `Invalid public key flag: expected ${expectedFlag}, got ${pk[0]}`,
    );
  }
}

/**
 * Checks a flagged key against the scheme its flag byte names.
 * @returns The key's scheme.
 */
export function assertSupportedKey(pk: PublicKeyBytes): KeyScheme {
  const scheme = schemeFromFlag(pk[0] ?? -1);

  if (scheme === undefined) {
    throw new MultisigError(MultisigErrorKind.InvalidKeyFlag, `Unsupported signature scheme flag: ${pk[0]}`);
  }

  assertKeyShape(pk, PUBLIC_KEY_LENGTHS[scheme], SIGNATURE_FLAGS[scheme]);

  return scheme;
}

/**
 * Checks a flagged key's shape and hashes it into a single-signer address.
 * @param pk - Flag byte followed by the raw key.
 * @param expectedLength - Total length including the flag byte.
 * @param expectedFlag - Flag byte the key must start with.
 */
export function addressFromKey(pk: PublicKeyBytes, expectedLength: number, expectedFlag: number): Address {
  assertKeyShape(pk, expectedLength, expectedFlag);

  return hashToAddress(Uint8Array.from(pk));
}

export function ed25519KeyToAddress(pk: PublicKeyBytes): Address {
  return addressFromKey(pk, PUBLIC_KEY_LENGTHS.ED25519, SIGNATURE_FLAGS.ED25519);
}

export function secp256k1KeyToAddress(pk: PublicKeyBytes): Address {
  return addressFromKey(pk, PUBLIC_KEY_LENGTHS.Secp256k1, SIGNATURE_FLAGS.Secp256k1);
}

export function secp256r1KeyToAddress(pk: PublicKeyBytes): Address {
  return addressFromKey(pk, PUBLIC_KEY_LENGTHS.Secp256r1, SIGNATURE_FLAGS.Secp256r1);
}

/**
 * Derives the single-signer address of a key, picking the scheme from its flag byte.
 */
export function keyToAddress(pk: PublicKeyBytes): Address {
  assertSupportedKey(pk);

  return hashToAddress(Uint8Array.from(pk));
}

/**
 * Decodes a Sui-standard Base64 public key (flag || raw bytes) and checks it
 * against the scheme its flag names.
 * @param pk - The Base64-encoded, flagged public key.
 */
export function publicKeyBytesFromBase64(pk: string): Uint8Array {
  const bytes = fromBase64(pk);
  assertSupportedKey(bytes);

  return bytes;
}

/**
 * Creates the SDK public key instance for a flagged key.
 */
export function toSdkPublicKey(pk: PublicKeyBytes): PublicKey {
  const bytes = Uint8Array.from(pk);
  const rawKeyBytes = bytes.slice(1);

  switch (schemeFromFlag(bytes[0] ?? -1)) {
    case "ED25519":
      return new Ed25519PublicKey(rawKeyBytes);
    case "Secp256k1":
      return new Secp256k1PublicKey(rawKeyBytes);
    case "Secp256r1":
      return new Secp256r1PublicKey(rawKeyBytes);
    default:
      throw new MultisigError(MultisigErrorKind.InvalidKeyFlag, `Unsupported signature scheme flag: ${bytes[0]}`);
  }
}
