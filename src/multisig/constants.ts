/** Leading byte of a flagged public key, per signature scheme. */
export const SIGNATURE_FLAGS = {
  ED25519: 0x00,
  Secp256k1: 0x01,
  Secp256r1: 0x02,
} as const;

export type KeyScheme = keyof typeof SIGNATURE_FLAGS;

/** Total length of a flagged public key (flag byte included). */
export const PUBLIC_KEY_LENGTHS: Record<KeyScheme, number> = {
  ED25519: 33,
  Secp256k1: 34,
  Secp256r1: 34,
};

/** Scheme tag that opens the multisig address preimage. */
export const MULTISIG_FLAG = 0x03;

export const MAX_WEIGHT = 0xff;
export const MAX_THRESHOLD = 0xffff;

// Largest key set the order resolver searches by default (10! orderings).
export const MAX_SIGNER_IN_MULTISIG = 10;

/**
 * Looks up the scheme a flag byte belongs to.
 * @returns The scheme name, or undefined for flags outside the three supported schemes.
 */
export function schemeFromFlag(flag: number): KeyScheme | undefined {
  switch (flag) {
    case SIGNATURE_FLAGS.ED25519:
      return "ED25519";
    case SIGNATURE_FLAGS.Secp256k1:
      return "Secp256k1";
    case SIGNATURE_FLAGS.Secp256r1:
      return "Secp256r1";
    default:
      return undefined;
  }
}
