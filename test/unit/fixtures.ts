import { MultisigError, type MultisigErrorKind } from "../../src";

// ED25519
export const ED25519_PK = [
  0, 13, 125, 171, 53, 140, 141, 173, 170, 78, 250, 0, 73, 167, 91, 7, 67, 101, 85, 177, 10, 54, 130, 25, 187, 104,
  15, 112, 87, 19, 73, 215, 117,
];
// Secp256k1
export const SECP256K1_PK = [
  1, 2, 14, 23, 205, 89, 57, 228, 107, 25, 102, 65, 150, 140, 215, 89, 145, 11, 162, 87, 126, 39, 250, 115, 253, 227,
  135, 109, 185, 190, 197, 188, 235, 43,
];
// Secp256r1
export const SECP256R1_PK = [
  2, 3, 71, 251, 175, 35, 240, 56, 171, 196, 195, 8, 162, 113, 17, 122, 42, 76, 255, 174, 221, 188, 95, 248, 28, 117,
  23, 188, 108, 116, 167, 237, 180, 48,
];

export const ED25519_BASE64 = "AA19qzWMja2qTvoASadbB0NlVbEKNoIZu2gPcFcTSdd1";
export const SECP256K1_BASE64 = "AQIOF81ZOeRrGWZBlozXWZELold+J/pz/eOHbbm+xbzrKw==";
export const SECP256R1_BASE64 = "AgNH+68j8DirxMMIonEReipM/67dvF/4HHUXvGx0p+20MA==";

export const ED25519_ADDRESS = "0x73a6b3c33e2d63383de5c6786cbaca231ff789f4c853af6d54cb883d8780adc0";
export const SECP256K1_ADDRESS = "0xd9607cd03428c904949572b51471e7a9f60019aeb9a3d7ee5e72921cab8e8be7";
export const SECP256R1_ADDRESS = "0x600b1081644fe46f76da3bdc19f8743b9f04458516364374c7d82959e790c19e";

// [ED25519, Secp256k1, Secp256r1], weights [1, 1, 1], threshold 2
export const MULTISIG_PKS = [ED25519_PK, SECP256K1_PK, SECP256R1_PK];
export const MULTISIG_WEIGHTS = [1, 1, 1];
export const MULTISIG_THRESHOLD = 2;
export const MULTISIG_ADDRESS = "0x1c4dac7fb4c01a0c608db993711c451ad655a38b7f0a9571ff099f70090263a8";

// Same keys and weights with the first two keys swapped
export const SWAPPED_MULTISIG_ADDRESS = "0x1ca7a14b6a17890483c05be6b9042d81346459795012f0210542c6f854d753aa";

export const UNRELATED_ADDRESS = "0x0000000000000000000000000000000000000000000000000000000000000abc";

/** Runs `fn` and returns the kind of the `MultisigError` it throws, if any. */
export function errorKindOf(fn: () => unknown): MultisigErrorKind | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof MultisigError) {
      return error.kind;
    }
    throw error;
  }

  return undefined;
}
