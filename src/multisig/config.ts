import { type PublicKey, SIGNATURE_FLAG_TO_SCHEME } from "@mysten/sui/cryptography";
import { normalizeSuiAddress, toBase64 } from "@mysten/sui/utils";
import { deriveMultisigAddressQuiet } from "./address";
import { MAX_SIGNER_IN_MULTISIG } from "./constants";
import { publicKeyBytesFromBase64, toSdkPublicKey } from "./keys";
import { resolvePkOrder } from "./order";

export interface MultisigConfig {
  /** The PublicKey instances of the signers for the multisig wallet. */
  publicKeys: PublicKey[];
  /** The Sui-standard byte representation of each signer's public key (flag || raw_bytes). */
  publicKeysSuiBytes: number[][];
  /** The weights of each signer in the multisig wallet. */
  weights: number[];
  /** The threshold required for a transaction to be approved. */
  threshold: number;
  /** The address of the multisig wallet. */
  address: string;
}

export type MultisigEnv = Partial<
  Record<"MULTISIG_SIGNERS_BASE64_PUBKEYS" | "MULTISIG_WEIGHTS" | "MULTISIG_THRESHOLD" | "MULTISIG_ADDRESS", string>
>;

function parseInteger(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`${name} must be a non-negative integer, got "${trimmed}"`);
  }

  return parseInt(trimmed, 10);
}

export interface MultisigEnvSettings {
  /** Flagged public keys, in the order they are listed. */
  pks: Uint8Array[];
  weights: number[];
  threshold: number;
  /** The configured address, normalized. */
  address: string;
}

/**
 * Reads the `MULTISIG_*` variables, rejecting missing values, non-integer
 * weights or threshold, and keys that fail their scheme's shape check.
 * Whether the keys derive the address is left to the caller.
 */
export function parseMultisigEnv(env: MultisigEnv = process.env): MultisigEnvSettings {
  const signersBase64 = env.MULTISIG_SIGNERS_BASE64_PUBKEYS;
  const weights = env.MULTISIG_WEIGHTS;
  const threshold = env.MULTISIG_THRESHOLD;
  const address = env.MULTISIG_ADDRESS;

  if (!signersBase64 || !weights || !threshold || !address) {
    throw new Error(
      "Please provide MULTISIG_SIGNERS_BASE64_PUBKEYS, MULTISIG_WEIGHTS, MULTISIG_THRESHOLD, and MULTISIG_ADDRESS in your .env file",
    );
  }

  const multisigSignersBase64Pubkeys = signersBase64.split(",").map((s) => s.trim());

  const pks = multisigSignersBase64Pubkeys.map((pk, i) => {
    try {
      return publicKeyBytesFromBase64(pk);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`The public key at index ${i} ("${pk.substring(0, 10)}...") is invalid: ${reason}`);
    }
  });

  return {
    pks,
    weights: weights.split(",").map((w) => parseInteger(w, "MULTISIG_WEIGHTS")),
    threshold: parseInteger(threshold, "MULTISIG_THRESHOLD"),
    address: normalizeSuiAddress(address.trim()),
  };
}

/**
 * Parses the multisig settings from the environment and checks that the keys,
 * weights and threshold really derive the configured address.
 *
 * When they don't, the keys' other orderings are tried so the error can name
 * the order that would have matched.
 */
export function loadMultisigConfig(env: MultisigEnv = process.env): MultisigConfig {
  const {
    pks: keyBytes,
    weights: parsedWeights,
    threshold: parsedThreshold,
    address: expectedAddress,
  } = parseMultisigEnv(env);

  const derivedAddress = deriveMultisigAddressQuiet(keyBytes, parsedWeights, parsedThreshold);

  if (derivedAddress !== expectedAddress) {
    let hint = " Please check your .env configuration.";

    if (keyBytes.length <= MAX_SIGNER_IN_MULTISIG) {
      const reordered = resolvePkOrder(expectedAddress, keyBytes, parsedWeights, parsedThreshold);

      if (reordered.ok) {
        hint = ` The keys derive it in this order: ${reordered.pks.map((pk) => toBase64(pk)).join(",")}`;
      }
    }

    throw new Error(
      `The derived multisig address (${derivedAddress}) does not match the provided address (${expectedAddress}).${hint}`,
    );
  }

  return {
    publicKeys: keyBytes.map((pk) => toSdkPublicKey(pk)),
    publicKeysSuiBytes: keyBytes.map((pk) => Array.from(pk)),
    weights: parsedWeights,
    threshold: parsedThreshold,
    address: derivedAddress,
  };
}

export function logMultisigConfig(config: MultisigConfig): void {
  console.debug("Multisig Config Loaded and Verified:");
  console.debug(`- Multisig Address: ${config.address}`);
  console.debug(`- Weights: ${JSON.stringify(config.weights)}`);
  console.debug(`- Threshold: ${JSON.stringify(config.threshold)}`);
  console.debug("- Signer Details:");
  config.publicKeys.forEach((pk, i) => {
    const scheme = SIGNATURE_FLAG_TO_SCHEME[pk.flag() as keyof typeof SIGNATURE_FLAG_TO_SCHEME];
    console.debug(`  - Signer ${i + 1} (${scheme}): ${pk.toSuiAddress()}`);
  });
  console.debug(`- Sui Public Key Bytes (for transactions): `, config.publicKeysSuiBytes);
}
