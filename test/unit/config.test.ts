import { afterEach, describe, expect, it, vi } from "vitest";
import { loadMultisigConfig, logMultisigConfig, type MultisigEnv, parseMultisigEnv } from "../../src";
import {
  ED25519_ADDRESS,
  ED25519_BASE64,
  ED25519_PK,
  MULTISIG_ADDRESS,
  SECP256K1_BASE64,
  SECP256K1_PK,
  SECP256R1_BASE64,
  SECP256R1_PK,
  SWAPPED_MULTISIG_ADDRESS,
  UNRELATED_ADDRESS,
} from "./fixtures";

const validEnv: MultisigEnv = {
  MULTISIG_SIGNERS_BASE64_PUBKEYS: `${ED25519_BASE64}, ${SECP256K1_BASE64}, ${SECP256R1_BASE64}`,
  MULTISIG_WEIGHTS: "1, 1, 1",
  MULTISIG_THRESHOLD: "2",
  MULTISIG_ADDRESS: MULTISIG_ADDRESS,
};

describe("parseMultisigEnv", () => {
  it("parses keys, weights, threshold and address without checking the address", () => {
    const settings = parseMultisigEnv({
      ...validEnv,
      MULTISIG_SIGNERS_BASE64_PUBKEYS: `${SECP256K1_BASE64},${ED25519_BASE64},${SECP256R1_BASE64}`,
      MULTISIG_ADDRESS: ` 0x${MULTISIG_ADDRESS.slice(2).toUpperCase()} `,
    });

    expect(settings.pks.map((pk) => Array.from(pk))).toEqual([SECP256K1_PK, ED25519_PK, SECP256R1_PK]);
    expect(settings.weights).toEqual([1, 1, 1]);
    expect(settings.threshold).toBe(2);
    expect(settings.address).toBe(MULTISIG_ADDRESS);
  });

  it("rejects a threshold with trailing characters", () => {
    expect(() => parseMultisigEnv({ ...validEnv, MULTISIG_THRESHOLD: "2abc" })).toThrowError(
      'MULTISIG_THRESHOLD must be a non-negative integer, got "2abc"',
    );
  });

  it("rejects fractional weights", () => {
    expect(() => parseMultisigEnv({ ...validEnv, MULTISIG_WEIGHTS: "1,1.9,1" })).toThrowError(
      'MULTISIG_WEIGHTS must be a non-negative integer, got "1.9"',
    );
  });
});

describe("loadMultisigConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses and verifies the configured multisig", () => {
    const config = loadMultisigConfig(validEnv);

    expect(config.address).toBe(MULTISIG_ADDRESS);
    expect(config.weights).toEqual([1, 1, 1]);
    expect(config.threshold).toBe(2);
    expect(config.publicKeysSuiBytes[0]).toEqual(ED25519_PK);
    expect(config.publicKeysSuiBytes[2]).toEqual(SECP256R1_PK);
    expect(config.publicKeys.map((pk) => pk.flag())).toEqual([0, 1, 2]);
  });

  it("requires all four variables", () => {
    expect(() => loadMultisigConfig({ ...validEnv, MULTISIG_THRESHOLD: undefined })).toThrowError(
      "Please provide MULTISIG_SIGNERS_BASE64_PUBKEYS, MULTISIG_WEIGHTS, MULTISIG_THRESHOLD, and MULTISIG_ADDRESS in your .env file",
    );
  });

  it("rejects weights that are not integers", () => {
    expect(() => loadMultisigConfig({ ...validEnv, MULTISIG_WEIGHTS: "1,x,1" })).toThrowError(
      'MULTISIG_WEIGHTS must be a non-negative integer, got "x"',
    );
  });

  it("names the key that fails to parse", () => {
    expect(() =>
      loadMultisigConfig({ ...validEnv, MULTISIG_SIGNERS_BASE64_PUBKEYS: `${ED25519_BASE64},CQ==,${SECP256R1_BASE64}` }),
    ).toThrowError('The public key at index 1 ("CQ==...") is invalid: Unsupported signature scheme flag: 9');
  });

  it("suggests the key order that derives the configured address", () => {
    const env = {
      ...validEnv,
      MULTISIG_SIGNERS_BASE64_PUBKEYS: `${SECP256K1_BASE64},${ED25519_BASE64},${SECP256R1_BASE64}`,
    };

    expect(() => loadMultisigConfig(env)).toThrowError(
      `The derived multisig address (${SWAPPED_MULTISIG_ADDRESS}) does not match the provided address (${MULTISIG_ADDRESS}).` +
        ` The keys derive it in this order: ${ED25519_BASE64},${SECP256K1_BASE64},${SECP256R1_BASE64}`,
    );
  });

  it("reports a plain mismatch when no order derives the address", () => {
    expect(() => loadMultisigConfig({ ...validEnv, MULTISIG_ADDRESS: UNRELATED_ADDRESS })).toThrowError(
      `The derived multisig address (${MULTISIG_ADDRESS}) does not match the provided address (${UNRELATED_ADDRESS}).` +
        " Please check your .env configuration.",
    );
  });

  it("logs the verified configuration", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    logMultisigConfig(loadMultisigConfig(validEnv));

    expect(debug).toHaveBeenCalledWith("Multisig Config Loaded and Verified:");
    expect(debug).toHaveBeenCalledWith(`- Multisig Address: ${MULTISIG_ADDRESS}`);
    expect(debug).toHaveBeenCalledWith("- Threshold: 2");
    expect(debug).toHaveBeenCalledWith(`  - Signer 1 (ED25519): ${ED25519_ADDRESS}`);
  });
});
