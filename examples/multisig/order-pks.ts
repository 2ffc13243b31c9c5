import "dotenv/config";

import { toBase64 } from "@mysten/sui/utils";
import { parseMultisigEnv, resolvePkOrder } from "../../src";

// Prints the key order that reproduces MULTISIG_ADDRESS, whatever order the keys are listed in.
// npx tsx examples/multisig/order-pks.ts
function main(): void {
  try {
    const { pks, weights, threshold, address } = parseMultisigEnv();
    const result = resolvePkOrder(address, pks, weights, threshold);

    if (!result.ok) {
      console.error(`❌ ${result.error.message}`);
      process.exitCode = 1;
      return;
    }

    console.log("✅ Found the key order for", address);
    console.log(`MULTISIG_SIGNERS_BASE64_PUBKEYS=${result.pks.map((pk) => toBase64(pk)).join(",")}`);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

main();
