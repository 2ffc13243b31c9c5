import "dotenv/config";

import { loadMultisigConfig, logMultisigConfig } from "../../src";

// npx tsx examples/multisig/derive-address.ts
function main(): void {
  try {
    const config = loadMultisigConfig();
    logMultisigConfig(config);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

main();
