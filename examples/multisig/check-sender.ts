import { checkIfSenderIsMultisigAddress, deriveMultisigAddress, loadMultisigConfig } from "../../src";
import { context, user } from "../common";

// npx tsx examples/multisig/check-sender.ts
function main(): void {
  const config = loadMultisigConfig();

  deriveMultisigAddress(config.publicKeysSuiBytes, config.weights, config.threshold, context);

  const isMultisig = checkIfSenderIsMultisigAddress(
    config.publicKeysSuiBytes,
    config.weights,
    config.threshold,
    context,
  );

  console.log(`Sender ${user} ${isMultisig ? "is" : "is not"} the multisig account ${config.address}`);
}

main();
