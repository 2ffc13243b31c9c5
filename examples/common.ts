import "dotenv/config";

import { Ed25519Keypair } from "@mysten/sui/keypairs/ed25519";
import { fromHex } from "@mysten/sui/utils";
import type { MultisigAddressEvent, MultisigHostContext } from "../src";

if (!process.env.SUI_WALLET_SEED_PHRASE?.length && !process.env.SUI_WALLET_PRIVATE_KEY_ARRAY?.length) {
  throw new Error("Empty mnemonic or private key");
}

const mnemonic = (process.env.SUI_WALLET_SEED_PHRASE ?? "").trim().toLowerCase().split(/\s+/).join(" ");

export const keypair = process.env.SUI_WALLET_PRIVATE_KEY_ARRAY
  ? Ed25519Keypair.fromSecretKey(fromHex(process.env.SUI_WALLET_PRIVATE_KEY_ARRAY))
  : Ed25519Keypair.deriveKeypair(mnemonic);
export const user = keypair.getPublicKey().toSuiAddress();

// Host context for scripts: the wallet is the sender, events go to stdout.
export const context: MultisigHostContext = {
  sender: user,
  emit: (event: MultisigAddressEvent) => {
    console.log("MultisigAddressEvent:", JSON.stringify(event));
  },
};
