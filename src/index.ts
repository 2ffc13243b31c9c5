export * from "./multisig";
