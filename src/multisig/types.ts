import type { MultisigError } from "./errors";

/** A flagged public key: scheme flag byte followed by the raw key bytes. */
export type PublicKeyBytes = Uint8Array | readonly number[];

/** A `0x`-prefixed, lower-case, 64 hex digit account address. */
export type Address = string;

export interface MultisigSpec<T extends PublicKeyBytes = PublicKeyBytes> {
  /** Flagged public keys; their order is part of the address. */
  pks: readonly T[];
  /** One weight per key, at the same index. */
  weights: readonly number[];
  /** Minimum total weight needed to authorize. */
  threshold: number;
}

/** Audit record of one emitting derivation; frozen, arrays included. */
export interface MultisigAddressEvent {
  readonly pks: readonly (readonly number[])[];
  readonly weights: readonly number[];
  readonly threshold: number;
  readonly multisigAddress: Address;
}

/** What the surrounding environment supplies to a call. */
export interface MultisigHostContext {
  /** Address of the invoking principal. */
  sender: Address;
  emit(event: MultisigAddressEvent): void;
}

export type OrderPksResult<T extends PublicKeyBytes> =
  | { ok: true; pks: T[] }
  | { ok: false; error: MultisigError };

export interface OrderPksOptions {
  /** Key sets larger than this are refused before any ordering is tried. */
  maxKeys?: number;
}
