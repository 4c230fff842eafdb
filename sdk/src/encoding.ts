import { getAddress, isAddress, type Address } from "viem";
import { RegistryError } from "./errors.js";
import type { Uint } from "./types.js";

/**
 * Checksum an account address, so that every spelling of one account is one identity.
 */
export function toIdentity(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new RegistryError("InvalidInput", `${field} is not a valid address: ${value}`, { field, value });
  }
  return getAddress(value);
}

export function toUint(value: Uint, field: string): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RegistryError("InvalidInput", `${field} must be an integer, got ${value}`, { field, value });
  }
  const n = BigInt(value);
  if (n < 0n) {
    throw new RegistryError("InvalidInput", `${field} must not be negative, got ${n}`, { field, value: n });
  }
  return n;
}
