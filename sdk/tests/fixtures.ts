import { getAddress } from "viem";
import { ManualClock } from "../src/clock.js";
import { LocalCoprocessor } from "../src/coprocessor.js";
import { RegistryError } from "../src/errors.js";
import { TrainingRecordRegistry } from "../src/registry.js";

export const ADMIN = getAddress("0x00000000000000000000000000000000000000a1");
export const TRAINER = getAddress("0x00000000000000000000000000000000000000a2");
export const EMPLOYEE = getAddress("0x00000000000000000000000000000000000000e1");
export const OTHER_EMPLOYEE = getAddress("0x00000000000000000000000000000000000000e2");
export const STRANGER = getAddress("0x00000000000000000000000000000000000000f1");

/** 2023-11-14T22:13:20Z */
export const T0 = 1_700_000_000n;

export function setup(start: bigint = T0) {
  const clock = new ManualClock(start);
  const coprocessor = new LocalCoprocessor();
  const registry = new TrainingRecordRegistry({ admin: ADMIN, coprocessor, clock });
  return { clock, coprocessor, registry };
}

/** The RegistryError code a call fails with, or undefined when it succeeds. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof RegistryError ? error.code : `not a RegistryError: ${String(error)}`;
  }
  return undefined;
}

export async function rejectionCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof RegistryError ? error.code : `not a RegistryError: ${String(error)}`;
  }
  return undefined;
}
