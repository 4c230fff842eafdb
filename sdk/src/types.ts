import type { Address, Hex } from "viem";

/** Seconds in one day. Module durations are stored in days, timestamps in seconds. */
export const SECONDS_PER_DAY = 86_400n;

/**
 * Opaque reference to a value encrypted by the coprocessor.
 *
 * The registry stores and hands out handles but never looks inside one.
 * Only an account the coprocessor has granted permission to can decrypt it.
 */
export type EncryptedHandle = Hex;

/** Unsigned integer input. Numbers must be safe integers; both forms are stored as bigint. */
export type Uint = bigint | number;

/**
 * A training requirement in the module catalog.
 */
export interface TrainingModule {
  name: string;
  description: string;
  /** How long a completion stays valid, in days */
  durationDays: bigint;
  /**
   * Records can only be created against active modules.
   * Re-adding a module always sets this back to true.
   */
  isActive: boolean;
}

/** A catalog entry together with its key. */
export interface TrainingModuleInfo extends TrainingModule {
  moduleId: string;
}

/**
 * The plaintext part of a training record, as returned by getTrainingRecord.
 *
 * Completion and certification status are not included: they are encrypted and
 * must be read through their handles.
 */
export interface TrainingRecord {
  /** The employee this record is about */
  subject: Address;
  /** Free-text display name, stored as given */
  subjectName: string;
  moduleKey: string;
  /** Unix seconds of the last completeTraining call, 0 when never completed */
  completionTimestamp: bigint;
  /** Unix seconds after which the training is expired, 0 when not computed */
  expiryTimestamp: bigint;
  isActive: boolean;
  score: bigint;
  notes: string;
}

// ─── EVENTS ──────────────────────────────────────────────────────────────────

export type RegistryEvent =
  | {
      eventName: "TrainingRecordCreated";
      args: { recordId: bigint; subject: Address; moduleKey: string };
    }
  | {
      eventName: "TrainingCompleted";
      args: { recordId: bigint; subject: Address; completed: boolean };
    }
  | { eventName: "TrainerAuthorized"; args: { trainer: Address } }
  | { eventName: "TrainerRevoked"; args: { trainer: Address } };

export type RegistryEventName = RegistryEvent["eventName"];

export type EventOf<N extends RegistryEventName> = Extract<RegistryEvent, { eventName: N }>;

/** An event as it sits in the registry's log, tagged with the transaction that emitted it. */
export interface RegistryLog<E extends RegistryEvent = RegistryEvent> {
  event: E;
  blockNumber: bigint;
  txHash: Hex;
}

export type RegistryEventListener = (log: RegistryLog) => void;

// ─── TRANSACTIONS ────────────────────────────────────────────────────────────

export type RegistryMethod =
  | "authorizeTrainer"
  | "revokeTrainer"
  | "addTrainingModule"
  | "createTrainingRecord"
  | "completeTraining";

export interface TransactionReceipt {
  txHash: Hex;
  blockNumber: bigint;
  /** Block timestamp in Unix seconds. Every timestamp the transaction wrote equals this. */
  timestamp: bigint;
  method: RegistryMethod;
  caller: Address;
}

// ─── SDK OPTIONS AND RESULTS ─────────────────────────────────────────────────

/**
 * Options for adding (or overwriting) a training module.
 */
export interface AddTrainingModuleOptions {
  /** Catalog key, e.g. "data-privacy". An existing module under this key is replaced. */
  moduleId: string;
  name: string;
  description: string;
  durationDays: Uint;
}

export interface CreateTrainingRecordOptions {
  /** The employee's account address */
  subject: Address;
  subjectName: string;
  /** Must name an active module */
  moduleKey: string;
}

/**
 * Options for recording a training completion.
 *
 * `completed` and `certified` are encrypted before they are stored; `score` and
 * `notes` are stored in plaintext. Every call replaces the previous values.
 */
export interface CompleteTrainingOptions {
  recordId: Uint;
  completed: boolean;
  certified: boolean;
  score: Uint;
  notes: string;
}

/** A record as the SDK presents it, with timestamps converted to dates. */
export interface TrainingRecordView extends TrainingRecord {
  recordId: bigint;
  completedAt: Date | null;
  expiresAt: Date | null;
}

/** Decrypted completion flags for one record. */
export interface CompletionStatus {
  completed: boolean;
  certified: boolean;
}

/**
 * Where a record stands, read from its plaintext timestamps.
 *
 *   pending: completeTraining has never been called
 *   incomplete: the last completion was recorded with completed=false
 *   current: completed and not yet past its expiry
 *   expired: completed, and the expiry has passed
 */
export type TrainingStatus = "pending" | "incomplete" | "current" | "expired";
