import { encodePacked, getContractAddress, keccak256, type Address } from "viem";
import { systemClock, type Clock } from "./clock.js";
import type { RegistryConfig } from "./config.js";
import type { Coprocessor } from "./coprocessor.js";
import { toIdentity, toUint } from "./encoding.js";
import { ConfigError, RegistryError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import { ACTIVE_TRAINING_MODULE_IDS, SEEDED_TRAINING_MODULES } from "./modules.js";
import {
  SECONDS_PER_DAY,
  type EncryptedHandle,
  type EventOf,
  type RegistryEvent,
  type RegistryEventListener,
  type RegistryEventName,
  type RegistryLog,
  type RegistryMethod,
  type TrainingModule,
  type TrainingRecord,
  type TransactionReceipt,
  type Uint,
} from "./types.js";

interface StoredRecord extends TrainingRecord {
  encryptedCompletion: EncryptedHandle;
  encryptedCertification: EncryptedHandle;
}

interface PendingTransaction {
  timestamp: bigint;
  events: RegistryEvent[];
}

export interface TrainingRecordRegistryOptions {
  /** Fixed for the lifetime of the registry */
  admin: Address;
  coprocessor: Coprocessor;
  /** The registry's own address. Defaults to the address the admin would deploy it at with nonce 0. */
  address?: Address;
  clock?: Clock;
  log?: Logger;
}

/**
 * TrainingRecordRegistry: role table, module catalog and training records.
 *
 * Every method takes the calling account first, the way a contract sees
 * msg.sender. Mutating methods run as transactions: all checks and all
 * coprocessor calls happen before any state is written, so a rejected call
 * leaves the registry untouched and emits nothing.
 *
 * Access rules:
 *   - admin: manages trainers and modules, and counts as a trainer everywhere
 *   - trainers: create and complete records, read any record
 *   - subjects: read their own records and decrypt their own status
 *   - anyone: expiry checks, per-subject record ids, the active module list
 */
export class TrainingRecordRegistry {
  readonly admin: Address;
  readonly address: Address;

  private readonly coprocessor: Coprocessor;
  private readonly clock: Clock;
  readonly log: Logger;

  private readonly trainers = new Set<Address>();
  private readonly modules = new Map<string, TrainingModule>();
  private readonly records = new Map<bigint, StoredRecord>();
  private readonly recordsBySubject = new Map<Address, bigint[]>();
  private recordCounter = 0n;

  private readonly eventLog: RegistryLog[] = [];
  private readonly listeners = new Set<RegistryEventListener>();
  private blockNumber = 0n;
  private receipt: TransactionReceipt | undefined;

  constructor(options: TrainingRecordRegistryOptions) {
    this.admin = toIdentity(options.admin, "admin");
    this.address = options.address
      ? toIdentity(options.address, "address")
      : getContractAddress({ from: this.admin, nonce: 0n });
    this.coprocessor = options.coprocessor;
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? createLogger("registry");

    this.trainers.add(this.admin);
    for (const { moduleId, ...module } of SEEDED_TRAINING_MODULES) {
      this.modules.set(moduleId, { ...module });
    }
  }

  static fromConfig(config: RegistryConfig, coprocessor: Coprocessor, clock?: Clock): TrainingRecordRegistry {
    if (!config.admin) {
      throw new ConfigError("Cannot create a registry", ["REGISTRY_ADMIN: Required"]);
    }
    return new TrainingRecordRegistry({
      admin: config.admin,
      address: config.registryAddress,
      coprocessor,
      clock,
      log: createLogger("registry", config.logLevel),
    });
  }

  // ─── ROLES ─────────────────────────────────────────────────────────────────

  authorizeTrainer(caller: Address, trainer: Address): void {
    this.transact("authorizeTrainer", caller, (sender, tx) => {
      const account = toIdentity(trainer, "trainer");
      this.requireAdmin(sender, "authorizeTrainer");
      this.trainers.add(account);
      tx.events.push({ eventName: "TrainerAuthorized", args: { trainer: account } });
    });
  }

  /**
   * Remove an account from the trainer set. Revoking the admin's entry is
   * allowed but has no effect on what the admin may do.
   */
  revokeTrainer(caller: Address, trainer: Address): void {
    this.transact("revokeTrainer", caller, (sender, tx) => {
      const account = toIdentity(trainer, "trainer");
      this.requireAdmin(sender, "revokeTrainer");
      this.trainers.delete(account);
      tx.events.push({ eventName: "TrainerRevoked", args: { trainer: account } });
    });
  }

  isTrainer(account: Address): boolean {
    return this.hasTrainerRights(toIdentity(account, "account"));
  }

  // ─── MODULES ───────────────────────────────────────────────────────────────

  /** Insert a module, or replace the one under the same key. The result is always active. */
  addTrainingModule(
    caller: Address,
    moduleId: string,
    name: string,
    description: string,
    durationDays: Uint,
  ): void {
    this.transact("addTrainingModule", caller, (sender) => {
      const duration = toUint(durationDays, "durationDays");
      this.requireAdmin(sender, "addTrainingModule");
      this.modules.set(moduleId, { name, description, durationDays: duration, isActive: true });
    });
  }

  getTrainingModule(moduleId: string): TrainingModule | undefined {
    const module = this.modules.get(moduleId);
    return module ? { ...module } : undefined;
  }

  /** Always the four seeded module ids, whatever has been added since. */
  getActiveTrainingModules(): string[] {
    return [...ACTIVE_TRAINING_MODULE_IDS];
  }

  // ─── RECORDS ───────────────────────────────────────────────────────────────

  /**
   * Open a record for an employee against an active module.
   *
   * Both encrypted flags start as an encryption of false, decryptable by the
   * registry and by the subject.
   *
   * @returns the new record id
   * @throws RegistryError Unauthorized, ModuleInactive, InvalidInput. No id is consumed on failure.
   */
  createTrainingRecord(caller: Address, subject: Address, subjectName: string, moduleKey: string): bigint {
    return this.transact("createTrainingRecord", caller, (sender, tx) => {
      const account = toIdentity(subject, "subject");
      this.requireTrainer(sender, "createTrainingRecord");

      const module = this.modules.get(moduleKey);
      if (!module?.isActive) {
        throw new RegistryError(
          "ModuleInactive",
          `Training module "${moduleKey}" does not exist or is inactive`,
          { moduleKey },
        );
      }

      const encryptedCompletion = this.sealBool(false, account);
      const encryptedCertification = this.sealBool(false, account);

      const recordId = this.recordCounter;
      this.recordCounter += 1n;
      this.records.set(recordId, {
        subject: account,
        subjectName,
        moduleKey,
        encryptedCompletion,
        encryptedCertification,
        completionTimestamp: 0n,
        expiryTimestamp: 0n,
        isActive: true,
        score: 0n,
        notes: "",
      });

      const index = this.recordsBySubject.get(account);
      if (index) {
        index.push(recordId);
      } else {
        this.recordsBySubject.set(account, [recordId]);
      }

      tx.events.push({
        eventName: "TrainingRecordCreated",
        args: { recordId, subject: account, moduleKey },
      });
      return recordId;
    });
  }

  /**
   * Record the outcome of a training. May be called any number of times; each
   * call replaces the flags, score, notes and both timestamps.
   *
   * Expiry is the block timestamp plus the module's current duration when
   * `completed` is true, and 0 otherwise.
   */
  completeTraining(
    caller: Address,
    recordId: Uint,
    completed: boolean,
    certified: boolean,
    score: Uint,
    notes: string,
  ): void {
    this.transact("completeTraining", caller, (sender, tx) => {
      const id = toUint(recordId, "recordId");
      const points = toUint(score, "score");
      this.requireTrainer(sender, "completeTraining");

      const record = this.records.get(id);
      if (!record?.isActive) {
        throw new RegistryError("RecordInactive", `Training record ${id} does not exist or is inactive`, {
          recordId: id,
        });
      }

      const durationDays = this.modules.get(record.moduleKey)?.durationDays ?? 0n;
      const encryptedCompletion = this.sealBool(completed, record.subject);
      const encryptedCertification = this.sealBool(certified, record.subject);

      this.records.set(id, {
        ...record,
        encryptedCompletion,
        encryptedCertification,
        completionTimestamp: tx.timestamp,
        expiryTimestamp: completed ? tx.timestamp + durationDays * SECONDS_PER_DAY : 0n,
        score: points,
        notes,
      });

      tx.events.push({
        eventName: "TrainingCompleted",
        args: { recordId: id, subject: record.subject, completed },
      });
    });
  }

  getTrainingRecord(caller: Address, recordId: Uint): TrainingRecord {
    const record = this.readRecord(caller, recordId);
    return {
      subject: record.subject,
      subjectName: record.subjectName,
      moduleKey: record.moduleKey,
      completionTimestamp: record.completionTimestamp,
      expiryTimestamp: record.expiryTimestamp,
      isActive: record.isActive,
      score: record.score,
      notes: record.notes,
    };
  }

  getEncryptedCompletion(caller: Address, recordId: Uint): EncryptedHandle {
    return this.readRecord(caller, recordId).encryptedCompletion;
  }

  getEncryptedCertification(caller: Address, recordId: Uint): EncryptedHandle {
    return this.readRecord(caller, recordId).encryptedCertification;
  }

  /** True once a computed expiry has passed. Records without an expiry never expire. */
  isTrainingExpired(recordId: Uint): boolean {
    const expiry = this.records.get(toUint(recordId, "recordId"))?.expiryTimestamp ?? 0n;
    return expiry !== 0n && this.clock.now() > expiry;
  }

  /** Ids of every record created for the subject, oldest first. */
  getEmployeeTrainingStatus(subject: Address): bigint[] {
    return [...(this.recordsBySubject.get(toIdentity(subject, "subject")) ?? [])];
  }

  /** The id the next created record will get. */
  getRecordCount(): bigint {
    return this.recordCounter;
  }

  // ─── EVENTS ────────────────────────────────────────────────────────────────

  getEvents<N extends RegistryEventName = RegistryEventName>(eventName?: N): Array<RegistryLog<EventOf<N>>> {
    return this.eventLog.filter(
      (log): log is RegistryLog<EventOf<N>> => eventName === undefined || log.event.eventName === eventName,
    );
  }

  /**
   * Subscribe to events as transactions commit.
   * @returns a function that removes the listener
   */
  watchEvents(listener: RegistryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get lastTransaction(): TransactionReceipt | undefined {
    return this.receipt;
  }

  // ─── INTERNALS ─────────────────────────────────────────────────────────────

  private hasTrainerRights(account: Address): boolean {
    return account === this.admin || this.trainers.has(account);
  }

  private requireAdmin(sender: Address, operation: string): void {
    if (sender !== this.admin) {
      throw new RegistryError("Unauthorized", `${operation} is restricted to the admin`, {
        caller: sender,
        operation,
      });
    }
  }

  private requireTrainer(sender: Address, operation: string): void {
    if (!this.hasTrainerRights(sender)) {
      throw new RegistryError("Unauthorized", `${operation} is restricted to trainers`, {
        caller: sender,
        operation,
      });
    }
  }

  private readRecord(caller: Address, recordId: Uint): StoredRecord {
    const sender = toIdentity(caller, "caller");
    const id = toUint(recordId, "recordId");
    const record = this.records.get(id);

    if (!this.hasTrainerRights(sender) && sender !== record?.subject) {
      throw new RegistryError("Unauthorized", `Not allowed to read training record ${id}`, {
        caller: sender,
        recordId: id,
      });
    }
    if (!record) {
      throw new RegistryError("RecordInactive", `Training record ${id} does not exist`, { recordId: id });
    }
    return record;
  }

  /** Encrypt a flag and let both the registry and the subject decrypt it. */
  private sealBool(value: boolean, subject: Address): EncryptedHandle {
    const handle = this.coprocessor.encryptBool(value, this.address);
    this.coprocessor.allow(handle, this.address);
    this.coprocessor.allow(handle, subject);
    return handle;
  }

  private transact<T>(
    method: RegistryMethod,
    caller: Address,
    run: (sender: Address, tx: PendingTransaction) => T,
  ): T {
    const { result, logs } = this.execute(method, caller, run);
    for (const log of logs) {
      this.notify(log);
    }
    return result;
  }

  private execute<T>(
    method: RegistryMethod,
    caller: Address,
    run: (sender: Address, tx: PendingTransaction) => T,
  ): { result: T; logs: RegistryLog[] } {
    const tx: PendingTransaction = { timestamp: this.clock.now(), events: [] };
    try {
      const sender = toIdentity(caller, "caller");
      const result = run(sender, tx);
      return { result, logs: this.commit(method, sender, tx) };
    } catch (error) {
      this.log.warn({ method, caller, err: error }, "transaction reverted");
      throw error;
    }
  }

  private commit(method: RegistryMethod, sender: Address, tx: PendingTransaction): RegistryLog[] {
    this.blockNumber += 1n;
    const blockNumber = this.blockNumber;
    const txHash = keccak256(encodePacked(["address", "uint256", "string"], [sender, blockNumber, method]));

    this.receipt = { txHash, blockNumber, timestamp: tx.timestamp, method, caller: sender };
    const logs = tx.events.map((event) => ({ event, blockNumber, txHash }));
    this.eventLog.push(...logs);

    this.log.debug(
      { method, caller: sender, txHash, blockNumber: blockNumber.toString(), events: logs.length },
      "transaction committed",
    );
    return logs;
  }

  private notify(log: RegistryLog): void {
    for (const listener of this.listeners) {
      try {
        listener(log);
      } catch (error) {
        this.log.error({ err: error, eventName: log.event.eventName, txHash: log.txHash }, "event listener failed");
      }
    }
  }
}
