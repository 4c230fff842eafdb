import type { Address, Hex } from "viem";
import type { Decryptor } from "./coprocessor.js";
import { toIdentity, toUint } from "./encoding.js";
import { RegistryError } from "./errors.js";
import type { TrainingRecordRegistry } from "./registry.js";
import type {
  AddTrainingModuleOptions,
  CompleteTrainingOptions,
  CompletionStatus,
  CreateTrainingRecordOptions,
  EncryptedHandle,
  TrainingModuleInfo,
  TrainingRecord,
  TrainingRecordView,
  TrainingStatus,
  Uint,
} from "./types.js";

/**
 * TrainingLedgerSDK: the registry as seen by one account.
 *
 * Example usage:
 * ```typescript
 * import { LocalCoprocessor, TrainingLedgerSDK, TrainingRecordRegistry } from '@training-ledger/sdk';
 *
 * const coprocessor = new LocalCoprocessor();
 * const registry = new TrainingRecordRegistry({ admin, coprocessor });
 *
 * const trainer = TrainingLedgerSDK.connect(registry, admin);
 * const { recordId } = await trainer.createTrainingRecord({
 *   subject: employee,
 *   subjectName: 'Ada',
 *   moduleKey: 'data-privacy',
 * });
 * await trainer.completeTraining({ recordId, completed: true, certified: true, score: 92, notes: '' });
 *
 * // Only the employee (or admin/trainers) can read the record; only accounts
 * // the coprocessor allowed can decrypt its status.
 * const me = TrainingLedgerSDK.connect(registry, employee, coprocessor);
 * const status = await me.getCompletionStatus(recordId);
 * ```
 */
export class TrainingLedgerSDK {
  private constructor(
    private readonly registry: TrainingRecordRegistry,
    readonly account: Address,
    private readonly decryptor: Decryptor | undefined,
  ) {}

  /**
   * Bind an account to a registry.
   *
   * @param registry   The registry to call
   * @param account    Every call is made as this account
   * @param decryptor  Needed only for getCompletionStatus
   */
  static connect(registry: TrainingRecordRegistry, account: Address, decryptor?: Decryptor): TrainingLedgerSDK {
    return new TrainingLedgerSDK(registry, toIdentity(account, "account"), decryptor);
  }

  // ─── ADMIN ────────────────────────────────────────────────────────────────

  async authorizeTrainer(trainer: Address): Promise<{ txHash: Hex }> {
    this.registry.authorizeTrainer(this.account, trainer);
    return { txHash: this.lastTxHash() };
  }

  async revokeTrainer(trainer: Address): Promise<{ txHash: Hex }> {
    this.registry.revokeTrainer(this.account, trainer);
    return { txHash: this.lastTxHash() };
  }

  async addTrainingModule(opts: AddTrainingModuleOptions): Promise<{ txHash: Hex }> {
    this.registry.addTrainingModule(this.account, opts.moduleId, opts.name, opts.description, opts.durationDays);
    return { txHash: this.lastTxHash() };
  }

  // ─── TRAINERS ─────────────────────────────────────────────────────────────

  async createTrainingRecord(opts: CreateTrainingRecordOptions): Promise<{ recordId: bigint; txHash: Hex }> {
    const recordId = this.registry.createTrainingRecord(this.account, opts.subject, opts.subjectName, opts.moduleKey);
    return { recordId, txHash: this.lastTxHash() };
  }

  async completeTraining(opts: CompleteTrainingOptions): Promise<{ txHash: Hex }> {
    this.registry.completeTraining(
      this.account,
      opts.recordId,
      opts.completed,
      opts.certified,
      opts.score,
      opts.notes,
    );
    return { txHash: this.lastTxHash() };
  }

  // ─── READS ────────────────────────────────────────────────────────────────

  async isTrainer(account: Address = this.account): Promise<boolean> {
    return this.registry.isTrainer(account);
  }

  async getTrainingRecord(recordId: Uint): Promise<TrainingRecordView> {
    const id = toUint(recordId, "recordId");
    const record = this.registry.getTrainingRecord(this.account, id);
    return {
      recordId: id,
      ...record,
      completedAt: toDate(record.completionTimestamp),
      expiresAt: toDate(record.expiryTimestamp),
    };
  }

  async getEncryptedCompletion(recordId: Uint): Promise<EncryptedHandle> {
    return this.registry.getEncryptedCompletion(this.account, recordId);
  }

  async getEncryptedCertification(recordId: Uint): Promise<EncryptedHandle> {
    return this.registry.getEncryptedCertification(this.account, recordId);
  }

  /**
   * Read and decrypt a record's completion and certification flags.
   *
   * The registry checks that this account may read the record; the decryptor
   * checks that the coprocessor granted it the handles.
   *
   * @throws RegistryError DecryptionUnavailable when connected without a decryptor
   */
  async getCompletionStatus(recordId: Uint): Promise<CompletionStatus> {
    const decryptor = this.decryptor;
    if (!decryptor) {
      throw new RegistryError(
        "DecryptionUnavailable",
        "Connect with a decryptor to read encrypted completion status",
        { account: this.account },
      );
    }

    const completionHandle = this.registry.getEncryptedCompletion(this.account, recordId);
    const certificationHandle = this.registry.getEncryptedCertification(this.account, recordId);
    const [completed, certified] = await Promise.all([
      decryptor.decryptBool(completionHandle, this.account),
      decryptor.decryptBool(certificationHandle, this.account),
    ]);
    return { completed, certified };
  }

  async isTrainingExpired(recordId: Uint): Promise<boolean> {
    return this.registry.isTrainingExpired(recordId);
  }

  /** Record ids for a subject; defaults to the connected account's own. */
  async getEmployeeTrainingStatus(subject: Address = this.account): Promise<bigint[]> {
    return this.registry.getEmployeeTrainingStatus(subject);
  }

  async getActiveTrainingModules(): Promise<TrainingModuleInfo[]> {
    return this.registry.getActiveTrainingModules().flatMap((moduleId) => {
      const module = this.registry.getTrainingModule(moduleId);
      return module ? [{ moduleId, ...module }] : [];
    });
  }

  // ─── HELPER UTILITIES ─────────────────────────────────────────────────────

  /**
   * Classify a record by its plaintext timestamps.
   *
   * @param now  Unix seconds to compare the expiry against
   */
  static trainingStatus(
    record: Pick<TrainingRecord, "completionTimestamp" | "expiryTimestamp">,
    now: bigint,
  ): TrainingStatus {
    if (record.completionTimestamp === 0n) return "pending";
    if (record.expiryTimestamp === 0n) return "incomplete";
    return now > record.expiryTimestamp ? "expired" : "current";
  }

  private lastTxHash(): Hex {
    const receipt = this.registry.lastTransaction;
    if (!receipt) {
      throw new Error("Registry returned without recording a transaction");
    }
    return receipt.txHash;
  }
}

function toDate(timestamp: bigint): Date | null {
  return timestamp === 0n ? null : new Date(Number(timestamp) * 1000);
}
