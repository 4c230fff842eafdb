/**
 * @training-ledger/sdk: training completion records with encrypted status
 *
 * Employees' completion and certification flags are stored as coprocessor
 * handles: only the registry and the employee can decrypt them.
 *
 * @example
 * ```typescript
 * import { LocalCoprocessor, TrainingLedgerSDK, TrainingRecordRegistry } from '@training-ledger/sdk';
 *
 * const registry = new TrainingRecordRegistry({ admin, coprocessor: new LocalCoprocessor() });
 * const ledger = TrainingLedgerSDK.connect(registry, admin);
 *
 * await ledger.authorizeTrainer(trainer);
 * const modules = await ledger.getActiveTrainingModules();
 * ```
 */

export { TrainingLedgerSDK } from "./training-ledger.js";
export { TrainingRecordRegistry } from "./registry.js";
export type { TrainingRecordRegistryOptions } from "./registry.js";
export { LocalCoprocessor } from "./coprocessor.js";
export type { Coprocessor, Decryptor } from "./coprocessor.js";
export { ManualClock, systemClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { loadConfig, loadLogLevel, LOG_LEVELS } from "./config.js";
export type { LogLevel, RegistryConfig } from "./config.js";
export { ConfigError, RegistryError, isRegistryError } from "./errors.js";
export type { RegistryErrorCode } from "./errors.js";
export { createLogger } from "./log.js";
export type { Logger } from "./log.js";
export { ACTIVE_TRAINING_MODULE_IDS, SEEDED_TRAINING_MODULES } from "./modules.js";
export { SECONDS_PER_DAY } from "./types.js";
export type {
  AddTrainingModuleOptions,
  CompleteTrainingOptions,
  CompletionStatus,
  CreateTrainingRecordOptions,
  EncryptedHandle,
  EventOf,
  RegistryEvent,
  RegistryEventListener,
  RegistryEventName,
  RegistryLog,
  RegistryMethod,
  TrainingModule,
  TrainingModuleInfo,
  TrainingRecord,
  TrainingRecordView,
  TrainingStatus,
  TransactionReceipt,
  Uint,
} from "./types.js";
