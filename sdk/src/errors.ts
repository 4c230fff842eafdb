/**
 * Reasons a registry operation can be rejected.
 *
 *   Unauthorized: caller lacks the role or record access the operation needs
 *   ModuleInactive: module is missing or deactivated when a record is created
 *   RecordInactive: record is missing or inactive
 *   InvalidInput: an argument the call encoding would reject (bad address, negative integer)
 *   DecryptionUnavailable: the SDK was connected without a decryptor
 *   DecryptionDenied: the coprocessor has not granted the account access to the handle
 */
export type RegistryErrorCode =
  | "Unauthorized"
  | "ModuleInactive"
  | "RecordInactive"
  | "InvalidInput"
  | "DecryptionUnavailable"
  | "DecryptionDenied";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: RegistryErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.details = details;
  }
}

export function isRegistryError(error: unknown, code?: RegistryErrorCode): error is RegistryError {
  return error instanceof RegistryError && (code === undefined || error.code === code);
}

/** Thrown when the environment does not describe a usable configuration. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
