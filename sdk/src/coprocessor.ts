/**
 * Encryption coprocessor interfaces, and an in-memory implementation for
 * development and tests.
 *
 * The registry only ever asks for two things: encrypt a plaintext boolean,
 * and grant an account permission to decrypt a handle. Decryption happens
 * outside the registry, on behalf of an account that holds that permission.
 */

import { randomBytes } from "node:crypto";
import { bytesToHex, type Address } from "viem";
import { toIdentity } from "./encoding.js";
import { RegistryError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import type { EncryptedHandle } from "./types.js";

export interface Coprocessor {
  /**
   * Encrypt a plaintext boolean on behalf of a contract.
   * The new handle is not decryptable by anyone until allow() is called.
   */
  encryptBool(value: boolean, contract: Address): EncryptedHandle;
  /** Grant decrypt permission. Permissions add up and are never revoked. */
  allow(handle: EncryptedHandle, account: Address): void;
  isAllowed(handle: EncryptedHandle, account: Address): boolean;
}

/** Client-side decryption of handles the account has been granted. */
export interface Decryptor {
  decryptBool(handle: EncryptedHandle, account: Address): Promise<boolean>;
}

interface Ciphertext {
  value: boolean;
  contract: Address;
}

/**
 * LocalCoprocessor keeps plaintexts next to random 32-byte handles.
 *
 * Handles carry no information about the value they stand for, so two
 * encryptions of the same boolean never share a handle.
 */
export class LocalCoprocessor implements Coprocessor, Decryptor {
  private readonly ciphertexts = new Map<EncryptedHandle, Ciphertext>();
  private readonly acl = new Map<EncryptedHandle, Set<Address>>();

  constructor(private readonly log: Logger = createLogger("coprocessor")) {}

  encryptBool(value: boolean, contract: Address): EncryptedHandle {
    const handle = bytesToHex(randomBytes(32));
    this.ciphertexts.set(handle, { value, contract: toIdentity(contract, "contract") });
    this.acl.set(handle, new Set());
    this.log.trace({ handle }, "encrypted bool");
    return handle;
  }

  allow(handle: EncryptedHandle, account: Address): void {
    const allowed = this.acl.get(handle);
    if (!allowed) {
      throw new RegistryError("InvalidInput", `Unknown handle ${handle}`, { handle });
    }
    allowed.add(toIdentity(account, "account"));
  }

  isAllowed(handle: EncryptedHandle, account: Address): boolean {
    return this.acl.get(handle)?.has(toIdentity(account, "account")) ?? false;
  }

  async decryptBool(handle: EncryptedHandle, account: Address): Promise<boolean> {
    const ciphertext = this.ciphertexts.get(handle);
    if (!ciphertext || !this.isAllowed(handle, account)) {
      throw new RegistryError(
        "DecryptionDenied",
        `${account} is not allowed to decrypt ${handle}`,
        { handle, account },
      );
    }
    return ciphertext.value;
  }

  /** Number of handles issued so far. */
  get size(): number {
    return this.ciphertexts.size;
  }
}
