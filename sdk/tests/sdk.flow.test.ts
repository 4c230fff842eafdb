/**
 * Full flow tests: admin, trainer and employee each drive the registry
 * through their own TrainingLedgerSDK connection.
 *
 * Run with: vitest run tests/sdk.flow.test.ts
 */
import { beforeEach, describe, expect, it } from "vitest";
import { ManualClock } from "../src/clock.js";
import { LocalCoprocessor } from "../src/coprocessor.js";
import { TrainingRecordRegistry } from "../src/registry.js";
import { TrainingLedgerSDK } from "../src/training-ledger.js";
import { SECONDS_PER_DAY } from "../src/types.js";
import { ADMIN, EMPLOYEE, STRANGER, T0, TRAINER, rejectionCode, setup } from "./fixtures.js";

let clock: ManualClock;
let coprocessor: LocalCoprocessor;
let registry: TrainingRecordRegistry;
let admin: TrainingLedgerSDK;
let trainer: TrainingLedgerSDK;
let employee: TrainingLedgerSDK;

beforeEach(() => {
  ({ clock, coprocessor, registry } = setup());
  admin = TrainingLedgerSDK.connect(registry, ADMIN);
  trainer = TrainingLedgerSDK.connect(registry, TRAINER);
  employee = TrainingLedgerSDK.connect(registry, EMPLOYEE, coprocessor);
});

describe("onboarding a trainer and completing a training", () => {
  it("runs from module setup to the employee reading their result", async () => {
    await admin.addTrainingModule({
      moduleId: "x",
      name: "Module X",
      description: "Ten-day refresher",
      durationDays: 10,
    });
    const { recordId } = await admin.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "E",
      moduleKey: "x",
    });
    expect(recordId).toBe(0n);

    // T has not been authorized yet
    expect(
      await rejectionCode(
        trainer.completeTraining({ recordId: 0n, completed: true, certified: true, score: 90, notes: "ok" }),
      ),
    ).toBe("Unauthorized");

    await admin.authorizeTrainer(TRAINER);
    clock.advance(3_600n);
    await trainer.completeTraining({ recordId: 0n, completed: true, certified: true, score: 90, notes: "ok" });

    const completedAt = T0 + 3_600n;
    const record = await employee.getTrainingRecord(0n);
    expect(record.score).toBe(90n);
    expect(record.notes).toBe("ok");
    expect(record.completionTimestamp).toBe(completedAt);
    expect(record.expiryTimestamp).toBe(completedAt + 10n * SECONDS_PER_DAY);
    expect(record.completedAt).toEqual(new Date(Number(completedAt) * 1000));

    await expect(employee.getCompletionStatus(0n)).resolves.toEqual({ completed: true, certified: true });
  });

  it("lets the employee list their own records and track expiry", async () => {
    await admin.authorizeTrainer(TRAINER);
    const first = await trainer.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "Ada",
      moduleKey: "security-awareness",
    });
    const second = await trainer.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "Ada",
      moduleKey: "gdpr-compliance",
    });
    await trainer.completeTraining({
      recordId: first.recordId,
      completed: true,
      certified: false,
      score: 71,
      notes: "",
    });

    await expect(employee.getEmployeeTrainingStatus()).resolves.toEqual([0n, 1n]);
    await expect(employee.getCompletionStatus(second.recordId)).resolves.toEqual({
      completed: false,
      certified: false,
    });

    clock.advance(60n * SECONDS_PER_DAY);
    await expect(employee.isTrainingExpired(first.recordId)).resolves.toBe(false);
    clock.advance(1n);
    await expect(employee.isTrainingExpired(first.recordId)).resolves.toBe(true);
    await expect(employee.isTrainingExpired(second.recordId)).resolves.toBe(false);
  });

  it("keeps a retake's result and drops the earlier one", async () => {
    const { recordId } = await admin.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "Ada",
      moduleKey: "data-privacy",
    });
    await admin.completeTraining({ recordId, completed: false, certified: false, score: 40, notes: "retake" });
    clock.advance(7n * SECONDS_PER_DAY);
    await admin.completeTraining({ recordId, completed: true, certified: true, score: 85, notes: "passed" });

    const record = await employee.getTrainingRecord(recordId);
    expect(record).toMatchObject({
      score: 85n,
      notes: "passed",
      completionTimestamp: T0 + 7n * SECONDS_PER_DAY,
      expiryTimestamp: T0 + 37n * SECONDS_PER_DAY,
    });
    expect(TrainingLedgerSDK.trainingStatus(record, clock.now())).toBe("current");
    await expect(employee.getCompletionStatus(recordId)).resolves.toEqual({ completed: true, certified: true });
  });

  it("hides another employee's record from a stranger, even with a decryptor", async () => {
    const { recordId } = await admin.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "Ada",
      moduleKey: "data-privacy",
    });
    const stranger = TrainingLedgerSDK.connect(registry, STRANGER, coprocessor);

    expect(await rejectionCode(stranger.getTrainingRecord(recordId))).toBe("Unauthorized");
    expect(await rejectionCode(stranger.getCompletionStatus(recordId))).toBe("Unauthorized");
    await expect(stranger.isTrainingExpired(recordId)).resolves.toBe(false);
  });

  it("lets a trainer read the record but not decrypt the employee's status", async () => {
    await admin.authorizeTrainer(TRAINER);
    const { recordId } = await trainer.createTrainingRecord({
      subject: EMPLOYEE,
      subjectName: "Ada",
      moduleKey: "data-privacy",
    });
    const decryptingTrainer = TrainingLedgerSDK.connect(registry, TRAINER, coprocessor);

    await expect(decryptingTrainer.getTrainingRecord(recordId)).resolves.toMatchObject({ subject: EMPLOYEE });
    expect(await rejectionCode(decryptingTrainer.getCompletionStatus(recordId))).toBe("DecryptionDenied");
  });
});
