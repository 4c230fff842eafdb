import type { TrainingModuleInfo } from "./types.js";

/** Modules every registry starts with. */
export const SEEDED_TRAINING_MODULES: ReadonlyArray<Readonly<TrainingModuleInfo>> = Object.freeze([
  {
    moduleId: "data-privacy",
    name: "Data Privacy Fundamentals",
    description: "Handling personal data, data minimisation and retention basics",
    durationDays: 30n,
    isActive: true,
  },
  {
    moduleId: "gdpr-compliance",
    name: "GDPR Compliance",
    description: "Lawful bases, data subject rights and breach notification duties",
    durationDays: 45n,
    isActive: true,
  },
  {
    moduleId: "security-awareness",
    name: "Security Awareness",
    description: "Phishing, password hygiene and safe handling of devices",
    durationDays: 60n,
    isActive: true,
  },
  {
    moduleId: "incident-response",
    name: "Incident Response",
    description: "Recognising, reporting and containing security incidents",
    durationDays: 30n,
    isActive: true,
  },
].map((module) => Object.freeze(module)));

/**
 * What getActiveTrainingModules reports. This list is fixed: modules added
 * later with addTrainingModule do not appear in it.
 */
export const ACTIVE_TRAINING_MODULE_IDS: readonly string[] = SEEDED_TRAINING_MODULES.map(
  (module) => module.moduleId,
);
