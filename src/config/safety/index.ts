/**
 * Safety policy module.
 *
 * Usage:
 *   import { loadSafetyPolicy, DEFAULT_SAFETY_POLICY } from "./config/safety/index.js";
 *
 *   // Stricter sentence limit, same phrase table
 *   const policy = loadSafetyPolicy({
 *     ...DEFAULT_SAFETY_POLICY,
 *     maxSentenceWords: 20,
 *   });
 */

export type {
  SafetyPolicy,
  SafetyPolicyOverrides,
} from "./schema.js";

export {
  SafetyPolicySchema,
  SafetyPolicyOverridesSchema,
  BannedPhraseSchema,
} from "./schema.js";

export {
  loadSafetyPolicy,
  mergeSafetyPolicy,
  readSafetyPolicyFile,
  SafetyPolicyError,
  type PolicyValidationIssue,
} from "./loader.js";

export { DEFAULT_SAFETY_POLICY } from "./defaults.js";
