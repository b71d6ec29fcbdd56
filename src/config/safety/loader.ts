/**
 * Safety policy loader and validator.
 *
 * Responsible for:
 * - Validating a policy against the schema with fail-fast behavior
 * - Lowercasing phrases so matching stays case-insensitive
 * - Freezing the policy so no scan can change it
 * - Layering a policy file over the defaults
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  SafetyPolicySchema,
  SafetyPolicyOverridesSchema,
  type SafetyPolicy,
} from "./schema.js";
import { DEFAULT_SAFETY_POLICY } from "./defaults.js";

/**
 * Structured validation error for the safety policy.
 */
export class SafetyPolicyError extends Error {
  public readonly issues: PolicyValidationIssue[];

  constructor(message: string, issues: PolicyValidationIssue[]) {
    super(message);
    this.name = "SafetyPolicyError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Safety policy validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface PolicyValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "file_read" / "invalid_json" for file problems */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): PolicyValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function freezePolicy(policy: SafetyPolicy): Readonly<SafetyPolicy> {
  return Object.freeze({
    ...policy,
    bannedPhrases: Object.freeze(policy.bannedPhrases.map((p) => p.toLowerCase())),
  });
}

/**
 * Validate and load a safety policy.
 *
 * @param input - Raw policy object to validate
 * @returns Validated, lowercased and frozen policy
 * @throws SafetyPolicyError if validation fails
 */
export function loadSafetyPolicy(input: unknown): Readonly<SafetyPolicy> {
  const result = SafetyPolicySchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SafetyPolicyError(
      `Invalid safety policy: ${issues.length} validation error(s)`,
      issues
    );
  }

  return freezePolicy(result.data);
}

/**
 * Apply a partial policy on top of a base policy.
 *
 * @throws SafetyPolicyError if the overrides or the merged result are invalid
 */
export function mergeSafetyPolicy(
  overrides: unknown,
  base: Readonly<SafetyPolicy> = DEFAULT_SAFETY_POLICY
): Readonly<SafetyPolicy> {
  const parsed = SafetyPolicyOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new SafetyPolicyError(
      `Invalid safety policy overrides: ${issues.length} validation error(s)`,
      issues
    );
  }

  return loadSafetyPolicy({ ...base, ...parsed.data });
}

/**
 * Read a JSON policy file and layer it over the defaults.
 *
 * @throws SafetyPolicyError if the file cannot be read, is not JSON, or is invalid
 */
export function readSafetyPolicyFile(filePath: string): Readonly<SafetyPolicy> {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new SafetyPolicyError(`Cannot read safety policy file: ${filePath}`, [
      { path: [], message: String(err), code: "file_read" },
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SafetyPolicyError(`Safety policy file is not valid JSON: ${filePath}`, [
      { path: [], message: String(err), code: "invalid_json" },
    ]);
  }

  return mergeSafetyPolicy(data);
}
