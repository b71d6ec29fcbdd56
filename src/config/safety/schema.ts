/**
 * Safety policy schema.
 *
 * The policy is the fixed table the content scanner reads: which phrases
 * read as prescriptive or diagnostic, how long a sentence may run, and how
 * warnings quote the offending text.
 */

import { z } from "zod";

/**
 * A banned phrase is matched as a raw substring of normalized text.
 * Surrounding spaces are significant ("take " differs from "take"),
 * so phrases are never trimmed.
 */
export const BannedPhraseSchema = z
  .string()
  .min(1, "Banned phrase cannot be empty")
  .refine((val) => val.trim().length > 0, "Banned phrase cannot be only whitespace");

export const SafetyPolicySchema = z.object({
  /**
   * Ordered phrase table. The first entry found in a string wins,
   * so order decides which phrase a warning reports.
   */
  bannedPhrases: z
    .array(BannedPhraseSchema)
    .min(1, "At least one banned phrase is required")
    .readonly(),

  /** A sentence with more words than this is reported */
  maxSentenceWords: z.number().int().positive(),

  /** Characters of the offending text quoted in a warning */
  excerptLength: z.number().int().positive(),

  /** Appended to every excerpt, truncated or not */
  excerptSuffix: z.string(),
});

export type SafetyPolicy = z.infer<typeof SafetyPolicySchema>;

/**
 * Policy file shape: any field may be left out and keeps its default.
 */
export const SafetyPolicyOverridesSchema = SafetyPolicySchema.partial();

export type SafetyPolicyOverrides = z.infer<typeof SafetyPolicyOverridesSchema>;
