/**
 * Topic schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE TOPIC = ONE MINUTE OF READING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A topic explains one symptom or one diagnosis in plain language:
 *   - a one-minute summary and an optional ELI5 summary
 *   - "what's happening in your body" and an analogy
 *   - what people often notice, and general (non-prescriptive) self-care
 *   - questions to bring to a clinician (post-diagnosis topics only)
 *   - an optional extra-detail layer, visuals, videos and resources
 *
 * Display fields never reject a topic. A missing or malformed field falls
 * back to its empty value (or "Untitled" for the title), and a category
 * outside the known ones is kept as authored. Only a malformed explicit id
 * rejects a topic, since the id keys it.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

/**
 * Browsing categories.
 */
export const TopicCategory = z.enum(["Everyday Symptoms", "Post-Diagnosis Companion"]);
export type TopicCategory = z.infer<typeof TopicCategory>;

/**
 * Display title for a topic without one.
 */
export const UNTITLED = "Untitled";

/**
 * Category filter values, "All" first.
 */
export const CATEGORY_FILTERS = ["All", ...TopicCategory.options] as const;
export type CategoryFilter = (typeof CATEGORY_FILTERS)[number];

const TextList = z.array(z.string()).catch([]);

/**
 * Extra detail may be a single paragraph or a list of them.
 */
const DetailText = z.union([z.string(), z.array(z.string())]);

export const AnalogySchema = z.object({
  title: z.string().catch(""),
  story: z.string().catch(""),
});
export type Analogy = z.infer<typeof AnalogySchema>;

/**
 * Deeper explanation per section, shown only when extra detail is on.
 */
export const ExtraDetailSchema = z.object({
  oneMinuteSummary: DetailText.optional().catch(undefined),
  whatsHappening: DetailText.optional().catch(undefined),
  analogy: DetailText.optional().catch(undefined),
  peopleOftenNotice: DetailText.optional().catch(undefined),
  generalSelfCare: DetailText.optional().catch(undefined),
  questionsForClinician: DetailText.optional().catch(undefined),
});
export type ExtraDetail = z.infer<typeof ExtraDetailSchema>;
export type ExtraDetailSection = keyof ExtraDetail;

export const VisualSchema = z.object({
  /** Logical path, e.g. "/images/bp-diagram.svg" */
  src: z.string().catch(""),
  alt: z.string().optional().catch(undefined),
});
export type Visual = z.infer<typeof VisualSchema>;

export const VideoSchema = z.object({
  embedUrl: z.string().catch(""),
});
export type Video = z.infer<typeof VideoSchema>;

export const ResourceSchema = z.object({
  label: z.string().catch("Resource"),
  url: z.string().catch(""),
});
export type Resource = z.infer<typeof ResourceSchema>;

export const TopicSchema = z.object({
  /**
   * Stable identifier. Derived from the title when absent.
   */
  id: z
    .string()
    .regex(/^[a-z0-9_]+$/, "Topic ID must be lowercase alphanumeric with underscores")
    .optional(),

  title: z.string().min(1).catch(UNTITLED),

  /**
   * One of TopicCategory for the browsing filters. Any other name is kept
   * and shown, but only the "All" filter lists it.
   */
  category: z.string().optional().catch(undefined),

  oneMinuteSummary: z.string().catch(""),

  eli5Summary: z.string().catch(""),

  whatsHappening: TextList,

  analogy: AnalogySchema.optional().catch(undefined),

  peopleOftenNotice: TextList,

  /**
   * General education only: no medication, no dosing, no urgency guidance.
   */
  generalSelfCare: TextList,

  questionsForClinician: TextList,

  extraDetail: ExtraDetailSchema.catch({}),

  visuals: z.array(VisualSchema).catch([]),

  videos: z.array(VideoSchema).catch([]),

  resources: z.array(ResourceSchema).catch([]),

  /** Date of the last clinical review, shown as authored */
  lastReviewed: z.string().optional().catch(undefined),
});

export type Topic = z.infer<typeof TopicSchema>;

/**
 * A topics file is either a bare array or a versioned wrapper.
 * Items are checked one by one by the loader so one bad topic does not
 * hide the rest.
 */
export const TopicCollectionSchema = z.union([
  z.array(z.unknown()),
  z.object({
    version: z.string().optional(),
    topics: z.array(z.unknown()),
  }),
]);
export type TopicCollection = z.infer<typeof TopicCollectionSchema>;
