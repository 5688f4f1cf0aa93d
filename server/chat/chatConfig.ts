/**
 * Chat Pipeline Configuration
 * Centralized tunables for dialogue state, planning, retrieval blending and delivery.
 *
 * The blend and threshold numbers are hand-tuned. Callers that need different
 * values pass BlendConstants / ConfidenceThresholds explicitly instead of
 * editing this object.
 */

export const chatConfig = {
  // ===== RETRIEVAL BLEND =====

  /**
   * Coefficients of the intent-score blend:
   *   nHierarchical = round(HIERARCHICAL_SCALE * (1 - s))
   *   nFactual      = round(FACTUAL_SCALE * s)
   *   confidenceMin = CONFIDENCE_BASE + CONFIDENCE_SLOPE * s
   * Each count is clamped to [0, LANE_CAP].
   */
  BLEND: {
    HIERARCHICAL_SCALE: 5,
    FACTUAL_SCALE: 10,
    LANE_CAP: 10,
    CONFIDENCE_BASE: 0.5,
    CONFIDENCE_SLOPE: 0.3,
  },

  /**
   * Score thresholds for confidence tiers.
   * score < abstainMax -> abstain; score >= confidentMin -> process_confident.
   */
  CONFIDENCE_THRESHOLDS: {
    abstainMax: 0.5,
    confidentMin: 0.85,
  },

  /**
   * Hierarchical retrieval fetches this multiple of the requested count when the
   * index cannot filter by source type, then sorts and truncates locally.
   */
  HIERARCHICAL_OVERFETCH_FACTOR: 2,

  /** Default k for RAG-routed blueprint entries. */
  RAG_DEFAULT_K: 10,

  /** +/- paragraph window for neighbor expansion. 0 disables expansion. */
  NEIGHBOR_WINDOW: 2,

  /** Score bonus for candidates from documents cited in the previous turn. */
  PREVIOUS_SOURCE_BOOST: 0.05,

  /** Maximum external search results merged into one sub-question's context. */
  EXTERNAL_SEARCH_MAX_RESULTS: 5,

  /** Characters of chunk text kept in response sources. */
  SOURCE_PREVIEW_CHARS: 300,

  // ===== PLANNING =====

  /** Rule-based decomposition splits on these (case-insensitive). */
  DECOMPOSITION_SEPARATORS: [" and ", " also ", " then "],

  /**
   * Phrases that mark a fragment as being about the user's own records.
   * Matched on word boundaries with flexible whitespace.
   */
  PATIENT_KEYWORDS: [
    "my doctor",
    "my medication",
    "my visit",
    "my record",
    "my records",
    "my care",
    "what did my doctor",
    "do I qualify",
    "do we qualify",
    "my eligibility",
    "based on my",
    "my enrollment",
    "my coverage",
    "am I eligible",
    "are we eligible",
  ],

  // ===== CLARIFY =====

  /** A single sub-question with fewer words than this triggers a refinement ask. */
  REFINEMENT_VAGUE_MIN_WORDS: 3,

  /** This many sub-questions or more is treated as likely multi-intent. */
  REFINEMENT_MULTI_INTENT_THRESHOLD: 3,

  /** Intent scores within this distance of 0.5 are considered ambiguous. */
  REFINEMENT_AMBIGUITY_BAND: 0.1,

  // ===== DIALOGUE STATE =====

  /** Turns without open slots before the active payer/domain/jurisdiction decays. */
  STATE_DECAY_TURNS: 2,

  /** Previous turns loaded for the context pack. */
  CONTEXT_TURNS: 2,

  // ===== DELIVERY =====

  /** Max buffered progress events per correlation id; oldest are dropped first. */
  PROGRESS_CHANNEL_CAPACITY: 500,

  /** Overall lifetime of a stream connection. */
  STREAM_MAX_DURATION_MS: 300_000,

  STREAM_KEEPALIVE_MS: 15_000,

  STREAM_POLL_INTERVAL_MS: 250,

  /** Bounded wait of one memory-queue pop, so the worker can notice shutdown. */
  MEMORY_QUEUE_POLL_TIMEOUT_MS: 1_000,

  /** Published responses the memory queue keeps before evicting the oldest. */
  MEMORY_QUEUE_RESPONSE_CAPACITY: 1_000,

  /** BRPOP timeout for the Redis queue. */
  REDIS_QUEUE_POLL_TIMEOUT_SECONDS: 5,
} as const;

export type ChatConfig = typeof chatConfig;
