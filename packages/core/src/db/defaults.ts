/**
 * Limits enforced on every tool call.
 */

export const ROW_LIMITS = {
  /** LIMIT appended to queries that carry none */
  default: 100,
  /** Hard cap on returned rows regardless of what the caller asks for */
  max: 1_000,
} as const;

export const SAFE_DEFAULTS = {
  /** Serialized tool responses are cut down to this many characters */
  characterLimit: 25_000,
  /** Remote call timeout in milliseconds */
  timeoutMs: 15_000,
  /** Rows shown by the schema tool */
  sampleRows: 5,
} as const;
