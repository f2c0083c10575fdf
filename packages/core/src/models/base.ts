/**
 * Base types shared by all parsed entries
 */

/**
 * Every entry carries these common fields
 */
export interface BaseEntry {
  /** When the observation was made (parse time unless overridden with @time) */
  readonly timestamp: Date;
  /** Normalized tags in first-seen order, or null when the input had none */
  readonly tags: readonly string[] | null;
}
