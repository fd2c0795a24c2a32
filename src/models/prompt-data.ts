/**
 * Uniform fetch result for one resolved entity.
 */
export interface PromptData {
  /** Human-readable summary lines; never empty */
  description: string[];
  /** CSV-like payload, only for time-series and log sources */
  data?: string;
}

/**
 * Sentinel payload for a query that returned no rows or points.
 */
export const NO_DATA_SENTINEL = 'No applicable data found\n';

/**
 * Time window of a run, in epoch milliseconds.
 */
export interface DateTimeRange {
  readonly startTime: number;
  readonly endTime: number;
  /** IANA zone name, used only to format extracted timestamps */
  readonly timeZone: string;
}
