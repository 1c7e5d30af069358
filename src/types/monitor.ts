/**
 * Tag used for the "value pushed downstream" monitor line.
 */
export const OUTPUT_TAG = '>';

/**
 * A trace event emitted by one pipeline stage.
 *
 * Ephemeral: delivered once, best-effort, to the observers connected at
 * broadcast time.
 */
export interface MonitorMessage {
  /** Position of the emitting stage in the pipeline (0-based) */
  stageIndex: number;
  /** Stage kind name for state snapshots, or OUTPUT_TAG for outputs */
  tag: string;
  /** Free-form state text (JSON for snapshots, the number for outputs) */
  payload: string;
}

/**
 * JSON-serializable view of a stage's internal state.
 */
export type StageSnapshot = Record<string, number | number[] | null>;
