/**
 * A single scalar reading flowing through the pipeline.
 *
 * Units are implied by position (degrees at the sensor, percent at the
 * actuator). Time is the scheduler tick; samples carry no timestamp.
 */
export type Sample = number;

/**
 * Pull function handed to a stage by the evaluation loop.
 * Resolves to `null` once the upstream is exhausted.
 */
export type Upstream = () => Promise<Sample | null>;
