/**
 * Streaming operator pipeline.
 */

export { BaseStage, toFixedPoint, fromFixedPoint, FIXED_POINT_SCALE, type Stage } from './stage.js';
export { Pipeline } from './pipeline.js';
export {
  assemblePipeline,
  createStage,
  validateStageSpecs,
  type AssembleOptions,
} from './assembler.js';
export { PidController, type PidGains, type ControlOutput } from './pid-controller.js';
export * from './stages/index.js';
