/**
 * Config module exports.
 */

export type {
  PifanConfigFile,
  MergedConfig,
  PipelineSpec,
  StageSpec,
  StageKind,
  InputSpec,
  OutputSpec,
  LogLevel,
} from './config-schema.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_PIPELINE,
  CONFIG_FILE_VERSION,
  stageSpecSchema,
  pipelineSpecSchema,
} from './config-schema.js';
export {
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  formatIssues,
  type ConfigOverrides,
} from './config-loader.js';
