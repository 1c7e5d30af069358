/**
 * Sensor and actuator adapters.
 */

export { FileSource, createCpuTemperatureSource, CPU_TEMPERATURE_PATH, CPU_TEMPERATURE_SCALE } from './file-source.js';
export type { FileSourceOptions } from './file-source.js';
export { CommandSource } from './command-source.js';
export { SequenceSource } from './sequence-source.js';
export { PwmSink, dutyCycleNs, SYSFS_PWM_ROOT, DEFAULT_PWM_FREQUENCY_HZ } from './pwm-sink.js';
export type { PwmSinkOptions } from './pwm-sink.js';
export { CommandSink } from './command-sink.js';
export { LogSink } from './log-sink.js';
export { runCommand, type CommandRunner } from './command-runner.js';
export { parseReading } from './parse-reading.js';
export { createSource, createSink, type IoFactoryOptions } from './factory.js';
