/**
 * Ports - Hexagonal Architecture Interfaces
 *
 * Ports define the boundaries between the control pipeline and the
 * outside world.
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │                      PORTS OVERVIEW                            │
 * ├────────────────────────────────────────────────────────────────┤
 * │ ISampleSource         - Sensor readings (sysfs, process)       │
 * │ ISampleSink           - Actuator commands (PWM, process)       │
 * │ ISubscriberConnection - Monitoring observers (socket)          │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { ISampleSource } from './sample-source.js';
export type { ISampleSink } from './sample-sink.js';
export type { ISubscriberConnection } from './subscriber.js';
