/**
 * Core type definitions for pifan.
 */

export type * from './logger.js';
export type * from './sample.js';
export type * from './monitor.js';

export { OUTPUT_TAG } from './monitor.js';
