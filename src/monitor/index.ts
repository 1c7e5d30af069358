/**
 * Monitoring broadcast: stage trace messages fanned out to live observers.
 */

export { MonitorChannel, MonitorHandle, createMonitorChannel } from './channel.js';
export { SubscriberSet, createSubscriberSet } from './subscriber-set.js';
export { MonitorHub, createMonitorHub, type BroadcastResult } from './hub.js';
export {
  SubscriberAcceptor,
  StreamConnection,
  createSubscriberAcceptor,
  type ListenTarget,
} from './acceptor.js';
export {
  formatMonitorLine,
  parseMonitorLine,
  parseNumericState,
  isOutputMessage,
} from './protocol.js';
export {
  DEFAULT_FINAL_STAGE_INDEX,
  connectObserver,
  readLines,
  readMessages,
  waitForStageOutput,
} from './observer.js';
