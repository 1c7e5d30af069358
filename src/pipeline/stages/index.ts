export { IdentityStage } from './identity.js';
export { AverageStage } from './average.js';
export { PidStage, rectify } from './pid.js';
export {
  DampenedOscillatorStage,
  criticalDamping,
  OSCILLATOR_REST_POSITION,
} from './dampened-oscillator.js';
export { ClipStage } from './clip.js';
export { AtLeastStage } from './at-least.js';
export { SupersampleStage } from './supersample.js';
export { SubsampleStage } from './subsample.js';
