import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import { BaseStage } from '../stage.js';

/**
 * Passthrough. A no-op placeholder in a chain.
 */
export class IdentityStage extends BaseStage {
  readonly kind = 'identity' as const;
  readonly tag = 'Identity';

  snapshot(): StageSnapshot {
    return {};
  }

  protected produce(pull: Upstream): Promise<Sample | null> {
    return pull();
  }
}
