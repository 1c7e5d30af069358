import type { Sample, StageSnapshot, Upstream } from '../../types/index.js';
import type { MonitorHandle } from '../../monitor/index.js';
import type { DampenedOscillatorSpec } from '../../config/config-schema.js';
import { BaseStage } from '../stage.js';

/** Starting position and target */
export const OSCILLATOR_REST_POSITION = 100;

/**
 * Critical damping coefficient for mass m and spring constant k.
 */
export function criticalDamping(mass: number, springConstant: number): number {
  return 2 * Math.sqrt(springConstant * mass);
}

/**
 * Point mass pulled toward the latest upstream value by a spring.
 *
 * Always critically damped: c is derived from m and k at construction and
 * any configured damping is ignored. Integration is a velocity-Verlet
 * style step with the velocity solved implicitly.
 */
export class DampenedOscillatorStage extends BaseStage {
  readonly kind = 'dampenedOscillator' as const;
  readonly tag = 'DampenedOscillator';

  private readonly m: number;
  private readonly k: number;
  private readonly dt: number;
  private readonly c: number;

  private target = OSCILLATOR_REST_POSITION;
  private pos = OSCILLATOR_REST_POSITION;
  private vel = 0;
  private acc = 0;

  constructor(spec: DampenedOscillatorSpec, index: number, monitor?: MonitorHandle) {
    super(index, monitor);
    this.m = spec.mass;
    this.k = spec.springConstant;
    this.dt = spec.dt;
    this.c = criticalDamping(spec.mass, spec.springConstant);
  }

  snapshot(): StageSnapshot {
    return {
      m: this.m,
      k: this.k,
      dt: this.dt,
      target: this.target,
      c: this.c,
      pos: this.pos,
      vel: this.vel,
      acc: this.acc,
    };
  }

  protected async produce(pull: Upstream): Promise<Sample | null> {
    const value = await pull();
    if (value === null) return null;

    this.target = value;
    const { m, k, c, dt } = this;

    const acc = -k * (this.pos - this.target) - c * this.vel;
    const newPos = this.pos + dt * this.vel + 0.5 * dt * dt * this.acc;
    const fac = dt / (2 * m);
    const newVel = (1 / (1 + c * fac)) * (this.vel * (1 - c * fac) + fac * (this.acc - acc));

    this.acc = acc;
    this.vel = newVel;
    this.pos = newPos;

    return newPos;
  }
}
