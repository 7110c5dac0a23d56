import * as THREE from 'three';
import { createParticles } from '../models/Particle';
import type { Particle, ParticleDescriptor, RGBA } from '../models/Particle';
import { applyBounds } from '../physics/BoundsPolicy';
import { computeDiagnostics } from '../physics/Diagnostics';
import type { SimulationDiagnostics } from '../physics/Diagnostics';
import { computeForces } from '../physics/ForceModel';
import { integrate } from '../physics/Integrator';
import { resolveSimulationConfig, validateDt } from './SimulationConfig';
import type { SimulationConfig } from './SimulationConfig';
import type { NumericInstabilityWarning } from './errors';

export interface ParticleSnapshot {
  index: number;
  charge: number;
  mass: number;
  size: number;
  color: RGBA;
  active: boolean;
  position: THREE.Vector3;
  velocity: THREE.Vector3;
  trajectory: THREE.Vector3[];
}

export interface SimulationSnapshot {
  stepCount: number;
  elapsedTime: number;
  dt: number;
  running: boolean;
  particles: ParticleSnapshot[];
  // Both describe the most recent tick only
  deactivated: number[];
  warnings: NumericInstabilityWarning[];
}

export interface TrajectoryPoint {
  position: THREE.Vector3;
  recency: number; // 0 = oldest, 1 = newest
}

/**
 * Position of point `i` in a trail of `count` points, from 0 (oldest) to 1
 * (newest). A single point counts as newest.
 */
function recencyOf(i: number, count: number): number {
  return count <= 1 ? 1 : i / (count - 1);
}

export function trajectoryWithRecency(trajectory: readonly THREE.Vector3[]): TrajectoryPoint[] {
  return trajectory.map((position, i) => ({
    position,
    recency: recencyOf(i, trajectory.length),
  }));
}

function cloneDescriptor(descriptor: ParticleDescriptor): ParticleDescriptor {
  return {
    charge: descriptor.charge,
    mass: descriptor.mass,
    position: { x: descriptor.position.x, y: descriptor.position.y, z: descriptor.position.z },
    velocity: { x: descriptor.velocity.x, y: descriptor.velocity.y, z: descriptor.velocity.z },
    color: descriptor.color,
  };
}

/**
 * Owns the particle set and advances it one tick per `step()` call.
 *
 * There is no timer in here: whoever holds the instance decides when to call
 * `step()`. Everything the host may change (dt, pause state, the particle set
 * on reset) goes through the methods below; snapshots are copies.
 */
export class ChargeSimulation {
  private config: SimulationConfig;
  private descriptors: ParticleDescriptor[];
  private particles: Particle[];
  private running: boolean = true;
  private stepCount: number = 0;
  private elapsedTime: number = 0;
  private lastDeactivated: number[] = [];
  private lastWarnings: NumericInstabilityWarning[] = [];

  constructor(descriptors: readonly ParticleDescriptor[], config: Partial<SimulationConfig> = {}) {
    this.config = resolveSimulationConfig(config);
    this.particles = createParticles(descriptors);
    this.descriptors = descriptors.map(cloneDescriptor);
    console.log(`ChargeSimulation: loaded ${this.particles.length} particles`);
  }

  public step(): SimulationSnapshot {
    if (!this.running) {
      return this.getSnapshot();
    }

    const { k, minDistance, dt, bounds } = this.config;

    // All forces are summed before any particle moves
    const forces = computeForces(this.particles, k, minDistance);
    const warnings = this.checkForces(forces);

    integrate(this.particles, forces, dt);
    warnings.push(...this.checkSpeeds());

    const deactivated = applyBounds(this.particles, bounds);
    for (const index of deactivated) {
      console.log(`ChargeSimulation: particle ${index} left the bounds at step ${this.stepCount + 1}`);
    }

    for (const particle of this.particles) {
      if (particle.active) {
        this.appendTrajectory(particle);
      }
    }

    if (warnings.length > 0) {
      console.warn(
        `ChargeSimulation: numeric instability at step ${this.stepCount + 1} (${warnings.length} particle(s)); consider a smaller dt`
      );
    }

    this.stepCount += 1;
    this.elapsedTime += dt;
    this.lastDeactivated = deactivated;
    this.lastWarnings = warnings;

    return this.getSnapshot();
  }

  public setDt(value: number): void {
    validateDt(value);
    this.config.dt = value;
  }

  public getDt(): number {
    return this.config.dt;
  }

  public pause(): void {
    this.running = false;
  }

  public resume(): void {
    this.running = true;
  }

  public togglePause(): boolean {
    this.running = !this.running;
    return this.running;
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Rebuilds the particle set from the loaded descriptors, or from a new list
   * when one is given. A rejected list leaves the current run as it was.
   */
  public reset(descriptors?: readonly ParticleDescriptor[]): SimulationSnapshot {
    if (descriptors) {
      this.particles = createParticles(descriptors);
      this.descriptors = descriptors.map(cloneDescriptor);
    } else {
      this.particles = createParticles(this.descriptors);
    }

    this.stepCount = 0;
    this.elapsedTime = 0;
    this.lastDeactivated = [];
    this.lastWarnings = [];
    this.running = true;

    console.log(`ChargeSimulation: reset with ${this.particles.length} particles`);
    return this.getSnapshot();
  }

  public getSnapshot(): SimulationSnapshot {
    return {
      stepCount: this.stepCount,
      elapsedTime: this.elapsedTime,
      dt: this.config.dt,
      running: this.running,
      particles: this.particles.map((particle, index) => ({
        index,
        charge: particle.charge,
        mass: particle.mass,
        size: particle.size,
        color: particle.color,
        active: particle.active,
        position: particle.position.clone(),
        velocity: particle.velocity.clone(),
        trajectory: particle.trajectory.map((point) => point.clone()),
      })),
      deactivated: [...this.lastDeactivated],
      warnings: this.lastWarnings.map((warning) => ({ ...warning })),
    };
  }

  public getDiagnostics(): SimulationDiagnostics {
    return computeDiagnostics(this.particles, this.config.k, this.config.minDistance);
  }

  public getParticleCount(): number {
    return this.particles.length;
  }

  private appendTrajectory(particle: Particle): void {
    particle.trajectory.push(particle.position.clone());
    const cap = this.config.maxTrajectoryLength;
    if (cap !== null && particle.trajectory.length > cap) {
      particle.trajectory.splice(0, particle.trajectory.length - cap);
    }
  }

  private checkForces(forces: readonly THREE.Vector3[]): NumericInstabilityWarning[] {
    const threshold = this.config.maxForceMagnitude;
    // Written as !(<=) so that a NaN magnitude is reported too
    const warnings: NumericInstabilityWarning[] = [];
    forces.forEach((force, index) => {
      const magnitude = force.length();
      if (!(magnitude <= threshold)) {
        warnings.push({ kind: 'force', index, magnitude, threshold });
      }
    });
    return warnings;
  }

  private checkSpeeds(): NumericInstabilityWarning[] {
    const threshold = this.config.maxSpeed;
    const warnings: NumericInstabilityWarning[] = [];
    this.particles.forEach((particle, index) => {
      if (!particle.active) return;
      const magnitude = particle.velocity.length();
      if (!(magnitude <= threshold)) {
        warnings.push({ kind: 'velocity', index, magnitude, threshold });
      }
    });
    return warnings;
  }
}
