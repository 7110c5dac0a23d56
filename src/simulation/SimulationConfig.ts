import { createDefaultBounds } from '../physics/BoundsPolicy';
import type { Bounds } from '../physics/BoundsPolicy';
import { SIMULATION_CONSTANTS } from '../physics/constants';
import { InvalidParameterError } from './errors';

export interface SimulationConfig {
  dt: number;
  k: number;
  minDistance: number;
  bounds: Bounds;
  maxTrajectoryLength: number | null; // null keeps every point
  maxForceMagnitude: number;
  maxSpeed: number;
}

export function createDefaultSimulationConfig(): SimulationConfig {
  return {
    dt: SIMULATION_CONSTANTS.DEFAULT_DT,
    k: SIMULATION_CONSTANTS.COULOMB_K,
    minDistance: SIMULATION_CONSTANTS.MIN_DISTANCE,
    bounds: createDefaultBounds(),
    maxTrajectoryLength: null,
    maxForceMagnitude: SIMULATION_CONSTANTS.MAX_FORCE_MAGNITUDE,
    maxSpeed: SIMULATION_CONSTANTS.MAX_SPEED,
  };
}

export function validateDt(value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError('dt', value, 'time step must be a positive finite number');
  }
}

function validateBounds(bounds: Bounds): void {
  switch (bounds.kind) {
    case 'box':
      if (!Number.isFinite(bounds.min) || !Number.isFinite(bounds.max) || bounds.min >= bounds.max) {
        throw new InvalidParameterError('bounds', `${bounds.min}..${bounds.max}`, 'box needs finite min < max');
      }
      return;
    case 'sphere': {
      const { center, radius } = bounds;
      if (!Number.isFinite(center.x) || !Number.isFinite(center.y) || !Number.isFinite(center.z)) {
        throw new InvalidParameterError('bounds', 'sphere center', 'center components must be finite');
      }
      if (!Number.isFinite(radius) || radius <= 0) {
        throw new InvalidParameterError('bounds', radius, 'sphere radius must be a positive finite number');
      }
      return;
    }
  }
}

function copyBounds(bounds: Bounds): Bounds {
  switch (bounds.kind) {
    case 'box':
      return { kind: 'box', min: bounds.min, max: bounds.max };
    case 'sphere':
      return {
        kind: 'sphere',
        center: { x: bounds.center.x, y: bounds.center.y, z: bounds.center.z },
        radius: bounds.radius,
      };
  }
}

/**
 * Fills missing fields from the defaults and rejects anything the engine cannot run with.
 */
export function resolveSimulationConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const merged: SimulationConfig = { ...createDefaultSimulationConfig(), ...overrides };
  // The caller keeps no handle on the volume once it is resolved
  const config: SimulationConfig = { ...merged, bounds: copyBounds(merged.bounds) };

  validateDt(config.dt);
  if (!Number.isFinite(config.k)) {
    throw new InvalidParameterError('k', config.k, 'Coulomb constant must be finite');
  }
  if (!Number.isFinite(config.minDistance) || config.minDistance <= 0) {
    throw new InvalidParameterError('minDistance', config.minDistance, 'must be a positive finite number');
  }
  validateBounds(config.bounds);
  if (
    config.maxTrajectoryLength !== null &&
    (!Number.isInteger(config.maxTrajectoryLength) || config.maxTrajectoryLength <= 0)
  ) {
    throw new InvalidParameterError('maxTrajectoryLength', config.maxTrajectoryLength, 'must be null or a positive integer');
  }
  // Infinity disables a threshold
  if (!(config.maxForceMagnitude > 0)) {
    throw new InvalidParameterError('maxForceMagnitude', config.maxForceMagnitude, 'must be positive');
  }
  if (!(config.maxSpeed > 0)) {
    throw new InvalidParameterError('maxSpeed', config.maxSpeed, 'must be positive');
  }

  return config;
}
