import * as THREE from 'three';
import type { Particle, Vec3Like } from '../models/Particle';
import { SIMULATION_CONSTANTS } from './constants';

export type Bounds =
  | { kind: 'box'; min: number; max: number }
  | { kind: 'sphere'; center: Vec3Like; radius: number };

export function createDefaultBounds(): Bounds {
  return {
    kind: 'box',
    min: -SIMULATION_CONSTANTS.BOUNDARY_LIMIT,
    max: SIMULATION_CONSTANTS.BOUNDARY_LIMIT,
  };
}

export function isOutside(position: THREE.Vector3, bounds: Bounds): boolean {
  // A position that overflowed to NaN or Infinity is nowhere inside any volume
  if (!Number.isFinite(position.x) || !Number.isFinite(position.y) || !Number.isFinite(position.z)) {
    return true;
  }
  switch (bounds.kind) {
    case 'box':
      return (
        position.x < bounds.min || position.y < bounds.min || position.z < bounds.min ||
        position.x > bounds.max || position.y > bounds.max || position.z > bounds.max
      );
    case 'sphere': {
      const dx = position.x - bounds.center.x;
      const dy = position.y - bounds.center.y;
      const dz = position.z - bounds.center.z;
      return dx * dx + dy * dy + dz * dz > bounds.radius * bounds.radius;
    }
  }
}

/**
 * Deactivates every active particle outside the volume. Deactivation is never
 * undone here. Returns the indices deactivated by this call, ascending.
 */
export function applyBounds(particles: Particle[], bounds: Bounds): number[] {
  const deactivated: number[] = [];
  particles.forEach((particle, index) => {
    if (particle.active && isOutside(particle.position, bounds)) {
      particle.active = false;
      deactivated.push(index);
    }
  });
  return deactivated;
}
