import * as THREE from 'three';
import type { Particle } from '../models/Particle';

type ChargedBody = Pick<Particle, 'charge' | 'position'>;

/**
 * Coulomb force exerted on `a` by `b`.
 *
 * The distance is floored at `minDistance` so the 1/r² term stays bounded when
 * particles get arbitrarily close. Exactly coincident bodies have no defined
 * direction and exert no force on each other.
 */
export function coulombForceBetween(
  a: ChargedBody,
  b: ChargedBody,
  k: number,
  minDistance: number,
  target: THREE.Vector3 = new THREE.Vector3()
): THREE.Vector3 {
  target.subVectors(a.position, b.position);
  const distance = target.length();
  if (distance === 0) {
    return target.set(0, 0, 0);
  }

  const effectiveDistance = Math.max(distance, minDistance);
  const forceMagnitude = (k * a.charge * b.charge) / (effectiveDistance * effectiveDistance);

  return target.divideScalar(distance).multiplyScalar(forceMagnitude);
}

/**
 * Net Coulomb force on every particle, indexed like the input.
 *
 * Each unordered pair of active particles is evaluated once and applied with
 * opposite signs. Inactive particles receive a zero vector and take part in no
 * pair. The input is not mutated.
 */
export function computeForces(
  particles: readonly Particle[],
  k: number,
  minDistance: number
): THREE.Vector3[] {
  const n = particles.length;
  const forces: THREE.Vector3[] = [];
  for (let i = 0; i < n; i++) {
    forces.push(new THREE.Vector3());
  }

  const pairForce = new THREE.Vector3();
  for (let i = 0; i < n; i++) {
    const pi = particles[i];
    if (!pi.active) continue;

    for (let j = i + 1; j < n; j++) {
      const pj = particles[j];
      if (!pj.active) continue;

      coulombForceBetween(pi, pj, k, minDistance, pairForce);
      forces[i].add(pairForce);
      forces[j].sub(pairForce);
    }
  }

  return forces;
}
