import * as THREE from 'three';
import type { Particle } from '../models/Particle';

export interface SimulationDiagnostics {
  momentum: THREE.Vector3;
  kineticEnergy: number;
  potentialEnergy: number;
  totalEnergy: number;
  activeCount: number;
}

/**
 * Σ m·v over active particles.
 */
export function totalMomentum(particles: readonly Particle[]): THREE.Vector3 {
  const momentum = new THREE.Vector3();
  for (const particle of particles) {
    if (!particle.active) continue;
    momentum.addScaledVector(particle.velocity, particle.mass);
  }
  return momentum;
}

export function kineticEnergy(particles: readonly Particle[]): number {
  let energy = 0;
  for (const particle of particles) {
    if (!particle.active) continue;
    energy += 0.5 * particle.mass * particle.velocity.lengthSq();
  }
  return energy;
}

/**
 * Pairwise electrostatic potential energy k·qi·qj / r, with the same distance
 * floor the force model applies.
 */
export function potentialEnergy(particles: readonly Particle[], k: number, minDistance: number): number {
  let energy = 0;
  for (let i = 0; i < particles.length; i++) {
    if (!particles[i].active) continue;
    for (let j = i + 1; j < particles.length; j++) {
      if (!particles[j].active) continue;
      const distance = Math.max(particles[i].position.distanceTo(particles[j].position), minDistance);
      energy += (k * particles[i].charge * particles[j].charge) / distance;
    }
  }
  return energy;
}

export function computeDiagnostics(
  particles: readonly Particle[],
  k: number,
  minDistance: number
): SimulationDiagnostics {
  const kinetic = kineticEnergy(particles);
  const potential = potentialEnergy(particles, k, minDistance);
  return {
    momentum: totalMomentum(particles),
    kineticEnergy: kinetic,
    potentialEnergy: potential,
    totalEnergy: kinetic + potential,
    activeCount: particles.filter((p) => p.active).length,
  };
}
