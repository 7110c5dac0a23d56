import * as THREE from 'three';
import type { Particle } from '../models/Particle';

/**
 * Semi-implicit (symplectic) Euler: velocity first, then position from the new
 * velocity. `dt` is used as given; large steps with a small distance floor can
 * go unstable and that is left visible.
 */
export function integrate(particles: Particle[], forces: readonly THREE.Vector3[], dt: number): void {
  const acceleration = new THREE.Vector3();

  for (let i = 0; i < particles.length; i++) {
    const particle = particles[i];
    if (!particle.active) continue;

    acceleration.copy(forces[i]).divideScalar(particle.mass);
    particle.velocity.addScaledVector(acceleration, dt);
    particle.position.addScaledVector(particle.velocity, dt);
  }
}
