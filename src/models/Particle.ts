import * as THREE from 'three';
import { SIMULATION_CONSTANTS } from '../physics/constants';
import { InvalidParticleError } from '../simulation/errors';

export type RGBA = readonly [number, number, number, number];

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

export interface ParticleDescriptor {
  charge: number;
  mass: number;
  position: Vec3Like;
  velocity: Vec3Like;
  color?: RGBA;
}

export interface Particle {
  charge: number;
  mass: number;
  position: THREE.Vector3;
  velocity: THREE.Vector3;
  active: boolean;
  trajectory: THREE.Vector3[]; // oldest first
  size: number;
  color: RGBA;
}

export const DEFAULT_PARTICLE_COLOR: RGBA = [1, 1, 1, 1];

function isFiniteVector(v: Vec3Like): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/**
 * Structural validation only: physical plausibility of a preset is not checked.
 */
export function validateDescriptor(descriptor: ParticleDescriptor, index: number): void {
  if (!Number.isFinite(descriptor.charge)) {
    throw new InvalidParticleError(index, 'charge', `charge must be a finite number, got ${descriptor.charge}`);
  }
  if (!Number.isFinite(descriptor.mass) || descriptor.mass <= 0) {
    throw new InvalidParticleError(index, 'mass', `mass must be a positive finite number, got ${descriptor.mass}`);
  }
  if (!isFiniteVector(descriptor.position)) {
    throw new InvalidParticleError(index, 'position', 'position components must be finite');
  }
  if (!isFiniteVector(descriptor.velocity)) {
    throw new InvalidParticleError(index, 'velocity', 'velocity components must be finite');
  }
}

export function validateDescriptors(descriptors: readonly ParticleDescriptor[]): void {
  descriptors.forEach((descriptor, index) => validateDescriptor(descriptor, index));
}

/**
 * Visual size grows linearly with mass relative to the heaviest particle of the set.
 */
export function particleSize(mass: number, maxMass: number): number {
  return SIMULATION_CONSTANTS.BASE_SIZE + SIMULATION_CONSTANTS.MASS_SIZE_RANGE * (mass / maxMass);
}

export function createParticle(descriptor: ParticleDescriptor, maxMass: number): Particle {
  return {
    charge: descriptor.charge,
    mass: descriptor.mass,
    position: new THREE.Vector3(descriptor.position.x, descriptor.position.y, descriptor.position.z),
    velocity: new THREE.Vector3(descriptor.velocity.x, descriptor.velocity.y, descriptor.velocity.z),
    active: true,
    trajectory: [],
    size: particleSize(descriptor.mass, maxMass),
    color: descriptor.color ?? DEFAULT_PARTICLE_COLOR,
  };
}

/**
 * Validates the whole list before building anything, so a bad entry never yields a partial set.
 */
export function createParticles(descriptors: readonly ParticleDescriptor[]): Particle[] {
  validateDescriptors(descriptors);
  const maxMass = descriptors.reduce((max, d) => Math.max(max, d.mass), 0);
  return descriptors.map((descriptor) => createParticle(descriptor, maxMass));
}
