import * as THREE from 'three';
import type { ParticleSnapshot } from '../simulation/ChargeSimulation';

// Converts the mass-derived particle size into scene units
export const SIZE_TO_WORLD = 0.004;

// Face colour is the particle colour dimmed by this factor
const FACE_COLOR_SCALE = 0.7;

type ParticleMesh = THREE.Mesh<THREE.SphereGeometry, THREE.MeshStandardMaterial>;

export class ParticleMeshManager {
  private scene: THREE.Scene;
  private particleMeshes: Map<number, ParticleMesh> = new Map();
  private particleGeometry: THREE.SphereGeometry;

  constructor(scene: THREE.Scene) {
    this.scene = scene;
    // Unit sphere, scaled per particle
    this.particleGeometry = new THREE.SphereGeometry(1, 16, 16);
  }

  public updateParticles(particles: readonly ParticleSnapshot[]): void {
    const seen: Set<number> = new Set();

    for (const particle of particles) {
      seen.add(particle.index);
      let mesh = this.particleMeshes.get(particle.index);

      if (!mesh) {
        mesh = new THREE.Mesh(this.particleGeometry, new THREE.MeshStandardMaterial());
        mesh.userData = { particleIndex: particle.index };
        this.scene.add(mesh);
        this.particleMeshes.set(particle.index, mesh);
      }

      const [r, g, b, a] = particle.color;
      mesh.material.color.setRGB(r * FACE_COLOR_SCALE, g * FACE_COLOR_SCALE, b * FACE_COLOR_SCALE);
      mesh.material.emissive.setRGB(r, g, b).multiplyScalar(0.2);
      mesh.material.transparent = a < 1;
      mesh.material.opacity = a;

      mesh.position.copy(particle.position);
      mesh.scale.setScalar(particle.size * SIZE_TO_WORLD);
    }

    // Remove meshes left over from a larger particle set
    for (const [index, mesh] of Array.from(this.particleMeshes.entries())) {
      if (!seen.has(index)) {
        this.scene.remove(mesh);
        mesh.material.dispose();
        this.particleMeshes.delete(index);
      }
    }
  }

  public getParticleMesh(index: number): ParticleMesh | undefined {
    return this.particleMeshes.get(index);
  }

  public getParticleMeshes(): ParticleMesh[] {
    return Array.from(this.particleMeshes.values());
  }

  public dispose(): void {
    for (const mesh of this.particleMeshes.values()) {
      this.scene.remove(mesh);
      mesh.material.dispose();
    }
    this.particleMeshes.clear();
    this.particleGeometry.dispose();
  }
}
