import * as THREE from 'three';
import { trajectoryWithRecency } from '../simulation/ChargeSimulation';
import type { ParticleSnapshot } from '../simulation/ChargeSimulation';

export const TRAIL_MIN_ALPHA = 0.1;
export const TRAIL_MAX_ALPHA = 0.6;

/**
 * Vertex opacity for a trail point, from its recency (0 = oldest, 1 = newest).
 */
export function trailAlpha(recency: number): number {
  return TRAIL_MIN_ALPHA + (TRAIL_MAX_ALPHA - TRAIL_MIN_ALPHA) * recency;
}

type TrailLine = THREE.Line<THREE.BufferGeometry, THREE.LineBasicMaterial>;

export class TrailMeshManager {
  private scene: THREE.Scene;
  private trailLines: Map<number, TrailLine> = new Map();

  constructor(scene: THREE.Scene) {
    this.scene = scene;
  }

  public updateTrails(particles: readonly ParticleSnapshot[]): void {
    const seen: Set<number> = new Set();

    for (const particle of particles) {
      seen.add(particle.index);
      let line = this.trailLines.get(particle.index);

      if (!line) {
        line = new THREE.Line(
          new THREE.BufferGeometry(),
          new THREE.LineBasicMaterial({ vertexColors: true, transparent: true })
        );
        line.userData = { particleIndex: particle.index };
        this.scene.add(line);
        this.trailLines.set(particle.index, line);
      }

      const count = particle.trajectory.length;
      if (count === 0) {
        line.visible = false;
        continue;
      }

      const positions = new Float32Array(count * 3);
      const colors = new Float32Array(count * 4);
      const [r, g, b] = particle.color;

      trajectoryWithRecency(particle.trajectory).forEach(({ position: point, recency }, i) => {
        positions[i * 3] = point.x;
        positions[i * 3 + 1] = point.y;
        positions[i * 3 + 2] = point.z;
        colors[i * 4] = r;
        colors[i * 4 + 1] = g;
        colors[i * 4 + 2] = b;
        colors[i * 4 + 3] = trailAlpha(recency);
      });

      line.geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
      line.geometry.setAttribute('color', new THREE.BufferAttribute(colors, 4));
      line.geometry.computeBoundingSphere();
      line.visible = true;
    }

    for (const [index, line] of Array.from(this.trailLines.entries())) {
      if (!seen.has(index)) {
        this.scene.remove(line);
        line.geometry.dispose();
        line.material.dispose();
        this.trailLines.delete(index);
      }
    }
  }

  public getTrailLine(index: number): TrailLine | undefined {
    return this.trailLines.get(index);
  }

  public dispose(): void {
    for (const line of this.trailLines.values()) {
      this.scene.remove(line);
      line.geometry.dispose();
      line.material.dispose();
    }
    this.trailLines.clear();
  }
}
