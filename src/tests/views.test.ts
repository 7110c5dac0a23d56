import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as THREE from 'three';
import { ChargeSimulation } from '../simulation/ChargeSimulation';
import { ParticleMeshManager, SIZE_TO_WORLD } from '../views/ParticleMeshManager';
import { TrailMeshManager, trailAlpha } from '../views/TrailMeshManager';
import { buildScene, cameraPositionFor, createDefaultSceneConfig } from '../views/sceneSetup';

function createSimulation(): ChargeSimulation {
  return new ChargeSimulation(
    [
      { charge: 1, mass: 4, position: { x: -1, y: 0, z: 0 }, velocity: { x: 0, y: 0, z: 0 }, color: [1, 0.8, 0, 0.9] },
      { charge: -1, mass: 1, position: { x: 1, y: 0, z: 0 }, velocity: { x: 0, y: 1, z: 0 } },
    ],
    { k: 1, dt: 0.01 }
  );
}

describe('trailAlpha', () => {
  it('fades linearly from 0.1 for the oldest point to 0.6 for the newest', () => {
    expect(trailAlpha(0)).toBeCloseTo(0.1, 12);
    expect(trailAlpha(0.5)).toBeCloseTo(0.35, 12);
    expect(trailAlpha(1)).toBeCloseTo(0.6, 12);
  });
});

describe('scene setup', () => {
  it('places the camera at the configured distance from the target', () => {
    const config = createDefaultSceneConfig();
    const position = cameraPositionFor(config);

    expect(position.distanceTo(config.target)).toBeCloseTo(15, 9);
    expect(position.x).toBeCloseTo(5 + 15 / Math.sqrt(3), 9);
    expect(position.x).toBeCloseTo(position.y, 12);
    expect(position.y).toBeCloseTo(position.z, 12);
  });

  it('builds the lights and helpers around the target', () => {
    const config = createDefaultSceneConfig();
    const scene = buildScene(config);

    const background = scene.background;
    expect(background instanceof THREE.Color ? background.getHex() : null).toBe(0x070724);
    const grid = scene.children.find((child) => child instanceof THREE.GridHelper);
    const axes = scene.children.find((child) => child instanceof THREE.AxesHelper);
    expect(grid?.position.toArray()).toEqual([5, 5, 5]);
    expect(axes?.position.toArray()).toEqual([5, 5, 5]);
    expect(scene.children.filter((child) => child instanceof THREE.Light)).toHaveLength(2);
  });
});

describe('scene managers', () => {
  let scene: THREE.Scene;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    scene = new THREE.Scene();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('places one sphere per particle, sized by mass', () => {
    const manager = new ParticleMeshManager(scene);
    const snapshot = createSimulation().getSnapshot();

    manager.updateParticles(snapshot.particles);

    const heavy = manager.getParticleMesh(0);
    const light = manager.getParticleMesh(1);
    expect(manager.getParticleMeshes()).toHaveLength(2);
    expect(heavy?.scale.x).toBeCloseTo(60 * SIZE_TO_WORLD, 12);
    expect(light?.scale.x).toBeCloseTo(30 * SIZE_TO_WORLD, 12);
    expect(heavy?.position.toArray()).toEqual([-1, 0, 0]);
    expect(heavy?.material.color.r).toBeCloseTo(0.7, 6);
    expect(heavy?.material.color.g).toBeCloseTo(0.56, 6);
    expect(heavy?.material.opacity).toBe(0.9);
    expect(heavy?.material.transparent).toBe(true);
    expect(light?.material.transparent).toBe(false);
  });

  it('follows the particles and drops meshes for a smaller set', () => {
    const manager = new ParticleMeshManager(scene);
    const simulation = createSimulation();
    manager.updateParticles(simulation.getSnapshot().particles);

    const moved = simulation.step();
    manager.updateParticles(moved.particles);
    expect(manager.getParticleMesh(1)?.position.y).toBe(moved.particles[1].position.y);

    manager.updateParticles(moved.particles.slice(0, 1));
    expect(manager.getParticleMeshes()).toHaveLength(1);
    expect(scene.children).toHaveLength(1);

    manager.dispose();
    expect(scene.children).toHaveLength(0);
  });

  it('draws trails with a per-vertex opacity gradient', () => {
    const manager = new TrailMeshManager(scene);
    const simulation = createSimulation();

    manager.updateTrails(simulation.getSnapshot().particles);
    expect(manager.getTrailLine(0)?.visible).toBe(false);

    simulation.step();
    simulation.step();
    const snapshot = simulation.step();
    manager.updateTrails(snapshot.particles);

    const line = manager.getTrailLine(0);
    expect(line?.visible).toBe(true);
    const positions = line?.geometry.getAttribute('position');
    const colors = line?.geometry.getAttribute('color');
    expect(positions?.count).toBe(3);
    expect(positions?.getX(2)).toBeCloseTo(snapshot.particles[0].position.x, 6);
    expect(colors?.getX(0)).toBe(1);
    expect(colors?.getW(0)).toBeCloseTo(0.1, 6);
    expect(colors?.getW(1)).toBeCloseTo(0.35, 6);
    expect(colors?.getW(2)).toBeCloseTo(0.6, 6);
  });

  it('hides trails again after a reset', () => {
    const manager = new TrailMeshManager(scene);
    const simulation = createSimulation();
    manager.updateTrails(simulation.step().particles);
    expect(manager.getTrailLine(1)?.visible).toBe(true);

    manager.updateTrails(simulation.reset().particles);

    expect(manager.getTrailLine(1)?.visible).toBe(false);
    manager.dispose();
    expect(scene.children).toHaveLength(0);
  });
});
