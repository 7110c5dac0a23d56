import * as THREE from 'three';

export interface SceneConfig {
  background: number;
  fov: number;
  near: number;
  far: number;
  target: THREE.Vector3;
  cameraDistance: number;
  // Direction from the target towards the camera; need not be normalized
  viewDirection: THREE.Vector3;
  ambientIntensity: number;
  keyLightIntensity: number;
  keyLightOffset: THREE.Vector3;
  gridSize: number;
  axesSize: number;
}

export function createDefaultSceneConfig(): SceneConfig {
  return {
    background: 0x070724,
    fov: 45,
    near: 0.1,
    far: 2000,
    target: new THREE.Vector3(5, 5, 5),
    cameraDistance: 15,
    viewDirection: new THREE.Vector3(1, 1, 1),
    ambientIntensity: 0.6,
    keyLightIntensity: 1,
    keyLightOffset: new THREE.Vector3(-5, 5, 0),
    gridSize: 20,
    axesSize: 2,
  };
}

/**
 * Camera position `cameraDistance` away from the target along `viewDirection`.
 */
export function cameraPositionFor(config: SceneConfig): THREE.Vector3 {
  const offset = config.viewDirection.clone().normalize().multiplyScalar(config.cameraDistance);
  return config.target.clone().add(offset);
}

/**
 * Lights and reference helpers, all placed relative to the target so every
 * preset sits in the middle of the grid. Needs no rendering context.
 */
export function buildScene(config: SceneConfig): THREE.Scene {
  const scene = new THREE.Scene();
  scene.background = new THREE.Color(config.background);

  scene.add(new THREE.AmbientLight(0xffffff, config.ambientIntensity));

  const keyLight = new THREE.DirectionalLight(0xffffff, config.keyLightIntensity);
  keyLight.position.copy(config.target).add(config.keyLightOffset);
  keyLight.target.position.copy(config.target);
  scene.add(keyLight, keyLight.target);

  const grid = new THREE.GridHelper(config.gridSize, config.gridSize, 0x999999, 0x444444);
  grid.position.copy(config.target);
  const axes = new THREE.AxesHelper(config.axesSize);
  axes.position.copy(config.target);
  scene.add(grid, axes);

  return scene;
}
