import * as THREE from 'three';
import { OrbitControls } from 'three/addons/controls/OrbitControls.js';
import { WebGPURenderer } from 'three/webgpu';
import { buildScene, cameraPositionFor, createDefaultSceneConfig } from './sceneSetup';
import type { SceneConfig } from './sceneSetup';

function createRenderer(background: number): WebGPURenderer | THREE.WebGLRenderer {
  const renderer = 'gpu' in navigator
    ? new WebGPURenderer({ antialias: true })
    : new THREE.WebGLRenderer({ antialias: true });
  renderer.setClearColor(new THREE.Color(background), 1);
  renderer.setPixelRatio(window.devicePixelRatio);
  renderer.setSize(window.innerWidth, window.innerHeight);
  return renderer;
}

export class SceneManager {
  public renderer: WebGPURenderer | THREE.WebGLRenderer;
  public scene: THREE.Scene;
  public camera: THREE.PerspectiveCamera;
  public controls: OrbitControls | null = null;
  private config: SceneConfig;

  constructor(config: SceneConfig = createDefaultSceneConfig()) {
    this.config = config;
    this.renderer = createRenderer(config.background);
    this.scene = buildScene(config);
    this.camera = new THREE.PerspectiveCamera(config.fov, window.innerWidth / window.innerHeight, config.near, config.far);
    this.camera.position.copy(cameraPositionFor(config));
    this.camera.lookAt(config.target);
  }

  public initializeControls(domElement: HTMLElement): void {
    this.controls = new OrbitControls(this.camera, domElement);
    this.controls.target.copy(this.config.target);
    this.controls.enableDamping = true;
  }

  public resize(width: number, height: number): void {
    this.camera.aspect = width / height;
    this.camera.updateProjectionMatrix();
    this.renderer.setSize(width, height);
  }

  public render(): void {
    this.controls?.update();
    this.renderer.render(this.scene, this.camera);
  }

  public dispose(): void {
    this.controls?.dispose();
    this.renderer.dispose();
  }
}
