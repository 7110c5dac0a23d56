import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChargeSimulation } from '../simulation/ChargeSimulation';
import type { SimulationSnapshot } from '../simulation/ChargeSimulation';
import { SimulationLoop } from '../simulation/SimulationLoop';
import type { FrameScheduler } from '../simulation/SimulationLoop';

class ManualScheduler implements FrameScheduler {
  private pending: Map<number, () => void> = new Map();
  private nextHandle = 1;
  public cancelled: number[] = [];

  request(callback: () => void): number {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancel(handle: number): void {
    this.cancelled.push(handle);
    this.pending.delete(handle);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  runFrame(): void {
    const callbacks = Array.from(this.pending.values());
    this.pending.clear();
    callbacks.forEach((callback) => callback());
  }
}

function createSimulation(): ChargeSimulation {
  return new ChargeSimulation(
    [
      { charge: 1, mass: 1, position: { x: -1, y: 0, z: 0 }, velocity: { x: 0, y: 0, z: 0 } },
      { charge: -1, mass: 1, position: { x: 1, y: 0, z: 0 }, velocity: { x: 0, y: 0, z: 0 } },
    ],
    { k: 1, dt: 0.001 }
  );
}

describe('SimulationLoop', () => {
  let scheduler: ManualScheduler;
  let frames: SimulationSnapshot[];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    scheduler = new ManualScheduler();
    frames = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('steps once per frame while running', () => {
    const loop = new SimulationLoop(createSimulation(), (snapshot) => frames.push(snapshot), scheduler);
    loop.start();

    scheduler.runFrame();
    scheduler.runFrame();
    scheduler.runFrame();

    expect(frames.map((f) => f.stepCount)).toEqual([1, 2, 3]);
    expect(scheduler.pendingCount).toBe(1);
    expect(loop.isActive()).toBe(true);
  });

  it('keeps delivering frames without stepping while paused', () => {
    const simulation = createSimulation();
    const loop = new SimulationLoop(simulation, (snapshot) => frames.push(snapshot), scheduler);
    loop.start();

    scheduler.runFrame();
    simulation.pause();
    scheduler.runFrame();
    scheduler.runFrame();
    simulation.resume();
    scheduler.runFrame();

    expect(frames.map((f) => f.stepCount)).toEqual([1, 1, 1, 2]);
    expect(frames.map((f) => f.running)).toEqual([true, false, false, true]);
  });

  it('schedules a single chain of frames however often it is started', () => {
    const loop = new SimulationLoop(createSimulation(), (snapshot) => frames.push(snapshot), scheduler);
    loop.start();
    loop.start();

    scheduler.runFrame();

    expect(frames).toHaveLength(1);
  });

  it('cancels the pending frame on stop', () => {
    const loop = new SimulationLoop(createSimulation(), (snapshot) => frames.push(snapshot), scheduler);
    loop.start();
    scheduler.runFrame();

    loop.stop();
    scheduler.runFrame();

    expect(scheduler.cancelled).toEqual([2]);
    expect(frames).toHaveLength(1);
    expect(loop.isActive()).toBe(false);
  });
});
