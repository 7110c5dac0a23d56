import type { ChargeSimulation, SimulationSnapshot } from './ChargeSimulation';

export interface FrameScheduler {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(() => callback()),
  cancel: (handle) => cancelAnimationFrame(handle),
};

/**
 * Drives a simulation once per frame. Frames keep coming while the simulation
 * is paused so the view can still render; only the step is skipped.
 */
export class SimulationLoop {
  private simulation: ChargeSimulation;
  private onFrame: (snapshot: SimulationSnapshot) => void;
  private scheduler: FrameScheduler;
  private handle: number | null = null;

  constructor(
    simulation: ChargeSimulation,
    onFrame: (snapshot: SimulationSnapshot) => void,
    scheduler: FrameScheduler = animationFrameScheduler
  ) {
    this.simulation = simulation;
    this.onFrame = onFrame;
    this.scheduler = scheduler;
  }

  public start(): void {
    if (this.handle !== null) return;
    this.handle = this.scheduler.request(this.tick);
  }

  public stop(): void {
    if (this.handle === null) return;
    this.scheduler.cancel(this.handle);
    this.handle = null;
  }

  public isActive(): boolean {
    return this.handle !== null;
  }

  private tick = (): void => {
    this.handle = this.scheduler.request(this.tick);
    const snapshot = this.simulation.isRunning() ? this.simulation.step() : this.simulation.getSnapshot();
    this.onFrame(snapshot);
  };
}
