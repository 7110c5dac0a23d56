export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ParticleField = 'charge' | 'mass' | 'position' | 'velocity';

/**
 * Raised when a particle descriptor is structurally invalid. Fatal to the load
 * that supplied it.
 */
export class InvalidParticleError extends SimulationError {
  readonly index: number;
  readonly field: ParticleField;

  constructor(index: number, field: ParticleField, message: string) {
    super(`Particle ${index}: ${message}`);
    this.index = index;
    this.field = field;
  }
}

/**
 * Raised when a simulation parameter is rejected. The previous value stays in
 * effect.
 */
export class InvalidParameterError extends SimulationError {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, message: string) {
    super(`Invalid ${parameter} (${String(value)}): ${message}`);
    this.parameter = parameter;
    this.value = value;
  }
}

export interface NumericInstabilityWarning {
  kind: 'force' | 'velocity';
  index: number;
  magnitude: number;
  threshold: number;
}
