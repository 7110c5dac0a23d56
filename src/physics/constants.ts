// Simulation constants (arbitrary simulation units)
export const SIMULATION_CONSTANTS = {
  COULOMB_K: 8.988e9, // Coulomb's constant
  DEFAULT_DT: 0.005,
  MIN_DISTANCE: 1e-14, // Distance floor to avoid the 1/r² singularity
  BOUNDARY_LIMIT: 100000, // Half-width of the default bounding box
  MAX_FORCE_MAGNITUDE: 1e12,
  MAX_SPEED: 1e6,
  BASE_SIZE: 20,
  MASS_SIZE_RANGE: 40,
  DT_SLIDER_SCALE: 2000,
  DT_SLIDER_MIN: 1,
  DT_SLIDER_MAX: 20,
} as const;
