import type { ParticleDescriptor, RGBA } from '../models/Particle';

export type PresetId =
  | 'orbital'
  | 'dipole'
  | 'ring'
  | 'ellipse'
  | 'spiral'
  | 'random-scatter'
  | 'stable-binary'
  | 'stable-circular';

export type RandomSource = () => number;

export interface PresetDefinition {
  name: string;
  create: (random?: RandomSource) => ParticleDescriptor[];
}

// Every layout is centred on this point
const CENTER = 5.0;

const GOLD: RGBA = [1.0, 0.8, 0.0, 0.9];

type Triple = [number, number, number];

function particle(
  position: Triple,
  velocity: Triple,
  charge: number,
  mass: number,
  color: RGBA
): ParticleDescriptor {
  return {
    charge,
    mass,
    position: { x: position[0], y: position[1], z: position[2] },
    velocity: { x: velocity[0], y: velocity[1], z: velocity[2] },
    color,
  };
}

function centralCharge(): ParticleDescriptor {
  return particle([CENTER, CENTER, CENTER], [0, 0, 0], +8e-6, 5e-2, GOLD);
}

/** `count` angles evenly spaced over a full turn, starting at 0. */
function evenAngles(count: number): number[] {
  return Array.from({ length: count }, (_, i) => (2 * Math.PI * i) / count);
}

/** `count` values from `start` to `end`, both ends included. */
function linspace(start: number, end: number, count: number): number[] {
  if (count === 1) return [start];
  const step = (end - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => start + i * step);
}

function orbital(): ParticleDescriptor[] {
  return [
    centralCharge(),
    particle([7.0, 5.0, 5.0], [0.0, 40.0, 0.0], -2e-6, 1e-3, [0.0, 0.5, 1.0, 0.8]),
    particle([3.0, 5.0, 5.0], [0.0, -40.0, 0.0], -2e-6, 1e-3, [0.0, 0.5, 1.0, 0.8]),
    particle([7.5, 7.5, 5.0], [-4.242, 4.242, 0.0], -3e-6, 3e-3, [1.0, 0.0, 0.0, 0.8]),
    particle([2.5, 7.5, 5.0], [-4.242, -4.242, 0.0], -3e-6, 3e-3, [0.0, 1.0, 0.0, 0.8]),
    particle([2.5, 2.5, 5.0], [4.242, -4.242, 0.0], -3e-6, 3e-3, [0.5, 0.0, 0.5, 0.8]),
    particle([7.5, 2.5, 5.0], [4.242, 4.242, 0.0], -3e-6, 3e-3, [1.0, 0.5, 0.0, 0.8]),
    particle([7.0, 5.0, 7.0], [4.242, 0.0, -4.242], +4e-6, 4e-3, [0.0, 1.0, 1.0, 0.8]),
    particle([3.0, 5.0, 3.0], [-4.242, 0.0, 4.242], +4e-6, 4e-3, [0.0, 1.0, 1.0, 0.8]),
  ];
}

function dipole(): ParticleDescriptor[] {
  return [
    particle([4.0, 5.0, 5.0], [0, 0, 0], +5e-6, 1e-2, [1.0, 0.0, 0.0, 0.9]),
    particle([6.0, 5.0, 5.0], [0, 0, 0], -5e-6, 1e-2, [0.0, 0.0, 1.0, 0.9]),
  ];
}

function ring(): ParticleDescriptor[] {
  return [
    centralCharge(),
    ...evenAngles(8).map((theta) =>
      particle(
        [CENTER + 3 * Math.cos(theta), CENTER + 3 * Math.sin(theta), CENTER],
        [0, 0, 0],
        -1e-6,
        1e-3,
        [0.0, 1.0, 0.0, 0.8]
      )
    ),
  ];
}

function ellipse(): ParticleDescriptor[] {
  return [
    centralCharge(),
    ...evenAngles(12).map((theta) =>
      particle(
        [CENTER + 5 * Math.cos(theta), CENTER + 3 * Math.sin(theta), CENTER],
        [-3 * Math.sin(theta), 2 * Math.cos(theta), 0],
        -1e-6,
        1e-3,
        [0.2, 0.7, 1.0, 0.8]
      )
    ),
  ];
}

function spiral(): ParticleDescriptor[] {
  return [
    centralCharge(),
    ...linspace(0.5, 3 * Math.PI, 15).map((theta) =>
      particle(
        [CENTER + theta * Math.cos(theta), CENTER + theta * Math.sin(theta), CENTER],
        [-Math.sin(theta), Math.cos(theta), 0],
        -1e-6,
        1e-3,
        [0.9, 0.3, 0.7, 0.8]
      )
    ),
  ];
}

function randomScatter(random: RandomSource = Math.random): ParticleDescriptor[] {
  const spread = () => random() - 0.5;
  const layout = Array.from({ length: 20 }, (): { position: Triple; velocity: Triple; charge: number } => ({
    position: [CENTER + 4 * spread(), CENTER + 4 * spread(), CENTER + 4 * spread()],
    velocity: [2 * spread(), 2 * spread(), 2 * spread()],
    charge: random() > 0.5 ? -1e-6 : +1e-6,
  }));
  // One colour shared by the whole cloud
  const color: RGBA = [random(), random(), random(), 0.8];
  return layout.map(({ position, velocity, charge }) => particle(position, velocity, charge, 1e-3, color));
}

function stableBinary(): ParticleDescriptor[] {
  return [
    particle([4.5, 5.0, 5.0], [0.0, 5.0, 0.0], +4e-6, 1e-2, [1.0, 0.3, 0.3, 1.0]),
    particle([5.5, 5.0, 5.0], [0.0, -5.0, 0.0], -4e-6, 1e-2, [0.3, 0.3, 1.0, 1.0]),
  ];
}

function stableCircular(): ParticleDescriptor[] {
  return [
    centralCharge(),
    ...evenAngles(4).map((theta) =>
      particle(
        [CENTER + 3 * Math.cos(theta), CENTER + 3 * Math.sin(theta), CENTER],
        [-3 * Math.sin(theta) * 2, 3 * Math.cos(theta) * 2, 0],
        -1e-6,
        1e-3,
        [0.0, 1.0, 1.0, 0.8]
      )
    ),
  ];
}

export const PRESETS: Record<PresetId, PresetDefinition> = {
  orbital: { name: 'Orbital', create: orbital },
  dipole: { name: 'Dipole', create: dipole },
  ring: { name: 'Ring', create: ring },
  ellipse: { name: 'Ellipse', create: ellipse },
  spiral: { name: 'Spiral', create: spiral },
  'random-scatter': { name: 'Random Scatter', create: randomScatter },
  'stable-binary': { name: 'Stable Binary', create: stableBinary },
  'stable-circular': { name: 'Stable Circular', create: stableCircular },
};

export const PRESET_IDS: readonly PresetId[] = [
  'orbital',
  'dipole',
  'ring',
  'ellipse',
  'spiral',
  'random-scatter',
  'stable-binary',
  'stable-circular',
];

export const DEFAULT_PRESET: PresetId = 'orbital';

export function isPresetId(value: string): value is PresetId {
  return PRESET_IDS.some((id) => id === value);
}

export function loadPreset(id: PresetId, random?: RandomSource): ParticleDescriptor[] {
  return PRESETS[id].create(random);
}
