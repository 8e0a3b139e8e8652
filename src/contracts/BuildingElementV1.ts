// ─── Building elements ────────────────────────────────────────────────────────
//
// The closed set of node identities a heat network may contain.  Each identity
// appears at most once per network.

export const BUILDING_ELEMENTS = [
  'ExternalAir',
  'InternalAir',
  'WallNorth',
  'WallEast',
  'WallSouth',
  'WallWest',
  'WindowsNorth',
  'WindowsEast',
  'WindowsSouth',
  'WindowsWest',
  'Floor',
  'Roof',
  'HeatingSystem',
] as const;

export type BuildingElement = typeof BUILDING_ELEMENTS[number];

export type Orientation = 'North' | 'East' | 'South' | 'West';

export const ORIENTATIONS: readonly Orientation[] = ['North', 'East', 'South', 'West'];

export type WallElement = 'WallNorth' | 'WallEast' | 'WallSouth' | 'WallWest';
export type WindowElement = 'WindowsNorth' | 'WindowsEast' | 'WindowsSouth' | 'WindowsWest';

export const WALL_BY_ORIENTATION: Record<Orientation, WallElement> = {
  North: 'WallNorth',
  East:  'WallEast',
  South: 'WallSouth',
  West:  'WallWest',
};

export const WINDOW_BY_ORIENTATION: Record<Orientation, WindowElement> = {
  North: 'WindowsNorth',
  East:  'WindowsEast',
  South: 'WindowsSouth',
  West:  'WindowsWest',
};

export const WALL_ELEMENTS: readonly WallElement[] = ORIENTATIONS.map(o => WALL_BY_ORIENTATION[o]);
export const WINDOW_ELEMENTS: readonly WindowElement[] = ORIENTATIONS.map(o => WINDOW_BY_ORIENTATION[o]);

/** Reporting categories used when a per-element breakdown is summarised. */
export type HeatLossCategory = 'walls' | 'windows' | 'floor' | 'roof' | 'ventilation';

const WALL_SET: ReadonlySet<BuildingElement> = new Set<BuildingElement>(WALL_ELEMENTS);
const WINDOW_SET: ReadonlySet<BuildingElement> = new Set<BuildingElement>(WINDOW_ELEMENTS);

export function isWallElement(element: BuildingElement): element is WallElement {
  return WALL_SET.has(element);
}

export function isWindowElement(element: BuildingElement): element is WindowElement {
  return WINDOW_SET.has(element);
}

/**
 * Category a link from InternalAir to `element` is reported under.
 * Null for elements that are not heat-loss paths (the heating system, the air itself).
 */
export function heatLossCategory(element: BuildingElement): HeatLossCategory | null {
  if (isWallElement(element)) return 'walls';
  if (isWindowElement(element)) return 'windows';
  if (element === 'Floor') return 'floor';
  if (element === 'Roof') return 'roof';
  if (element === 'ExternalAir') return 'ventilation';
  return null;
}
