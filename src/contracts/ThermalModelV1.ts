// ─── Thermal model contracts ──────────────────────────────────────────────────
//
// Shapes exchanged with the fitting and optimisation layers that call into the
// engine.  Nothing here performs a calculation.

import { InvalidInputError } from './errors';

export const INTERVENTION_TYPES = ['loft', 'double_glazing', 'cladding'] as const;

/** Generic fabric upgrades the engine can model and cost. */
export type InterventionType = typeof INTERVENTION_TYPES[number];

/** Parse an externally supplied intervention name (exact, lower-case wire form). */
export function parseInterventionType(value: string): InterventionType {
  const match = INTERVENTION_TYPES.find(t => t === value);
  if (match === undefined) {
    throw new InvalidInputError(
      'intervention',
      value,
      `expected one of ${INTERVENTION_TYPES.join(', ')}`,
    );
  }
  return match;
}

/**
 * Parse a list of intervention names into the distinct measures it asks for,
 * in the order they are applied: loft, then glazing, then cladding.  A measure
 * named twice is still done once.
 */
export function distinctInterventions(values: readonly string[]): InterventionType[] {
  const wanted = new Set(values.map(parseInterventionType));
  return INTERVENTION_TYPES.filter(t => wanted.has(t));
}

/**
 * Parameters of a fitted thermal model of one building.
 *
 * `scaleFactor` scales the reference 50 m² cuboid; `uValue` is the composite
 * fabric U-value (W/m²K) seen by the walls of that cuboid.
 */
export interface ThermalModelResult {
  scaleFactor: number;
  /** Air changes per hour. */
  ach: number;
  uValue: number;
  /** Boiler output (W). */
  boilerPower: number;
  /** Equivalent 24/7 thermostat setpoint (°C). */
  setpoint: number;
  /** Domestic hot water usage (kWh/day). */
  dhwUsage: number;
}

/** Building-adjusted internal temperature (BAIT) and heating regression coefficients. */
export interface BaitAndModelCoefs {
  solarGain: number;
  windChill: number;
  humidityDiscomfort: number;
  smoothing: number;
  threshold: number;
  /** Heating energy per heating degree day (kWh). */
  heatingKwh: number;
  dhwKwh: number;
  r2Score: number;
}

/** Parts of a building a costed intervention is priced against. */
export type StructuralArea =
  | 'exterior_wall_area'
  | 'floor_area'
  | 'window_area'
  | 'roof_area'
  | 'thermal_bridge';

/** One priced entry of the intervention catalogue. */
export interface CostedIntervention {
  name: string;
  actsOn: StructuralArea;
  /** £ per m² of the area it acts on. */
  cost: number;
  /** U-value after the intervention (W/m²K); null where it does not change the fabric. */
  uValue: number | null;
}

/** Areas measured from a site survey or floor plan (m²). */
export interface SurveyedSizes {
  /** Number of storeys, ground included.  Default 2. */
  nFloors?: number;
  totalFloorArea: number;
  exteriorWallArea: number;
  /** Default: one storey's floor area. */
  ceilingArea?: number;
  /** Default: estimated from floor area (detached, age band A). */
  windowArea?: number;
}
