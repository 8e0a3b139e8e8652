import { requireNonNegative } from '../../contracts/errors';

// ─── Window area estimate ─────────────────────────────────────────────────────
//
// Linear glazing-area estimates from total floor area, by building form and
// construction age band.  Adapted from the RdSAP 2005 conventions (SAP 2005
// Appendix S, Table S4).  They were dropped from later SAP versions as too
// coarse, but serve as a starting point where no survey measurement exists.
//
// Age bands run A (pre-1900) to M (2023 onwards); later letters are newer.

export type BuildingType =
  | 'detached'
  | 'semi_detached'
  | 'end_terrace'
  | 'mid_terrace'
  | 'enclosed_mid_terrace'
  | 'enclosed_end_terrace'
  | 'flat'
  | 'maisonette';

export type BuildingAgeBand = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'I' | 'J' | 'K' | 'L' | 'M';

/** [m² of glazing per m² of floor, constant m²] */
type GlazingLine = readonly [slope: number, intercept: number];

const FLAT_GLAZING: Record<BuildingAgeBand, GlazingLine> = {
  A: [0.0801, 5.580],
  B: [0.0801, 5.580],
  C: [0.0801, 5.580],
  D: [0.0341, 8.562],
  E: [0.0717, 6.560],
  F: [0.1199, 1.975],
  G: [0.0501, 4.554],
  H: [0.0813, 3.744],
  I: [0.1148, 0.392],
  J: [0.1148, 0.392],
  K: [0.1148, 0.392],
  L: [0.1148, 0.392],
  M: [0.1148, 0.392],
};

const HOUSE_GLAZING: Record<BuildingAgeBand, GlazingLine> = {
  A: [0.1220, 6.875],
  B: [0.1220, 6.875],
  C: [0.1220, 6.875],
  D: [0.1294, 5.515],
  E: [0.1239, 7.332],
  F: [0.1252, 5.520],
  G: [0.1356, 5.252],
  H: [0.0948, 6.534],
  I: [0.1382, -0.027],
  J: [0.1435, 0.403],
  K: [0.1435, 0.403],
  L: [0.1435, 0.403],
  M: [0.1435, 0.403],
};

/**
 * Estimated total window area (m²) for a dwelling of `totalFloorArea` m²
 * (all storeys).  Never negative.
 */
export function estimateWindowArea(
  totalFloorArea: number,
  buildingType: BuildingType = 'detached',
  ageBand: BuildingAgeBand = 'A',
): number {
  requireNonNegative('totalFloorArea', totalFloorArea);
  const table = buildingType === 'flat' || buildingType === 'maisonette' ? FLAT_GLAZING : HOUSE_GLAZING;
  const [slope, intercept] = table[ageBand];
  return Math.max(0, slope * totalFloorArea + intercept);
}
