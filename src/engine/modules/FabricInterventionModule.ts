import { isWallElement, isWindowElement } from '../../contracts/BuildingElementV1';
import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { distinctInterventions } from '../../contracts/ThermalModelV1';
import type {
  BaitAndModelCoefs,
  InterventionType,
  ThermalModelResult,
} from '../../contracts/ThermalModelV1';
import { InvalidInputError, requireNonNegative, requirePositive } from '../../contracts/errors';
import { MATERIAL, materialUValue } from '../catalog/fabricCatalog';
import { CLADDING_MAX_ACH, GLAZING_ACH_FACTOR, createStructureFromParams } from './HeatNetworkModule';
import type { BuildingNetwork } from './HeatNetworkModule';

// ─── Regression-coefficient savings ───────────────────────────────────────────
//
// Flat multipliers on the fitted BAIT / degree-day model.  Heating energy per
// degree day drops by the measure's typical saving; measures that seal the
// envelope also weaken the wind-chill term.  Different measures compound.
//
// Source: DESNZ National Energy Efficiency Data-Framework (NEED) typical
// savings, rounded up for a first-order estimate.

const HEATING_KWH_FACTOR: Record<InterventionType, number> = {
  loft:           0.90,
  cladding:       0.80,
  double_glazing: 0.85,
};

const WIND_CHILL_FACTOR: Record<InterventionType, number> = {
  loft:           1.00, // roof insulation leaves infiltration unchanged
  cladding:       0.95,
  double_glazing: 0.90,
};

/**
 * Apply fabric interventions to fitted BAIT and heating-model coefficients.
 * Returns a new object; a measure named more than once applies once.
 */
export function applyFabricInterventions(
  coefs: BaitAndModelCoefs,
  interventions: readonly InterventionType[],
): BaitAndModelCoefs {
  requireNonNegative('heatingKwh', coefs.heatingKwh);
  const result = { ...coefs };
  for (const intervention of distinctInterventions(interventions)) {
    result.heatingKwh *= HEATING_KWH_FACTOR[intervention];
    result.windChill *= WIND_CHILL_FACTOR[intervention];
  }
  return result;
}

// ─── Composite U-value algebra ────────────────────────────────────────────────
//
// A fitted model carries one composite U-value for the whole envelope.  Treat
// it as area-weighted resistances in series:
//
//   R_composite = 1 / U_fitted
//
// An intervention swaps one element's assumed existing resistance for its
// upgraded one, weighted by that element's share of the envelope area:
//
//   R_composite += f_element × (1/U_improved − 1/U_existing)
//
// The result is capped at the resistance of a fully upgraded envelope, floored
// at U = 0.1 W/m²K, and never allowed to exceed the fitted U-value.

/** Lowest composite U-value (W/m²K) the algebra may produce. */
export const MIN_COMPOSITE_U_VALUE = 0.1;
/** Ceiling on ACH after the glazing multiplier. */
const MAX_ACH = 10;

const FABRIC_U = {
  windowExisting: materialUValue(MATERIAL.SINGLE_GLAZED_METAL),   // 5.7
  windowImproved: materialUValue(MATERIAL.DOUBLE_GLAZED),         // 3.4
  wallExisting:   materialUValue(MATERIAL.CAVITY_WALL_FILLED),    // 0.45
  wallImproved:   materialUValue(MATERIAL.CLAD_WALL),             // 0.29
  roofExisting:   materialUValue(MATERIAL.ROOF_100MM),            // 0.34
  roofImproved:   materialUValue(MATERIAL.ROOF_300MM),            // 0.12
  floorImproved:  materialUValue(MATERIAL.SOLID_FLOOR_INSULATED), // 0.25
};

export interface EnvelopeFractions {
  walls: number;
  windows: number;
  roof: number;
  floor: number;
}

/**
 * Share of the outdoor-facing conductive area taken by each element class.
 * Only links touching ExternalAir count, so each element is counted once.
 */
export function envelopeAreaFractions(structure: BuildingNetwork): EnvelopeFractions {
  const areas: EnvelopeFractions = { walls: 0, windows: 0, roof: 0, floor: 0 };
  for (const { u, v, link } of structure.edges) {
    if (link.kind !== 'conductive') continue;
    let element: BuildingElement;
    if (v === 'ExternalAir') element = u;
    else if (u === 'ExternalAir') element = v;
    else continue;

    if (isWallElement(element)) areas.walls += link.interfaceArea;
    else if (isWindowElement(element)) areas.windows += link.interfaceArea;
    else if (element === 'Roof') areas.roof += link.interfaceArea;
    else if (element === 'Floor') areas.floor += link.interfaceArea;
  }

  const total = areas.walls + areas.windows + areas.roof + areas.floor;
  if (!(total > 0)) {
    throw new InvalidInputError('structure', total, 'has no envelope area exposed to the outdoor air');
  }
  return {
    walls: areas.walls / total,
    windows: areas.windows / total,
    roof: areas.roof / total,
    floor: areas.floor / total,
  };
}

/**
 * Improved thermal-model parameters after fabric interventions.  Each distinct
 * measure applies once, glazing before cladding, so the result does not depend
 * on the order of the list.
 *
 * @param structure  Building whose envelope proportions weight each upgrade.
 *                   Default: the reference cuboid built from `params`.
 */
export function applyThermalModelFabricInterventions(
  params: ThermalModelResult,
  interventions: readonly InterventionType[],
  structure?: BuildingNetwork,
): ThermalModelResult {
  const kinds = distinctInterventions(interventions);
  if (kinds.length === 0) {
    return { ...params };
  }
  const initialU = requirePositive('uValue', params.uValue);
  requirePositive('scaleFactor', params.scaleFactor);
  let ach = requireNonNegative('ach', params.ach);

  const f = envelopeAreaFractions(structure ?? createStructureFromParams(params));

  let resistance = 1 / initialU;
  for (const kind of kinds) {
    switch (kind) {
      case 'double_glazing':
        resistance += f.windows * (1 / FABRIC_U.windowImproved - 1 / FABRIC_U.windowExisting);
        ach = Math.min(ach * GLAZING_ACH_FACTOR, MAX_ACH);
        break;
      case 'cladding':
        resistance += f.walls * (1 / FABRIC_U.wallImproved - 1 / FABRIC_U.wallExisting);
        ach = Math.min(ach, CLADDING_MAX_ACH);
        break;
      case 'loft':
        resistance += f.roof * (1 / FABRIC_U.roofImproved - 1 / FABRIC_U.roofExisting);
        break;
    }
  }

  const bestResistance =
    f.walls / FABRIC_U.wallImproved +
    f.windows / FABRIC_U.windowImproved +
    f.roof / FABRIC_U.roofImproved +
    f.floor / FABRIC_U.floorImproved;
  resistance = Math.min(bestResistance, resistance);

  const uValue = Math.min(initialU, Math.max(MIN_COMPOSITE_U_VALUE, 1 / resistance));
  return { ...params, uValue, ach };
}
