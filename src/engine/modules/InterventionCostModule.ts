import { INTERVENTION_TYPES, distinctInterventions } from '../../contracts/ThermalModelV1';
import type {
  InterventionType,
  StructuralArea,
  SurveyedSizes,
  ThermalModelResult,
} from '../../contracts/ThermalModelV1';
import { InvalidInputError, requireNonNegative, requirePositive } from '../../contracts/errors';
import { costedIntervention } from '../catalog/fabricCatalog';
import {
  createStructureFromParams,
  getCeilingArea,
  getWallArea,
  getWindowArea,
} from './HeatNetworkModule';
import type { BuildingNetwork } from './HeatNetworkModule';
import { estimateWindowArea } from './WindowAreaEstimator';

// ─── Intervention costs ───────────────────────────────────────────────────────
//
// Retrofit measures are priced per m² of the part of the building they act on.
// Generic interventions map to one representative catalogue entry:
//
//   cladding       → external insulation to a cavity wall, × exterior wall area
//   double_glazing → replacement external windows,         × window area
//   loft           → insulation to the ceiling void,       × ceiling area
//
// All costs are in GBP, excluding VAT.

const GENERIC_CATALOGUE_ENTRY: Record<InterventionType, string> = {
  cladding:       'External Insulation to external cavity wall',
  double_glazing: 'Replacement External Windows',
  loft:           'Insulation to ceiling void',
};

function genericRate(kind: InterventionType): number {
  return costedIntervention(GENERIC_CATALOGUE_ENTRY[kind]).cost;
}

/**
 * Total cost (£) of the generic interventions on a built network.
 * Each distinct measure is charged once.
 */
export function calculateInterventionCostsStructure(
  structure: BuildingNetwork,
  interventions: readonly InterventionType[],
): number {
  if (interventions.length === 0) return 0;

  const area: Record<InterventionType, number> = {
    cladding:       getWallArea(structure),
    double_glazing: getWindowArea(structure),
    loft:           getCeilingArea(structure),
  };
  return distinctInterventions(interventions)
    .reduce((total, kind) => total + area[kind] * genericRate(kind), 0);
}

/** Total cost (£) of the generic interventions on the reference building for fitted parameters. */
export function calculateInterventionCostsParams(
  params: ThermalModelResult,
  interventions: readonly InterventionType[],
): number {
  if (interventions.length === 0) return 0;
  return calculateInterventionCostsStructure(createStructureFromParams(params), interventions);
}

// ─── Surveyed buildings ───────────────────────────────────────────────────────

export const DEFAULT_SURVEYED_FLOORS = 2;

export type SurveyedAreas = Record<StructuralArea, number>;

/** Resolve a survey's optional fields into the areas each measure is priced against. */
export function resolveSurveyedAreas(sizes: SurveyedSizes): SurveyedAreas {
  const nFloors = sizes.nFloors ?? DEFAULT_SURVEYED_FLOORS;
  if (!Number.isInteger(nFloors) || nFloors < 1) {
    throw new InvalidInputError('nFloors', nFloors, 'must be a positive integer');
  }
  const totalFloorArea = requirePositive('totalFloorArea', sizes.totalFloorArea);
  const groundFloorArea = totalFloorArea / nFloors;

  return {
    exterior_wall_area: requireNonNegative('exteriorWallArea', sizes.exteriorWallArea),
    floor_area: groundFloorArea,
    window_area: requireNonNegative('windowArea', sizes.windowArea ?? estimateWindowArea(totalFloorArea)),
    roof_area: requireNonNegative('ceilingArea', sizes.ceilingArea ?? groundFloorArea),
    // Surveys carry no thermal-bridge measurement.
    thermal_bridge: 0,
  };
}

export interface InterventionCostLine {
  name: string;
  actsOn: StructuralArea;
  /** m² */
  area: number;
  /** £/m² */
  rate: number;
  /** £ */
  cost: number;
}

function matchGeneric(name: string): InterventionType | undefined {
  const lower = name.toLowerCase();
  return INTERVENTION_TYPES.find(t => t === lower);
}

/**
 * Price each named intervention against surveyed areas.
 *
 * Names are either the generic interventions or entries of the costed
 * intervention catalogue (case-insensitive).  Unknown names throw.
 */
export function itemiseSurveyedInterventionCosts(
  sizes: SurveyedSizes,
  interventionNames: readonly string[],
): InterventionCostLine[] {
  const areas = resolveSurveyedAreas(sizes);
  return interventionNames.map(name => {
    const generic = matchGeneric(name);
    const entry = costedIntervention(generic !== undefined ? GENERIC_CATALOGUE_ENTRY[generic] : name);
    const area = areas[entry.actsOn];
    return { name, actsOn: entry.actsOn, area, rate: entry.cost, cost: area * entry.cost };
  });
}

/** Total cost (£) of the named interventions on a surveyed building. */
export function calculateSurveyedInterventionCosts(
  sizes: SurveyedSizes,
  interventionNames: readonly string[],
): number {
  return itemiseSurveyedInterventionCosts(sizes, interventionNames)
    .reduce((total, line) => total + line.cost, 0);
}
