import materialUValuesJson from './materialUValues.json';
import costedInterventionsJson from './costedInterventions.json';
import type { CostedIntervention, StructuralArea } from '../../contracts/ThermalModelV1';
import { InvalidInputError } from '../../contracts/errors';

// ─── Fabric catalogue ─────────────────────────────────────────────────────────
//
// Two tables loaded once at module load:
//
//  materialUValues.json     – constructions and their U-values (W/m²K), after
//                             the RdSAP / BRE tabulated build-ups.
//  costedInterventions.json – priced retrofit measures (£/m² of the area they
//                             act on) with the U-value they leave behind.
//
// Lookups by name are case-insensitive.

const STRUCTURAL_AREAS: readonly StructuralArea[] = [
  'exterior_wall_area',
  'floor_area',
  'window_area',
  'roof_area',
  'thermal_bridge',
];

function isStructuralArea(value: unknown): value is StructuralArea {
  return STRUCTURAL_AREAS.some(a => a === value);
}

/** Validate one raw catalogue row. */
export function parseCostedIntervention(entry: unknown, index: number): CostedIntervention {
  if (
    typeof entry !== 'object' || entry === null ||
    !('name' in entry) || typeof entry.name !== 'string' ||
    !('actsOn' in entry) || !isStructuralArea(entry.actsOn) ||
    !('cost' in entry) || typeof entry.cost !== 'number' ||
    !('uValue' in entry) || (entry.uValue !== null && typeof entry.uValue !== 'number')
  ) {
    throw new InvalidInputError('costedInterventions.json', `entry ${index}`, 'expected name, actsOn, cost and uValue');
  }
  return { name: entry.name, actsOn: entry.actsOn, cost: entry.cost, uValue: entry.uValue };
}

const MATERIAL_U_VALUES: ReadonlyMap<string, number> = new Map(
  Object.entries(materialUValuesJson).map(([name, u]) => [name.toLowerCase(), u]),
);

const COSTED_INTERVENTIONS: readonly CostedIntervention[] =
  costedInterventionsJson.map((entry, i) => parseCostedIntervention(entry, i));

const COSTED_BY_NAME: ReadonlyMap<string, CostedIntervention> = new Map(
  COSTED_INTERVENTIONS.map(entry => [entry.name.toLowerCase(), entry]),
);

// ─── Named constructions used by the engine ───────────────────────────────────

export const MATERIAL = {
  /** Default wall: unfilled cavity, aerated block inner leaf. */
  CAVITY_WALL_UNFILLED:
    'Brick 102mm, cavity, 100mm standard aerated block, 12.5mm plasterboard on dabs',
  /** Assumed pre-retrofit wall when costing cladding against a fitted U-value. */
  CAVITY_WALL_FILLED:
    'Brick 102mm, mineral wool slab in cavity 50mm, 100mm standard aerated block, 13mm plaster',
  CLAD_WALL:
    'Shiplap boards, airspace, standard aerated block 100mm, mineral wool slab in cavity 50mm, 125mm high performance block, 13mm plaster',
  SINGLE_GLAZED_DEFAULT: 'Wood/PVC Single Glazed',
  SINGLE_GLAZED_METAL: 'Glazed wood or PVC-U door Metal Single Glazed',
  DOUBLE_GLAZED: 'Glazed wood or PVC-U door Metal Double Glazed',
  ROOF_50MM:
    'Pitched roof - Slates or tiles, sarking felt, ventilated air space, 50mm insulation between rafters, 9.5mm plasterboard',
  ROOF_100MM:
    'Pitched roof - Slates or tiles, sarking felt, ventilated air space, 100mm insulation between joists, 9.5mm plasterboard',
  ROOF_300MM:
    'Pitched roof - Slates or tiles, sarking felt, ventilated air space, 300mm insulation between joists, 9.5mm plasterboard',
  SOLID_FLOOR_INSULATED: 'Solid Floor Insulation',
} as const;

// ─── Lookups ──────────────────────────────────────────────────────────────────

/** U-value (W/m²K) of a named construction. */
export function materialUValue(name: string): number {
  const u = MATERIAL_U_VALUES.get(name.toLowerCase());
  if (u === undefined) {
    throw new InvalidInputError('material', name, 'not in the material U-value catalogue');
  }
  return u;
}

/** Priced intervention by its catalogue name. */
export function costedIntervention(name: string): CostedIntervention {
  const entry = COSTED_BY_NAME.get(name.toLowerCase());
  if (entry === undefined) {
    throw new InvalidInputError('intervention', name, 'not in the costed intervention catalogue');
  }
  return entry;
}

export function listCostedInterventions(): readonly CostedIntervention[] {
  return COSTED_INTERVENTIONS;
}
