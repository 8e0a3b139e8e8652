import {
  ORIENTATIONS,
  WALL_BY_ORIENTATION,
  WINDOW_BY_ORIENTATION,
  isWallElement,
  isWindowElement,
} from '../../contracts/BuildingElementV1';
import type { BuildingElement, Orientation } from '../../contracts/BuildingElementV1';
import { distinctInterventions } from '../../contracts/ThermalModelV1';
import type { InterventionType, ThermalModelResult } from '../../contracts/ThermalModelV1';
import {
  InvalidInputError,
  NetworkConstructionError,
  requireNonNegative,
  requirePositive,
} from '../../contracts/errors';
import { MATERIAL, materialUValue } from '../catalog/fabricCatalog';
import {
  DEFAULT_RADIATOR_DELTA_T,
  conductiveLink,
  convectiveLink,
  thermalRadiativeLink,
} from './ThermalLinkModule';
import type { ThermalLink, ThermalNodeState } from './ThermalLinkModule';

// ─── Heat network ─────────────────────────────────────────────────────────────
//
// A heat network is a set of thermal nodes (one per building element) joined
// by directed links.  It is assembled in three phases, in this order:
//
//   initialiseOutdoors()        → 'outdoors'   ExternalAir only
//   addStructureToGraph(...)    → 'structure'  walls, glazing, floor, roof, air
//   addHeatingSystemToGraph(..) → 'heating'    emitter coupled to the room air
//
// The phase is carried in the type, so calling them out of order does not
// compile.  Each phase extends the node map and edge list it was given and
// returns a new handle on them; the earlier handle sees the same nodes.

export type NetworkStage = 'outdoors' | 'structure' | 'heating';

export interface HeatEdge {
  /** Source node.  Positive link energy flows u → v. */
  readonly u: BuildingElement;
  readonly v: BuildingElement;
  readonly link: ThermalLink;
}

export interface HeatNetwork<S extends NetworkStage = NetworkStage> {
  readonly stage: S;
  readonly nodes: Map<BuildingElement, ThermalNodeState>;
  readonly edges: HeatEdge[];
}

/** Any network with a building in it: what the heat-loss calculators accept. */
export type BuildingNetwork = HeatNetwork<'structure' | 'heating'>;

// ─── Physical constants ───────────────────────────────────────────────────────
//
// Effective heat capacities of the lumped envelope nodes.  Masonry is given
// per m³ and applied over its depth; glazing and roof tiles are given per m²
// of element.  The envelope values are calibrated so that the one-day heat
// balance in HeatBalanceSolverV1 reproduces the reference cube figure.

/** Air at ~20 °C: ρ 1.2 kg/m³ × cp 990 J/kgK (J/m³K). */
export const AIR_HEAT_CAPACITY = 1188;
/** Brick and block wall (J/m³K). */
export const BRICK_HEAT_CAPACITY = 2_000_000;
/** Glazing unit and frame (J/m²K). */
export const GLASS_HEAT_CAPACITY = 1_000_000;
/** Ground-bearing slab in contact with the room (J/m³K). */
export const CONCRETE_HEAT_CAPACITY = 200_000;
/** Tiles, battens and felt (J/m²K). */
export const TILE_HEAT_CAPACITY = 132_914;

const WALL_DEPTH_M = 0.25;
const FLOOR_SLAB_DEPTH_M = 0.25;

/** Uninsulated solid ground floor (W/m²K). */
export const FLOOR_U_VALUE = 0.51;

export const DEFAULT_AIR_CHANGES_PER_HOUR = 1.5;
export const DEFAULT_FABRIC_TEMPERATURE_C = 18;
export const DEFAULT_OUTDOOR_TEMPERATURE_C = 15;

/** Pipework, boiler heat exchanger and primary water, per radiator (J/K). */
const HEATING_SYSTEM_BASE_MASS = 27_500;
/** One 1 kW panel radiator, 19 kg of steel and 3.6 L of water, with a 20 % pipework margin (J/K). */
const HEATING_SYSTEM_MASS_PER_RADIATOR = (9025 + 1494) * 1.2;
/** The emitter water starts this far below the flow temperature (K). */
const HEATING_SYSTEM_FLOW_DROP_K = 5;
/** Rated output of one radiator at ΔT 50 (W). */
export const RADIATOR_POWER_W = 1000;

const MIN_FLOW_TEMPERATURE_C = 20;
const MAX_FLOW_TEMPERATURE_C = 100;

/** Radiators are sized slightly below the boiler they are fed by. */
const EMITTER_TO_BOILER_RATIO = 0.75;

// ─── Inputs ───────────────────────────────────────────────────────────────────

export interface FabricUValues {
  wall: number;
  window: number;
  floor: number;
  roof: number;
}

export const DEFAULT_U_VALUES: FabricUValues = {
  wall:   materialUValue(MATERIAL.CAVITY_WALL_UNFILLED),  // 0.8
  window: materialUValue(MATERIAL.SINGLE_GLAZED_DEFAULT), // 4.8
  floor:  FLOOR_U_VALUE,
  roof:   materialUValue(MATERIAL.ROOF_50MM),             // 0.6
};

/** Share of the total glazed area on each façade.  Shares must sum to 1. */
export type GlazingSplit = Partial<Record<Orientation, number>>;

export const DEFAULT_GLAZING_SPLIT: GlazingSplit = { North: 0.5, South: 0.5 };

export interface StructureGeometry {
  /** Width of each of the four façades (m). */
  wallWidth: number;
  /** Total glazed area across the building (m²). */
  windowArea: number;
  /** Default: half the wall width. */
  wallHeight?: number;
  /** Ground-floor area (m²).  Default: wallWidth². */
  floorArea?: number;
  /** Default: the floor area. */
  roofArea?: number;
  /**
   * Heated air volume (m³).  When given, the room air also exchanges with the
   * outdoor air; when omitted the volume is floorArea × wallHeight and the
   * building is treated as airtight.
   */
  airVolume?: number;
  airChangesPerHour?: number;
  uValues?: Partial<FabricUValues>;
  glazingSplit?: GlazingSplit;
  /** Starting temperature of the air and fabric (°C). */
  initialTemperature?: number;
}

export interface HeatingSystemOptions {
  /** Design flow temperature (°C), 20–100.  Default 70. */
  flowTemperature?: number;
  /** Rated emitter temperature gap (K).  Default 50. */
  deltaT?: number;
  /** Number of 1 kW radiators lumped into the emitter.  Default 4. */
  nRadiators?: number;
  /** Total rated emitter output (W).  Default nRadiators × 1 kW. */
  emitterPower?: number;
}

export type SimpleStructureOptions = StructureGeometry & HeatingSystemOptions;

// ─── Network helpers ──────────────────────────────────────────────────────────

function node(temperature: number, thermalMass: number): ThermalNodeState {
  return { temperature, thermalMass, energyChange: 0 };
}

function addNode(network: HeatNetwork, element: BuildingElement, state: ThermalNodeState): void {
  if (network.nodes.has(element)) {
    throw new NetworkConstructionError(`${element} is already part of this network.`);
  }
  network.nodes.set(element, state);
}

function addEdge(network: HeatNetwork, u: BuildingElement, v: BuildingElement, link: ThermalLink): void {
  network.edges.push({ u, v, link });
}

/** State of `element`, or NetworkConstructionError if the map lacks it. */
export function requireState(
  states: ReadonlyMap<BuildingElement, ThermalNodeState>,
  element: BuildingElement,
): ThermalNodeState {
  const state = states.get(element);
  if (state === undefined) {
    throw new NetworkConstructionError(`Network has no ${element} node.`);
  }
  return state;
}

export function requireNode(network: HeatNetwork, element: BuildingElement): ThermalNodeState {
  return requireState(network.nodes, element);
}

/** Independent copy of every node's state, for calculators that must not touch the network. */
export function cloneNodeStates(network: HeatNetwork): Map<BuildingElement, ThermalNodeState> {
  const copy = new Map<BuildingElement, ThermalNodeState>();
  for (const [element, state] of network.nodes) {
    copy.set(element, { ...state });
  }
  return copy;
}

// ─── Phase 1: outdoors ────────────────────────────────────────────────────────

export function initialiseOutdoors(
  externalTemperature: number = DEFAULT_OUTDOOR_TEMPERATURE_C,
): HeatNetwork<'outdoors'> {
  const nodes = new Map<BuildingElement, ThermalNodeState>();
  nodes.set('ExternalAir', node(externalTemperature, Infinity));
  return { stage: 'outdoors', nodes, edges: [] };
}

// ─── Phase 2: structure ───────────────────────────────────────────────────────

function resolveGlazingSplit(split: GlazingSplit): Record<Orientation, number> {
  const shares: Record<Orientation, number> = { North: 0, East: 0, South: 0, West: 0 };
  let total = 0;
  for (const orientation of ORIENTATIONS) {
    const share = requireNonNegative(`glazingSplit.${orientation}`, split[orientation] ?? 0);
    shares[orientation] = share;
    total += share;
  }
  if (Math.abs(total - 1) > 1e-9) {
    throw new InvalidInputError('glazingSplit', total, 'shares must sum to 1');
  }
  return shares;
}

/**
 * Add a single-zone cuboid building to an outdoors-only network.
 *
 * Each façade carries the same opaque area, `wallWidth × wallHeight − windowArea`.
 * Glazing is split across façades by `glazingSplit`; only glazed façades get a
 * window node.  Every envelope element is coupled to the room air on its inner
 * face and to the outdoor air on its outer face through the same U-value and area.
 */
export function addStructureToGraph(
  network: HeatNetwork<'outdoors'>,
  geometry: StructureGeometry,
): HeatNetwork<'structure'> {
  requireNode(network, 'ExternalAir');
  if (network.nodes.has('InternalAir')) {
    throw new NetworkConstructionError('A structure has already been added to this network.');
  }

  const wallWidth = requirePositive('wallWidth', geometry.wallWidth);
  const wallHeight = requirePositive('wallHeight', geometry.wallHeight ?? wallWidth / 2);
  const windowArea = requireNonNegative('windowArea', geometry.windowArea);
  const floorArea = requirePositive('floorArea', geometry.floorArea ?? wallWidth * wallWidth);
  const roofArea = requirePositive('roofArea', geometry.roofArea ?? floorArea);
  const ach = requireNonNegative(
    'airChangesPerHour',
    geometry.airChangesPerHour ?? DEFAULT_AIR_CHANGES_PER_HOUR,
  );
  const initial = geometry.initialTemperature ?? DEFAULT_FABRIC_TEMPERATURE_C;
  const u: FabricUValues = { ...DEFAULT_U_VALUES, ...geometry.uValues };
  requirePositive('uValues.wall', u.wall);
  requirePositive('uValues.window', u.window);
  requirePositive('uValues.floor', u.floor);
  requirePositive('uValues.roof', u.roof);

  const opaqueArea = wallWidth * wallHeight - windowArea;
  if (opaqueArea <= 0) {
    throw new InvalidInputError(
      'windowArea',
      windowArea,
      `glazing must be smaller than one façade (${wallWidth * wallHeight} m²)`,
    );
  }
  const shares = resolveGlazingSplit(geometry.glazingSplit ?? DEFAULT_GLAZING_SPLIT);

  const airVolume = geometry.airVolume !== undefined
    ? requirePositive('airVolume', geometry.airVolume)
    : floorArea * wallHeight;

  addNode(network, 'InternalAir', node(initial, airVolume * AIR_HEAT_CAPACITY));

  for (const orientation of ORIENTATIONS) {
    addNode(
      network,
      WALL_BY_ORIENTATION[orientation],
      node(initial, BRICK_HEAT_CAPACITY * opaqueArea * WALL_DEPTH_M),
    );
  }
  const glazed = ORIENTATIONS.filter(o => shares[o] * windowArea > 0);
  for (const orientation of glazed) {
    addNode(
      network,
      WINDOW_BY_ORIENTATION[orientation],
      node(initial, GLASS_HEAT_CAPACITY * shares[orientation] * windowArea),
    );
  }
  addNode(network, 'Floor', node(initial, CONCRETE_HEAT_CAPACITY * floorArea * FLOOR_SLAB_DEPTH_M));
  addNode(network, 'Roof', node(initial, TILE_HEAT_CAPACITY * roofArea));

  const throughElement = (element: BuildingElement, area: number, uValue: number) => {
    addEdge(network, 'InternalAir', element, conductiveLink(area, uValue));
    addEdge(network, element, 'ExternalAir', conductiveLink(area, uValue));
  };

  for (const orientation of ORIENTATIONS) {
    throughElement(WALL_BY_ORIENTATION[orientation], opaqueArea, u.wall);
  }
  for (const orientation of glazed) {
    throughElement(WINDOW_BY_ORIENTATION[orientation], shares[orientation] * windowArea, u.window);
  }
  throughElement('Floor', floorArea, u.floor);
  throughElement('Roof', roofArea, u.roof);

  if (geometry.airVolume !== undefined) {
    addEdge(network, 'InternalAir', 'ExternalAir', convectiveLink(ach));
  }

  return { stage: 'structure', nodes: network.nodes, edges: network.edges };
}

// ─── Phase 3: heating ─────────────────────────────────────────────────────────

/**
 * Add a wet heating system: every emitter and the pipework lumped into one
 * HeatingSystem node starting just below the flow temperature, heating the
 * room air through a thermal-radiative link rated at `deltaT`.
 */
export function addHeatingSystemToGraph(
  network: HeatNetwork<'structure'>,
  options: HeatingSystemOptions = {},
): HeatNetwork<'heating'> {
  requireNode(network, 'InternalAir');
  if (network.nodes.has('HeatingSystem')) {
    throw new NetworkConstructionError('A heating system has already been added to this network.');
  }

  const flowTemperature = options.flowTemperature ?? 70;
  if (
    !Number.isFinite(flowTemperature) ||
    flowTemperature < MIN_FLOW_TEMPERATURE_C ||
    flowTemperature > MAX_FLOW_TEMPERATURE_C
  ) {
    throw new InvalidInputError(
      'flowTemperature',
      flowTemperature,
      `must be between ${MIN_FLOW_TEMPERATURE_C} and ${MAX_FLOW_TEMPERATURE_C} °C`,
    );
  }
  const nRadiators = options.nRadiators ?? 4;
  if (!Number.isInteger(nRadiators) || nRadiators <= 0) {
    throw new InvalidInputError('nRadiators', nRadiators, 'must be a positive integer');
  }
  const deltaT = requirePositive('deltaT', options.deltaT ?? DEFAULT_RADIATOR_DELTA_T);
  const emitterPower = requirePositive('emitterPower', options.emitterPower ?? RADIATOR_POWER_W * nRadiators);

  addNode(
    network,
    'HeatingSystem',
    node(
      flowTemperature - HEATING_SYSTEM_FLOW_DROP_K,
      (HEATING_SYSTEM_BASE_MASS + HEATING_SYSTEM_MASS_PER_RADIATOR * nRadiators) * nRadiators,
    ),
  );
  addEdge(network, 'HeatingSystem', 'InternalAir', thermalRadiativeLink(emitterPower, deltaT));

  return { stage: 'heating', nodes: network.nodes, edges: network.edges };
}

// ─── Composed builders ────────────────────────────────────────────────────────

/** Outdoors, one cuboid structure and a heating system in a single call. */
export function createSimpleStructure(options: SimpleStructureOptions): HeatNetwork<'heating'> {
  const structure = addStructureToGraph(initialiseOutdoors(), options);
  return addHeatingSystemToGraph(structure, options);
}

/** Floor area (m²) of the reference building at scale factor 1. */
export const REFERENCE_FLOOR_AREA = 50;
const REFERENCE_WALL_WIDTH = 10;
const REFERENCE_WALL_HEIGHT = 5;
/** Glazing as a share of floor area for the reference building. */
const REFERENCE_GLAZING_RATIO = 0.2;

/**
 * Reference cuboid for a fitted thermal model.
 *
 * Floor area 50 m² × scaleFactor; façades 10√s × 5√s m (area scales with s);
 * glazing 20 % of the floor area; walls at the fitted U-value; ventilation at
 * the fitted ACH; emitters sized at 75 % of the boiler output.
 */
export function createStructureFromParams(params: ThermalModelResult): HeatNetwork<'heating'> {
  const scale = requirePositive('scaleFactor', params.scaleFactor);
  requirePositive('uValue', params.uValue);
  requireNonNegative('ach', params.ach);
  const boilerPower = requirePositive('boilerPower', params.boilerPower);

  const floorArea = REFERENCE_FLOOR_AREA * scale;
  const wallHeight = REFERENCE_WALL_HEIGHT * Math.sqrt(scale);
  const emitterPower = boilerPower * EMITTER_TO_BOILER_RATIO;

  return createSimpleStructure({
    wallWidth: REFERENCE_WALL_WIDTH * Math.sqrt(scale),
    wallHeight,
    windowArea: REFERENCE_GLAZING_RATIO * floorArea,
    floorArea,
    airVolume: floorArea * wallHeight,
    airChangesPerHour: params.ach,
    uValues: { wall: params.uValue },
    nRadiators: Math.max(1, Math.ceil(emitterPower / RADIATOR_POWER_W)),
    emitterPower,
  });
}

// ─── Area getters ─────────────────────────────────────────────────────────────

function outerConductiveArea(
  network: HeatNetwork,
  matches: (element: BuildingElement) => boolean,
): number {
  let area = 0;
  for (const { u, v, link } of network.edges) {
    if (link.kind !== 'conductive') continue;
    if (v === 'ExternalAir' && matches(u)) area += link.interfaceArea;
    else if (u === 'ExternalAir' && matches(v)) area += link.interfaceArea;
  }
  return area;
}

function innerConductiveArea(network: HeatNetwork, element: BuildingElement): number {
  const edge = network.edges.find(
    e => e.u === 'InternalAir' && e.v === element && e.link.kind === 'conductive',
  );
  return edge !== undefined && edge.link.kind === 'conductive' ? edge.link.interfaceArea : 0;
}

/** Opaque wall area exposed to the outdoor air (m²). */
export function getWallArea(network: HeatNetwork): number {
  return outerConductiveArea(network, isWallElement);
}

/** Glazed area exposed to the outdoor air (m²). */
export function getWindowArea(network: HeatNetwork): number {
  return outerConductiveArea(network, isWindowElement);
}

/** Ceiling (room air to roof) area: where loft insulation goes (m²). */
export function getCeilingArea(network: HeatNetwork): number {
  return innerConductiveArea(network, 'Roof');
}

export function getFloorArea(network: HeatNetwork): number {
  return innerConductiveArea(network, 'Floor');
}

// ─── Interventions on a built network ─────────────────────────────────────────

/** Ventilation reduction from sealing new window frames. */
export const GLAZING_ACH_FACTOR = 0.8;
/** Air permeability ceiling after external cladding. */
export const CLADDING_MAX_ACH = 0.6;

/**
 * Copy of `network` with fabric upgrades applied to its links.
 *
 *   loft           – ceiling (room air → roof) at 300 mm insulation.
 *   double_glazing – both faces of every window at double-glazed U; ACH × 0.8.
 *   cladding       – both faces of every wall at the clad-wall U; ACH capped at 0.6.
 *
 * Repeating an entry has no further effect.  The input network is not modified.
 */
export function applyInterventionsToStructure<S extends 'structure' | 'heating'>(
  network: HeatNetwork<S>,
  interventions: readonly InterventionType[],
): HeatNetwork<S> {
  const wanted = new Set(distinctInterventions(interventions));
  const loftU = materialUValue(MATERIAL.ROOF_300MM);
  const windowU = materialUValue(MATERIAL.DOUBLE_GLAZED);
  const wallU = materialUValue(MATERIAL.CLAD_WALL);

  const edges = network.edges.map((edge): HeatEdge => {
    const { u, v, link } = edge;
    if (link.kind === 'conductive') {
      if (wanted.has('loft') && u === 'InternalAir' && v === 'Roof') {
        return { u, v, link: conductiveLink(link.interfaceArea, loftU) };
      }
      if (wanted.has('double_glazing') && (isWindowElement(u) || isWindowElement(v))) {
        return { u, v, link: conductiveLink(link.interfaceArea, windowU) };
      }
      if (wanted.has('cladding') && (isWallElement(u) || isWallElement(v))) {
        return { u, v, link: conductiveLink(link.interfaceArea, wallU) };
      }
    }
    if (link.kind === 'convective') {
      let ach = link.ach;
      if (wanted.has('double_glazing')) ach *= GLAZING_ACH_FACTOR;
      if (wanted.has('cladding')) ach = Math.min(ach, CLADDING_MAX_ACH);
      return { u, v, link: convectiveLink(ach) };
    }
    return edge;
  });

  return { stage: network.stage, nodes: cloneNodeStates(network), edges };
}
