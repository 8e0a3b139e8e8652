import { BUILDING_ELEMENTS, heatLossCategory } from '../../contracts/BuildingElementV1';
import type { BuildingElement, HeatLossCategory } from '../../contracts/BuildingElementV1';
import { requireNode } from './HeatNetworkModule';
import type { BuildingNetwork } from './HeatNetworkModule';
import { stepLink } from './ThermalLinkModule';

// ─── Design conditions ────────────────────────────────────────────────────────
//
// Steady-state heat loss at design conditions, in the manner of a BS EN 12831
// room-by-room calculation collapsed to one zone: every path out of the room
// air is evaluated against the temperature on its far side.
//
//  Floor → ground.  The slab sees the annual mean ground temperature, not the
//          outdoor air.  11.3 °C is the UK mean (CIBSE Guide A Table 2.34).
//  Roof  → loft.    A ventilated, unheated roof space sits ~11 K below the room
//          on a design day.
//  Everything else → outdoor air.

export const DEFAULT_INTERNAL_TEMPERATURE_C = 21;
export const DEFAULT_EXTERNAL_TEMPERATURE_C = -2;
export const GROUND_TEMPERATURE_C = 11.3;
export const ROOF_SPACE_TEMPERATURE_DROP_K = 11;

export interface StaticHeatLossOptions {
  internalTemperature?: number;
  externalTemperature?: number;
  groundTemperature?: number;
  roofSpaceDrop?: number;
}

/** W per far-side element; negative = heat leaving the room air. */
export type HeatLossBreakdown = Partial<Record<BuildingElement, number>>;

export type HeatLossSummary = Record<HeatLossCategory, number>;

/**
 * Heat loss (W) through each link out of the room air, keyed by the element
 * on the far side.  Links to the heating system are not heat-loss paths and
 * are skipped.  Each link is evaluated over one second on scratch node states,
 * so the network is not modified.
 */
export function calculateMaximumStaticHeatLossBreakdown(
  network: BuildingNetwork,
  options: StaticHeatLossOptions = {},
): HeatLossBreakdown {
  const internal = options.internalTemperature ?? DEFAULT_INTERNAL_TEMPERATURE_C;
  const external = options.externalTemperature ?? DEFAULT_EXTERNAL_TEMPERATURE_C;
  const ground = options.groundTemperature ?? GROUND_TEMPERATURE_C;
  const roofDrop = options.roofSpaceDrop ?? ROOF_SPACE_TEMPERATURE_DROP_K;

  const roomAir = requireNode(network, 'InternalAir');

  const farSideTemperature = (element: BuildingElement): number => {
    if (element === 'Floor') return ground;
    if (element === 'Roof') return internal - roofDrop;
    return external;
  };

  const breakdown: HeatLossBreakdown = {};
  for (const { u, v, link } of network.edges) {
    if (u !== 'InternalAir' || v === 'HeatingSystem') continue;

    const room = { temperature: internal, thermalMass: roomAir.thermalMass, energyChange: 0 };
    const far = { temperature: farSideTemperature(v), thermalMass: requireNode(network, v).thermalMass, energyChange: 0 };
    stepLink(link, room, far, 1);
    breakdown[v] = (breakdown[v] ?? 0) + room.energyChange;
  }
  return breakdown;
}

/**
 * Worst-case steady-state heat loss (W) of the building: the sum of the
 * breakdown.  Negative while the room is warmer than its surroundings.
 */
export function calculateMaximumStaticHeatLoss(
  network: BuildingNetwork,
  options: StaticHeatLossOptions = {},
): number {
  const breakdown = calculateMaximumStaticHeatLossBreakdown(network, options);
  let total = 0;
  for (const element of BUILDING_ELEMENTS) {
    total += breakdown[element] ?? 0;
  }
  return total;
}

/** Collapse a per-element breakdown into walls / windows / floor / roof / ventilation. */
export function summariseHeatLossBreakdown(breakdown: HeatLossBreakdown): HeatLossSummary {
  const summary: HeatLossSummary = { walls: 0, windows: 0, floor: 0, roof: 0, ventilation: 0 };
  for (const element of BUILDING_ELEMENTS) {
    const watts = breakdown[element];
    const category = heatLossCategory(element);
    if (watts !== undefined && category !== null) summary[category] += watts;
  }
  return summary;
}
