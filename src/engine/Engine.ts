import { BUILDING_ELEMENTS } from '../contracts/BuildingElementV1';
import type { BuildingElement } from '../contracts/BuildingElementV1';
import type { InterventionType, ThermalModelResult } from '../contracts/ThermalModelV1';
import { ASSUMPTION_IDS } from '../contracts/assumptions.ids';
import type { AssumptionId } from '../contracts/assumptions.ids';
import { ASSUMPTION_CATALOG } from './assumptions.catalog';
import { calculateMaximumDynamicHeatLoss } from './modules/DynamicHeatLossModule';
import { applyThermalModelFabricInterventions } from './modules/FabricInterventionModule';
import { createStructureFromParams } from './modules/HeatNetworkModule';
import type { BuildingNetwork } from './modules/HeatNetworkModule';
import { calculateInterventionCostsParams } from './modules/InterventionCostModule';
import {
  DEFAULT_EXTERNAL_TEMPERATURE_C,
  calculateMaximumStaticHeatLossBreakdown,
  summariseHeatLossBreakdown,
} from './modules/StaticHeatLossModule';
import type { HeatLossBreakdown, HeatLossSummary } from './modules/StaticHeatLossModule';
import { describeLink } from './modules/ThermalLinkModule';
import { interpolateHeatingPower } from './timeline/HeatBalanceSolverV1';

export interface HeatLossEngineInput {
  /** Fitted thermal model of the building. */
  params: ThermalModelResult;
  interventions?: readonly InterventionType[];
  /** Outdoor design temperature (°C).  Default -2. */
  designExternalTemperature?: number;
  /** Default: the fitted setpoint. */
  internalTemperature?: number;
}

export interface HeatLossFiguresV1 {
  /** Steady-state heat loss at design conditions (W, negative = loss). */
  staticW: number;
  breakdown: HeatLossBreakdown;
  summary: HeatLossSummary;
  /** Mean loss over a 24 h cold soak from a warm envelope (W). */
  dynamicW: number;
  /** Mean heating power that holds the setpoint over one day (W, negative = demand). */
  heatingPowerW: number;
}

export interface EngineAssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  improveBy?: string;
}

export interface HeatLossEngineResult {
  baseline: HeatLossFiguresV1;
  /** Null when no interventions were requested. */
  improved: HeatLossFiguresV1 | null;
  improvedParams: ThermalModelResult;
  /** £ */
  interventionCost: number;
  notes: string[];
  assumptions: EngineAssumptionV1[];
}

const SECONDS_PER_DAY = 86_400;

function evaluate(
  structure: BuildingNetwork,
  internalTemperature: number,
  externalTemperature: number,
): HeatLossFiguresV1 {
  const conditions = { internalTemperature, externalTemperature };
  const breakdown = calculateMaximumStaticHeatLossBreakdown(structure, conditions);
  const summary = summariseHeatLossBreakdown(breakdown);
  const staticW = summary.walls + summary.windows + summary.floor + summary.roof + summary.ventilation;
  return {
    staticW,
    breakdown,
    summary,
    dynamicW: calculateMaximumDynamicHeatLoss(structure, conditions),
    heatingPowerW: interpolateHeatingPower(structure, { ...conditions, dt: SECONDS_PER_DAY }) / SECONDS_PER_DAY,
  };
}

/** Element on the far side of the largest heat-loss path out of the room air. */
function largestLossPath(breakdown: HeatLossBreakdown): BuildingElement | null {
  let worst: BuildingElement | null = null;
  let worstW = 0;
  for (const element of BUILDING_ELEMENTS) {
    const watts = breakdown[element] ?? 0;
    if (watts < worstW) {
      worst = element;
      worstW = watts;
    }
  }
  return worst;
}

function kw(watts: number): string {
  return (Math.abs(watts) / 1000).toFixed(2);
}

/**
 * Heat-loss engine – one fitted building, before and after fabric interventions.
 *
 * Builds the reference structure for the fitted parameters, evaluates static,
 * dynamic and transient heat loss at design conditions, then repeats the
 * evaluation on the improved parameters and prices the interventions.
 */
export function runHeatLossEngine(input: HeatLossEngineInput): HeatLossEngineResult {
  const { params } = input;
  const interventions = input.interventions ?? [];
  const internal = input.internalTemperature ?? params.setpoint;
  const external = input.designExternalTemperature ?? DEFAULT_EXTERNAL_TEMPERATURE_C;

  const notes: string[] = [];
  const assumptionIds: AssumptionId[] = [
    ASSUMPTION_IDS.MODELLED_NOT_MEASURED,
    ASSUMPTION_IDS.REFERENCE_CUBOID,
    ASSUMPTION_IDS.GLAZING_RATIO_ASSUMED,
    ASSUMPTION_IDS.EMITTERS_SIZED_FROM_BOILER,
    ASSUMPTION_IDS.GROUND_TEMPERATURE_UK_MEAN,
  ];
  if (input.internalTemperature === undefined) {
    assumptionIds.push(ASSUMPTION_IDS.SETPOINT_FROM_FIT);
  }

  // ── Baseline ──────────────────────────────────────────────────────────────
  const structure = createStructureFromParams(params);
  const baseline = evaluate(structure, internal, external);

  notes.push(
    `🏠 Design heat loss at ${internal}°C inside / ${external}°C outside: ${kw(baseline.staticW)} kW steady state.`,
  );
  notes.push(
    `🧱 Fabric thermal mass lowers the first-day loss to ${kw(baseline.dynamicW)} kW; ` +
    `holding the setpoint for 24 h needs ${kw(baseline.heatingPowerW)} kW on average.`,
  );

  const worst = largestLossPath(baseline.breakdown);
  if (worst !== null) {
    const edge = structure.edges.find(e => e.u === 'InternalAir' && e.v === worst);
    const mechanism = edge !== undefined ? ` via ${describeLink(edge.link)}` : '';
    notes.push(`📉 Largest single loss path: ${worst}${mechanism}.`);
  }

  // ── Interventions ─────────────────────────────────────────────────────────
  const improvedParams = applyThermalModelFabricInterventions(params, interventions);
  const interventionCost = calculateInterventionCostsParams(params, interventions);

  let improved: HeatLossFiguresV1 | null = null;
  if (interventions.length > 0) {
    assumptionIds.push(ASSUMPTION_IDS.EXISTING_FABRIC_ASSUMED, ASSUMPTION_IDS.GENERIC_COST_RATES);
    improved = evaluate(createStructureFromParams(improvedParams), internal, external);

    notes.push(
      `🔧 ${interventions.join(', ')}: composite U-value ${params.uValue.toFixed(2)} → ` +
      `${improvedParams.uValue.toFixed(2)} W/m²K, ACH ${params.ach.toFixed(2)} → ${improvedParams.ach.toFixed(2)}.`,
    );
    notes.push(
      `💷 Estimated cost £${interventionCost.toFixed(0)}; design heat loss falls to ${kw(improved.staticW)} kW.`,
    );
  }

  const assumptions = assumptionIds.map(id => ({ id, ...ASSUMPTION_CATALOG[id] }));
  return { baseline, improved, improvedParams, interventionCost, notes, assumptions };
}
