import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { InvalidInputError, requirePositive } from '../../contracts/errors';
import { solveImplicitStep } from '../timeline/HeatBalanceSolverV1';
import { cloneNodeStates, requireNode, requireState } from './HeatNetworkModule';
import type { BuildingNetwork } from './HeatNetworkModule';
import { stepLink } from './ThermalLinkModule';
import {
  DEFAULT_EXTERNAL_TEMPERATURE_C,
  DEFAULT_INTERNAL_TEMPERATURE_C,
} from './StaticHeatLossModule';

// ─── Dynamic heat loss ────────────────────────────────────────────────────────
//
// The static figure assumes every envelope element has already reached its
// steady-state profile.  A real building starts the cold day warm: its walls,
// floor and roof hold heat, and while they cool the room air loses less than
// the steady-state figure.
//
// Here the heating is switched off, the room air is held at the setpoint, the
// outdoor air at the design temperature, and the envelope starts at room
// temperature.  The envelope then cools by implicit timesteps; the heat drawn
// from the room air at each step is averaged over the period.
//
// For a realistic building the result lies between the static loss and half of it.

export const DEFAULT_DYNAMIC_DT_S = 300;
export const DEFAULT_DYNAMIC_DURATION_S = 86_400;

export interface DynamicHeatLossOptions {
  internalTemperature?: number;
  externalTemperature?: number;
  /** Step length (s).  Default 5 minutes. */
  dt?: number;
  /** Period averaged over (s).  Default 24 hours. */
  durationSeconds?: number;
}

export interface DynamicHeatLossDataPoint {
  /** Seconds since the start of the cold soak (end of the step). */
  elapsedSeconds: number;
  /** Room-air heat balance over the step (W); negative = heat leaving. */
  heatLossW: number;
}

export interface DynamicHeatLossResult {
  meanHeatLossW: number;
  trace: DynamicHeatLossDataPoint[];
}

/** Full trace of the cold soak; see calculateMaximumDynamicHeatLoss for the headline figure. */
export function simulateDynamicHeatLoss(
  network: BuildingNetwork,
  options: DynamicHeatLossOptions = {},
): DynamicHeatLossResult {
  const internal = options.internalTemperature ?? DEFAULT_INTERNAL_TEMPERATURE_C;
  const external = options.externalTemperature ?? DEFAULT_EXTERNAL_TEMPERATURE_C;
  const dt = requirePositive('dt', options.dt ?? DEFAULT_DYNAMIC_DT_S);
  const duration = requirePositive('durationSeconds', options.durationSeconds ?? DEFAULT_DYNAMIC_DURATION_S);
  const steps = Math.round(duration / dt);
  if (steps < 1) {
    throw new InvalidInputError('durationSeconds', duration, 'must cover at least one timestep');
  }

  requireNode(network, 'InternalAir');
  requireNode(network, 'ExternalAir');

  const states = cloneNodeStates(network);
  const edges = network.edges.filter(e => e.u !== 'HeatingSystem' && e.v !== 'HeatingSystem');
  const fixed: ReadonlySet<BuildingElement> = new Set<BuildingElement>(['InternalAir', 'ExternalAir', 'HeatingSystem']);
  const free = [...states.keys()].filter(e => !fixed.has(e));

  for (const [element, state] of states) {
    if (element === 'InternalAir') state.temperature = internal;
    else if (element === 'ExternalAir') state.temperature = external;
    else if (!fixed.has(element)) state.temperature = internal;
  }
  const roomAir = requireState(states, 'InternalAir');

  const trace: DynamicHeatLossDataPoint[] = [];
  let total = 0;
  for (let step = 1; step <= steps; step++) {
    const next = solveImplicitStep({ states, edges, free, dt });
    for (const [element, temperature] of next) {
      requireState(states, element).temperature = temperature;
    }

    for (const state of states.values()) state.energyChange = 0;
    for (const { u, v, link } of edges) {
      stepLink(link, requireState(states, u), requireState(states, v), dt);
    }
    const heatLossW = roomAir.energyChange / dt;
    trace.push({ elapsedSeconds: step * dt, heatLossW });
    total += heatLossW;
  }

  return { meanHeatLossW: total / steps, trace };
}

/**
 * Mean room-air heat loss (W) over a cold soak from a warm envelope.
 * Negative = heat leaving.  The network is not modified.
 */
export function calculateMaximumDynamicHeatLoss(
  network: BuildingNetwork,
  options: DynamicHeatLossOptions = {},
): number {
  return simulateDynamicHeatLoss(network, options).meanHeatLossW;
}
