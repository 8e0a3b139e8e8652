/**
 * HeatNetworkSimulatorV1 — explicit time-stepping of a heat network.
 *
 * Each step sets the outdoor air to the next external temperature, moves heat
 * across every link at the current temperatures, checks that the energy
 * booked to the nodes sums to zero, and then turns each node's energy change
 * into a temperature change.  Nothing is held fixed except nodes with
 * infinite thermal mass.
 *
 * Keep `dt` short: the scheme is forward Euler, so a step much longer than a
 * node's time constant overshoots.
 */

import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { InvalidInputError, NetworkConstructionError, requirePositive } from '../../contracts/errors';
import { cloneNodeStates, requireNode, requireState } from '../modules/HeatNetworkModule';
import type { HeatNetwork } from '../modules/HeatNetworkModule';
import { stepLink } from '../modules/ThermalLinkModule';
import type { ThermalNodeState } from '../modules/ThermalLinkModule';

export const DEFAULT_SIMULATION_DT_S = 300;

/** Net energy a step may leave, as a share of the energy it moved. */
const CONSERVATION_TOLERANCE = 1e-9;

export interface SimulateHeatNetworkOptions {
  /** Step length (s).  Default 5 minutes. */
  dt?: number;
}

export interface HeatNetworkSimulationPoint {
  /** Seconds since the start of the run (end of the step). */
  elapsedSeconds: number;
  /** Temperature of every node after the step (°C). */
  temperatures: Partial<Record<BuildingElement, number>>;
}

/**
 * Apply each node's accumulated energy change to its temperature and reset
 * the accumulator.  Nodes with infinite (or zero) thermal mass keep their
 * temperature.
 */
export function updateTemperatures(states: ReadonlyMap<BuildingElement, ThermalNodeState>): void {
  for (const state of states.values()) {
    const delta = state.energyChange / state.thermalMass;
    if (Number.isFinite(delta)) state.temperature += delta;
    state.energyChange = 0;
  }
}

export function simulateHeatNetwork(
  network: HeatNetwork,
  externalTemperatures: readonly number[],
  options: SimulateHeatNetworkOptions = {},
): HeatNetworkSimulationPoint[] {
  const dt = requirePositive('dt', options.dt ?? DEFAULT_SIMULATION_DT_S);
  externalTemperatures.forEach((t, i) => {
    if (!Number.isFinite(t)) {
      throw new InvalidInputError(`externalTemperatures[${i}]`, t, 'must be a finite temperature');
    }
  });
  requireNode(network, 'ExternalAir');

  const states = cloneNodeStates(network);
  const outdoors = requireState(states, 'ExternalAir');
  const trace: HeatNetworkSimulationPoint[] = [];

  externalTemperatures.forEach((external, i) => {
    outdoors.temperature = external;
    for (const state of states.values()) state.energyChange = 0;

    let moved = 0;
    for (const { u, v, link } of network.edges) {
      moved += Math.abs(stepLink(link, requireState(states, u), requireState(states, v), dt));
    }

    let net = 0;
    for (const state of states.values()) net += state.energyChange;
    if (!(Math.abs(net) <= CONSERVATION_TOLERANCE * moved)) {
      throw new NetworkConstructionError(
        `Energy is not conserved at step ${i + 1}: ${net} J left over after moving ${moved} J.`,
      );
    }

    updateTemperatures(states);

    const temperatures: Partial<Record<BuildingElement, number>> = {};
    for (const [element, state] of states) temperatures[element] = state.temperature;
    trace.push({ elapsedSeconds: (i + 1) * dt, temperatures });
  });

  return trace;
}
