/**
 * HeatBalanceSolverV1 — matrix heat balances over a heat network.
 *
 * solveImplicitStep() is a backward-Euler step over a chosen set of free
 * nodes, with every other node held at its temperature:
 *
 *   (C/dt + L_ff) · T_new = C/dt · T_old + L_fb · T_b + P
 *
 * solveHeatBalanceEquation() is the single-step balance behind
 * interpolateHeatingPower().  It works in kelvin over every node with a
 * finite temperature and thermal mass:
 *
 *   (C + M·dt) · T_new = C · T_old + g · dt
 *
 * where M is the flow matrix (M · T is the power into each node through the
 * links between balanced nodes) and g the gains vector: links to fixed nodes
 * such as the outdoor air evaluated at the starting temperatures, constant
 * radiative power, and any heating delivered to the room air.
 */

import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { NetworkConstructionError, requirePositive } from '../../contracts/errors';
import { cloneNodeStates, requireNode, requireState } from '../modules/HeatNetworkModule';
import type { BuildingNetwork, HeatEdge } from '../modules/HeatNetworkModule';
import { linkConductance } from '../modules/ThermalLinkModule';
import type { ThermalNodeState } from '../modules/ThermalLinkModule';
import { solveLinearSystem } from '../utils/linearSystem';

export interface ImplicitStepInput {
  states: ReadonlyMap<BuildingElement, ThermalNodeState>;
  edges: readonly HeatEdge[];
  /** Nodes whose temperature is solved for; every other node is held fixed. */
  free: readonly BuildingElement[];
  /** s */
  dt: number;
  /** Extra constant power into free nodes (W). */
  sources?: Partial<Record<BuildingElement, number>>;
}

/**
 * One backward-Euler step.  Returns the new temperature of every free node;
 * the states themselves are not modified.
 */
export function solveImplicitStep(input: ImplicitStepInput): Map<BuildingElement, number> {
  const { states, edges, free, dt } = input;
  const index = new Map<BuildingElement, number>();
  free.forEach((element, i) => index.set(element, i));

  const n = free.length;
  const a = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  const b = new Array<number>(n).fill(0);

  free.forEach((element, i) => {
    const { thermalMass, temperature } = requireState(states, element);
    a[i][i] += thermalMass / dt;
    b[i] += (thermalMass / dt) * temperature + (input.sources?.[element] ?? 0);
  });

  for (const { u, v, link } of edges) {
    const su = requireState(states, u);
    const sv = requireState(states, v);
    const iu = index.get(u);
    const iv = index.get(v);

    const g = linkConductance(link, su.thermalMass);
    if (g === null) {
      // Constant power u → v.
      const power = link.kind === 'radiative' ? link.power : 0;
      if (iu !== undefined) b[iu] -= power;
      if (iv !== undefined) b[iv] += power;
      continue;
    }

    if (iu !== undefined) {
      a[iu][iu] += g;
      if (iv !== undefined) a[iu][iv] -= g;
      else b[iu] += g * sv.temperature;
    }
    if (iv !== undefined) {
      a[iv][iv] += g;
      if (iu !== undefined) a[iv][iu] -= g;
      else b[iv] += g * su.temperature;
    }
  }

  const solution = solveLinearSystem(a, b);
  const result = new Map<BuildingElement, number>();
  free.forEach((element, i) => result.set(element, solution[i]));
  return result;
}

// ─── Whole-network heat balance ───────────────────────────────────────────────

const KELVIN_OFFSET = 273.15;

export interface HeatBalanceInput {
  states: ReadonlyMap<BuildingElement, ThermalNodeState>;
  edges: readonly HeatEdge[];
  /** s */
  dt: number;
  /** Heating delivered straight to the room air (W). */
  heatingPower?: number;
}

/** Nodes with a finite temperature and thermal mass, in network order. */
function balancedNodes(states: ReadonlyMap<BuildingElement, ThermalNodeState>): BuildingElement[] {
  return [...states]
    .filter(([, s]) => Number.isFinite(s.temperature) && Number.isFinite(s.thermalMass))
    .map(([element]) => element);
}

/**
 * New temperature (K) of every balanced node after one step of `dt`.
 * The states themselves are not modified.
 */
export function solveHeatBalanceEquation(input: HeatBalanceInput): Map<BuildingElement, number> {
  const { states, edges, dt } = input;
  const nodes = balancedNodes(states);
  const index = new Map<BuildingElement, number>();
  nodes.forEach((element, i) => index.set(element, i));

  const n = nodes.length;
  const a = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  const b = new Array<number>(n).fill(0);

  nodes.forEach((element, i) => {
    const { thermalMass, temperature } = requireState(states, element);
    a[i][i] += thermalMass;
    b[i] += thermalMass * (temperature + KELVIN_OFFSET);
  });

  for (const { u, v, link } of edges) {
    const su = requireState(states, u);
    const sv = requireState(states, v);
    const iu = index.get(u);
    const iv = index.get(v);

    const g = linkConductance(link, su.thermalMass);
    if (g === null) {
      const power = link.kind === 'radiative' ? link.power : 0;
      if (iu !== undefined) b[iu] -= power * dt;
      if (iv !== undefined) b[iv] += power * dt;
      continue;
    }

    if (iu !== undefined && iv !== undefined) {
      a[iu][iu] -= g * dt;
      a[iv][iv] -= g * dt;
      a[iu][iv] += g * dt;
      a[iv][iu] += g * dt;
    } else if (iu !== undefined && Number.isFinite(sv.temperature)) {
      b[iu] += g * (sv.temperature - su.temperature) * dt;
    } else if (iv !== undefined && Number.isFinite(su.temperature)) {
      b[iv] += g * (su.temperature - sv.temperature) * dt;
    }
  }

  const heatingPower = input.heatingPower ?? 0;
  if (heatingPower !== 0) {
    const room = index.get('InternalAir');
    if (room === undefined) {
      throw new NetworkConstructionError(
        'InternalAir must have a finite temperature and thermal mass to be heated.',
      );
    }
    b[room] += heatingPower * dt;
  }

  const solution = solveLinearSystem(a, b);
  const result = new Map<BuildingElement, number>();
  nodes.forEach((element, i) => result.set(element, solution[i]));
  return result;
}

// ─── Heating power interpolation ──────────────────────────────────────────────

export interface InterpolateHeatingPowerOptions {
  /** Room setpoint (°C).  Default 21. */
  internalTemperature?: number;
  /** Outdoor temperature (°C).  Default -2. */
  externalTemperature?: number;
  /** Step length (s).  Default one day. */
  dt?: number;
  /** Heating power of the hot solve (W).  Default 10 kW. */
  maxHeatPower?: number;
}

/**
 * Heating energy (J) over `dt` at the given conditions, read off the room-air
 * temperatures of two heat balances.  Negative for a building that is losing
 * heat; divide by `dt` for the mean power.
 *
 * The room air starts at the setpoint and the outdoor air is set to the
 * external temperature; every other node keeps its current temperature.
 * One balance is solved with no heating and one with `maxHeatPower` into the
 * room air, and the energy is interpolated at the setpoint between them.
 * The room-air temperature is linear in the heating power, so the result
 * does not depend on `maxHeatPower`.
 *
 * The network is not modified.
 */
export function interpolateHeatingPower(
  network: BuildingNetwork,
  options: InterpolateHeatingPowerOptions = {},
): number {
  const internalTemperature = options.internalTemperature ?? 21;
  const externalTemperature = options.externalTemperature ?? -2;
  const dt = requirePositive('dt', options.dt ?? 86_400);
  const maxHeatPower = requirePositive('maxHeatPower', options.maxHeatPower ?? 1e4);

  requireNode(network, 'InternalAir');
  requireNode(network, 'ExternalAir');
  const states = cloneNodeStates(network);
  requireState(states, 'InternalAir').temperature = internalTemperature;
  requireState(states, 'ExternalAir').temperature = externalTemperature;

  const balance = { states, edges: network.edges, dt };
  const cold = roomTemperature(solveHeatBalanceEquation(balance));
  const hot = roomTemperature(solveHeatBalanceEquation({ ...balance, heatingPower: maxHeatPower }));
  if (hot === cold) {
    throw new NetworkConstructionError('Room air temperature does not respond to heating.');
  }

  return (dt * maxHeatPower * (internalTemperature + KELVIN_OFFSET - cold)) / (hot - cold);
}

function roomTemperature(solution: Map<BuildingElement, number>): number {
  const t = solution.get('InternalAir');
  if (t === undefined) {
    throw new NetworkConstructionError('InternalAir must have a finite temperature and thermal mass.');
  }
  return t;
}
