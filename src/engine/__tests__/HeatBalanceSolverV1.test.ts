import { describe, it, expect } from 'vitest';
import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { InvalidInputError, NetworkConstructionError } from '../../contracts/errors';
import type { ThermalModelResult } from '../../contracts/ThermalModelV1';
import {
  applyInterventionsToStructure,
  createSimpleStructure,
  createStructureFromParams,
  requireNode,
} from '../modules/HeatNetworkModule';
import type { HeatEdge, SimpleStructureOptions } from '../modules/HeatNetworkModule';
import { conductiveLink, radiativeLink } from '../modules/ThermalLinkModule';
import type { ThermalNodeState } from '../modules/ThermalLinkModule';
import {
  interpolateHeatingPower,
  solveHeatBalanceEquation,
  solveImplicitStep,
} from '../timeline/HeatBalanceSolverV1';
import { solveLinearSystem } from '../utils/linearSystem';

const DAY = 86_400;

const referenceBuilding = () =>
  createSimpleStructure({
    wallWidth: 10,
    wallHeight: 5,
    windowArea: 1,
    floorArea: 100,
    roofArea: 100,
    airVolume: 500,
  });

const tower = (overrides: Partial<SimpleStructureOptions> = {}) =>
  createSimpleStructure({ wallWidth: 10, wallHeight: 10, windowArea: 1, floorArea: 20, ...overrides });

/** Mean heating power over one day (W). */
const dailyPower = (network: ReturnType<typeof tower>, internalTemperature = 21, externalTemperature = -2.3) =>
  interpolateHeatingPower(network, { internalTemperature, externalTemperature, dt: DAY }) / DAY;

const isDecreasing = (xs: number[]) => xs.every((x, i) => i === 0 || x < xs[i - 1]);

// ─── Linear solve ─────────────────────────────────────────────────────────────

describe('linearSystem – solveLinearSystem', () => {
  it('solves a well-conditioned system', () => {
    const x = solveLinearSystem([[2, 1], [1, 3]], [3, 5]);
    expect(x[0]).toBeCloseTo(0.8, 12);
    expect(x[1]).toBeCloseTo(1.4, 12);
  });

  it('pivots past a zero on the diagonal', () => {
    expect(solveLinearSystem([[0, 1], [1, 0]], [2, 3])).toEqual([3, 2]);
  });

  it('throws on a singular matrix', () => {
    expect(() => solveLinearSystem([[1, 2], [2, 4]], [1, 2])).toThrow(InvalidInputError);
    expect(() => solveLinearSystem([[1, 2], [2, 4]], [1, 2])).toThrow(/singular/);
  });

  it('throws on a shape mismatch', () => {
    expect(() => solveLinearSystem([[1, 2]], [1])).toThrow(InvalidInputError);
    expect(() => solveLinearSystem([[1, 2]], [1])).toThrow(/1×1/);
  });

  it('leaves its inputs untouched', () => {
    const a = [[4, 1], [2, 3]];
    const b = [1, 2];
    solveLinearSystem(a, b);
    expect(a).toEqual([[4, 1], [2, 3]]);
    expect(b).toEqual([1, 2]);
  });
});

// ─── Implicit step ────────────────────────────────────────────────────────────

describe('HeatBalanceSolverV1 – solveImplicitStep', () => {
  const room = (): Map<BuildingElement, ThermalNodeState> =>
    new Map<BuildingElement, ThermalNodeState>([
      ['InternalAir', { temperature: 20, thermalMass: 1000, energyChange: 0 }],
      ['ExternalAir', { temperature: 0, thermalMass: Infinity, energyChange: 0 }],
    ]);
  const wall: HeatEdge[] = [{ u: 'InternalAir', v: 'ExternalAir', link: conductiveLink(1, 10) }];

  it('relaxes a free node toward a fixed one', () => {
    // (1000/100 + 10) T = 10 × 20 + 10 × 0
    const next = solveImplicitStep({ states: room(), edges: wall, free: ['InternalAir'], dt: 100 });
    expect(next.get('InternalAir')).toBeCloseTo(10, 12);
    expect(next.has('ExternalAir')).toBe(false);
  });

  it('adds injected power to the right-hand side', () => {
    const next = solveImplicitStep({
      states: room(),
      edges: wall,
      free: ['InternalAir'],
      dt: 100,
      sources: { InternalAir: 100 },
    });
    expect(next.get('InternalAir')).toBeCloseTo(15, 12);
  });

  it('treats radiative links as constant power', () => {
    const edges: HeatEdge[] = [...wall, { u: 'ExternalAir', v: 'InternalAir', link: radiativeLink(50) }];
    const next = solveImplicitStep({ states: room(), edges, free: ['InternalAir'], dt: 100 });
    expect(next.get('InternalAir')).toBeCloseTo(12.5, 12);
  });

  it('does not modify the states', () => {
    const states = room();
    solveImplicitStep({ states, edges: wall, free: ['InternalAir'], dt: 100 });
    expect(states.get('InternalAir')).toEqual({ temperature: 20, thermalMass: 1000, energyChange: 0 });
  });
});

// ─── Whole-network balance ────────────────────────────────────────────────────

describe('HeatBalanceSolverV1 – solveHeatBalanceEquation', () => {
  const room = (): Map<BuildingElement, ThermalNodeState> =>
    new Map<BuildingElement, ThermalNodeState>([
      ['InternalAir', { temperature: 20, thermalMass: 1000, energyChange: 0 }],
      ['ExternalAir', { temperature: 0, thermalMass: Infinity, energyChange: 0 }],
    ]);
  const wall: HeatEdge[] = [{ u: 'InternalAir', v: 'ExternalAir', link: conductiveLink(1, 10) }];

  it('books links to the outdoor air as gains at the starting temperatures', () => {
    // 1000 T = 1000 × 293.15 + 10 × (0 − 20) × 100
    const next = solveHeatBalanceEquation({ states: room(), edges: wall, dt: 100 });
    expect(next.get('InternalAir')).toBeCloseTo(273.15, 9);
    expect(next.has('ExternalAir')).toBe(false);
  });

  it('delivers heating to the room air', () => {
    const next = solveHeatBalanceEquation({ states: room(), edges: wall, dt: 100, heatingPower: 100 });
    expect(next.get('InternalAir')).toBeCloseTo(283.15, 9);
  });

  it('keeps the heat content of two coupled nodes', () => {
    const states = room();
    states.set('WallNorth', { temperature: 10, thermalMass: 1000, energyChange: 0 });
    const edges: HeatEdge[] = [{ u: 'InternalAir', v: 'WallNorth', link: conductiveLink(1, 1) }];
    const next = solveHeatBalanceEquation({ states, edges, dt: 100 });
    const air = next.get('InternalAir') ?? NaN;
    const wallT = next.get('WallNorth') ?? NaN;
    // 1000 × 293.15 + 1000 × 283.15
    expect(1000 * air + 1000 * wallT).toBeCloseTo(576_300, 6);
  });

  it('heating needs a balanced room-air node', () => {
    const states = room();
    states.set('InternalAir', { temperature: 20, thermalMass: Infinity, energyChange: 0 });
    expect(() => solveHeatBalanceEquation({ states, edges: wall, dt: 100, heatingPower: 100 }))
      .toThrow(NetworkConstructionError);
  });
});

// ─── Heating power interpolation ──────────────────────────────────────────────

describe('HeatBalanceSolverV1 – interpolateHeatingPower', () => {
  it('reference building needs about 5.6 kW over a design day', () => {
    expect(dailyPower(referenceBuilding())).toBeCloseTo(-5597.62, 2);
  });

  it('does not depend on the heating power of the hot solve', () => {
    for (const maxHeatPower of [1e3, 5e3, 1e4, 5e4, 1e5]) {
      const joules = interpolateHeatingPower(referenceBuilding(), {
        internalTemperature: 21,
        externalTemperature: -2.3,
        dt: DAY,
        maxHeatPower,
      });
      expect(joules / DAY).toBeCloseTo(-5597.62, 2);
    }
  });

  it('tracks the internal temperature', () => {
    const powers = [16, 18, 21, 22, 25].map(t => dailyPower(tower(), t));
    const expected = [-2015.96, -2971.22, -4404.1, -4881.73, -6314.62];
    powers.forEach((p, i) => expect(p).toBeCloseTo(expected[i], 1));
    expect(isDecreasing(powers)).toBe(true);
  });

  it('grows as it gets colder outside', () => {
    const powers = [2, 0, -2, -4].map(t => dailyPower(tower(), 21, t));
    expect(isDecreasing(powers)).toBe(true);
  });

  it('grows with wall area', () => {
    const powers = [5, 10, 15, 20].map(a =>
      dailyPower(tower({ wallWidth: a, wallHeight: a, windowArea: 5 })),
    );
    const expected = [-3075.41, -4692.45, -7387.53, -11160.63];
    powers.forEach((p, i) => expect(p).toBeCloseTo(expected[i], 1));
  });

  it('grows with window area', () => {
    const powers = [1, 2, 3, 4, 5].map(a => dailyPower(tower({ windowArea: a })));
    expect(isDecreasing(powers)).toBe(true);
  });

  it('grows with floor area', () => {
    const powers = [5, 10, 15, 20].map(a => dailyPower(tower({ floorArea: a, roofArea: 10 })));
    expect(isDecreasing(powers)).toBe(true);
  });

  it('falls after a fabric upgrade', () => {
    const params: ThermalModelResult = {
      scaleFactor: 1, ach: 1, uValue: 2.2, boilerPower: 24_000, setpoint: 21, dhwUsage: 0,
    };
    const before = dailyPower(createStructureFromParams(params));
    const after = dailyPower(applyInterventionsToStructure(createStructureFromParams(params), ['cladding']));
    expect(before).toBeLessThan(0);
    expect(after).toBeGreaterThan(before);
  });

  it('does not modify the network', () => {
    const network = referenceBuilding();
    dailyPower(network);
    expect(requireNode(network, 'InternalAir').temperature).toBe(18);
    expect(requireNode(network, 'ExternalAir').temperature).toBe(15);
  });

  it('needs room air with a finite thermal mass', () => {
    const network = referenceBuilding();
    requireNode(network, 'InternalAir').thermalMass = Infinity;
    expect(() => dailyPower(network)).toThrow(NetworkConstructionError);
  });

  it('rejects a non-positive heating power or step', () => {
    expect(() => interpolateHeatingPower(referenceBuilding(), { maxHeatPower: 0 })).toThrow(InvalidInputError);
    expect(() => interpolateHeatingPower(referenceBuilding(), { dt: -1 })).toThrow(InvalidInputError);
  });
});
