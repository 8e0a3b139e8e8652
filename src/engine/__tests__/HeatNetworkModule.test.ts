import { describe, it, expect } from 'vitest';
import type { BuildingElement } from '../../contracts/BuildingElementV1';
import { InvalidInputError, NetworkConstructionError } from '../../contracts/errors';
import type { ThermalModelResult } from '../../contracts/ThermalModelV1';
import {
  addHeatingSystemToGraph,
  addStructureToGraph,
  applyInterventionsToStructure,
  createSimpleStructure,
  createStructureFromParams,
  getCeilingArea,
  getFloorArea,
  getWallArea,
  getWindowArea,
  initialiseOutdoors,
  requireNode,
} from '../modules/HeatNetworkModule';
import type { HeatNetwork } from '../modules/HeatNetworkModule';
import {
  conductiveLink,
  convectiveLink,
  thermalRadiativeLink,
} from '../modules/ThermalLinkModule';
import type { ThermalLink } from '../modules/ThermalLinkModule';

function linkBetween(network: HeatNetwork, u: BuildingElement, v: BuildingElement): ThermalLink {
  const edge = network.edges.find(e => e.u === u && e.v === v);
  if (edge === undefined) throw new Error(`no edge ${u} → ${v}`);
  return edge.link;
}

const params: ThermalModelResult = {
  scaleFactor: 1,
  ach: 1.0,
  uValue: 2.2,
  boilerPower: 24_000,
  setpoint: 21,
  dhwUsage: 0,
};

// ─── Phase 1 ──────────────────────────────────────────────────────────────────

describe('HeatNetworkModule – initialiseOutdoors', () => {
  it('holds only the outdoor air, at infinite mass', () => {
    const outdoors = initialiseOutdoors();
    expect(outdoors.stage).toBe('outdoors');
    expect([...outdoors.nodes.keys()]).toEqual(['ExternalAir']);
    expect(outdoors.edges).toHaveLength(0);
    const air = requireNode(outdoors, 'ExternalAir');
    expect(air.thermalMass).toBe(Infinity);
    expect(air.temperature).toBe(15);
  });

  it('takes an outdoor temperature', () => {
    expect(requireNode(initialiseOutdoors(-5), 'ExternalAir').temperature).toBe(-5);
  });
});

// ─── Phase 2 ──────────────────────────────────────────────────────────────────

describe('HeatNetworkModule – addStructureToGraph', () => {
  const structure = addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: 1 });

  it('adds room air, four walls, glazed façades, floor and roof in order', () => {
    expect(structure.stage).toBe('structure');
    expect([...structure.nodes.keys()]).toEqual([
      'ExternalAir',
      'InternalAir',
      'WallNorth',
      'WallEast',
      'WallSouth',
      'WallWest',
      'WindowsNorth',
      'WindowsSouth',
      'Floor',
      'Roof',
    ]);
  });

  it('couples every envelope element to both air nodes', () => {
    expect(structure.edges).toHaveLength(16);
    expect(linkBetween(structure, 'InternalAir', 'WallNorth')).toEqual(conductiveLink(49, 0.8));
    expect(linkBetween(structure, 'WallNorth', 'ExternalAir')).toEqual(conductiveLink(49, 0.8));
    expect(linkBetween(structure, 'InternalAir', 'WindowsSouth')).toEqual(conductiveLink(0.5, 4.8));
    expect(linkBetween(structure, 'InternalAir', 'Floor')).toEqual(conductiveLink(100, 0.51));
    expect(linkBetween(structure, 'Roof', 'ExternalAir')).toEqual(conductiveLink(100, 0.6));
  });

  it('has no ventilation link when no air volume is given', () => {
    expect(structure.edges.some(e => e.link.kind === 'convective')).toBe(false);
  });

  it('sizes thermal masses from geometry', () => {
    // 10 m × 5 m × 10 m of air
    expect(requireNode(structure, 'InternalAir').thermalMass).toBe(594_000);
    // 49 m² of brick, 0.25 m deep
    expect(requireNode(structure, 'WallEast').thermalMass).toBe(24_500_000);
    // 0.5 m² of glazing
    expect(requireNode(structure, 'WindowsNorth').thermalMass).toBe(500_000);
    // 100 m² slab, 0.25 m deep
    expect(requireNode(structure, 'Floor').thermalMass).toBe(5_000_000);
    expect(requireNode(structure, 'Roof').thermalMass).toBe(13_291_400);
  });

  it('starts air and fabric at 18 °C unless told otherwise', () => {
    expect(requireNode(structure, 'Floor').temperature).toBe(18);
    const warm = addStructureToGraph(initialiseOutdoors(), {
      wallWidth: 10,
      windowArea: 1,
      initialTemperature: 21,
    });
    expect(requireNode(warm, 'InternalAir').temperature).toBe(21);
  });

  it('adds an infiltration link sized by the given air volume', () => {
    const vented = addStructureToGraph(initialiseOutdoors(), {
      wallWidth: 10,
      windowArea: 1,
      airVolume: 400,
      airChangesPerHour: 0.7,
    });
    expect(linkBetween(vented, 'InternalAir', 'ExternalAir')).toEqual(convectiveLink(0.7));
    expect(requireNode(vented, 'InternalAir').thermalMass).toBe(475_200);
  });

  it('places glazing by the glazing split', () => {
    const east = addStructureToGraph(initialiseOutdoors(), {
      wallWidth: 10,
      windowArea: 2,
      glazingSplit: { East: 1 },
    });
    expect(east.nodes.has('WindowsEast')).toBe(true);
    expect(east.nodes.has('WindowsNorth')).toBe(false);
    expect(linkBetween(east, 'WindowsEast', 'ExternalAir')).toEqual(conductiveLink(2, 4.8));
  });

  it('leaves out window nodes when there is no glazing', () => {
    const blind = addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: 0 });
    expect(blind.nodes.size).toBe(8);
    expect(getWindowArea(blind)).toBe(0);
  });

  it('applies U-value overrides', () => {
    const custom = addStructureToGraph(initialiseOutdoors(), {
      wallWidth: 10,
      windowArea: 1,
      uValues: { wall: 0.3, roof: 0.15 },
    });
    expect(linkBetween(custom, 'InternalAir', 'WallWest')).toEqual(conductiveLink(49, 0.3));
    expect(linkBetween(custom, 'InternalAir', 'Roof')).toEqual(conductiveLink(100, 0.15));
    expect(linkBetween(custom, 'InternalAir', 'WindowsNorth')).toEqual(conductiveLink(0.5, 4.8));
  });

  it('shares node state with the handle it was built from', () => {
    const outdoors = initialiseOutdoors();
    const built = addStructureToGraph(outdoors, { wallWidth: 10, windowArea: 1 });
    expect(built.nodes).toBe(outdoors.nodes);
  });
});

describe('HeatNetworkModule – invalid geometry', () => {
  it('rejects glazing that fills a façade', () => {
    expect(() => addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: 50 }))
      .toThrow(InvalidInputError);
  });

  it('rejects a non-positive wall width', () => {
    expect(() => addStructureToGraph(initialiseOutdoors(), { wallWidth: 0, windowArea: 0 }))
      .toThrow(InvalidInputError);
  });

  it('rejects a negative window area', () => {
    expect(() => addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: -1 }))
      .toThrow(InvalidInputError);
  });

  it('rejects a glazing split that does not sum to one', () => {
    expect(() =>
      addStructureToGraph(initialiseOutdoors(), {
        wallWidth: 10,
        windowArea: 1,
        glazingSplit: { North: 0.5 },
      }),
    ).toThrow(InvalidInputError);
  });

  it('names the offending field', () => {
    try {
      addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: 1, floorArea: -3 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err instanceof InvalidInputError && err.field).toBe('floorArea');
    }
  });
});

// ─── Phase 3 ──────────────────────────────────────────────────────────────────

describe('HeatNetworkModule – addHeatingSystemToGraph', () => {
  it('adds a heating system coupled to the room air', () => {
    const network = createSimpleStructure({ wallWidth: 10, windowArea: 1 });
    expect(network.stage).toBe('heating');
    const heating = requireNode(network, 'HeatingSystem');
    // 5 K below the 70 °C flow
    expect(heating.temperature).toBe(65);
    // (27.5 kJ/K + 4 radiators × 12.6228 kJ/K) per radiator
    expect(heating.thermalMass).toBeCloseTo(311_964.8, 6);
    expect(linkBetween(network, 'HeatingSystem', 'InternalAir')).toEqual(thermalRadiativeLink(4000, 50));
    expect(network.edges).toHaveLength(17);
  });

  it('takes explicit emitter settings', () => {
    const network = createSimpleStructure({
      wallWidth: 10,
      windowArea: 1,
      flowTemperature: 55,
      deltaT: 30,
      nRadiators: 6,
      emitterPower: 9000,
    });
    expect(requireNode(network, 'HeatingSystem').temperature).toBe(50);
    expect(linkBetween(network, 'HeatingSystem', 'InternalAir')).toEqual(thermalRadiativeLink(9000, 30));
  });

  it('rejects a flow temperature outside 20–100 °C', () => {
    expect(() => createSimpleStructure({ wallWidth: 10, windowArea: 1, flowTemperature: 10 }))
      .toThrow(InvalidInputError);
    expect(() => createSimpleStructure({ wallWidth: 10, windowArea: 1, flowTemperature: 120 }))
      .toThrow(InvalidInputError);
  });

  it('rejects a radiator count that is not a positive integer', () => {
    expect(() => createSimpleStructure({ wallWidth: 10, windowArea: 1, nRadiators: 0 }))
      .toThrow(InvalidInputError);
    expect(() => createSimpleStructure({ wallWidth: 10, windowArea: 1, nRadiators: 2.5 }))
      .toThrow(InvalidInputError);
  });
});

// ─── Phase order ──────────────────────────────────────────────────────────────

describe('HeatNetworkModule – phase order', () => {
  it('heating before structure does not compile and throws at run time', () => {
    expect(() =>
      // @ts-expect-error an outdoors-only network has no room air to heat
      addHeatingSystemToGraph(initialiseOutdoors()),
    ).toThrow(NetworkConstructionError);
  });

  it('structure on a finished network does not compile and throws at run time', () => {
    const finished = createSimpleStructure({ wallWidth: 10, windowArea: 1 });
    expect(() =>
      // @ts-expect-error a heated network already has a structure
      addStructureToGraph(finished, { wallWidth: 10, windowArea: 1 }),
    ).toThrow(NetworkConstructionError);
  });

  it('a second structure on the same outdoors throws', () => {
    const outdoors = initialiseOutdoors();
    addStructureToGraph(outdoors, { wallWidth: 10, windowArea: 1 });
    expect(() => addStructureToGraph(outdoors, { wallWidth: 10, windowArea: 1 }))
      .toThrow(NetworkConstructionError);
  });

  it('a second heating system on the same structure throws', () => {
    const structure = addStructureToGraph(initialiseOutdoors(), { wallWidth: 10, windowArea: 1 });
    addHeatingSystemToGraph(structure);
    expect(() => addHeatingSystemToGraph(structure)).toThrow(NetworkConstructionError);
  });

  it('requireNode throws for a missing node', () => {
    expect(() => requireNode(initialiseOutdoors(), 'InternalAir')).toThrow(NetworkConstructionError);
  });
});

// ─── Reference building ───────────────────────────────────────────────────────

describe('HeatNetworkModule – createStructureFromParams', () => {
  it('builds the 50 m² reference cuboid at scale 1', () => {
    const network = createStructureFromParams(params);
    expect(getWallArea(network)).toBe(160);
    expect(getWindowArea(network)).toBe(10);
    expect(getCeilingArea(network)).toBe(50);
    expect(getFloorArea(network)).toBe(50);
  });

  it('scales every area with the scale factor', () => {
    const network = createStructureFromParams({ ...params, scaleFactor: 4 });
    expect(getWallArea(network)).toBe(640);
    expect(getWindowArea(network)).toBe(40);
    expect(getCeilingArea(network)).toBe(200);
    expect(getFloorArea(network)).toBe(200);
  });

  it('carries the fitted U-value and ACH', () => {
    const network = createStructureFromParams(params);
    expect(linkBetween(network, 'InternalAir', 'WallSouth')).toEqual(conductiveLink(40, 2.2));
    expect(linkBetween(network, 'InternalAir', 'ExternalAir')).toEqual(convectiveLink(1.0));
    // 50 m² × 5 m of air
    expect(requireNode(network, 'InternalAir').thermalMass).toBe(297_000);
  });

  it('sizes emitters at 75 % of the boiler', () => {
    const network = createStructureFromParams(params);
    expect(linkBetween(network, 'HeatingSystem', 'InternalAir')).toEqual(thermalRadiativeLink(18_000, 50));
    // 18 radiators
    expect(requireNode(network, 'HeatingSystem').thermalMass).toBeCloseTo(4_584_787.2, 4);
  });

  it('rejects non-positive parameters', () => {
    expect(() => createStructureFromParams({ ...params, scaleFactor: 0 })).toThrow(InvalidInputError);
    expect(() => createStructureFromParams({ ...params, uValue: -1 })).toThrow(InvalidInputError);
    expect(() => createStructureFromParams({ ...params, boilerPower: 0 })).toThrow(InvalidInputError);
  });
});

// ─── Interventions on a network ───────────────────────────────────────────────

describe('HeatNetworkModule – applyInterventionsToStructure', () => {
  const base = () =>
    createSimpleStructure({ wallWidth: 10, windowArea: 1, airVolume: 500 });

  it('loft insulation changes only the ceiling', () => {
    const improved = applyInterventionsToStructure(base(), ['loft']);
    expect(linkBetween(improved, 'InternalAir', 'Roof')).toEqual(conductiveLink(100, 0.12));
    expect(linkBetween(improved, 'Roof', 'ExternalAir')).toEqual(conductiveLink(100, 0.6));
    expect(linkBetween(improved, 'InternalAir', 'WallNorth')).toEqual(conductiveLink(49, 0.8));
  });

  it('double glazing changes both window faces and cuts infiltration by 20 %', () => {
    const improved = applyInterventionsToStructure(base(), ['double_glazing']);
    expect(linkBetween(improved, 'InternalAir', 'WindowsNorth')).toEqual(conductiveLink(0.5, 3.4));
    expect(linkBetween(improved, 'WindowsSouth', 'ExternalAir')).toEqual(conductiveLink(0.5, 3.4));
    const vent = linkBetween(improved, 'InternalAir', 'ExternalAir');
    expect(vent.kind === 'convective' && vent.ach).toBeCloseTo(1.2, 9);
  });

  it('cladding changes both wall faces and caps infiltration at 0.6 ACH', () => {
    const improved = applyInterventionsToStructure(base(), ['cladding', 'double_glazing']);
    expect(linkBetween(improved, 'WallWest', 'ExternalAir')).toEqual(conductiveLink(49, 0.29));
    expect(linkBetween(improved, 'InternalAir', 'ExternalAir')).toEqual(convectiveLink(0.6));
  });

  it('a repeated intervention has no further effect', () => {
    const once = applyInterventionsToStructure(base(), ['double_glazing']);
    const twice = applyInterventionsToStructure(base(), ['double_glazing', 'double_glazing']);
    expect(twice.edges).toEqual(once.edges);
  });

  it('leaves the input network untouched', () => {
    const network = base();
    const improved = applyInterventionsToStructure(network, ['loft', 'cladding', 'double_glazing']);
    expect(improved.stage).toBe('heating');
    expect(improved.nodes).not.toBe(network.nodes);
    expect(linkBetween(network, 'InternalAir', 'WallNorth')).toEqual(conductiveLink(49, 0.8));
    expect(linkBetween(network, 'InternalAir', 'ExternalAir')).toEqual(convectiveLink(1.5));
  });

  it('no interventions copies the network unchanged', () => {
    const network = base();
    expect(applyInterventionsToStructure(network, []).edges).toEqual(network.edges);
  });
});
