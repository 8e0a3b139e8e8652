// ─── Thermal links ────────────────────────────────────────────────────────────
//
// A link is the physical mechanism that moves heat between two nodes of a heat
// network.  Every link is a plain readonly record tagged by `kind`, and one
// function (stepLink) evaluates any of them over a timestep.
//
// Sign convention: the energy returned by stepLink is positive when heat flows
// from the first node (u) to the second (v).  u is debited, v is credited, so
// the energy of the pair is conserved exactly.

/** Mutable per-node state carried through a simulation. */
export interface ThermalNodeState {
  /** °C */
  temperature: number;
  /** J/K.  Infinity for a node whose temperature never moves (outdoor air). */
  thermalMass: number;
  /** Accumulated J since the last reset. */
  energyChange: number;
}

/** Conduction through a solid interface. */
export interface ConductiveLink {
  readonly kind: 'conductive';
  /** m² */
  readonly interfaceArea: number;
  /** U-value, W/m²K */
  readonly heatTransfer: number;
}

/** Air exchange.  Only the first node's air volume is exchanged. */
export interface ConvectiveLink {
  readonly kind: 'convective';
  /** Air changes per hour. */
  readonly ach: number;
}

/** Constant power, independent of either temperature. */
export interface RadiativeLink {
  readonly kind: 'radiative';
  /** W */
  readonly power: number;
}

/** Emitter whose output scales with the temperature gap, rated at `deltaT`. */
export interface ThermalRadiativeLink {
  readonly kind: 'thermal_radiative';
  /** Rated output (W) at the rated temperature gap. */
  readonly power: number;
  /** K */
  readonly deltaT: number;
}

export type ThermalLink = ConductiveLink | ConvectiveLink | RadiativeLink | ThermalRadiativeLink;

/** Rated gap of a UK panel radiator (flow 70 °C into a 20 °C room). */
export const DEFAULT_RADIATOR_DELTA_T = 50;

const SECONDS_PER_HOUR = 3600;

// ─── Factories ────────────────────────────────────────────────────────────────

export function conductiveLink(interfaceArea: number, heatTransfer: number): ConductiveLink {
  return { kind: 'conductive', interfaceArea, heatTransfer };
}

export function convectiveLink(ach: number): ConvectiveLink {
  return { kind: 'convective', ach };
}

export function radiativeLink(power: number): RadiativeLink {
  return { kind: 'radiative', power };
}

export function thermalRadiativeLink(
  power: number,
  deltaT: number = DEFAULT_RADIATOR_DELTA_T,
): ThermalRadiativeLink {
  return { kind: 'thermal_radiative', power, deltaT };
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

/**
 * Linear coupling of a link in W/K: the power that crosses it per kelvin of
 * (Tu − Tv).  Null for a radiative link, whose power ignores temperature.
 *
 * @param uThermalMass  Thermal mass of the link's first node (convective links only).
 */
export function linkConductance(link: ThermalLink, uThermalMass: number): number | null {
  switch (link.kind) {
    case 'conductive':
      return link.heatTransfer * link.interfaceArea;
    case 'convective':
      return (link.ach * uThermalMass) / SECONDS_PER_HOUR;
    case 'radiative':
      return null;
    case 'thermal_radiative':
      return link.power / link.deltaT;
  }
}

/**
 * Move heat across `link` for `dt` seconds at the nodes' current temperatures.
 *
 * Adds the transfer to both nodes' `energyChange` (u debited, v credited) and
 * returns it in J.  Temperatures are left untouched.
 */
export function stepLink(
  link: ThermalLink,
  u: ThermalNodeState,
  v: ThermalNodeState,
  dt: number,
): number {
  let energy: number;
  if (link.kind === 'radiative') {
    energy = link.power * dt;
  } else {
    // Every other kind is linear in the temperature gap.
    const conductance = linkConductance(link, u.thermalMass) ?? 0;
    energy = conductance * (u.temperature - v.temperature) * dt;
  }
  u.energyChange -= energy;
  v.energyChange += energy;
  return energy;
}

/** One-line readable form, used in engine notes. */
export function describeLink(link: ThermalLink): string {
  switch (link.kind) {
    case 'conductive':
      return `conductive ${link.interfaceArea.toFixed(2)} m² @ U=${link.heatTransfer} W/m²K`;
    case 'convective':
      return `convective ${link.ach} ACH`;
    case 'radiative':
      return `radiative ${link.power} W`;
    case 'thermal_radiative':
      return `thermal radiative ${link.power} W @ ΔT=${link.deltaT} K`;
  }
}
