export const ASSUMPTION_IDS = {
  // Reference building
  REFERENCE_CUBOID: 'structure.reference_cuboid',
  GLAZING_RATIO_ASSUMED: 'structure.glazing_ratio_assumed',
  EMITTERS_SIZED_FROM_BOILER: 'structure.emitters_from_boiler',

  // Boundary conditions
  GROUND_TEMPERATURE_UK_MEAN: 'boundary.ground_temperature_uk_mean',
  SETPOINT_FROM_FIT: 'boundary.setpoint_from_fit',

  // Interventions
  EXISTING_FABRIC_ASSUMED: 'interventions.existing_fabric_assumed',
  GENERIC_COST_RATES: 'interventions.generic_cost_rates',

  // General
  MODELLED_NOT_MEASURED: 'general.modelled_estimate',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
