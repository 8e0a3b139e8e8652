import type { AssumptionId } from '../contracts/assumptions.ids';

export const ASSUMPTION_CATALOG: Record<AssumptionId, {
  title: string;
  detail: string;
  improveBy?: string;
}> = {
  'structure.reference_cuboid': {
    title: 'Building modelled as a single-zone cuboid',
    detail: 'The fitted scale factor sizes a 50 m² reference building with four equal façades. Room-by-room variation is not modelled.',
    improveBy: 'Provide surveyed wall, window and floor areas.',
  },
  'structure.glazing_ratio_assumed': {
    title: 'Glazing area assumed',
    detail: 'Window area is taken as 20 % of the floor area, split evenly between the north and south façades.',
    improveBy: 'Measure total window area on site.',
  },
  'structure.emitters_from_boiler': {
    title: 'Emitters sized from boiler output',
    detail: 'Radiator output is assumed to be 75 % of the boiler rating, lumped into a single emitter.',
  },
  'boundary.ground_temperature_uk_mean': {
    title: 'Ground at UK annual mean temperature',
    detail: 'The ground floor loses heat to ground at 11.3 °C rather than to the outdoor air.',
  },
  'boundary.setpoint_from_fit': {
    title: 'Internal temperature from fitted setpoint',
    detail: 'Heat loss is evaluated at the equivalent 24/7 setpoint recovered by the thermal model fit.',
    improveBy: 'Enter the thermostat setpoint the household actually uses.',
  },
  'interventions.existing_fabric_assumed': {
    title: 'Existing fabric assumed',
    detail: 'Savings assume single-glazed windows, a filled cavity wall and 100 mm of loft insulation before the upgrade.',
    improveBy: 'Record the existing glazing, wall and loft construction during the survey.',
  },
  'interventions.generic_cost_rates': {
    title: 'Generic cost rates',
    detail: 'Each intervention is priced per m² from a single representative catalogue rate, excluding VAT, access and making good.',
    improveBy: 'Obtain a contractor quotation.',
  },
  'general.modelled_estimate': {
    title: 'Modelled estimate',
    detail: 'This value is derived from a physical model rather than a direct measurement.',
  },
};
