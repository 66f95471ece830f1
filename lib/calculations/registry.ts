import type { DerivedField } from '@/types/ecmo';
import type { DerivedMetricDefinition } from './types';

/** In evaluation order; each entry may read the ones before it. */
export const DERIVED_METRIC_DEFINITIONS: DerivedMetricDefinition[] = [
  {
    id: 'GLUCOSE_MGDL_V1',
    field: 'glucoseMgdl',
    label: 'Glucose (mg/dL)',
    expression: 'Glucose_mgdl = Glucose_mmol * 18',
    inputs: ['glucoseMmol'],
    nullSemantics: 'Null when glucose was not recorded.',
  },
  {
    id: 'R_V1',
    field: 'r',
    label: 'Resistance proxy',
    expression: 'R = DeltaP / Flow',
    inputs: ['deltaP', 'flow'],
    nullSemantics: 'Null when Flow <= 0 or either input is missing.',
  },
  {
    id: 'RPM_PER_FLOW_V1',
    field: 'rpmPerFlow',
    label: 'Pump efficiency proxy',
    expression: 'RPM_per_Flow = RPM / Flow',
    inputs: ['rpm', 'flow'],
    nullSemantics: 'Null when Flow <= 0 or either input is missing.',
  },
  {
    id: 'R_PER_HB_V1',
    field: 'rPerHb',
    label: 'Resistance per hemoglobin',
    expression: 'R_per_Hb = R / Hb',
    inputs: ['r', 'hemoglobin'],
    nullSemantics: 'Null when R is null or Hb <= 0.',
  },
];

export function getDerivedMetricDefinition(field: DerivedField): DerivedMetricDefinition | undefined {
  return DERIVED_METRIC_DEFINITIONS.find(m => m.field === field);
}
