/**
 * Shared contracts for derived circuit metrics.
 */

import type { DerivedField, RecordField } from '@/types/ecmo';

export type FormulaId =
  | 'GLUCOSE_MGDL_V1'
  | 'R_V1'
  | 'RPM_PER_FLOW_V1'
  | 'R_PER_HB_V1';

export interface DerivedMetricDefinition {
  id: FormulaId;
  field: DerivedField;
  label: string;
  expression: string;
  inputs: RecordField[];
  nullSemantics: string;
}
