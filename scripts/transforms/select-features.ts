/**
 * Feature Selector
 *
 * Projects the derived feature matrix onto the fixed, renamed column set
 * persisted with each OrderDetails row.
 */

import { MissingFeatureError } from '../lib/error-handler';
import { FeatureSelection } from '../lib/warehouse-schema';
import { FeatureMatrix, FeatureRow } from './derive-features';

export interface SelectedFeatures {
  /** Persisted column names, in selection order */
  columns: string[];
  rows: Map<string, FeatureRow>;
}

export function selectFeatures(matrix: FeatureMatrix, selection: FeatureSelection[]): SelectedFeatures {
  const available = new Set(matrix.featureNames);
  const missing = selection.filter(s => !available.has(s.feature)).map(s => s.feature);
  if (missing.length > 0) {
    throw new MissingFeatureError(missing);
  }

  const rows = new Map<string, FeatureRow>();
  for (const key of matrix.index) {
    const source = matrix.rows.get(key) ?? {};
    const selected: FeatureRow = {};
    for (const { feature, column } of selection) {
      selected[column] = source[feature] ?? null;
    }
    rows.set(key, selected);
  }

  return { columns: selection.map(s => s.column), rows };
}
