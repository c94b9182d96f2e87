/**
 * Enrichment Merger
 *
 * Left-joins selected features onto fact rows by the synthetic join key and
 * drops the key, which is never persisted.
 */

import { Row } from '../lib/warehouse-schema';
import { keyOf } from './entity-graph';
import { SelectedFeatures } from './select-features';

export function mergeFeatures(rows: Row[], joinKey: string, selected: SelectedFeatures): Row[] {
  return rows.map(row => {
    const key = keyOf(row[joinKey]);
    const features = key === null ? undefined : selected.rows.get(key);

    const merged: Row = {};
    for (const [column, value] of Object.entries(row)) {
      if (column !== joinKey) merged[column] = value;
    }
    for (const column of selected.columns) {
      merged[column] = features?.[column] ?? null;
    }
    return merged;
  });
}
