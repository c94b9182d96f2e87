/**
 * Unit Tests for the Feature Selector
 */

import { MissingFeatureError } from '../../lib/error-handler';
import { SALES_WAREHOUSE_SCHEMA } from '../../lib/warehouse-schema';
import { FeatureMatrix, deriveFeatures } from '../derive-features';
import { buildEntityGraph } from '../entity-graph';
import { normalizeRecords } from '../normalize-records';
import { selectFeatures } from '../select-features';
import { salesRecord } from '../../__tests__/helpers/sales-records';

const schema = SALES_WAREHOUSE_SCHEMA;

describe('selectFeatures', () => {
  it('projects and renames the selected features', () => {
    const batch = normalizeRecords([
      salesRecord({ 'Order ID': 'OR-1', 'Sales': 10, 'Quantity': 1, 'Discount': 0, 'Profit': 2 }),
      salesRecord({ 'Order ID': 'OR-2', 'Order Date': '2024-04-02', 'Sales': 20, 'Quantity': 3, 'Discount': 0.5, 'Profit': -1 }),
    ], schema);
    const matrix = deriveFeatures(buildEntityGraph(batch, schema), { target: 'OrderDetails', maxDepth: 2 });

    const selected = selectFeatures(matrix, schema.features);

    expect(selected.columns).toEqual([
      'Customer_Order_Count',
      'Product_Order_Count',
      'Product_Max_Profit',
      'Product_Mean_Discount',
      'Product_Total_Quantity',
      'Product_Total_Sales',
      'Order_Item_Count',
      'Order_Max_Quantity',
      'Order_Mean_Profit',
      'Order_Total_Sales',
      'Order_Month',
      'Order_Year',
    ]);
    expect(selected.rows.get('["OR-1","PR-1"]')).toEqual({
      Customer_Order_Count: 2,
      Product_Order_Count: 2,
      Product_Max_Profit: 2,
      Product_Mean_Discount: 0.25,
      Product_Total_Quantity: 4,
      Product_Total_Sales: 30,
      Order_Item_Count: 1,
      Order_Max_Quantity: 1,
      Order_Mean_Profit: 2,
      Order_Total_Sales: 10,
      Order_Month: 3,
      Order_Year: 2024,
    });
    expect(selected.rows.get('["OR-2","PR-1"]')?.Order_Month).toBe(4);
  });

  it('lists every missing feature', () => {
    const matrix: FeatureMatrix = {
      targetEntity: 'OrderDetails',
      index: ['k1'],
      featureNames: ['Orders.MONTH(Order Date)'],
      definitions: [{ name: 'Orders.MONTH(Order Date)', entity: 'OrderDetails', kind: 'direct', depth: 2 }],
      rows: new Map([['k1', { 'Orders.MONTH(Order Date)': 3 }]]),
    };
    const selection = schema.features.filter(f => f.feature.startsWith('Orders.'));

    expect(() => selectFeatures(matrix, selection)).toThrow(MissingFeatureError);
    expect(() => selectFeatures(matrix, selection)).toThrow(
      'Derived feature matrix is missing 5 selected feature(s): ' +
      'Orders.COUNT(OrderDetails), Orders.MAX(OrderDetails.Quantity), Orders.MEAN(OrderDetails.Profit), ' +
      'Orders.SUM(OrderDetails.Sales), Orders.YEAR(Order Date)'
    );
  });
});
