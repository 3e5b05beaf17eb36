import { defaultCatalog } from '../../src/config/catalog';
import { intakeOrders } from '../../src/scheduler/order_intake';

describe('intakeOrders', () => {
  const catalog = defaultCatalog();

  test('accepts well-formed forming and accessory orders', () => {
    const { accepted, rejected } = intakeOrders(
      [
        { id: 'P001', productType: 'Yane600', priority: 'URGENT', totalLengthM: 1200, thicknessBmt: '0.5mm' },
        { id: 'P002', productType: 'Accessory', priority: 'NORMAL', bendsPerItem: 4, itemCount: 25 },
      ],
      catalog
    );
    expect(rejected).toEqual([]);
    expect(accepted).toEqual([
      { id: 'P001', productType: 'Yane600', priority: 'URGENT', totalLengthM: 1200, thicknessBmt: '0.5mm' },
      { id: 'P002', productType: 'Accessory', priority: 'NORMAL', bendsPerItem: 4, itemCount: 25 },
    ]);
  });

  test('rejects non-positive and non-numeric quantities one record at a time', () => {
    const { accepted, rejected } = intakeOrders(
      [
        { id: 'P001', productType: 'Yane600', priority: 'NORMAL', totalLengthM: -5 },
        { id: 'P002', productType: 'Yane672', priority: 'NORMAL', totalLengthM: 'abc' },
        { id: 'P003', productType: 'Yane750', priority: 'NORMAL', totalLengthM: 400 },
        { id: 'P004', productType: 'Accessory', priority: 'NORMAL', bendsPerItem: 2.5, itemCount: 3 },
      ],
      catalog
    );

    expect(accepted.map((o) => o.id)).toEqual(['P003']);
    expect(rejected.map((r) => [r.index, r.orderId, r.field])).toEqual([
      [0, 'P001', 'totalLengthM'],
      [1, 'P002', 'totalLengthM'],
      [3, 'P004', 'bendsPerItem'],
    ]);
    expect(rejected[0].reason).toBe('Total length must be positive');
    expect(rejected[2].reason).toBe('Bends per item must be a whole number');
  });

  test('requires the quantities of the resolved workflow', () => {
    const { rejected } = intakeOrders(
      [
        { id: 'P001', productType: 'Accessory', priority: 'NORMAL', bendsPerItem: 3 },
        { id: 'P002', productType: 'SD680', priority: 'NORMAL', bendsPerItem: 3, itemCount: 2 },
      ],
      catalog
    );
    expect(rejected).toEqual([
      { index: 0, orderId: 'P001', field: 'itemCount', reason: 'Accessory orders need a positive whole number of items' },
      { index: 1, orderId: 'P002', field: 'totalLengthM', reason: 'Forming orders need a positive total length in metres' },
    ]);
  });

  test('rejects duplicate identifiers and malformed records', () => {
    const { accepted, rejected } = intakeOrders(
      [
        { id: 'P001', productType: 'Yane600', priority: 'NORMAL', totalLengthM: 100 },
        { id: 'P001', productType: 'Yane600', priority: 'URGENT', totalLengthM: 200 },
        { id: 'P002', productType: 'Yane600', totalLengthM: 100 },
        'not an order',
      ],
      catalog
    );
    expect(accepted).toHaveLength(1);
    expect(rejected).toEqual([
      { index: 1, orderId: 'P001', field: 'id', reason: 'Duplicate order ID P001' },
      { index: 2, orderId: 'P002', field: 'priority', reason: 'Required' },
      { index: 3, orderId: undefined, field: 'unknown', reason: 'Expected object, received string' },
    ]);
  });

  test('passes unknown product types through for classification', () => {
    const { accepted, rejected } = intakeOrders(
      [{ id: 'X1', productType: 'Widget', priority: 'NORMAL' }],
      catalog
    );
    expect(rejected).toEqual([]);
    expect(accepted).toEqual([{ id: 'X1', productType: 'Widget', priority: 'NORMAL' }]);
  });
});
