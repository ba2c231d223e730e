import { groupKeyOf, groupRows, UNKNOWN_KEY } from '../identity';
import { rowsToNormalized } from '../rows-to-normalized';
import { NormalizedRow } from '../types';
import { LABELLED_ROWS, LEGACY_ROWS } from './fixtures';

const row = (patch: Partial<NormalizedRow>): NormalizedRow => ({
  raw_customer_id: null,
  shipping_mark_or_tracking: 'M1',
  phone: null,
  customer_name: null,
  quantity_text: '',
  volume_cbm: 0,
  item_text: '',
  location: 'ACCRA GHANA',
  ...patch,
});

describe('groupKeyOf', () => {
  it('prefers phone, then name, then customer id', () => {
    expect(groupKeyOf(row({ phone: '540789320', customer_name: 'Ama', raw_customer_id: 'C1' }))).toBe('540789320');
    expect(groupKeyOf(row({ phone: '', customer_name: 'Ama', raw_customer_id: 'C1' }))).toBe('Ama');
    expect(groupKeyOf(row({ customer_name: '  ', raw_customer_id: 'C1' }))).toBe('C1');
  });
  it('falls back to UNKNOWN', () => {
    expect(groupKeyOf(row({}))).toBe(UNKNOWN_KEY);
  });
});

describe('groupRows', () => {
  it('puts one customer with several parcels into one group', () => {
    const groups = groupRows([
      row({ phone: '1', shipping_mark_or_tracking: 'A' }),
      row({ phone: '2', shipping_mark_or_tracking: 'B' }),
      row({ phone: '1', shipping_mark_or_tracking: 'C' }),
    ]);
    expect(groups.map((g) => g.key)).toEqual(['1', '2']);
    expect(groups[0].rows.map((r) => r.shipping_mark_or_tracking)).toEqual(['A', 'C']);
  });

  it('is a partition of the normalized rows', () => {
    for (const sheet of [LEGACY_ROWS, LABELLED_ROWS]) {
      const { rows } = rowsToNormalized(sheet);
      const groups = groupRows(rows);
      const members = groups.flatMap((g) => g.rows);
      expect(members).toHaveLength(rows.length);
      expect(new Set(members).size).toBe(rows.length);
      for (const g of groups) expect(g.rows.every((r) => groupKeyOf(r) === g.key)).toBe(true);
    }
  });
});
