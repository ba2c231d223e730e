import {
  DEFAULT_LOCATION,
  detectLayout,
  isContainerHeaderLine,
  rowsToNormalized,
} from '../rows-to-normalized';
import { LABELLED_ROWS, LEGACY_ROWS } from './fixtures';

describe('detectLayout', () => {
  it('falls back to legacy without a tracking header', () => {
    expect(detectLayout(LEGACY_ROWS)).toEqual({ kind: 'legacy' });
    expect(detectLayout([])).toEqual({ kind: 'legacy' });
  });
  it('stays legacy when item text starts with "Tracking"', () => {
    const rows = [
      ['C1', 'M1', '111 AMA', '1', 0.3, 'Tracking device'],
      ['C2', 'M2', '222 KOFI', '2', 0.2, 'shoes'],
    ];
    expect(detectLayout(rows)).toEqual({ kind: 'legacy' });
    expect(rowsToNormalized(rows).rows.map((r) => [r.phone, r.volume_cbm])).toEqual([
      ['111', 0.3],
      ['222', 0.2],
    ]);
  });
  it('needs more than a tracking column to call a row the header', () => {
    expect(detectLayout([['TRACKING NO', 'REMARKS'], ['T1', 'x']])).toEqual({ kind: 'legacy' });
  });
  it('ignores long free text that happens to match header words', () => {
    const row = ['TRACKING NUMBERS WERE LOST FOR THIS BATCH OF GOODS', 'CBM', 'CONTACT'];
    expect(detectLayout([row])).toEqual({ kind: 'legacy' });
  });
  it('finds the labelled header below metadata lines', () => {
    expect(detectLayout(LABELLED_ROWS)).toEqual({
      kind: 'labelled',
      headerIndex: 3,
      columns: {
        tracking: 1,
        contact: 2,
        customer_name: 3,
        location: 4,
        quantity: 5,
        volume: 6,
        description: 7,
        customer_id: 0,
      },
    });
  });
});

describe('legacy layout', () => {
  const { layout, rows } = rowsToNormalized(LEGACY_ROWS);

  it('drops container header lines and rows without a shipping mark', () => {
    expect(layout.kind).toBe('legacy');
    expect(rows.map((r) => r.shipping_mark_or_tracking)).toEqual(['KK100', 'KK102', 'S200']);
  });

  it('fills customer id and name/phone down over continuation rows', () => {
    expect(rows[1]).toEqual({
      raw_customer_id: 'C001',
      shipping_mark_or_tracking: 'KK102',
      phone: '0202425612',
      customer_name: 'BLESSING KUMASI',
      quantity_text: '2',
      volume_cbm: 0.2,
      item_text: '',
      location: DEFAULT_LOCATION,
    });
  });

  it('coerces a malformed volume to 0', () => {
    expect(rows[2]).toEqual({
      raw_customer_id: 'C002',
      shipping_mark_or_tracking: 'S200',
      phone: '540789320',
      customer_name: null,
      quantity_text: '4',
      volume_cbm: 0,
      item_text: 'bags',
      location: DEFAULT_LOCATION,
    });
  });

  it('uses the caller location', () => {
    const out = rowsToNormalized(LEGACY_ROWS, { defaultLocation: 'KUMASI' });
    expect(out.rows.every((r) => r.location === 'KUMASI')).toBe(true);
  });

  it('recognises both container markers', () => {
    expect(isContainerHeaderLine('GHANA--N005=ABC')).toBe(true);
    expect(isContainerHeaderLine('N006=')).toBe(true);
    expect(isContainerHeaderLine('C001')).toBe(false);
    expect(isContainerHeaderLine(null)).toBe(false);
  });
});

describe('labelled layout', () => {
  const { layout, rows } = rowsToNormalized(LABELLED_ROWS);

  it('keeps rows with a tracking number, in sheet order', () => {
    expect(layout.kind).toBe('labelled');
    expect(rows.map((r) => r.shipping_mark_or_tracking)).toEqual(['KK12345678', 'S987654321', 'S999888777']);
  });

  it('maps the named columns', () => {
    expect(rows[0]).toEqual({
      raw_customer_id: '101',
      shipping_mark_or_tracking: 'KK12345678',
      phone: '201698812',
      customer_name: 'Tilly',
      quantity_text: '1pallet',
      volume_cbm: 0.18,
      item_text: 'LEARNING MACHINE',
      location: 'ACCRA GHANA',
    });
  });

  it('reads missing columns as blank', () => {
    const out = rowsToNormalized([['TRACKING NO', 'CONTACT', 'CBM'], ['T1', null, 'x'], ['', null, 0.3]]);
    expect(out.rows).toEqual([
      {
        raw_customer_id: null,
        shipping_mark_or_tracking: 'T1',
        phone: null,
        customer_name: null,
        quantity_text: '',
        volume_cbm: 0,
        item_text: '',
        location: DEFAULT_LOCATION,
      },
    ]);
  });
});

describe('invariants', () => {
  it('never produces a negative or missing volume', () => {
    const messy = [
      ['A', 'M1', '1', '1', -3, null],
      ['A', 'M2', '1', '1', 'NaN', null],
      ['A', 'M3', '1', '1', null, null],
      ['A', 'M4', '1', '1', 'Infinity', null],
    ];
    const { rows } = rowsToNormalized(messy);
    expect(rows.map((r) => r.volume_cbm)).toEqual([0, 0, 0, 0]);
  });
});
