import { formatQuantity, mentionsPallet, parseQuantity, pluralUnit } from '../quantity';

describe('parseQuantity', () => {
  it('reads pallets', () => {
    expect(parseQuantity('1pallet')).toEqual({ quantity: 1, unit: 'PALLET' });
    expect(parseQuantity('3 PALLETS')).toEqual({ quantity: 3, unit: 'PALLETS' });
  });
  it('treats plain numbers as cartons', () => {
    expect(parseQuantity('4')).toEqual({ quantity: 4, unit: 'CARTONS' });
    expect(parseQuantity('1')).toEqual({ quantity: 1, unit: 'CARTON' });
  });
  it('reads boxes', () => {
    expect(parseQuantity('2 boxes')).toEqual({ quantity: 2, unit: 'BOXES' });
    expect(parseQuantity('1 box')).toEqual({ quantity: 1, unit: 'BOX' });
  });
  it('defaults to one carton when there is nothing to read', () => {
    expect(parseQuantity('')).toEqual({ quantity: 1, unit: 'CARTON' });
    expect(parseQuantity('loose')).toEqual({ quantity: 1, unit: 'CARTON' });
  });
  it('takes the first digit run and checks pallet before box', () => {
    expect(parseQuantity('10 pallets in 2 boxes')).toEqual({ quantity: 10, unit: 'PALLETS' });
    expect(parseQuantity('5 cartons (boxes)')).toEqual({ quantity: 5, unit: 'CARTONS' });
  });
});

describe('helpers', () => {
  it('pluralises on quantity', () => {
    expect(pluralUnit('BOX', 1)).toBe('BOX');
    expect(pluralUnit('BOX', 0)).toBe('BOXES');
  });
  it('detects pallets case-insensitively', () => {
    expect(mentionsPallet('2 PALLETS')).toBe(true);
    expect(mentionsPallet('2')).toBe(false);
  });
  it('formats', () => {
    expect(formatQuantity(parseQuantity('2 boxes'))).toBe('2 BOXES');
  });
});
