import { formatMoney, roundMoney } from './money.helper';

describe('money helper', () => {
  it('rounds floating point noise to two decimals', () => {
    expect(roundMoney(140.46 + 70.2)).toBe(210.66);
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
  });

  it('rounds half cents up', () => {
    expect(roundMoney(1.005)).toBe(1.01);
  });

  it('formats with two decimals', () => {
    expect(formatMoney(70.2)).toBe('70.20');
    expect(formatMoney(237.26)).toBe('237.26');
  });
});
