export const roundMoney = (amount: number): number =>
  Math.round((amount + Number.EPSILON) * 100) / 100;

export const formatMoney = (amount: number): string => amount.toFixed(2);
