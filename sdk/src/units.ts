import { formatUnits, parseUnits } from 'viem';

export function formatAmount(amount: bigint, decimals: number): string {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error('formatAmount: decimals must be a non-negative integer');
  }
  return formatUnits(amount, decimals);
}

export function parseAmount(text: string, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error('parseAmount: decimals must be a non-negative integer');
  }
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) throw new Error(`parseAmount: invalid amount "${text}"`);
  return parseUnits(trimmed, decimals);
}
