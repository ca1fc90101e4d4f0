import { maxUint256 } from 'viem';

// Fixed-point scale of every accumulator value.
export const ACC_PRECISION = 10n ** 18n;

export const BPS_DENOMINATOR = 10_000n;

export class ArithmeticOverflow extends Error {
  constructor(op: string) {
    super(`${op}: result exceeds uint256`);
  }
}

export class ArithmeticUnderflow extends Error {
  constructor(op: string) {
    super(`${op}: result below zero`);
  }
}

export class DivisionByZero extends Error {
  constructor(op: string) {
    super(`${op}: division by zero`);
  }
}

function checked(op: string, v: bigint): bigint {
  if (v < 0n) throw new ArithmeticUnderflow(op);
  if (v > maxUint256) throw new ArithmeticOverflow(op);
  return v;
}

export function add(a: bigint, b: bigint): bigint {
  return checked('add', a + b);
}

export function sub(a: bigint, b: bigint): bigint {
  return checked('sub', a - b);
}

export function mul(a: bigint, b: bigint): bigint {
  return checked('mul', a * b);
}

/** `floor(a * b / c)`; the product is range-checked before dividing. */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) throw new DivisionByZero('mulDiv');
  return checked('mulDiv', mul(a, b) / c);
}

export function bpsMul(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, bps, BPS_DENOMINATOR);
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
