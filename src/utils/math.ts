import BigNumber from 'bignumber.js';
import { WAD } from '../config/constants';
import { ProtocolError } from '../core/errors';

export type Rounding = 'down' | 'up';

export const toBigNumber = (value: bigint | string | number): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/**
 * x * y / d with explicit rounding. Every share and value conversion in the
 * protocol goes through here.
 */
export const mulDiv = (x: bigint, y: bigint, d: bigint, rounding: Rounding = 'down'): bigint => {
    if (d === 0n) {
        throw new ProtocolError('DivisionByZero', 'mulDiv by zero', { x, y });
    }
    const product = x * y;
    const quotient = product / d;
    if (rounding === 'up' && quotient * d !== product) {
        return quotient + 1n;
    }
    return quotient;
};

export const mulWad = (x: bigint, y: bigint, rounding: Rounding = 'down'): bigint => mulDiv(x, y, WAD, rounding);

export const divWad = (x: bigint, y: bigint, rounding: Rounding = 'down'): bigint => mulDiv(x, WAD, y, rounding);

export const minOf = (first: bigint, ...rest: bigint[]): bigint => {
    return rest.reduce((acc, value) => (value < acc ? value : acc), first);
};

/** Amounts are unsigned; zero passes through to the caller's own checks. */
export const requireAmount = (amount: bigint, context: Record<string, unknown> = {}): bigint => {
    if (amount < 0n) {
        throw new ProtocolError('InvalidAmount', 'amount must not be negative', { ...context, amount });
    }
    return amount;
};

export const subOrZero = (a: bigint, b: bigint): bigint => (a > b ? a - b : 0n);

/**
 * Parse a decimal fraction ("0.95") into WAD scale.
 * Digits past the 18th decimal are truncated.
 */
export const parseWad = (value: string): bigint => {
    const parsed = toBigNumber(value);
    if (!parsed.isFinite() || parsed.isNegative()) {
        throw new ProtocolError('InvalidConfig', `not a non-negative decimal: ${value}`);
    }
    return BigInt(parsed.shiftedBy(18).integerValue(BigNumber.ROUND_DOWN).toFixed());
};

/**
 * Render a WAD-scaled value as a decimal string for logs.
 *
 * @example
 * formatWad(950000000000000000n) // "0.95"
 */
export const formatWad = (value: bigint, decimals: number = 18): string => {
    return toBigNumber(value).shiftedBy(-decimals).toFixed();
};
