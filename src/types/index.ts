/**
 * External collaborator contracts. Concrete rate curves and price feeds live
 * outside the protocol; anything satisfying these shapes can be plugged in.
 */

import type { Address } from 'viem';

/**
 * Interest rate strategy bound to a market.
 */
export interface RateModel {
    readonly address: Address;
    /** Annual borrow rate, WAD scaled. */
    getRate(totalBorrowed: bigint, totalIdle: bigint): bigint;
}

/**
 * Price source for one (market, asset) binding. May throw; errors propagate
 * to the caller unchanged.
 */
export interface PriceOracle {
    readonly address: Address;
    /** Value of `amount` units of `asset` in the reference unit (WAD). */
    getValueInReferenceUnit(asset: Address, amount: bigint): bigint;
}
