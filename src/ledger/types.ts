/**
 * Ledger Module - Type Definitions
 */

import type { Address, MarketId } from '../core/identity';
import type { RateModel } from '../types';

/**
 * A share ledger: `shares` claims on `assets`. shares == 0 ⇔ assets == 0
 * except transiently after a bad-debt write-off on the deposit side.
 */
export interface SharePair {
    readonly shares: bigint;
    readonly assets: bigint;
}

export interface Market {
    readonly id: MarketId;
    readonly owner: Address;
    readonly asset: Address;
    readonly depositCap: bigint;
    readonly borrowCap: bigint;
    /** Share of accrued interest minted to the fee recipient (WAD). */
    readonly interestFee: bigint;
    /** Share of each borrow withheld and paid to the fee recipient (WAD). */
    readonly originationFee: bigint;
    readonly isPaused: boolean;
    readonly deposits: SharePair;
    readonly borrows: SharePair;
    readonly lastAccrual: number;
}

export interface MarketView extends Market {
    readonly rateModel: Address;
    readonly idle: bigint;
}

export interface InitializeMarketParams {
    readonly asset: Address;
    readonly rateModel: RateModel;
    readonly depositCap: bigint;
    readonly borrowCap: bigint;
    readonly initialDeposit: bigint;
}

export interface AccrualPreview {
    readonly interest: bigint;
    readonly feeShares: bigint;
    readonly deposits: SharePair;
    readonly borrows: SharePair;
    readonly timestamp: number;
}

export interface RepayResult {
    readonly sharesBurned: bigint;
    readonly remainingShares: bigint;
    readonly assetsRepaid: bigint;
}
