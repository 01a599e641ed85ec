/**
 * SuperPool Module - Type Definitions
 */

import type { Address, MarketId } from '../core/identity';

export interface SuperPoolParams {
    readonly owner: Address;
    readonly asset: Address;
    readonly feeRecipient: Address;
    /** Performance fee on accrued gains (WAD). */
    readonly fee: bigint;
    readonly superPoolCap: bigint;
    readonly name: string;
    readonly symbol: string;
}

export interface DeploySuperPoolParams extends SuperPoolParams {
    readonly initialDeposit: bigint;
}

export interface MarketAllocation {
    readonly market: MarketId;
    readonly amount: bigint;
}

export interface SuperPoolAccrual {
    readonly newTotalAssets: bigint;
    readonly feeShares: bigint;
}
