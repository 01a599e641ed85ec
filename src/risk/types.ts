/**
 * Risk Module - Type Definitions
 */

import type { Address, MarketId } from '../core/identity';

export interface LtvBounds {
    readonly minLtv: bigint;
    readonly maxLtv: bigint;
}

/**
 * What the risk module needs to see of an account: where it lives, which
 * collateral it tracks and which markets it owes.
 */
export interface PositionView {
    readonly address: Address;
    getPositionAssets(): Address[];
    getDebtMarkets(): MarketId[];
}

export interface RiskData {
    readonly totalCollateralValue: bigint;
    readonly totalDebtValue: bigint;
    readonly minRequiredCollateralValue: bigint;
}

export interface DebtRepayment {
    readonly market: MarketId;
    readonly amount: bigint;
}

export interface AssetSeizure {
    readonly asset: Address;
    readonly amount: bigint;
}

export interface LiquidationAssessment {
    readonly isBadDebt: boolean;
    readonly healthFactorBefore: bigint;
    readonly repaidValue: bigint;
    readonly seizedValue: bigint;
    readonly maxSeizedValue: bigint;
}

/**
 * Full valuation of one account. `minRequiredCollateralValue` is null when the
 * account owes a positive value but holds no valued collateral.
 */
export interface PositionAssessment {
    readonly debtMarkets: MarketId[];
    readonly debtValues: bigint[];
    readonly totalDebtValue: bigint;
    readonly weights: bigint[];
    readonly assets: Address[];
    readonly collateralValues: bigint[];
    readonly totalCollateralValue: bigint;
    readonly minRequiredCollateralValue: bigint | null;
}
