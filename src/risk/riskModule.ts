/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * RISK MODULE — ACCOUNT VALUATION AND LIQUIDATION VALIDITY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * Prices an account's debt and collateral through the risk engine and decides
 * whether it is healthy and whether a proposed liquidation is legal.
 *
 * VALUATION:
 *   debtValue[i]   = value of borrowsOf(market[i]) under market[i]'s oracle
 *   weight[i]      = debtValue[i] / totalDebt                       (round up)
 *   collateral[j]  = Σ_i value of balance[j] under market[i] · weight[i]  (round down)
 *   minRequired    = Σ_i Σ_j debtValue[i] · (collateral[j] / totalCollateral)
 *                                            / ltv(market[i], asset[j])  (round up)
 *   healthy        ⇔ totalCollateral ≥ minRequired
 *
 * RULES:
 * 1. An account without debt markets is healthy; no oracle is consulted
 * 2. Debt with zero collateral is unhealthy, never reported as zero
 * 3. A held asset with LTV 0 in any debt market is unsupported → error
 * 4. Liquidation: unhealthy only; per-market close factor unless bad debt;
 *    seized value ≤ repaid value · (1 + discount)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MAX_UINT256, WAD } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError, isProtocolError } from '../core/errors';
import type { Address, MarketId } from '../core/identity';
import type { Ledger } from '../ledger';
import logger from '../utils/logger';
import { mulDiv, mulWad } from '../utils/math';
import type { RiskEngine } from './riskEngine';
import type {
    AssetSeizure,
    DebtRepayment,
    LiquidationAssessment,
    PositionAssessment,
    PositionView,
    RiskData,
} from './types';

export const RISK_MODULE_CONFIG = {
    logPrefix: '[RISK-MODULE]',
};

const sum = (values: bigint[]): bigint => values.reduce((acc, value) => acc + value, 0n);

const aggregate = <K extends string>(entries: ReadonlyArray<{ amount: bigint }>, keyOf: (index: number) => K) => {
    const totals = new Map<K, bigint>();
    entries.forEach((entry, index) => {
        const key = keyOf(index);
        totals.set(key, (totals.get(key) ?? 0n) + entry.amount);
    });
    return totals;
};

export class RiskModule {
    constructor(
        private readonly ctx: ProtocolContext,
        private readonly ledger: Ledger,
        private readonly riskEngine: RiskEngine
    ) {}

    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Price every debt and collateral entry of an account. Returns null for an
     * account without debt markets.
     */
    assess(position: PositionView): PositionAssessment | null {
        const debtMarkets = position.getDebtMarkets();
        if (debtMarkets.length === 0) return null;

        const debtValues = debtMarkets.map((market) =>
            this.riskEngine.valueOf(
                market,
                this.ledger.getPoolAsset(market),
                this.ledger.getBorrowsOf(market, position.address)
            )
        );
        const totalDebtValue = sum(debtValues);
        const weights =
            totalDebtValue === 0n
                ? debtMarkets.map(() => mulDiv(WAD, 1n, BigInt(debtMarkets.length), 'up'))
                : debtValues.map((value) => mulDiv(value, WAD, totalDebtValue, 'up'));

        const assets = position.getPositionAssets();
        const collateralValues = assets.map((asset) => {
            const balance = this.ctx.tokens.balanceOf(asset, position.address);
            if (balance === 0n) return 0n;
            for (const market of debtMarkets) {
                if (this.riskEngine.ltvFor(market, asset) === 0n) {
                    throw new ProtocolError('UnsupportedAsset', 'asset not accepted as collateral by debt market', {
                        position: position.address,
                        market,
                        asset,
                    });
                }
            }
            return this.weightedValue(debtMarkets, weights, asset, balance);
        });
        const totalCollateralValue = sum(collateralValues);

        let minRequiredCollateralValue: bigint | null = null;
        if (totalCollateralValue === 0n) {
            minRequiredCollateralValue = totalDebtValue === 0n ? 0n : null;
        } else {
            let minRequired = 0n;
            for (let i = 0; i < debtMarkets.length; i++) {
                for (let j = 0; j < assets.length; j++) {
                    if (collateralValues[j] === 0n) continue;
                    const ltv = this.riskEngine.ltvFor(debtMarkets[i], assets[j]);
                    minRequired += mulDiv(debtValues[i] * collateralValues[j], WAD, totalCollateralValue * ltv, 'up');
                }
            }
            minRequiredCollateralValue = minRequired;
        }

        return {
            debtMarkets,
            debtValues,
            totalDebtValue,
            weights,
            assets,
            collateralValues,
            totalCollateralValue,
            minRequiredCollateralValue,
        };
    }

    getRiskData(position: PositionView): RiskData {
        const assessment = this.assess(position);
        if (assessment === null) {
            return { totalCollateralValue: 0n, totalDebtValue: 0n, minRequiredCollateralValue: 0n };
        }
        if (assessment.minRequiredCollateralValue === null) {
            throw new ProtocolError('ZeroCollateralWithDebt', 'account owes debt with no collateral', {
                position: position.address,
                totalDebtValue: assessment.totalDebtValue,
            });
        }
        return {
            totalCollateralValue: assessment.totalCollateralValue,
            totalDebtValue: assessment.totalDebtValue,
            minRequiredCollateralValue: assessment.minRequiredCollateralValue,
        };
    }

    isHealthy(position: PositionView): boolean {
        return RiskModule.isHealthyAssessment(this.assess(position));
    }

    /**
     * collateral / minRequired in WAD. MAX_UINT256 without debt, 0 when debt
     * has no collateral behind it.
     */
    getHealthFactor(position: PositionView): bigint {
        return RiskModule.healthFactorOf(this.assess(position));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIQUIDATION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Check a proposed liquidation. `discount` caps the seized value at
     * repaid · (1 + discount) and defaults to the configured liquidation
     * discount.
     */
    validateLiquidation(
        position: PositionView,
        debtData: readonly DebtRepayment[],
        assetData: readonly AssetSeizure[],
        discount: bigint = this.ctx.config.liquidation.discount
    ): LiquidationAssessment {
        const assessment = this.assess(position);
        if (assessment === null || RiskModule.isHealthyAssessment(assessment)) {
            throw new ProtocolError('LiquidateHealthyPosition', 'position is healthy', {
                position: position.address,
            });
        }
        const isBadDebt = assessment.totalCollateralValue < assessment.totalDebtValue;
        const { closeFactor } = this.ctx.config.liquidation;

        let repaidValue = 0n;
        const repayments = aggregate(debtData, (i) => debtData[i].market);
        for (const [market, amount] of repayments) {
            if (!assessment.debtMarkets.includes(market)) {
                throw new ProtocolError('UnknownDebtMarket', 'position has no debt in market', {
                    position: position.address,
                    market,
                });
            }
            if (!isBadDebt) {
                const maxRepay = mulWad(this.ledger.getBorrowsOf(market, position.address), closeFactor, 'up');
                if (amount > maxRepay) {
                    throw new ProtocolError('CloseFactorExceeded', 'repayment above close factor', {
                        market,
                        amount,
                        maxRepay,
                    });
                }
            }
            repaidValue += this.riskEngine.valueOf(market, this.ledger.getPoolAsset(market), amount);
        }

        let seizedValue = 0n;
        const seizures = aggregate(assetData, (i) => assetData[i].asset);
        for (const [asset, amount] of seizures) {
            if (!assessment.assets.includes(asset)) {
                throw new ProtocolError('UnknownCollateral', 'asset is not tracked collateral', {
                    position: position.address,
                    asset,
                });
            }
            seizedValue += this.weightedValue(assessment.debtMarkets, assessment.weights, asset, amount);
        }

        const maxSeizedValue = mulWad(repaidValue, WAD + discount, 'down');
        if (seizedValue > maxSeizedValue) {
            throw new ProtocolError('SeizedTooMuchCollateral', 'seized value above repaid value plus discount', {
                seizedValue,
                maxSeizedValue,
            });
        }

        logger.debug(
            `${RISK_MODULE_CONFIG.logPrefix} LIQUIDATION_VALID position=${position.address} badDebt=${isBadDebt} repaid=${repaidValue} seized=${seizedValue}`
        );
        return {
            isBadDebt,
            healthFactorBefore: RiskModule.healthFactorOf(assessment),
            repaidValue,
            seizedValue,
            maxSeizedValue,
        };
    }

    /**
     * Boolean form of validateLiquidation. Rule violations yield false;
     * valuation failures still throw.
     */
    isValidLiquidation(
        position: PositionView,
        debtData: readonly DebtRepayment[],
        assetData: readonly AssetSeizure[],
        discount: bigint = this.ctx.config.liquidation.discount
    ): boolean {
        try {
            this.validateLiquidation(position, debtData, assetData, discount);
            return true;
        } catch (error) {
            if (isProtocolError(error) && (error.kind === 'HealthViolation' || error.kind === 'InvalidInput')) {
                return false;
            }
            throw error;
        }
    }

    validateBadDebtLiquidation(position: PositionView): PositionAssessment {
        const assessment = this.assess(position);
        if (assessment === null || assessment.totalCollateralValue >= assessment.totalDebtValue) {
            throw new ProtocolError('NoBadDebt', 'collateral covers debt', {
                position: position.address,
                totalCollateralValue: assessment?.totalCollateralValue ?? 0n,
                totalDebtValue: assessment?.totalDebtValue ?? 0n,
            });
        }
        return assessment;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // HELPERS
    // ═══════════════════════════════════════════════════════════════════════════

    private weightedValue(markets: MarketId[], weights: bigint[], asset: Address, amount: bigint): bigint {
        let value = 0n;
        markets.forEach((market, i) => {
            value += mulWad(this.riskEngine.valueOf(market, asset, amount), weights[i], 'down');
        });
        return value;
    }

    private static isHealthyAssessment(assessment: PositionAssessment | null): boolean {
        if (assessment === null) return true;
        if (assessment.minRequiredCollateralValue === null) return false;
        return assessment.totalCollateralValue >= assessment.minRequiredCollateralValue;
    }

    private static healthFactorOf(assessment: PositionAssessment | null): bigint {
        if (assessment === null) return MAX_UINT256;
        const minRequired = assessment.minRequiredCollateralValue;
        if (minRequired === null) return 0n;
        if (minRequired === 0n) return MAX_UINT256;
        return mulDiv(assessment.totalCollateralValue, WAD, minRequired, 'down');
    }
}
