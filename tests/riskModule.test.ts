/**
 * Risk Module Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Account valuation, health and liquidation validity.
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Base account: 10 WETH at 10 USDC each, 40 USDC owed, WETH LTV 50%.
 *   collateral  = 100
 *   minRequired = 40 / 0.5 = 80         → healthy, health factor 1.25
 * At a WETH price of 7: collateral 70 < 80 → liquidatable, not bad debt.
 * At a WETH price of 3: collateral 30 < debt 40 → bad debt.
 */

import { MAX_UINT256, WAD } from '../src/config/constants';
import { deriveMarketId, labelAddress, type Address, type MarketId } from '../src/core/identity';
import { addCollateralType, borrow, deposit } from '../src/position/actions';
import {
    ALICE,
    DAI,
    E18,
    LENDER,
    OWNER,
    USDC,
    WBTC,
    WETH,
    createMarket,
    createTestProtocol,
    enableCollateral,
    expectProtocolError,
    fund,
    lend,
    openPosition,
    setPrice,
    type TestProtocol,
} from './helpers/fixtures';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function setup() {
    const env = createTestProtocol();
    const { id: market } = createMarket(env, { asset: USDC });
    lend(env, market, LENDER, 1_000n * E18);
    setPrice(env, market, USDC, E18);
    const wethOracle = enableCollateral(env, market, WETH, 10n * E18, WAD / 2n);
    env.positionManager.toggleKnownAsset(OWNER, WETH);
    fund(env, WETH, ALICE, 100n * E18, env.positionManager.address);
    const position = openPosition(env, ALICE);
    return { env, market, wethOracle, position };
}

function borrowAgainst(env: TestProtocol, position: Address, market: MarketId, collateral: bigint, debt: bigint): void {
    env.positionManager.processBatch(ALICE, position, [
        deposit(WETH, collateral),
        addCollateralType(WETH),
        borrow(market, debt),
    ]);
}

/** The base account from the header. */
function withDebt() {
    const ctx = setup();
    borrowAgainst(ctx.env, ctx.position, ctx.market, 10n * E18, 40n * E18);
    return { ...ctx, account: ctx.env.positionManager.getPosition(ctx.position) };
}

describe('RiskModule', () => {
    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION
    // ═══════════════════════════════════════════════════════════════════════════

    describe('getRiskData', () => {
        it('should report zeros for an account without debt and consult no oracle', () => {
            const { env, position, wethOracle } = setup();
            env.positionManager.process(ALICE, position, deposit(WETH, E18));
            wethOracle.stale = true;
            const account = env.positionManager.getPosition(position);

            expect(env.riskModule.getRiskData(account)).toEqual({
                totalCollateralValue: 0n,
                totalDebtValue: 0n,
                minRequiredCollateralValue: 0n,
            });
            expect(env.riskModule.isHealthy(account)).toBe(true);
            expect(env.riskModule.getHealthFactor(account)).toBe(MAX_UINT256);
        });

        it('should value a single-market account', () => {
            const { env, account } = withDebt();
            const risk = env.riskModule.getRiskData(account);

            expect(risk).toEqual({
                totalCollateralValue: 100n * E18,
                totalDebtValue: 40n * E18,
                minRequiredCollateralValue: 80n * E18,
            });
            expect(risk.minRequiredCollateralValue).toBeGreaterThan(risk.totalDebtValue);
            expect(env.riskModule.getHealthFactor(account)).toBe((WAD * 5n) / 4n);
        });

        it('should require more collateral value than debt for any healthy indebted account', () => {
            for (const debt of [E18, 10n * E18, 25n * E18, 50n * E18]) {
                const { env, market, position } = setup();
                borrowAgainst(env, position, market, 10n * E18, debt);
                const account = env.positionManager.getPosition(position);
                const risk = env.riskModule.getRiskData(account);

                expect(env.riskModule.isHealthy(account)).toBe(true);
                expect(risk.totalDebtValue).toBe(debt);
                // debt / 0.5
                expect(risk.minRequiredCollateralValue).toBe(2n * debt);
                expect(risk.minRequiredCollateralValue).toBeGreaterThan(risk.totalDebtValue);
            }
        });

        it('should refuse a batch that leaves the account unhealthy', () => {
            const { env, market, position } = setup();
            // 51 / 0.5 = 102 > 100
            expectProtocolError(() => borrowAgainst(env, position, market, 10n * E18, 51n * E18), 'HealthCheckFailed');

            const account = env.positionManager.getPosition(position);
            expect(account.getDebtMarkets()).toEqual([]);
            expect(account.getPositionAssets()).toEqual([]);
            expect(env.tokens.balanceOf(WETH, ALICE)).toBe(100n * E18);
            expect(env.ledger.getTotalBorrows(market)).toBe(0n);
        });

        it('should propagate oracle failures for indebted accounts', () => {
            const { env, account, wethOracle } = withDebt();
            wethOracle.stale = true;
            expectProtocolError(() => env.riskModule.getRiskData(account), 'StalePrice');
            expectProtocolError(() => env.riskModule.isHealthy(account), 'StalePrice');
        });

        it('should treat debt without collateral value as unhealthy', () => {
            const { env, account, wethOracle } = withDebt();
            wethOracle.price = 0n;
            expectProtocolError(() => env.riskModule.getRiskData(account), 'ZeroCollateralWithDebt');
            expect(env.riskModule.isHealthy(account)).toBe(false);
            expect(env.riskModule.getHealthFactor(account)).toBe(0n);
        });

        it('should refuse collateral a debt market does not accept', () => {
            const { env, market, position } = setup();
            env.positionManager.toggleKnownAsset(OWNER, WBTC);
            fund(env, WBTC, ALICE, E18, env.positionManager.address);

            expectProtocolError(
                () =>
                    env.positionManager.processBatch(ALICE, position, [
                        deposit(WETH, 10n * E18),
                        addCollateralType(WETH),
                        deposit(WBTC, E18),
                        addCollateralType(WBTC),
                        borrow(market, 10n * E18),
                    ]),
                'UnsupportedAsset'
            );
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // DEBT-WEIGHTED COLLATERAL
    // ═══════════════════════════════════════════════════════════════════════════

    describe('debt-weighted collateral', () => {
        // WETH is worth 10 under the USDC market's oracle and 1 under the DAI
        // market's oracle; LTV 90% in both.
        function twoMarkets() {
            const env = createTestProtocol();
            const { id: usdcMarket } = createMarket(env, { asset: USDC });
            const { id: daiMarket } = createMarket(env, { asset: DAI });
            lend(env, usdcMarket, LENDER, 1_000n * E18);
            lend(env, daiMarket, LENDER, 1_000n * E18);
            setPrice(env, usdcMarket, USDC, E18);
            setPrice(env, daiMarket, DAI, E18);
            const ltv = (WAD * 90n) / 100n;
            enableCollateral(env, usdcMarket, WETH, 10n * E18, ltv);
            enableCollateral(env, daiMarket, WETH, E18, ltv);
            env.positionManager.toggleKnownAsset(OWNER, WETH);
            fund(env, WETH, ALICE, 100n * E18, env.positionManager.address);
            return { env, usdcMarket, daiMarket };
        }

        function openSplit(usdcDebt: bigint, daiDebt: bigint, salt: string) {
            const { env, usdcMarket, daiMarket } = twoMarkets();
            const position = openPosition(env, ALICE, salt);
            env.positionManager.processBatch(ALICE, position, [
                deposit(WETH, 10n * E18),
                addCollateralType(WETH),
                borrow(usdcMarket, usdcDebt),
                borrow(daiMarket, daiDebt),
            ]);
            return env.riskModule.getRiskData(env.positionManager.getPosition(position));
        }

        it('should average the per-market values for an even debt split', () => {
            const risk = openSplit(20n * E18, 20n * E18, 'even');
            // 100 · 0.5 + 10 · 0.5
            expect(risk.totalCollateralValue).toBe(55n * E18);
            expect(risk.totalDebtValue).toBe(40n * E18);
            // 2 · ceil(20 / 0.9)
            expect(risk.minRequiredCollateralValue).toBe(44_444_444_444_444_444_446n);
        });

        it('should weight per-market values by debt share', () => {
            const risk = openSplit(30n * E18, 10n * E18, 'skewed');
            // 100 · 0.75 + 10 · 0.25
            expect(risk.totalCollateralValue).toBe(77_500_000_000_000_000_000n);
            // ceil(30 / 0.9) + ceil(10 / 0.9)
            expect(risk.minRequiredCollateralValue).toBe(44_444_444_444_444_444_446n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // LIQUIDATION VALIDITY
    // ═══════════════════════════════════════════════════════════════════════════

    describe('validateLiquidation', () => {
        it('should refuse to liquidate a healthy account', () => {
            const { env, market, account } = withDebt();
            const repay = [{ market, amount: 10n * E18 }];
            const seize = [{ asset: WETH, amount: E18 }];
            expectProtocolError(() => env.riskModule.validateLiquidation(account, repay, seize), 'LiquidateHealthyPosition');
            expect(env.riskModule.isValidLiquidation(account, repay, seize)).toBe(false);
        });

        it('should accept a repayment within the close factor and discount', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;

            const verdict = env.riskModule.validateLiquidation(
                account,
                [{ market, amount: 20n * E18 }],
                [{ asset: WETH, amount: 3n * E18 }]
            );
            expect(verdict).toEqual({
                isBadDebt: false,
                healthFactorBefore: (WAD * 7n) / 8n,
                repaidValue: 20n * E18,
                seizedValue: 21n * E18,
                maxSeizedValue: 22n * E18,
            });
        });

        it('should cap each market repayment at the close factor', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            const seize = [{ asset: WETH, amount: E18 }];

            expectProtocolError(
                () => env.riskModule.validateLiquidation(account, [{ market, amount: 21n * E18 }], seize),
                'CloseFactorExceeded'
            );
            // duplicate entries for one market are summed
            const split = [
                { market, amount: 15n * E18 },
                { market, amount: 15n * E18 },
            ];
            expectProtocolError(() => env.riskModule.validateLiquidation(account, split, seize), 'CloseFactorExceeded');
            expect(env.riskModule.isValidLiquidation(account, split, seize)).toBe(false);
        });

        it('should cap seized value at the repaid value plus discount', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            // 3.2 · 7 = 22.4 > 20 · 1.1
            expectProtocolError(
                () =>
                    env.riskModule.validateLiquidation(
                        account,
                        [{ market, amount: 20n * E18 }],
                        [{ asset: WETH, amount: 3_200_000_000_000_000_000n }]
                    ),
                'SeizedTooMuchCollateral'
            );
        });

        it('should take the discount per call and fall back to the configured one', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            const repay = [{ market, amount: 20n * E18 }];
            // 3.2 · 7 = 22.4: above 20 · 1.1, within 20 · 1.15
            const seize = [{ asset: WETH, amount: 3_200_000_000_000_000_000n }];

            expect(env.riskModule.isValidLiquidation(account, repay, seize)).toBe(false);
            expect(env.riskModule.isValidLiquidation(account, repay, seize, (WAD * 15n) / 100n)).toBe(true);

            const verdict = env.riskModule.validateLiquidation(account, repay, seize, (WAD * 15n) / 100n);
            expect(verdict.maxSeizedValue).toBe(23n * E18);

            // 3 · 7 = 21 passes the configured 10% but not a zero discount
            const smaller = [{ asset: WETH, amount: 3n * E18 }];
            expect(env.riskModule.isValidLiquidation(account, repay, smaller)).toBe(true);
            expect(env.riskModule.isValidLiquidation(account, repay, smaller, 0n)).toBe(false);
        });

        it('should refuse markets and assets the account does not hold', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            const stranger = deriveMarketId(ALICE, USDC, labelAddress('test:nowhere'));

            expectProtocolError(
                () =>
                    env.riskModule.validateLiquidation(
                        account,
                        [{ market: stranger, amount: E18 }],
                        [{ asset: WETH, amount: E18 }]
                    ),
                'UnknownDebtMarket'
            );
            expectProtocolError(
                () =>
                    env.riskModule.validateLiquidation(
                        account,
                        [{ market, amount: E18 }],
                        [{ asset: WBTC, amount: E18 }]
                    ),
                'UnknownCollateral'
            );
        });

        it('should still throw valuation failures from the boolean form', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            const repay = [{ market, amount: 20n * E18 }];
            const seize = [{ asset: WETH, amount: 3n * E18 }];
            expect(env.riskModule.isValidLiquidation(account, repay, seize)).toBe(true);

            wethOracle.stale = true;
            expectProtocolError(() => env.riskModule.isValidLiquidation(account, repay, seize), 'StalePrice');
        });

        it('should lift the close factor for bad debt', () => {
            const { env, market, account, wethOracle } = withDebt();
            wethOracle.price = 3n * E18;

            const verdict = env.riskModule.validateLiquidation(
                account,
                [{ market, amount: 40n * E18 }],
                [{ asset: WETH, amount: 10n * E18 }]
            );
            expect(verdict.isBadDebt).toBe(true);
            expect(verdict.seizedValue).toBe(30n * E18);
            expect(verdict.maxSeizedValue).toBe(44n * E18);
        });
    });

    describe('validateBadDebtLiquidation', () => {
        it('should only pass when collateral is worth less than debt', () => {
            const { env, account, wethOracle } = withDebt();
            wethOracle.price = 7n * E18;
            expectProtocolError(() => env.riskModule.validateBadDebtLiquidation(account), 'NoBadDebt');

            wethOracle.price = 3n * E18;
            const assessment = env.riskModule.validateBadDebtLiquidation(account);
            expect(assessment.totalCollateralValue).toBe(30n * E18);
            expect(assessment.totalDebtValue).toBe(40n * E18);
        });
    });
});
