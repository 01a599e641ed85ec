/**
 * Ledger Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Market creation, lender flows, borrow/repay through a stand-in position
 * manager, lazy interest accrual with fees, rounding direction, caps, share
 * token permissions and the rate model timelock.
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Interest scenario (100% annual rate, 10% interest fee, one year):
 *   deposits 100_000_000 / 100_000_000, borrows 10_000_000 / 10_000_000
 *   interest   = 10_000_000            → borrow owed doubles to 20_000_000
 *   fee shares = 1_000_000 · 1e8 / 1e8 = 1_000_000 minted to the fee recipient
 *   after      : deposits 101_000_000 shares / 110_000_000 assets
 */

import { DEAD_ADDRESS, MAX_UINT256, SECONDS_PER_YEAR, WAD } from '../src/config/constants';
import { labelAddress, type Address, type MarketId } from '../src/core/identity';
import type { RepayResult } from '../src/ledger';
import {
    ALICE,
    BOB,
    FEE_RECIPIENT,
    FixedRateModel,
    INITIAL_DEPOSIT,
    MARKET_OWNER,
    OWNER,
    USDC,
    createMarket,
    createTestProtocol,
    expectProtocolError,
    fund,
    lend,
    type MarketSetup,
    type TestProtocol,
} from './helpers/fixtures';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const PM_STUB = labelAddress('test:position-manager-stub');
const BORROWER = labelAddress('test:borrower');
const YEAR = Number(SECONDS_PER_YEAR);
const DAY = 86_400;
const START = 1_700_000_000;

/**
 * Protocol with a USDC market whose borrow side is driven directly by a
 * stand-in position manager address.
 */
function setup(market: Omit<MarketSetup, 'asset'> = {}) {
    const env = createTestProtocol();
    env.ledger.setPositionManager(OWNER, PM_STUB);
    const { id, rateModel } = createMarket(env, { asset: USDC, ...market });
    return { env, id, rateModel };
}

/** Move `amount` from the borrower into the ledger and burn the matching debt. */
function repayFrom(env: TestProtocol, id: MarketId, account: Address, amount: bigint): RepayResult {
    return env.ctx.journal.atomic(() => {
        const owed = amount === MAX_UINT256 ? env.ledger.getBorrowsOf(id, account) : amount;
        env.tokens.transfer(USDC, account, env.ledger.address, owed);
        return env.ledger.repay(PM_STUB, id, account, amount);
    });
}

/** The interest scenario from the header, accrued. */
function afterOneYear() {
    const { env, id } = setup({ rate: WAD });
    env.ledger.setInterestFee(OWNER, id, WAD / 10n);
    lend(env, id, ALICE, 99_000_000n);
    env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);
    env.clock.advance(YEAR);
    env.ledger.accrue(id);
    return { env, id };
}

describe('Ledger', () => {
    // ═══════════════════════════════════════════════════════════════════════════
    // MARKET CREATION
    // ═══════════════════════════════════════════════════════════════════════════

    describe('initializeMarket', () => {
        it('should burn the initial deposit shares to the dead address', () => {
            const { env, id, rateModel } = setup();
            const pool = env.ledger.getPoolData(id);

            expect(env.ledger.balanceOf(id, DEAD_ADDRESS)).toBe(INITIAL_DEPOSIT);
            expect(pool.deposits).toEqual({ shares: INITIAL_DEPOSIT, assets: INITIAL_DEPOSIT });
            expect(pool.borrows).toEqual({ shares: 0n, assets: 0n });
            expect(pool.owner).toBe(MARKET_OWNER);
            expect(pool.rateModel).toBe(rateModel.address);
            expect(env.tokens.balanceOf(USDC, env.ledger.address)).toBe(INITIAL_DEPOSIT);
            expect(env.ledger.getMarketIds()).toEqual([id]);
            expect(env.ctx.events.filter('PoolInitialized')).toHaveLength(1);
        });

        it('should refuse a second market with the same owner, asset and rate model', () => {
            const { env, rateModel } = setup();
            fund(env, USDC, MARKET_OWNER, INITIAL_DEPOSIT, env.ledger.address);
            expectProtocolError(
                () =>
                    env.ledger.initializeMarket(MARKET_OWNER, {
                        asset: USDC,
                        rateModel,
                        depositCap: MAX_UINT256,
                        borrowCap: MAX_UINT256,
                        initialDeposit: INITIAL_DEPOSIT,
                    }),
                'MarketAlreadyExists'
            );
        });

        it('should refuse an initial deposit below the burned-share minimum', () => {
            const { env } = setup();
            const rateModel = new FixedRateModel(labelAddress('test:rate-model:small'), 0n);
            fund(env, USDC, MARKET_OWNER, INITIAL_DEPOSIT, env.ledger.address);
            expectProtocolError(
                () =>
                    env.ledger.initializeMarket(MARKET_OWNER, {
                        asset: USDC,
                        rateModel,
                        depositCap: MAX_UINT256,
                        borrowCap: MAX_UINT256,
                        initialDeposit: INITIAL_DEPOSIT - 1n,
                    }),
                'InitialDepositTooLow'
            );
            expect(env.ledger.getMarketIds()).toHaveLength(1);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // LENDER FLOWS
    // ═══════════════════════════════════════════════════════════════════════════

    describe('deposit', () => {
        it('should mint shares one to one while no interest has accrued', () => {
            const { env, id } = setup();
            expect(lend(env, id, ALICE, 5_000n)).toBe(5_000n);
            expect(env.ledger.balanceOf(id, ALICE)).toBe(5_000n);
            expect(env.ledger.getAssetsOf(id, ALICE)).toBe(5_000n);
            expectProtocolError(() => env.ledger.deposit(ALICE, id, 0n, ALICE), 'ZeroSharesDeposit');
        });

        it('should enforce the deposit cap on the post-deposit total', () => {
            const { env, id } = setup({ depositCap: 2_000_000n });
            fund(env, USDC, ALICE, 2_000_000n, env.ledger.address);
            expectProtocolError(() => env.ledger.deposit(ALICE, id, 1_000_001n, ALICE), 'DepositCapExceeded');
            expect(env.ledger.deposit(ALICE, id, 1_000_000n, ALICE)).toBe(1_000_000n);
        });

        it('should refuse deposits while paused', () => {
            const { env, id } = setup();
            expect(env.ledger.togglePause(MARKET_OWNER, id)).toBe(true);
            fund(env, USDC, ALICE, 100n, env.ledger.address);
            expectProtocolError(() => env.ledger.deposit(ALICE, id, 100n, ALICE), 'MarketPaused');
            expectProtocolError(() => env.ledger.togglePause(ALICE, id), 'OnlyMarketOwner');
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // INTEREST
    // ═══════════════════════════════════════════════════════════════════════════

    describe('accrue', () => {
        it('should double the debt at a 100% rate over one year', () => {
            const { env, id } = setup({ rate: WAD });
            env.ledger.setInterestFee(OWNER, id, WAD / 10n);
            lend(env, id, ALICE, 99_000_000n);
            expect(env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n)).toBe(10_000_000n);

            env.clock.advance(YEAR);
            expect(env.ledger.getBorrowsOf(id, BORROWER)).toBe(20_000_000n);
            expect(env.ledger.simulateAccrue(id)).toMatchObject({ interest: 10_000_000n, feeShares: 1_000_000n });
            // views simulate without writing
            expect(env.ledger.getPoolData(id).lastAccrual).toBe(START);
        });

        it('should mint interest fee shares to the fee recipient', () => {
            const { env, id } = afterOneYear();
            const pool = env.ledger.getPoolData(id);

            expect(env.ledger.balanceOf(id, FEE_RECIPIENT)).toBe(1_000_000n);
            expect(pool.deposits).toEqual({ shares: 101_000_000n, assets: 110_000_000n });
            expect(pool.borrows).toEqual({ shares: 10_000_000n, assets: 20_000_000n });
            expect(pool.lastAccrual).toBe(START + YEAR);
            // 1_000_000 fee assets buy shares at the pre-interest price of 1,
            // which are then worth 1_000_000 · 110 / 101
            expect(env.ledger.getAssetsOf(id, FEE_RECIPIENT)).toBe(1_089_108n);
            expect(env.ledger.getAssetsOf(id, ALICE)).toBe(107_821_782n);
        });

        it('should keep share balances summing to the share total', () => {
            const { env, id } = afterOneYear();
            const holders = [DEAD_ADDRESS, ALICE, FEE_RECIPIENT];
            const total = holders.reduce((acc, holder) => acc + env.ledger.balanceOf(id, holder), 0n);
            expect(total).toBe(env.ledger.getPoolData(id).deposits.shares);
            expect(env.ledger.borrowSharesOf(id, BORROWER)).toBe(env.ledger.getPoolData(id).borrows.shares);
        });

        it('should grow withdrawable amounts in proportion to the share price', () => {
            const { env, id } = setup({ rate: WAD });
            lend(env, id, ALICE, 19_000_000n);
            lend(env, id, BOB, 80_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);
            expect(env.ledger.maxWithdraw(id, ALICE)).toBe(19_000_000n);
            expect(env.ledger.maxWithdraw(id, BOB)).toBe(80_000_000n);

            // deposits 100e6 → 110e6 against 100e6 shares, idle 90e6
            env.clock.advance(YEAR);
            expect(env.ledger.maxWithdraw(id, ALICE)).toBe(20_900_000n);
            expect(env.ledger.maxWithdraw(id, BOB)).toBe(88_000_000n);

            expect(env.ledger.withdraw(ALICE, id, 20_900_000n, ALICE, ALICE)).toBe(19_000_000n);
            expect(env.ledger.balanceOf(id, ALICE)).toBe(0n);
            expect(env.tokens.balanceOf(USDC, ALICE)).toBe(20_900_000n);
        });

        it('should be a no-op when called twice in the same second', () => {
            const { env, id } = afterOneYear();
            const before = env.ledger.getPoolData(id);
            env.ledger.accrue(id);
            expect(env.ledger.getPoolData(id)).toEqual(before);
            expect(env.ctx.events.filter('InterestAccrued')).toHaveLength(1);
        });

        it('should only move the timestamp while nothing is borrowed', () => {
            const { env, id } = setup({ rate: WAD });
            env.clock.advance(YEAR);
            env.ledger.accrue(id);
            const pool = env.ledger.getPoolData(id);
            expect(pool.deposits).toEqual({ shares: INITIAL_DEPOSIT, assets: INITIAL_DEPOSIT });
            expect(pool.lastAccrual).toBe(START + YEAR);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // ROUNDING
    // ═══════════════════════════════════════════════════════════════════════════

    describe('rounding', () => {
        it('should round withdraw shares up and redeem assets down', () => {
            const { env, id } = afterOneYear();
            // 100 · 101e6 / 110e6 = 91.8 → 92 shares burned
            expect(env.ledger.withdraw(ALICE, id, 100n, ALICE, ALICE)).toBe(92n);
            // 92 shares are worth 100.2 assets → 100 paid
            expect(env.ledger.redeem(ALICE, id, 92n, ALICE, ALICE)).toBe(100n);
            expect(env.ledger.balanceOf(id, ALICE)).toBe(99_000_000n - 184n);
        });

        it('should round borrow shares up and repay shares down', () => {
            const { env, id } = afterOneYear();
            // 3 · 1e7 / 2e7 = 1.5 → 2 shares
            expect(env.ledger.borrow(PM_STUB, id, BORROWER, 3n)).toBe(2n);
            // 1 · 10_000_002 / 20_000_003 → 0 shares
            expectProtocolError(() => repayFrom(env, id, BORROWER, 1n), 'ZeroSharesRepay');
        });

        it('should burn every share and charge the rounded-up debt on a full repay', () => {
            const { env, id } = afterOneYear();
            fund(env, USDC, BORROWER, 10_000_000n);
            const result = repayFrom(env, id, BORROWER, MAX_UINT256);

            expect(result).toEqual({ sharesBurned: 10_000_000n, remainingShares: 0n, assetsRepaid: 20_000_000n });
            expect(env.ledger.getPoolData(id).borrows).toEqual({ shares: 0n, assets: 0n });
            expect(env.ledger.borrowSharesOf(id, BORROWER)).toBe(0n);
            expect(env.tokens.balanceOf(USDC, BORROWER)).toBe(0n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // BORROWING
    // ═══════════════════════════════════════════════════════════════════════════

    describe('borrow and repay', () => {
        it('should accept borrow and repay from the position manager only', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 100_000n);
            expectProtocolError(() => env.ledger.borrow(ALICE, id, ALICE, 1_000n), 'OnlyPositionManager');
            expectProtocolError(() => env.ledger.repay(ALICE, id, ALICE, 1_000n), 'OnlyPositionManager');
        });

        it('should enforce the borrow cap and idle liquidity', () => {
            const capped = setup({ borrowCap: 50_000n });
            lend(capped.env, capped.id, ALICE, 100_000n);
            expectProtocolError(() => capped.env.ledger.borrow(PM_STUB, capped.id, BORROWER, 50_001n), 'BorrowCapExceeded');

            const { env, id } = setup();
            lend(env, id, ALICE, 500_000n);
            expectProtocolError(() => env.ledger.borrow(PM_STUB, id, BORROWER, 1_500_001n), 'InsufficientLiquidity');
            env.ledger.borrow(PM_STUB, id, BORROWER, 1_400_000n);

            expect(env.ledger.getLiquidityOf(id)).toBe(100_000n);
            expect(env.ledger.maxWithdraw(id, ALICE)).toBe(100_000n);
            expectProtocolError(() => env.ledger.withdraw(ALICE, id, 100_001n, ALICE, ALICE), 'InsufficientLiquidity');
        });

        it('should enforce the minimum borrow and the minimum remaining debt', () => {
            const { env, id } = setup();
            env.ledger.setMinBorrow(OWNER, 1_000n);
            env.ledger.setMinDebt(OWNER, 5_000n);
            lend(env, id, ALICE, 100_000n);

            expectProtocolError(() => env.ledger.borrow(PM_STUB, id, BORROWER, 999n), 'BorrowAmountTooLow');
            expectProtocolError(() => env.ledger.borrow(PM_STUB, id, BORROWER, 4_000n), 'DebtTooLow');
            env.ledger.borrow(PM_STUB, id, BORROWER, 5_000n);

            expectProtocolError(() => repayFrom(env, id, BORROWER, 1_000n), 'DebtTooLow');
            expect(env.tokens.balanceOf(USDC, BORROWER)).toBe(5_000n);

            fund(env, USDC, BORROWER, 1_000n);
            expectProtocolError(() => repayFrom(env, id, BORROWER, 6_000n), 'InsufficientShares');
            expect(repayFrom(env, id, BORROWER, 5_000n).remainingShares).toBe(0n);
        });

        it('should withhold the origination fee from the borrowed amount', () => {
            const { env, id } = setup();
            env.ledger.setOriginationFee(OWNER, id, WAD / 100n);
            lend(env, id, ALICE, 100_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);

            expect(env.tokens.balanceOf(USDC, BORROWER)).toBe(9_900_000n);
            expect(env.tokens.balanceOf(USDC, FEE_RECIPIENT)).toBe(100_000n);
            expect(env.ledger.getBorrowsOf(id, BORROWER)).toBe(10_000_000n);
        });

        it('should refuse fees above 100% and callers other than the protocol owner', () => {
            const { env, id } = setup();
            expectProtocolError(() => env.ledger.setInterestFee(OWNER, id, WAD + 1n), 'FeeTooHigh');
            expectProtocolError(() => env.ledger.setInterestFee(ALICE, id, 1n), 'OnlyProtocolOwner');
        });

        it('should keep borrow shares summing to the total across borrowers and partial repays', () => {
            const { env, id } = setup({ rate: WAD });
            const SECOND = labelAddress('test:second-borrower');
            lend(env, id, ALICE, 99_000_000n);

            expect(env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n)).toBe(10_000_000n);
            // borrows 10e6 / 12.5e6 after a quarter → ceil(7e6 · 10e6 / 12.5e6)
            env.clock.advance(YEAR / 4);
            expect(env.ledger.borrow(PM_STUB, id, SECOND, 7_000_000n)).toBe(5_600_000n);

            // borrows 15.6e6 / 24.375e6 after another quarter
            env.clock.advance(YEAR / 4);
            expect(repayFrom(env, id, BORROWER, 3_000_000n).sharesBurned).toBe(1_920_000n);
            // share price is now 21.375e6 / 13.68e6; 1_234_567 · 0.64 = 790_122.88
            expect(repayFrom(env, id, SECOND, 1_234_567n).sharesBurned).toBe(790_122n);

            const pool = env.ledger.getPoolData(id);
            expect(env.ledger.borrowSharesOf(id, BORROWER)).toBe(8_080_000n);
            expect(env.ledger.borrowSharesOf(id, SECOND)).toBe(4_809_878n);
            expect(pool.borrows.shares).toBe(12_889_878n);
            expect(env.ledger.borrowSharesOf(id, BORROWER) + env.ledger.borrowSharesOf(id, SECOND)).toBe(
                pool.borrows.shares
            );
            // debts round up, so together they never undershoot the total
            const owed = env.ledger.getBorrowsOf(id, BORROWER) + env.ledger.getBorrowsOf(id, SECOND);
            expect(owed).toBeGreaterThanOrEqual(pool.borrows.assets);
            expect(owed).toBeLessThanOrEqual(pool.borrows.assets + 1n);
        });

        it('should write bad debt off against depositors', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 100_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);

            expect(env.ledger.rebalanceBadDebt(PM_STUB, id, BORROWER)).toBe(10_000_000n);
            const pool = env.ledger.getPoolData(id);
            expect(pool.deposits).toEqual({ shares: 101_000_000n, assets: 91_000_000n });
            expect(pool.borrows).toEqual({ shares: 0n, assets: 0n });
            expect(env.ledger.rebalanceBadDebt(PM_STUB, id, BORROWER)).toBe(0n);
        });
    });

    describe('written-off markets', () => {
        it('should refuse deposits once every deposited asset is written off', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 9_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);
            expect(env.ledger.rebalanceBadDebt(PM_STUB, id, BORROWER)).toBe(10_000_000n);
            expect(env.ledger.getPoolData(id).deposits).toEqual({ shares: 10_000_000n, assets: 0n });
            expect(env.ledger.getAssetsOf(id, ALICE)).toBe(0n);

            fund(env, USDC, BOB, 100_000_000n, env.ledger.address);
            const error = expectProtocolError(() => env.ledger.deposit(BOB, id, 100_000_000n, BOB), 'MarketInsolvent');
            expect(error.kind).toBe('InvalidInput');
            expect(env.tokens.balanceOf(USDC, BOB)).toBe(100_000_000n);
            expect(env.ledger.balanceOf(id, BOB)).toBe(0n);
            expect(env.ledger.getPoolData(id).deposits).toEqual({ shares: 10_000_000n, assets: 0n });

            expectProtocolError(() => env.ledger.redeem(ALICE, id, 1n, ALICE, ALICE), 'ZeroAssetsRedeem');
        });

        it('should keep pricing a market that still holds assets after a write-off', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 99_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 50_000_000n);
            env.ledger.rebalanceBadDebt(PM_STUB, id, BORROWER);

            // deposits 100e6 shares / 50e6 assets: 10e6 assets buy 20e6 shares
            fund(env, USDC, BOB, 10_000_000n, env.ledger.address);
            expect(env.ledger.deposit(BOB, id, 10_000_000n, BOB)).toBe(20_000_000n);
            expect(env.ledger.getAssetsOf(id, BOB)).toBe(10_000_000n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // NEGATIVE AMOUNTS
    // ═══════════════════════════════════════════════════════════════════════════

    describe('negative amounts', () => {
        it('should refuse negative amounts on every entry point without moving funds', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 100_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000n);
            const pool = env.ledger.getPoolData(id);
            const liquidity = env.tokens.balanceOf(USDC, env.ledger.address);

            const attempts: Array<() => unknown> = [
                () => env.ledger.deposit(ALICE, id, -50_000n, ALICE),
                () => env.ledger.withdraw(ALICE, id, -1n, ALICE, ALICE),
                () => env.ledger.redeem(ALICE, id, -1n, ALICE, ALICE),
                () => env.ledger.borrow(PM_STUB, id, BORROWER, -1n),
                () => env.ledger.repay(PM_STUB, id, BORROWER, -1n),
                () => env.ledger.transfer(ALICE, id, BOB, -1n),
                () => env.ledger.transferFrom(BOB, ALICE, BOB, id, -1n),
                () => env.ledger.approve(ALICE, BOB, id, -1n),
                () => env.ledger.setDepositCap(MARKET_OWNER, id, -1n),
            ];
            for (const attempt of attempts) {
                expect(expectProtocolError(attempt, 'InvalidAmount').kind).toBe('InvalidInput');
            }

            expect(env.ledger.getPoolData(id)).toEqual(pool);
            expect(env.tokens.balanceOf(USDC, env.ledger.address)).toBe(liquidity);
            expect(env.tokens.balanceOf(USDC, ALICE)).toBe(0n);
            expect(env.ledger.balanceOf(id, ALICE)).toBe(100_000n);
            expect(env.ledger.balanceOf(id, BOB)).toBe(0n);
            expect(env.ledger.allowance(ALICE, BOB, id)).toBe(0n);
            expect(env.ledger.borrowSharesOf(id, BORROWER)).toBe(10_000n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARE TOKEN
    // ═══════════════════════════════════════════════════════════════════════════

    describe('share token', () => {
        it('should spend share allowances on transferFrom', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 1_000n);
            env.ledger.approve(ALICE, BOB, id, 600n);

            env.ledger.transferFrom(BOB, ALICE, BOB, id, 400n);
            expect(env.ledger.balanceOf(id, BOB)).toBe(400n);
            expect(env.ledger.allowance(ALICE, BOB, id)).toBe(200n);
            expectProtocolError(() => env.ledger.transferFrom(BOB, ALICE, BOB, id, 201n), 'InsufficientAllowance');
            expectProtocolError(() => env.ledger.transfer(ALICE, id, BOB, 601n), 'InsufficientShares');
        });

        it('should let an operator withdraw without an allowance', () => {
            const { env, id } = setup();
            lend(env, id, ALICE, 1_000n);
            expectProtocolError(() => env.ledger.withdraw(BOB, id, 300n, BOB, ALICE), 'InsufficientAllowance');

            env.ledger.setOperator(ALICE, BOB, true);
            expect(env.ledger.withdraw(BOB, id, 300n, BOB, ALICE)).toBe(300n);
            expect(env.tokens.balanceOf(USDC, BOB)).toBe(300n);
            expect(env.ledger.balanceOf(id, ALICE)).toBe(700n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // RATE MODEL GOVERNANCE
    // ═══════════════════════════════════════════════════════════════════════════

    describe('rate model updates', () => {
        it('should apply a new rate model only after the timelock', () => {
            const { env, id, rateModel } = setup();
            const next = new FixedRateModel(labelAddress('test:rate-model:next'), WAD);
            lend(env, id, ALICE, 100_000_000n);
            env.ledger.borrow(PM_STUB, id, BORROWER, 10_000_000n);

            expectProtocolError(() => env.ledger.requestRateModelUpdate(ALICE, id, next), 'OnlyMarketOwner');
            env.ledger.requestRateModelUpdate(MARKET_OWNER, id, next);
            expectProtocolError(() => env.ledger.acceptRateModelUpdate(MARKET_OWNER, id), 'TimelockNotElapsed');
            expect(env.ledger.getRateModel(id)).toBe(rateModel);

            env.clock.advance(DAY);
            env.ledger.acceptRateModelUpdate(MARKET_OWNER, id);
            expect(env.ledger.getRateModel(id)).toBe(next);
            expect(env.ledger.getPendingRateModel(id)).toBeUndefined();
            // the elapsed day accrued under the outgoing zero rate
            expect(env.ledger.getTotalBorrows(id)).toBe(10_000_000n);

            env.clock.advance(YEAR);
            expect(env.ledger.getTotalBorrows(id)).toBe(20_000_000n);
        });

        it('should expire and reject pending rate models', () => {
            const { env, id } = setup();
            const next = new FixedRateModel(labelAddress('test:rate-model:late'), WAD);

            env.ledger.requestRateModelUpdate(MARKET_OWNER, id, next);
            env.clock.advance(4 * DAY + 1);
            expectProtocolError(() => env.ledger.acceptRateModelUpdate(MARKET_OWNER, id), 'TimelockExpired');

            env.ledger.rejectRateModelUpdate(MARKET_OWNER, id);
            expect(env.ledger.getPendingRateModel(id)).toBeUndefined();
            expectProtocolError(() => env.ledger.rejectRateModelUpdate(MARKET_OWNER, id), 'NoPendingUpdate');
        });
    });
});
