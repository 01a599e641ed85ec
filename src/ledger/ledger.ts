/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * LEDGER — ISOLATED MARKET SHARE ACCOUNTING
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * Each market is an isolated pair of share ledgers over one asset: deposit
 * shares held by lenders and borrow shares held by accounts. Interest accrues
 * lazily on the next touch of a market.
 *
 * INVARIANTS:
 * - Σ deposit share balances == deposits.shares (dead shares included)
 * - Σ borrow share balances == borrows.shares
 * - borrows.assets <= deposits.assets; idle = deposits.assets − borrows.assets
 * - Every mutation accrues first, so all conversions use current totals
 * - Views simulate accrual and never write
 *
 * ROUNDING (always against the caller):
 * - deposit → shares down        - withdraw → shares up
 * - redeem  → assets down        - borrow   → shares up
 * - repay   → shares down
 *
 * RULES:
 * 1. borrow / repay / rebalanceBadDebt are callable by the position manager only
 * 2. Caps are checked against the post-mutation totals
 * 3. Market creation burns the initial deposit's shares to DEAD_ADDRESS
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DEAD_ADDRESS, MAX_UINT256, SECONDS_PER_YEAR, WAD } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError } from '../core/errors';
import { deriveMarketId, labelAddress, type Address, type MarketId } from '../core/identity';
import { StateMap, StateSlot } from '../core/journal';
import { TimelockedParameter, type PendingUpdate } from '../core/timelock';
import type { RateModel } from '../types';
import logger from '../utils/logger';
import { formatWad, mulDiv, mulWad, requireAmount, subOrZero } from '../utils/math';
import { toAssets, toShares, EMPTY_PAIR } from './shares';
import type {
    AccrualPreview,
    InitializeMarketParams,
    Market,
    MarketView,
    RepayResult,
} from './types';

export const LEDGER_CONFIG = {
    logPrefix: '[LEDGER]',
    emitter: 'Ledger',
};

export interface LedgerOptions {
    owner: Address;
    feeRecipient: Address;
    address?: Address;
}

export class Ledger {
    readonly address: Address;

    private readonly owner: StateSlot<Address>;
    private readonly feeRecipient: StateSlot<Address>;
    private readonly positionManager: StateSlot<Address | null>;
    private readonly defaultInterestFee: StateSlot<bigint>;
    private readonly defaultOriginationFee: StateSlot<bigint>;
    private readonly minBorrow: StateSlot<bigint>;
    private readonly minDebt: StateSlot<bigint>;

    private readonly markets: StateMap<MarketId, Market>;
    private readonly rateModels: TimelockedParameter<RateModel>;
    // `${market}:${account}`
    private readonly depositShares: StateMap<string, bigint>;
    private readonly borrowShares: StateMap<string, bigint>;
    // `${owner}:${spender}:${market}`
    private readonly shareAllowances: StateMap<string, bigint>;
    // `${owner}:${operator}`
    private readonly operators: StateMap<string, boolean>;

    constructor(private readonly ctx: ProtocolContext, options: LedgerOptions) {
        const { journal, config } = ctx;
        this.address = options.address ?? labelAddress('isomarket.ledger');
        this.owner = new StateSlot(journal, options.owner);
        this.feeRecipient = new StateSlot(journal, options.feeRecipient);
        this.positionManager = new StateSlot<Address | null>(journal, null);
        this.defaultInterestFee = new StateSlot(journal, config.ledger.defaultInterestFee);
        this.defaultOriginationFee = new StateSlot(journal, config.ledger.defaultOriginationFee);
        this.minBorrow = new StateSlot(journal, config.ledger.minBorrow);
        this.minDebt = new StateSlot(journal, config.ledger.minDebt);
        this.markets = new StateMap(journal);
        this.rateModels = new TimelockedParameter(journal, ctx.clock, 'rate model', {
            timelock: config.ledger.rateModelTimelock,
            deadline: config.ledger.rateModelDeadline,
        });
        this.depositShares = new StateMap(journal);
        this.borrowShares = new StateMap(journal);
        this.shareAllowances = new StateMap(journal);
        this.operators = new StateMap(journal);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MARKET LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Create a market owned by `caller`. The initial deposit is pulled from the
     * caller and its shares are burned, so the share price can never be
     * inflated from an empty ledger.
     */
    initializeMarket(caller: Address, params: InitializeMarketParams): MarketId {
        return this.ctx.journal.atomic(() => {
            const id = deriveMarketId(caller, params.asset, params.rateModel.address);
            if (this.markets.has(id)) {
                throw new ProtocolError('MarketAlreadyExists', 'market already initialized', { id });
            }
            requireAmount(params.depositCap, { id });
            requireAmount(params.borrowCap, { id });
            const minBurned = this.ctx.config.ledger.minBurnedShares;
            if (params.initialDeposit < minBurned) {
                throw new ProtocolError('InitialDepositTooLow', 'initial deposit below burned-share minimum', {
                    initialDeposit: params.initialDeposit,
                    minBurned,
                });
            }
            if (params.initialDeposit > params.depositCap) {
                throw new ProtocolError('DepositCapExceeded', 'initial deposit above deposit cap', {
                    initialDeposit: params.initialDeposit,
                    depositCap: params.depositCap,
                });
            }

            this.ctx.tokens.transferFrom(this.address, params.asset, caller, this.address, params.initialDeposit);

            this.markets.set(id, {
                id,
                owner: caller,
                asset: params.asset,
                depositCap: params.depositCap,
                borrowCap: params.borrowCap,
                interestFee: this.defaultInterestFee.get(),
                originationFee: this.defaultOriginationFee.get(),
                isPaused: false,
                deposits: { shares: params.initialDeposit, assets: params.initialDeposit },
                borrows: EMPTY_PAIR,
                lastAccrual: this.ctx.clock.now(),
            });
            this.rateModels.set(id, params.rateModel);
            this.depositShares.set(`${id}:${DEAD_ADDRESS}`, params.initialDeposit);

            this.emit('PoolInitialized', {
                market: id,
                owner: caller,
                asset: params.asset,
                rateModel: params.rateModel.address,
            });
            this.log(`INIT market=${id} asset=${params.asset} owner=${caller} burned=${params.initialDeposit}`);
            return id;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTEREST ACCRUAL
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Bring a market's totals up to the current time. A second call in the same
     * time step is a no-op.
     */
    accrue(id: MarketId): Market {
        return this.ctx.journal.atomic(() => {
            const market = this.requireMarket(id);
            const preview = this.simulate(market);
            if (preview.timestamp === market.lastAccrual) return market;

            const next: Market = {
                ...market,
                deposits: preview.deposits,
                borrows: preview.borrows,
                lastAccrual: preview.timestamp,
            };
            this.markets.set(id, next);

            if (preview.feeShares > 0n) {
                const recipient = this.feeRecipient.get();
                this.creditShares(id, recipient, preview.feeShares);
            }
            if (preview.interest > 0n) {
                this.emit('InterestAccrued', {
                    market: id,
                    interest: preview.interest,
                    feeShares: preview.feeShares,
                });
                this.log(`ACCRUE market=${id} interest=${preview.interest} feeShares=${preview.feeShares}`);
            }
            return next;
        });
    }

    /** Read-only view of what `accrue` would do right now. */
    simulateAccrue(id: MarketId): AccrualPreview {
        return this.simulate(this.requireMarket(id));
    }

    private simulate(market: Market): AccrualPreview {
        const now = this.ctx.clock.now();
        const elapsed = now - market.lastAccrual;
        const unchanged: AccrualPreview = {
            interest: 0n,
            feeShares: 0n,
            deposits: market.deposits,
            borrows: market.borrows,
            timestamp: Math.max(now, market.lastAccrual),
        };
        if (elapsed <= 0 || market.borrows.assets === 0n) return unchanged;

        const idle = subOrZero(market.deposits.assets, market.borrows.assets);
        const rate = this.rateModelOf(market.id).getRate(market.borrows.assets, idle);
        const interest = mulDiv(
            market.borrows.assets * rate,
            BigInt(elapsed),
            WAD * SECONDS_PER_YEAR,
            'down'
        );
        if (interest === 0n) return unchanged;

        // fee shares take the pre-interest share price, so the recipient also
        // holds its pro-rata part of this step's interest
        const feeAssets = mulWad(interest, market.interestFee, 'down');
        const feeShares = feeAssets === 0n ? 0n : toShares(feeAssets, market.deposits, 'down');

        return {
            interest,
            feeShares,
            deposits: {
                shares: market.deposits.shares + feeShares,
                assets: market.deposits.assets + interest,
            },
            borrows: {
                shares: market.borrows.shares,
                assets: market.borrows.assets + interest,
            },
            timestamp: now,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LENDER OPERATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    deposit(caller: Address, id: MarketId, assets: bigint, receiver: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(assets, { id });
            const market = this.accrue(id);
            if (market.isPaused) {
                throw new ProtocolError('MarketPaused', 'market is paused', { id });
            }
            const shares = toShares(assets, market.deposits, 'down');
            if (shares === 0n) {
                throw new ProtocolError('ZeroSharesDeposit', 'deposit mints zero shares', { id, assets });
            }
            const totalAfter = market.deposits.assets + assets;
            if (totalAfter > market.depositCap) {
                throw new ProtocolError('DepositCapExceeded', 'deposit cap exceeded', {
                    id,
                    totalAfter,
                    depositCap: market.depositCap,
                });
            }

            this.ctx.tokens.transferFrom(this.address, market.asset, caller, this.address, assets);
            this.markets.set(id, {
                ...market,
                deposits: { shares: market.deposits.shares + shares, assets: totalAfter },
            });
            this.creditShares(id, receiver, shares);

            this.emit('Deposit', { market: id, caller, receiver, assets, shares });
            this.log(`DEPOSIT market=${id} receiver=${receiver} assets=${assets} shares=${shares}`);
            return shares;
        });
    }

    withdraw(caller: Address, id: MarketId, assets: bigint, receiver: Address, owner: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(assets, { id });
            const market = this.accrue(id);
            const shares = toShares(assets, market.deposits, 'up');
            if (shares === 0n) {
                throw new ProtocolError('ZeroSharesWithdraw', 'withdraw burns zero shares', { id, assets });
            }
            this.exit(caller, market, assets, shares, receiver, owner);
            return shares;
        });
    }

    redeem(caller: Address, id: MarketId, shares: bigint, receiver: Address, owner: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(shares, { id });
            const market = this.accrue(id);
            const assets = toAssets(shares, market.deposits, 'down');
            if (assets === 0n) {
                throw new ProtocolError('ZeroAssetsRedeem', 'redeem returns zero assets', { id, shares });
            }
            this.exit(caller, market, assets, shares, receiver, owner);
            return assets;
        });
    }

    private exit(
        caller: Address,
        market: Market,
        assets: bigint,
        shares: bigint,
        receiver: Address,
        owner: Address
    ): void {
        const id = market.id;
        this.spendShareAllowance(owner, caller, id, shares);
        const balance = this.balanceOf(id, owner);
        if (balance < shares) {
            throw new ProtocolError('InsufficientShares', 'share balance too low', { id, owner, balance, shares });
        }
        const idle = subOrZero(market.deposits.assets, market.borrows.assets);
        if (assets > idle) {
            throw new ProtocolError('InsufficientLiquidity', 'not enough idle assets', { id, assets, idle });
        }

        this.markets.set(id, {
            ...market,
            deposits: {
                shares: market.deposits.shares - shares,
                assets: market.deposits.assets - assets,
            },
        });
        this.depositShares.set(`${id}:${owner}`, balance - shares);
        this.ctx.tokens.transfer(market.asset, this.address, receiver, assets);

        this.emit('Withdraw', { market: id, caller, receiver, owner, assets, shares });
        this.log(`WITHDRAW market=${id} owner=${owner} assets=${assets} shares=${shares}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // BORROWER OPERATIONS (position manager only)
    // ═══════════════════════════════════════════════════════════════════════════

    borrow(caller: Address, id: MarketId, position: Address, assets: bigint): bigint {
        return this.ctx.journal.atomic(() => {
            this.requirePositionManager(caller);
            requireAmount(assets, { id, position });
            const market = this.accrue(id);
            if (market.isPaused) {
                throw new ProtocolError('MarketPaused', 'market is paused', { id });
            }
            const minBorrow = this.minBorrow.get();
            if (assets < minBorrow) {
                throw new ProtocolError('BorrowAmountTooLow', 'borrow below minimum', { id, assets, minBorrow });
            }
            const shares = toShares(assets, market.borrows, 'up');
            if (shares === 0n) {
                throw new ProtocolError('ZeroSharesBorrow', 'borrow mints zero shares', { id, assets });
            }
            const borrows = { shares: market.borrows.shares + shares, assets: market.borrows.assets + assets };
            if (borrows.assets > market.borrowCap) {
                throw new ProtocolError('BorrowCapExceeded', 'borrow cap exceeded', {
                    id,
                    totalAfter: borrows.assets,
                    borrowCap: market.borrowCap,
                });
            }
            const idle = subOrZero(market.deposits.assets, market.borrows.assets);
            if (assets > idle) {
                throw new ProtocolError('InsufficientLiquidity', 'not enough idle assets', { id, assets, idle });
            }
            const balance = this.borrowSharesOf(id, position) + shares;
            const debt = toAssets(balance, borrows, 'up');
            const minDebt = this.minDebt.get();
            if (debt < minDebt) {
                throw new ProtocolError('DebtTooLow', 'resulting debt below minimum', { id, debt, minDebt });
            }

            this.markets.set(id, { ...market, borrows });
            this.borrowShares.set(`${id}:${position}`, balance);

            const fee = mulWad(assets, market.originationFee, 'down');
            if (fee > 0n) {
                this.ctx.tokens.transfer(market.asset, this.address, this.feeRecipient.get(), fee);
            }
            this.ctx.tokens.transfer(market.asset, this.address, position, assets - fee);

            this.emit('Borrow', { market: id, position, assets, shares, fee });
            this.log(`BORROW market=${id} position=${position} assets=${assets} shares=${shares} fee=${fee}`);
            return shares;
        });
    }

    /**
     * Burn borrow shares for assets the position manager has already moved
     * into the ledger. `MAX_UINT256` burns the whole balance.
     */
    repay(caller: Address, id: MarketId, position: Address, assets: bigint): RepayResult {
        return this.ctx.journal.atomic(() => {
            this.requirePositionManager(caller);
            requireAmount(assets, { id, position });
            const market = this.accrue(id);
            const balance = this.borrowSharesOf(id, position);

            const repayAll = assets === MAX_UINT256;
            const sharesBurned = repayAll ? balance : toShares(assets, market.borrows, 'down');
            const assetsRepaid = repayAll ? toAssets(balance, market.borrows, 'up') : assets;
            if (sharesBurned === 0n) {
                throw new ProtocolError('ZeroSharesRepay', 'repay burns zero shares', { id, assets });
            }
            if (sharesBurned > balance || assetsRepaid > market.borrows.assets) {
                throw new ProtocolError('InsufficientShares', 'repay exceeds debt', {
                    id,
                    position,
                    balance,
                    sharesBurned,
                });
            }

            const borrows = {
                shares: market.borrows.shares - sharesBurned,
                assets: market.borrows.assets - assetsRepaid,
            };
            const remainingShares = balance - sharesBurned;
            if (remainingShares > 0n) {
                const remainingDebt = toAssets(remainingShares, borrows, 'up');
                const minDebt = this.minDebt.get();
                if (remainingDebt < minDebt) {
                    throw new ProtocolError('DebtTooLow', 'remaining debt below minimum', {
                        id,
                        remainingDebt,
                        minDebt,
                    });
                }
            }

            this.markets.set(id, { ...market, borrows });
            this.setBorrowShares(id, position, remainingShares);

            this.emit('Repay', { market: id, position, assets: assetsRepaid, shares: sharesBurned });
            this.log(`REPAY market=${id} position=${position} assets=${assetsRepaid} shares=${sharesBurned}`);
            return { sharesBurned, remainingShares, assetsRepaid };
        });
    }

    /**
     * Write off a position's entire borrow. Depositors absorb the loss through
     * a lower deposits.assets. Returns the debt written off.
     */
    rebalanceBadDebt(caller: Address, id: MarketId, position: Address): bigint {
        return this.ctx.journal.atomic(() => {
            this.requirePositionManager(caller);
            const market = this.accrue(id);
            const shares = this.borrowSharesOf(id, position);
            if (shares === 0n) return 0n;

            const debt = toAssets(shares, market.borrows, 'up');
            const written = debt > market.borrows.assets ? market.borrows.assets : debt;
            this.markets.set(id, {
                ...market,
                borrows: { shares: market.borrows.shares - shares, assets: market.borrows.assets - written },
                deposits: { shares: market.deposits.shares, assets: subOrZero(market.deposits.assets, written) },
            });
            this.setBorrowShares(id, position, 0n);

            this.emit('BadDebtRebalanced', { market: id, position, assets: written, shares });
            this.ctx.journal.onCommit(() => {
                logger.warn(`${LEDGER_CONFIG.logPrefix} BAD_DEBT market=${id} position=${position} written=${written}`);
            });
            return written;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARE TOKEN
    // ═══════════════════════════════════════════════════════════════════════════

    transfer(caller: Address, id: MarketId, to: Address, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { id });
            this.moveShares(id, caller, to, shares);
        });
    }

    transferFrom(caller: Address, from: Address, to: Address, id: MarketId, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { id });
            this.spendShareAllowance(from, caller, id, shares);
            this.moveShares(id, from, to, shares);
        });
    }

    approve(caller: Address, spender: Address, id: MarketId, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { id, spender });
            this.shareAllowances.set(`${caller}:${spender}:${id}`, shares);
            this.emit('Approval', { owner: caller, spender, market: id, shares });
        });
    }

    setOperator(caller: Address, operator: Address, approved: boolean): void {
        this.ctx.journal.atomic(() => {
            this.operators.set(`${caller}:${operator}`, approved);
            this.emit('OperatorSet', { owner: caller, operator, approved });
        });
    }

    private moveShares(id: MarketId, from: Address, to: Address, shares: bigint): void {
        this.requireMarket(id);
        const balance = this.balanceOf(id, from);
        if (balance < shares) {
            throw new ProtocolError('InsufficientShares', 'share balance too low', { id, from, balance, shares });
        }
        this.depositShares.set(`${id}:${from}`, balance - shares);
        this.creditShares(id, to, shares);
        this.emit('Transfer', { market: id, from, to, shares });
    }

    private spendShareAllowance(owner: Address, spender: Address, id: MarketId, shares: bigint): void {
        if (owner === spender || this.isOperator(owner, spender)) return;
        const allowed = this.allowance(owner, spender, id);
        if (allowed < shares) {
            throw new ProtocolError('InsufficientAllowance', 'share allowance too low', {
                id,
                owner,
                spender,
                allowed,
                shares,
            });
        }
        if (allowed !== MAX_UINT256) {
            this.shareAllowances.set(`${owner}:${spender}:${id}`, allowed - shares);
        }
    }

    private creditShares(id: MarketId, account: Address, shares: bigint): void {
        this.depositShares.set(`${id}:${account}`, this.balanceOf(id, account) + shares);
    }

    private setBorrowShares(id: MarketId, position: Address, shares: bigint): void {
        if (shares === 0n) {
            this.borrowShares.delete(`${id}:${position}`);
        } else {
            this.borrowShares.set(`${id}:${position}`, shares);
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MARKET OWNER ADMINISTRATION
    // ═══════════════════════════════════════════════════════════════════════════

    setDepositCap(caller: Address, id: MarketId, depositCap: bigint): void {
        requireAmount(depositCap, { id });
        this.updateMarket(caller, id, 'DepositCapSet', (market) => ({ ...market, depositCap }), { depositCap });
    }

    setBorrowCap(caller: Address, id: MarketId, borrowCap: bigint): void {
        requireAmount(borrowCap, { id });
        this.updateMarket(caller, id, 'BorrowCapSet', (market) => ({ ...market, borrowCap }), { borrowCap });
    }

    togglePause(caller: Address, id: MarketId): boolean {
        this.updateMarket(caller, id, 'PauseToggled', (market) => ({ ...market, isPaused: !market.isPaused }), {});
        return this.requireMarket(id).isPaused;
    }

    requestRateModelUpdate(caller: Address, id: MarketId, rateModel: RateModel): PendingUpdate<RateModel> {
        return this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, id);
            const pending = this.rateModels.request(id, rateModel);
            this.emit('RateModelUpdateRequested', {
                market: id,
                rateModel: rateModel.address,
                validAfter: pending.validAfter,
            });
            return pending;
        });
    }

    acceptRateModelUpdate(caller: Address, id: MarketId): void {
        this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, id);
            // interest up to now accrues under the outgoing model
            this.accrue(id);
            const rateModel = this.rateModels.accept(id);
            this.emit('RateModelUpdated', { market: id, rateModel: rateModel.address });
            this.log(`RATE_MODEL market=${id} rateModel=${rateModel.address}`);
        });
    }

    rejectRateModelUpdate(caller: Address, id: MarketId): void {
        this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, id);
            const rejected = this.rateModels.reject(id);
            this.emit('RateModelUpdateRejected', { market: id, rateModel: rejected.value.address });
        });
    }

    private updateMarket(
        caller: Address,
        id: MarketId,
        event: string,
        update: (market: Market) => Market,
        args: Record<string, unknown>
    ): void {
        this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, id);
            const market = this.accrue(id);
            this.markets.set(id, update(market));
            this.emit(event, { market: id, ...args });
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PROTOCOL OWNER ADMINISTRATION
    // ═══════════════════════════════════════════════════════════════════════════

    setPositionManager(caller: Address, positionManager: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.positionManager.set(positionManager);
            this.emit('PositionManagerSet', { positionManager });
        });
    }

    setFeeRecipient(caller: Address, feeRecipient: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.feeRecipient.set(feeRecipient);
            this.emit('FeeRecipientSet', { feeRecipient });
        });
    }

    setInterestFee(caller: Address, id: MarketId, fee: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireFee(fee);
            // fees on past interest use the old rate
            const market = this.accrue(id);
            this.markets.set(id, { ...market, interestFee: fee });
            this.emit('InterestFeeSet', { market: id, fee });
        });
    }

    setOriginationFee(caller: Address, id: MarketId, fee: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireFee(fee);
            const market = this.requireMarket(id);
            this.markets.set(id, { ...market, originationFee: fee });
            this.emit('OriginationFeeSet', { market: id, fee });
        });
    }

    setDefaultInterestFee(caller: Address, fee: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireFee(fee);
            this.defaultInterestFee.set(fee);
        });
    }

    setDefaultOriginationFee(caller: Address, fee: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireFee(fee);
            this.defaultOriginationFee.set(fee);
        });
    }

    setMinBorrow(caller: Address, minBorrow: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.minBorrow.set(requireAmount(minBorrow));
        });
    }

    setMinDebt(caller: Address, minDebt: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.minDebt.set(requireAmount(minDebt));
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    marketExists(id: MarketId): boolean {
        return this.markets.has(id);
    }

    getMarketIds(): MarketId[] {
        return this.markets.keys();
    }

    getPoolData(id: MarketId): MarketView {
        const market = this.requireMarket(id);
        const preview = this.simulate(market);
        return {
            ...market,
            deposits: preview.deposits,
            borrows: preview.borrows,
            rateModel: this.rateModelOf(id).address,
            idle: subOrZero(preview.deposits.assets, preview.borrows.assets),
        };
    }

    getPoolAsset(id: MarketId): Address {
        return this.requireMarket(id).asset;
    }

    getMarketOwner(id: MarketId): Address {
        return this.requireMarket(id).owner;
    }

    getRateModel(id: MarketId): RateModel {
        return this.rateModelOf(id);
    }

    getPendingRateModel(id: MarketId): PendingUpdate<RateModel> | undefined {
        return this.rateModels.getPending(id);
    }

    getAssetsOf(id: MarketId, account: Address): bigint {
        const { deposits } = this.simulateAccrue(id);
        return toAssets(this.balanceOf(id, account), deposits, 'down');
    }

    getBorrowsOf(id: MarketId, position: Address): bigint {
        const { borrows } = this.simulateAccrue(id);
        return toAssets(this.borrowSharesOf(id, position), borrows, 'up');
    }

    getTotalAssets(id: MarketId): bigint {
        return this.simulateAccrue(id).deposits.assets;
    }

    getTotalBorrows(id: MarketId): bigint {
        return this.simulateAccrue(id).borrows.assets;
    }

    getLiquidityOf(id: MarketId): bigint {
        const { deposits, borrows } = this.simulateAccrue(id);
        return subOrZero(deposits.assets, borrows.assets);
    }

    convertToShares(id: MarketId, assets: bigint): bigint {
        return toShares(assets, this.simulateAccrue(id).deposits, 'down');
    }

    convertToAssets(id: MarketId, shares: bigint): bigint {
        return toAssets(shares, this.simulateAccrue(id).deposits, 'down');
    }

    maxWithdraw(id: MarketId, owner: Address): bigint {
        const assets = this.getAssetsOf(id, owner);
        const liquidity = this.getLiquidityOf(id);
        return assets < liquidity ? assets : liquidity;
    }

    balanceOf(id: MarketId, account: Address): bigint {
        return this.depositShares.getOr(`${id}:${account}`, 0n);
    }

    borrowSharesOf(id: MarketId, position: Address): bigint {
        return this.borrowShares.getOr(`${id}:${position}`, 0n);
    }

    allowance(owner: Address, spender: Address, id: MarketId): bigint {
        return this.shareAllowances.getOr(`${owner}:${spender}:${id}`, 0n);
    }

    isOperator(owner: Address, operator: Address): boolean {
        return this.operators.getOr(`${owner}:${operator}`, false);
    }

    getOwner(): Address {
        return this.owner.get();
    }

    getFeeRecipient(): Address {
        return this.feeRecipient.get();
    }

    getPositionManager(): Address | null {
        return this.positionManager.get();
    }

    getMinBorrow(): bigint {
        return this.minBorrow.get();
    }

    getMinDebt(): bigint {
        return this.minDebt.get();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // GUARDS
    // ═══════════════════════════════════════════════════════════════════════════

    private requireMarket(id: MarketId): Market {
        const market = this.markets.get(id);
        if (market === undefined) {
            throw new ProtocolError('UnknownMarket', 'market does not exist', { id });
        }
        return market;
    }

    private rateModelOf(id: MarketId): RateModel {
        const rateModel = this.rateModels.get(id);
        if (rateModel === undefined) {
            throw new ProtocolError('UnknownMarket', 'market has no rate model', { id });
        }
        return rateModel;
    }

    private requireOwner(caller: Address): void {
        if (caller !== this.owner.get()) {
            throw new ProtocolError('OnlyProtocolOwner', 'caller is not the protocol owner', { caller });
        }
    }

    private requireMarketOwner(caller: Address, id: MarketId): void {
        if (caller !== this.requireMarket(id).owner) {
            throw new ProtocolError('OnlyMarketOwner', 'caller is not the market owner', { caller, id });
        }
    }

    private requirePositionManager(caller: Address): void {
        if (caller !== this.positionManager.get()) {
            throw new ProtocolError('OnlyPositionManager', 'caller is not the position manager', { caller });
        }
    }

    private requireFee(fee: bigint): void {
        requireAmount(fee);
        if (fee > WAD) {
            throw new ProtocolError('FeeTooHigh', 'fee above 100%', { fee: formatWad(fee) });
        }
    }

    private emit(name: string, args: Record<string, unknown>): void {
        this.ctx.events.emit(LEDGER_CONFIG.emitter, name, args);
    }

    private log(line: string): void {
        this.ctx.journal.onCommit(() => {
            logger.info(`${LEDGER_CONFIG.logPrefix} ${line}`);
        });
    }
}
