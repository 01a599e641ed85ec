/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SUPERPOOL — LIQUIDITY ROUTER ACROSS MARKETS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * ERC-4626 shaped vault over one asset. Deposits are spread across member
 * markets in deposit-queue order up to per-market caps; withdrawals are served
 * from idle funds first, then in withdraw-queue order.
 *
 * SHARE PRICE:
 *   shares = assets · (totalSupply + virtualShares) / (totalAssets + virtualAssets)
 *   deposit / redeem round down, mint / withdraw round up
 *
 * INVARIANTS:
 * - totalAssets = idle + Σ member-market balances (pending interest included)
 * - Every mutation first accrues and mints the performance fee on the gain
 *   since lastTotalAssets, priced before the fee shares exist
 * - Σ share balances == totalSupply
 * - Queues are permutations of the same member set, at most maxQueueLength
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MAX_UINT256, WAD } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError, isProtocolError } from '../core/errors';
import type { Address, MarketId } from '../core/identity';
import { StateMap, StateSlot } from '../core/journal';
import { TimelockedParameter, type PendingUpdate } from '../core/timelock';
import type { Ledger } from '../ledger';
import logger from '../utils/logger';
import { formatWad, minOf, mulDiv, mulWad, requireAmount, subOrZero, type Rounding } from '../utils/math';
import type { MarketAllocation, SuperPoolAccrual, SuperPoolParams } from './types';

export const SUPERPOOL_CONFIG = {
    logPrefix: '[SUPERPOOL]',
    emitter: 'SuperPool',
};

const FEE_KEY = 'fee';

export class SuperPool {
    readonly address: Address;
    readonly asset: Address;
    readonly name: string;
    readonly symbol: string;

    private readonly owner: StateSlot<Address>;
    private readonly feeRecipient: StateSlot<Address>;
    private readonly superPoolCap: StateSlot<bigint>;
    private readonly lastTotalAssets: StateSlot<bigint>;
    private readonly supply: StateSlot<bigint>;
    private readonly balances: StateMap<Address, bigint>;
    // `${owner}:${spender}`
    private readonly allowances: StateMap<string, bigint>;
    private readonly fees: TimelockedParameter<bigint>;
    private readonly poolCaps: StateMap<MarketId, bigint>;
    private readonly depositQueue: StateSlot<readonly MarketId[]>;
    private readonly withdrawQueue: StateSlot<readonly MarketId[]>;
    private readonly allocators: StateMap<Address, boolean>;

    constructor(
        private readonly ctx: ProtocolContext,
        private readonly ledger: Ledger,
        address: Address,
        params: SuperPoolParams
    ) {
        const { journal, clock, config } = ctx;
        requireAmount(params.fee);
        requireAmount(params.superPoolCap);
        if (params.fee > WAD) {
            throw new ProtocolError('FeeTooHigh', 'performance fee above 100%', { fee: formatWad(params.fee) });
        }
        this.address = address;
        this.asset = params.asset;
        this.name = params.name;
        this.symbol = params.symbol;
        this.owner = new StateSlot(journal, params.owner);
        this.feeRecipient = new StateSlot(journal, params.feeRecipient);
        this.superPoolCap = new StateSlot(journal, params.superPoolCap);
        this.lastTotalAssets = new StateSlot(journal, 0n);
        this.supply = new StateSlot(journal, 0n);
        this.balances = new StateMap(journal);
        this.allowances = new StateMap(journal);
        this.fees = new TimelockedParameter(journal, clock, 'superpool fee', {
            timelock: config.superPool.feeTimelock,
            deadline: config.superPool.feeDeadline,
        });
        this.fees.set(FEE_KEY, params.fee);
        this.poolCaps = new StateMap(journal);
        this.depositQueue = new StateSlot<readonly MarketId[]>(journal, []);
        this.withdrawQueue = new StateSlot<readonly MarketId[]>(journal, []);
        this.allocators = new StateMap(journal);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ACCOUNTING
    // ═══════════════════════════════════════════════════════════════════════════

    totalAssets(): bigint {
        let total = this.ctx.tokens.balanceOf(this.asset, this.address);
        for (const market of this.depositQueue.get()) {
            total += this.ledger.getAssetsOf(market, this.address);
        }
        return total;
    }

    totalSupply(): bigint {
        return this.supply.get();
    }

    simulateAccrue(): SuperPoolAccrual {
        const newTotalAssets = this.totalAssets();
        const last = this.lastTotalAssets.get();
        const fee = this.getFee();
        if (newTotalAssets <= last || fee === 0n) {
            return { newTotalAssets, feeShares: 0n };
        }
        const feeAssets = mulWad(newTotalAssets - last, fee, 'down');
        const feeShares = this.toSharesAt(feeAssets, newTotalAssets, this.supply.get(), 'down');
        return { newTotalAssets, feeShares };
    }

    accrueInterestAndFees(): SuperPoolAccrual {
        return this.ctx.journal.atomic(() => {
            const accrual = this.simulateAccrue();
            if (accrual.feeShares > 0n) {
                this.mintShares(this.feeRecipient.get(), accrual.feeShares);
                this.emit('FeesAccrued', { feeShares: accrual.feeShares, totalAssets: accrual.newTotalAssets });
            }
            this.lastTotalAssets.set(accrual.newTotalAssets);
            return accrual;
        });
    }

    private toSharesAt(assets: bigint, totalAssets: bigint, supply: bigint, rounding: Rounding): bigint {
        const { virtualShares, virtualAssets } = this.ctx.config.superPool;
        return mulDiv(assets, supply + virtualShares, totalAssets + virtualAssets, rounding);
    }

    private toAssetsAt(shares: bigint, totalAssets: bigint, supply: bigint, rounding: Rounding): bigint {
        const { virtualShares, virtualAssets } = this.ctx.config.superPool;
        return mulDiv(shares, totalAssets + virtualAssets, supply + virtualShares, rounding);
    }

    /** Conversion against the state the next mutation will see. */
    private convert(value: bigint, direction: 'toShares' | 'toAssets', rounding: Rounding): bigint {
        const { newTotalAssets, feeShares } = this.simulateAccrue();
        const supply = this.supply.get() + feeShares;
        return direction === 'toShares'
            ? this.toSharesAt(value, newTotalAssets, supply, rounding)
            : this.toAssetsAt(value, newTotalAssets, supply, rounding);
    }

    convertToShares(assets: bigint): bigint {
        return this.convert(assets, 'toShares', 'down');
    }

    convertToAssets(shares: bigint): bigint {
        return this.convert(shares, 'toAssets', 'down');
    }

    previewDeposit(assets: bigint): bigint {
        return this.convert(assets, 'toShares', 'down');
    }

    previewMint(shares: bigint): bigint {
        return this.convert(shares, 'toAssets', 'up');
    }

    previewWithdraw(assets: bigint): bigint {
        return this.convert(assets, 'toShares', 'up');
    }

    previewRedeem(shares: bigint): bigint {
        return this.convert(shares, 'toAssets', 'down');
    }

    maxDeposit(_receiver: Address): bigint {
        return subOrZero(this.superPoolCap.get(), this.simulateAccrue().newTotalAssets);
    }

    maxMint(receiver: Address): bigint {
        return this.convert(this.maxDeposit(receiver), 'toShares', 'down');
    }

    maxWithdraw(owner: Address): bigint {
        const ownerAssets = this.convert(this.balanceOf(owner), 'toAssets', 'down');
        return minOf(ownerAssets, this.withdrawableLiquidity());
    }

    maxRedeem(owner: Address): bigint {
        const balance = this.balanceOf(owner);
        const liquidity = this.withdrawableLiquidity();
        if (this.convert(balance, 'toAssets', 'down') <= liquidity) return balance;
        return this.convert(liquidity, 'toShares', 'down');
    }

    private withdrawableLiquidity(): bigint {
        let liquidity = this.ctx.tokens.balanceOf(this.asset, this.address);
        for (const market of this.withdrawQueue.get()) {
            liquidity += minOf(
                this.ledger.getAssetsOf(market, this.address),
                this.ledger.getLiquidityOf(market)
            );
        }
        return liquidity;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ERC-4626 ENTRY POINTS
    // ═══════════════════════════════════════════════════════════════════════════

    deposit(caller: Address, assets: bigint, receiver: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(assets);
            this.accrueInterestAndFees();
            const shares = this.toSharesAt(assets, this.lastTotalAssets.get(), this.supply.get(), 'down');
            if (shares === 0n) {
                throw new ProtocolError('ZeroShares', 'deposit mints zero shares', { assets });
            }
            this.enter(caller, receiver, assets, shares);
            return shares;
        });
    }

    mint(caller: Address, shares: bigint, receiver: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(shares);
            this.accrueInterestAndFees();
            const assets = this.toAssetsAt(shares, this.lastTotalAssets.get(), this.supply.get(), 'up');
            if (assets === 0n) {
                throw new ProtocolError('ZeroAssets', 'mint costs zero assets', { shares });
            }
            this.enter(caller, receiver, assets, shares);
            return assets;
        });
    }

    withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(assets);
            this.accrueInterestAndFees();
            const shares = this.toSharesAt(assets, this.lastTotalAssets.get(), this.supply.get(), 'up');
            if (shares === 0n) {
                throw new ProtocolError('ZeroShares', 'withdraw burns zero shares', { assets });
            }
            this.exit(caller, receiver, owner, assets, shares);
            return shares;
        });
    }

    redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): bigint {
        return this.ctx.journal.atomic(() => {
            requireAmount(shares);
            this.accrueInterestAndFees();
            const assets = this.toAssetsAt(shares, this.lastTotalAssets.get(), this.supply.get(), 'down');
            if (assets === 0n) {
                throw new ProtocolError('ZeroAssets', 'redeem returns zero assets', { shares });
            }
            this.exit(caller, receiver, owner, assets, shares);
            return assets;
        });
    }

    private enter(caller: Address, receiver: Address, assets: bigint, shares: bigint): void {
        const totalAfter = this.lastTotalAssets.get() + assets;
        const cap = this.superPoolCap.get();
        if (totalAfter > cap) {
            throw new ProtocolError('SuperPoolCapExceeded', 'superpool cap exceeded', { totalAfter, cap });
        }
        this.ctx.tokens.transferFrom(this.address, this.asset, caller, this.address, assets);
        this.mintShares(receiver, shares);
        this.supplyToPools(assets);
        this.lastTotalAssets.set(totalAfter);

        this.emit('Deposit', { caller, receiver, assets, shares });
        this.log(`DEPOSIT receiver=${receiver} assets=${assets} shares=${shares}`);
    }

    private exit(caller: Address, receiver: Address, owner: Address, assets: bigint, shares: bigint): void {
        if (caller !== owner) {
            this.spendAllowance(owner, caller, shares);
        }
        const balance = this.balanceOf(owner);
        if (balance < shares) {
            throw new ProtocolError('InsufficientShares', 'share balance too low', { owner, balance, shares });
        }
        this.withdrawFromPools(assets);
        this.balances.set(owner, balance - shares);
        this.supply.set(this.supply.get() - shares);
        this.ctx.tokens.transfer(this.asset, this.address, receiver, assets);
        this.lastTotalAssets.set(subOrZero(this.lastTotalAssets.get(), assets));

        this.emit('Withdraw', { caller, receiver, owner, assets, shares });
        this.log(`WITHDRAW owner=${owner} assets=${assets} shares=${shares}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ROUTING
    // ═══════════════════════════════════════════════════════════════════════════

    private supplyToPools(assets: bigint): void {
        let remaining = assets;
        for (const market of this.depositQueue.get()) {
            if (remaining === 0n) break;
            const cap = this.poolCaps.getOr(market, 0n);
            const inPool = this.ledger.getAssetsOf(market, this.address);
            if (inPool >= cap) continue;

            const pool = this.ledger.getPoolData(market);
            const headroom = subOrZero(pool.depositCap, pool.deposits.assets);
            const amount = minOf(remaining, cap - inPool, headroom);
            if (amount === 0n) continue;

            try {
                this.ctx.journal.atomic(() => this.supplyTo(market, amount));
                remaining -= amount;
            } catch (error) {
                if (!isProtocolError(error)) throw error;
                logger.debug(`${SUPERPOOL_CONFIG.logPrefix} SKIP market=${market} amount=${amount} reason=${error.code}`);
            }
        }
    }

    private supplyTo(market: MarketId, amount: bigint): void {
        this.ctx.tokens.approve(this.asset, this.address, this.ledger.address, amount);
        this.ledger.deposit(this.address, market, amount, this.address);
    }

    private withdrawFromPools(assets: bigint): void {
        const idle = this.ctx.tokens.balanceOf(this.asset, this.address);
        if (idle >= assets) return;

        let remaining = assets - idle;
        for (const market of this.withdrawQueue.get()) {
            const inPool = this.ledger.getAssetsOf(market, this.address);
            if (inPool === 0n) continue;
            const amount = minOf(remaining, inPool, this.ledger.getLiquidityOf(market));
            if (amount === 0n) continue;

            this.ledger.withdraw(this.address, market, amount, this.address, this.address);
            remaining -= amount;
            if (remaining === 0n) return;
        }
        throw new ProtocolError('InsufficientWithdrawPath', 'not enough withdrawable liquidity', {
            requested: assets,
            shortfall: remaining,
        });
    }

    /**
     * Move funds between member markets. Withdrawals run first, then deposits,
     * each subject to the market's own liquidity and caps.
     */
    reallocate(caller: Address, withdrawals: readonly MarketAllocation[], deposits: readonly MarketAllocation[]): void {
        this.ctx.journal.atomic(() => {
            if (caller !== this.owner.get() && !this.isAllocator(caller)) {
                throw new ProtocolError('OnlyAllocator', 'caller is not an allocator', { caller });
            }
            for (const { market, amount } of [...withdrawals, ...deposits]) {
                requireAmount(amount, { market });
            }
            for (const { market, amount } of withdrawals) {
                this.requireMember(market);
                this.ledger.withdraw(this.address, market, amount, this.address, this.address);
            }
            for (const { market, amount } of deposits) {
                this.requireMember(market);
                const cap = this.poolCaps.getOr(market, 0n);
                const after = this.ledger.getAssetsOf(market, this.address) + amount;
                if (after > cap) {
                    throw new ProtocolError('PoolCapExceeded', 'allocation above market cap', { market, after, cap });
                }
                this.supplyTo(market, amount);
            }
            this.emit('Reallocated', { caller, withdrawals: withdrawals.length, deposits: deposits.length });
            this.log(`REALLOCATE caller=${caller} withdrawals=${withdrawals.length} deposits=${deposits.length}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARE TOKEN
    // ═══════════════════════════════════════════════════════════════════════════

    balanceOf(account: Address): bigint {
        return this.balances.getOr(account, 0n);
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.allowances.getOr(`${owner}:${spender}`, 0n);
    }

    approve(caller: Address, spender: Address, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { spender });
            this.allowances.set(`${caller}:${spender}`, shares);
            this.emit('Approval', { owner: caller, spender, shares });
        });
    }

    transfer(caller: Address, to: Address, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { to });
            this.moveShares(caller, to, shares);
        });
    }

    transferFrom(caller: Address, from: Address, to: Address, shares: bigint): void {
        this.ctx.journal.atomic(() => {
            requireAmount(shares, { from, to });
            this.spendAllowance(from, caller, shares);
            this.moveShares(from, to, shares);
        });
    }

    private moveShares(from: Address, to: Address, shares: bigint): void {
        const balance = this.balanceOf(from);
        if (balance < shares) {
            throw new ProtocolError('InsufficientShares', 'share balance too low', { from, balance, shares });
        }
        this.balances.set(from, balance - shares);
        this.balances.set(to, this.balanceOf(to) + shares);
        this.emit('Transfer', { from, to, shares });
    }

    private spendAllowance(owner: Address, spender: Address, shares: bigint): void {
        const allowed = this.allowance(owner, spender);
        if (allowed < shares) {
            throw new ProtocolError('InsufficientAllowance', 'share allowance too low', {
                owner,
                spender,
                allowed,
                shares,
            });
        }
        if (allowed !== MAX_UINT256) {
            this.allowances.set(`${owner}:${spender}`, allowed - shares);
        }
    }

    private mintShares(to: Address, shares: bigint): void {
        this.balances.set(to, this.balanceOf(to) + shares);
        this.supply.set(this.supply.get() + shares);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // OWNER ADMINISTRATION
    // ═══════════════════════════════════════════════════════════════════════════

    addPool(caller: Address, market: MarketId, cap: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            requireAmount(cap, { market });
            if (this.ledger.getPoolAsset(market) !== this.asset) {
                throw new ProtocolError('AssetMismatch', 'market asset differs from superpool asset', { market });
            }
            if (this.poolCaps.has(market)) {
                throw new ProtocolError('MarketAlreadyInRouter', 'market already added', { market });
            }
            const maxQueueLength = this.ctx.config.superPool.maxQueueLength;
            if (this.depositQueue.get().length >= maxQueueLength) {
                throw new ProtocolError('QueueTooLong', 'queue is full', { maxQueueLength });
            }
            this.accrueInterestAndFees();
            this.poolCaps.set(market, cap);
            this.depositQueue.set([...this.depositQueue.get(), market]);
            this.withdrawQueue.set([...this.withdrawQueue.get(), market]);
            this.emit('PoolAdded', { market, cap });
        });
    }

    modifyPoolCap(caller: Address, market: MarketId, cap: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireMember(market);
            requireAmount(cap, { market });
            this.poolCaps.set(market, cap);
            this.emit('PoolCapSet', { market, cap });
        });
    }

    /**
     * Drop a member market. A market still holding funds is refused unless
     * `force`, which first redeems every share held there.
     */
    removePool(caller: Address, market: MarketId, force: boolean): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.requireMember(market);
            this.accrueInterestAndFees();
            const shares = this.ledger.balanceOf(market, this.address);
            if (shares > 0n) {
                if (!force) {
                    throw new ProtocolError('MarketHasAssets', 'market still holds superpool funds', { market });
                }
                this.ledger.redeem(this.address, market, shares, this.address, this.address);
            }
            this.poolCaps.delete(market);
            this.depositQueue.set(this.depositQueue.get().filter((id) => id !== market));
            this.withdrawQueue.set(this.withdrawQueue.get().filter((id) => id !== market));
            this.emit('PoolRemoved', { market, forced: force });
        });
    }

    reorderDepositQueue(caller: Address, indexes: readonly number[]): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.depositQueue.set(SuperPool.permute(this.depositQueue.get(), indexes));
            this.emit('DepositQueueReordered', { indexes: indexes.join(',') });
        });
    }

    reorderWithdrawQueue(caller: Address, indexes: readonly number[]): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.withdrawQueue.set(SuperPool.permute(this.withdrawQueue.get(), indexes));
            this.emit('WithdrawQueueReordered', { indexes: indexes.join(',') });
        });
    }

    setSuperPoolCap(caller: Address, cap: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.superPoolCap.set(requireAmount(cap));
            this.emit('SuperPoolCapSet', { cap });
        });
    }

    setFeeRecipient(caller: Address, feeRecipient: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            // fees earned so far go to the outgoing recipient
            this.accrueInterestAndFees();
            this.feeRecipient.set(feeRecipient);
            this.emit('FeeRecipientSet', { feeRecipient });
        });
    }

    toggleAllocator(caller: Address, allocator: Address): boolean {
        return this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            const next = !this.isAllocator(allocator);
            this.allocators.set(allocator, next);
            this.emit('AllocatorToggled', { allocator, isAllocator: next });
            return next;
        });
    }

    requestFeeUpdate(caller: Address, fee: bigint): PendingUpdate<bigint> {
        return this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            requireAmount(fee);
            if (fee > WAD) {
                throw new ProtocolError('FeeTooHigh', 'performance fee above 100%', { fee: formatWad(fee) });
            }
            const pending = this.fees.request(FEE_KEY, fee);
            this.emit('FeeUpdateRequested', { fee, validAfter: pending.validAfter });
            return pending;
        });
    }

    acceptFeeUpdate(caller: Address): bigint {
        return this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.accrueInterestAndFees();
            const fee = this.fees.accept(FEE_KEY);
            this.emit('FeeUpdated', { fee });
            this.log(`FEE fee=${formatWad(fee)}`);
            return fee;
        });
    }

    rejectFeeUpdate(caller: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            const rejected = this.fees.reject(FEE_KEY);
            this.emit('FeeUpdateRejected', { fee: rejected.value });
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getFee(): bigint {
        return this.fees.get(FEE_KEY) ?? 0n;
    }

    getPendingFee(): PendingUpdate<bigint> | undefined {
        return this.fees.getPending(FEE_KEY);
    }

    getFeeRecipient(): Address {
        return this.feeRecipient.get();
    }

    getOwner(): Address {
        return this.owner.get();
    }

    getSuperPoolCap(): bigint {
        return this.superPoolCap.get();
    }

    getLastTotalAssets(): bigint {
        return this.lastTotalAssets.get();
    }

    getPoolCap(market: MarketId): bigint {
        return this.poolCaps.getOr(market, 0n);
    }

    getDepositQueue(): readonly MarketId[] {
        return this.depositQueue.get();
    }

    getWithdrawQueue(): readonly MarketId[] {
        return this.withdrawQueue.get();
    }

    isAllocator(account: Address): boolean {
        return this.allocators.getOr(account, false);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // GUARDS
    // ═══════════════════════════════════════════════════════════════════════════

    private static permute(queue: readonly MarketId[], indexes: readonly number[]): MarketId[] {
        const seen = new Set<number>();
        const valid =
            indexes.length === queue.length &&
            indexes.every((index) => {
                if (!Number.isInteger(index) || index < 0 || index >= queue.length || seen.has(index)) return false;
                seen.add(index);
                return true;
            });
        if (!valid) {
            throw new ProtocolError('InvalidQueue', 'indexes are not a permutation of the queue', {
                indexes: indexes.join(','),
                length: queue.length,
            });
        }
        return indexes.map((index) => queue[index]);
    }

    private requireOwner(caller: Address): void {
        if (caller !== this.owner.get()) {
            throw new ProtocolError('OnlyProtocolOwner', 'caller is not the superpool owner', { caller });
        }
    }

    private requireMember(market: MarketId): void {
        if (!this.poolCaps.has(market)) {
            throw new ProtocolError('MarketNotInRouter', 'market is not a superpool member', { market });
        }
    }

    private emit(name: string, args: Record<string, unknown>): void {
        this.ctx.events.emit(`${SUPERPOOL_CONFIG.emitter}:${this.symbol}`, name, args);
    }

    private log(line: string): void {
        this.ctx.journal.onCommit(() => {
            logger.info(`${SUPERPOOL_CONFIG.logPrefix} ${this.symbol} ${line}`);
        });
    }
}
