/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * POSITION — COLLATERAL ACCOUNT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * An isolated account holding tokens under its own address, tracking which of
 * them count as collateral and which markets it owes.
 *
 * INVARIANTS:
 * - |assets| <= maxAssets and |debtMarkets| <= maxDebtMarkets
 * - Only the position manager mutates a position
 * - Balances live in the token bank; the position tracks membership only
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BoundedSet } from '../core/boundedSet';
import type { ProtocolContext } from '../core/context';
import { ProtocolError } from '../core/errors';
import type { Address, MarketId } from '../core/identity';
import type { PositionView } from '../risk/types';
import type { ExecArg, ExecTarget } from './types';

export class Position implements PositionView {
    private readonly assets: BoundedSet<Address>;
    private readonly debtMarkets: BoundedSet<MarketId>;

    constructor(
        private readonly ctx: ProtocolContext,
        readonly address: Address,
        readonly positionManager: Address
    ) {
        this.assets = new BoundedSet(ctx.journal, ctx.config.position.maxAssets, 'MaxAssetsExceeded');
        this.debtMarkets = new BoundedSet(ctx.journal, ctx.config.position.maxDebtMarkets, 'MaxDebtMarketsExceeded');
    }

    getPositionAssets(): Address[] {
        return this.assets.toArray();
    }

    getDebtMarkets(): MarketId[] {
        return this.debtMarkets.toArray();
    }

    hasAsset(asset: Address): boolean {
        return this.assets.has(asset);
    }

    hasDebtMarket(market: MarketId): boolean {
        return this.debtMarkets.has(market);
    }

    balanceOf(asset: Address): bigint {
        return this.ctx.tokens.balanceOf(asset, this.address);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // POSITION MANAGER ONLY
    // ═══════════════════════════════════════════════════════════════════════════

    addToken(caller: Address, asset: Address): void {
        this.onlyPositionManager(caller);
        this.assets.insert(asset);
    }

    removeToken(caller: Address, asset: Address): void {
        this.onlyPositionManager(caller);
        this.assets.remove(asset);
    }

    borrow(caller: Address, market: MarketId): void {
        this.onlyPositionManager(caller);
        this.debtMarkets.insert(market);
    }

    repay(caller: Address, market: MarketId): void {
        this.onlyPositionManager(caller);
        this.debtMarkets.remove(market);
    }

    transfer(caller: Address, asset: Address, to: Address, amount: bigint): void {
        this.onlyPositionManager(caller);
        this.ctx.tokens.transfer(asset, this.address, to, amount);
    }

    approve(caller: Address, asset: Address, spender: Address, amount: bigint): void {
        this.onlyPositionManager(caller);
        this.ctx.tokens.approve(asset, this.address, spender, amount);
    }

    exec(caller: Address, target: ExecTarget, selector: string, args: readonly ExecArg[]): void {
        this.onlyPositionManager(caller);
        target.execute({ position: this.address, selector, args });
    }

    private onlyPositionManager(caller: Address): void {
        if (caller !== this.positionManager) {
            throw new ProtocolError('OnlyPositionManager', 'caller is not the position manager', {
                caller,
                position: this.address,
            });
        }
    }
}
