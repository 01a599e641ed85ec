/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * RISK ENGINE — LTV AND ORACLE GOVERNANCE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * Holds, per (market, asset) pair, the loan-to-value ratio and the price oracle
 * that market uses to value that asset. Market owners change LTVs through a
 * two-step request/accept flow behind a timelock so borrowers always get a
 * notice window.
 *
 * INVARIANTS:
 * - Every committed LTV lies in [minLtv, maxLtv] as of its request
 * - A pending update is acceptable only inside [validAfter, validAfter + deadline]
 * - An LTV can only be requested for a pair that already has an oracle
 * - The first LTV of a pair applies immediately: nobody is exposed yet
 *
 * RULES:
 * 1. LTV request / accept / reject: market owner only
 * 2. setOracle and setLtvBounds: protocol owner only
 * 3. Oracle errors propagate unchanged from valueOf
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { WAD } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError } from '../core/errors';
import { labelAddress, type Address, type MarketId } from '../core/identity';
import { StateSlot } from '../core/journal';
import { TimelockedParameter, type PendingUpdate } from '../core/timelock';
import type { Ledger } from '../ledger';
import type { PriceOracle } from '../types';
import logger from '../utils/logger';
import { formatWad } from '../utils/math';
import type { LtvBounds } from './types';

export const RISK_ENGINE_CONFIG = {
    logPrefix: '[RISK-ENGINE]',
    emitter: 'RiskEngine',
};

export interface RiskEngineOptions {
    owner: Address;
    address?: Address;
}

const pairKey = (market: MarketId, asset: Address): string => `${market}:${asset}`;

export class RiskEngine {
    readonly address: Address;

    private readonly owner: StateSlot<Address>;
    private readonly minLtv: StateSlot<bigint>;
    private readonly maxLtv: StateSlot<bigint>;
    private readonly ltvs: TimelockedParameter<bigint>;
    private readonly oracles: TimelockedParameter<PriceOracle>;

    constructor(
        private readonly ctx: ProtocolContext,
        private readonly ledger: Ledger,
        options: RiskEngineOptions
    ) {
        const { journal, clock, config } = ctx;
        this.address = options.address ?? labelAddress('isomarket.riskEngine');
        this.owner = new StateSlot(journal, options.owner);
        this.minLtv = new StateSlot(journal, config.ltv.minLtv);
        this.maxLtv = new StateSlot(journal, config.ltv.maxLtv);
        this.ltvs = new TimelockedParameter(journal, clock, 'ltv', {
            timelock: config.ltv.updateTimelock,
            deadline: config.ltv.updateDeadline,
        });
        this.oracles = new TimelockedParameter(journal, clock, 'oracle', {
            timelock: config.oracle.updateTimelock,
            deadline: config.oracle.updateDeadline,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LTV GOVERNANCE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Propose a new LTV for `asset` as collateral against `market`.
     *
     * @returns the pending update, or null when the value applied immediately
     */
    requestLtvUpdate(caller: Address, market: MarketId, asset: Address, ltv: bigint): PendingUpdate<bigint> | null {
        return this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const minLtv = this.minLtv.get();
            const maxLtv = this.maxLtv.get();
            if (ltv < minLtv || ltv > maxLtv) {
                throw new ProtocolError('LtvOutOfBounds', 'ltv outside allowed bounds', {
                    ltv: formatWad(ltv),
                    minLtv: formatWad(minLtv),
                    maxLtv: formatWad(maxLtv),
                });
            }
            const key = pairKey(market, asset);
            if (this.oracles.get(key) === undefined) {
                throw new ProtocolError('NoOracleFound', 'no oracle bound for pair', { market, asset });
            }

            if (this.ltvs.get(key) === undefined) {
                this.ltvs.set(key, ltv);
                this.emit('LtvUpdateAccepted', { market, asset, ltv });
                this.log(`LTV_SET market=${market} asset=${asset} ltv=${formatWad(ltv)}`);
                return null;
            }

            const pending = this.ltvs.request(key, ltv);
            this.emit('LtvUpdateRequested', { market, asset, ltv, validAfter: pending.validAfter });
            this.log(`LTV_REQUEST market=${market} asset=${asset} ltv=${formatWad(ltv)} validAfter=${pending.validAfter}`);
            return pending;
        });
    }

    acceptLtvUpdate(caller: Address, market: MarketId, asset: Address): bigint {
        return this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const ltv = this.ltvs.accept(pairKey(market, asset));
            this.emit('LtvUpdateAccepted', { market, asset, ltv });
            this.log(`LTV_ACCEPT market=${market} asset=${asset} ltv=${formatWad(ltv)}`);
            return ltv;
        });
    }

    rejectLtvUpdate(caller: Address, market: MarketId, asset: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const rejected = this.ltvs.reject(pairKey(market, asset));
            this.emit('LtvUpdateRejected', { market, asset, ltv: rejected.value });
        });
    }

    setLtvBounds(caller: Address, minLtv: bigint, maxLtv: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            if (minLtv <= 0n || minLtv > maxLtv || maxLtv >= WAD) {
                throw new ProtocolError('InvalidLtvBounds', 'ltv bounds must satisfy 0 < min <= max < 1', {
                    minLtv,
                    maxLtv,
                });
            }
            this.minLtv.set(minLtv);
            this.maxLtv.set(maxLtv);
            this.emit('LtvBoundsSet', { minLtv, maxLtv });
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ORACLE GOVERNANCE
    // ═══════════════════════════════════════════════════════════════════════════

    setOracle(caller: Address, market: MarketId, asset: Address, oracle: PriceOracle): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            if (!this.ledger.marketExists(market)) {
                throw new ProtocolError('UnknownMarket', 'market does not exist', { market });
            }
            this.oracles.set(pairKey(market, asset), oracle);
            this.emit('OracleSet', { market, asset, oracle: oracle.address });
            this.log(`ORACLE_SET market=${market} asset=${asset} oracle=${oracle.address}`);
        });
    }

    /**
     * Propose replacing the oracle of an already priced pair. Only the
     * protocol owner binds a pair for the first time, through `setOracle`.
     */
    requestOracleUpdate(
        caller: Address,
        market: MarketId,
        asset: Address,
        oracle: PriceOracle
    ): PendingUpdate<PriceOracle> {
        return this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const key = pairKey(market, asset);
            if (this.oracles.get(key) === undefined) {
                throw new ProtocolError('NoOracleFound', 'no oracle bound for pair', { market, asset });
            }
            const pending = this.oracles.request(key, oracle);
            this.emit('OracleUpdateRequested', {
                market,
                asset,
                oracle: oracle.address,
                validAfter: pending.validAfter,
            });
            return pending;
        });
    }

    acceptOracleUpdate(caller: Address, market: MarketId, asset: Address): PriceOracle {
        return this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const oracle = this.oracles.accept(pairKey(market, asset));
            this.emit('OracleSet', { market, asset, oracle: oracle.address });
            return oracle;
        });
    }

    rejectOracleUpdate(caller: Address, market: MarketId, asset: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireMarketOwner(caller, market);
            const rejected = this.oracles.reject(pairKey(market, asset));
            this.emit('OracleUpdateRejected', { market, asset, oracle: rejected.value.address });
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    ltvFor(market: MarketId, asset: Address): bigint {
        return this.ltvs.get(pairKey(market, asset)) ?? 0n;
    }

    pendingLtvUpdate(market: MarketId, asset: Address): PendingUpdate<bigint> | undefined {
        return this.ltvs.getPending(pairKey(market, asset));
    }

    oracleFor(market: MarketId, asset: Address): PriceOracle | undefined {
        return this.oracles.get(pairKey(market, asset));
    }

    pendingOracleUpdate(market: MarketId, asset: Address): PendingUpdate<PriceOracle> | undefined {
        return this.oracles.getPending(pairKey(market, asset));
    }

    getLtvBounds(): LtvBounds {
        return { minLtv: this.minLtv.get(), maxLtv: this.maxLtv.get() };
    }

    getOwner(): Address {
        return this.owner.get();
    }

    /**
     * Value of `amount` units of `asset` as priced by `market`'s oracle for it.
     */
    valueOf(market: MarketId, asset: Address, amount: bigint): bigint {
        const oracle = this.oracles.get(pairKey(market, asset));
        if (oracle === undefined) {
            throw new ProtocolError('NoOracleFound', 'no oracle bound for pair', { market, asset });
        }
        return oracle.getValueInReferenceUnit(asset, amount);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // GUARDS
    // ═══════════════════════════════════════════════════════════════════════════

    private requireOwner(caller: Address): void {
        if (caller !== this.owner.get()) {
            throw new ProtocolError('OnlyProtocolOwner', 'caller is not the protocol owner', { caller });
        }
    }

    private requireMarketOwner(caller: Address, market: MarketId): void {
        if (caller !== this.ledger.getMarketOwner(market)) {
            throw new ProtocolError('OnlyMarketOwner', 'caller is not the market owner', { caller, market });
        }
    }

    private emit(name: string, args: Record<string, unknown>): void {
        this.ctx.events.emit(RISK_ENGINE_CONFIG.emitter, name, args);
    }

    private log(line: string): void {
        this.ctx.journal.onCommit(() => {
            logger.info(`${RISK_ENGINE_CONFIG.logPrefix} ${line}`);
        });
    }
}
