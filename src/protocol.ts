/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PROTOCOL — COMPOSITION ROOT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Wires one protocol instance: a shared context (journal, clock, tokens,
 * events, config), the ledger, the risk engine and module, the position
 * manager and the superpool factory. The ledger only accepts borrow / repay
 * from the position manager created here.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { ProtocolConfig } from './config/protocol';
import type { Clock } from './core/clock';
import { createContext, type ProtocolContext } from './core/context';
import type { Address } from './core/identity';
import { Ledger } from './ledger';
import { PositionManager } from './position';
import { RiskEngine, RiskModule } from './risk';
import { SuperPoolFactory } from './superpool';
import logger from './utils/logger';

export interface ProtocolOptions {
    owner: Address;
    feeRecipient: Address;
    clock?: Clock;
    config?: ProtocolConfig;
}

export interface Protocol {
    readonly ctx: ProtocolContext;
    readonly ledger: Ledger;
    readonly riskEngine: RiskEngine;
    readonly riskModule: RiskModule;
    readonly positionManager: PositionManager;
    readonly superPoolFactory: SuperPoolFactory;
}

export function createProtocol(options: ProtocolOptions): Protocol {
    const ctx = createContext({ clock: options.clock, config: options.config });
    const ledger = new Ledger(ctx, { owner: options.owner, feeRecipient: options.feeRecipient });
    const riskEngine = new RiskEngine(ctx, ledger, { owner: options.owner });
    const riskModule = new RiskModule(ctx, ledger, riskEngine);
    const positionManager = new PositionManager(ctx, ledger, riskModule, { owner: options.owner });
    const superPoolFactory = new SuperPoolFactory(ctx, ledger);

    ledger.setPositionManager(options.owner, positionManager.address);

    logger.info(
        `[PROTOCOL] ready ledger=${ledger.address} riskEngine=${riskEngine.address} positionManager=${positionManager.address}`
    );
    return { ctx, ledger, riskEngine, riskModule, positionManager, superPoolFactory };
}
