/**
 * Ledger Module
 *
 * Isolated per-market deposit and borrow share accounting with lazy interest
 * accrual.
 */

export { Ledger, LEDGER_CONFIG } from './ledger';
export type { LedgerOptions } from './ledger';
export { toAssets, toShares, EMPTY_PAIR } from './shares';
export type {
    AccrualPreview,
    InitializeMarketParams,
    Market,
    MarketView,
    RepayResult,
    SharePair,
} from './types';
