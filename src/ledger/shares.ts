import { ProtocolError } from '../core/errors';
import { mulDiv, type Rounding } from '../utils/math';
import type { SharePair } from './types';

/**
 * assets → shares against a ledger. An empty ledger prices 1:1. Shares left
 * outstanding against zero assets (a fully written-off ledger) have no price.
 */
export const toShares = (assets: bigint, pair: SharePair, rounding: Rounding): bigint => {
    if (pair.shares === 0n) return assets;
    if (pair.assets === 0n) {
        throw new ProtocolError('MarketInsolvent', 'shares outstanding against zero assets', {
            shares: pair.shares,
        });
    }
    return mulDiv(assets, pair.shares, pair.assets, rounding);
};

/**
 * shares → assets against a ledger. An empty ledger prices 1:1.
 */
export const toAssets = (shares: bigint, pair: SharePair, rounding: Rounding): bigint => {
    if (pair.shares === 0n) return shares;
    return mulDiv(shares, pair.assets, pair.shares, rounding);
};

export const EMPTY_PAIR: SharePair = { shares: 0n, assets: 0n };
