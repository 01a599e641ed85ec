/**
 * SuperPool Module
 *
 * ERC-4626 liquidity router spreading one asset across member markets.
 */

export { SuperPool, SUPERPOOL_CONFIG } from './superPool';
export { SuperPoolFactory } from './superPoolFactory';
export type {
    DeploySuperPoolParams,
    MarketAllocation,
    SuperPoolAccrual,
    SuperPoolParams,
} from './types';
