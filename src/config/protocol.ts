/**
 * Protocol Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * DEFAULT PARAMETERS AND ENVIRONMENT OVERRIDES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Fractions are WAD-scaled bigints (1e18 = 100%). Durations are seconds.
 * Environment values use decimal fractions ("0.95") and integer seconds.
 */

import { WAD } from './constants';
import { ProtocolError } from '../core/errors';
import { parseWad } from '../utils/math';

export interface LtvConfig {
    minLtv: bigint;
    maxLtv: bigint;
    updateTimelock: number;
    updateDeadline: number;
}

export interface OracleConfig {
    updateTimelock: number;
    updateDeadline: number;
}

export interface LedgerConfig {
    minBurnedShares: bigint;
    defaultInterestFee: bigint;
    defaultOriginationFee: bigint;
    minBorrow: bigint;
    minDebt: bigint;
    rateModelTimelock: number;
    rateModelDeadline: number;
}

export interface LiquidationConfig {
    closeFactor: bigint;
    discount: bigint;
    fee: bigint;
}

export interface PositionConfig {
    maxAssets: number;
    maxDebtMarkets: number;
}

export interface SuperPoolConfig {
    minBurnedShares: bigint;
    virtualShares: bigint;
    virtualAssets: bigint;
    maxQueueLength: number;
    feeTimelock: number;
    feeDeadline: number;
}

export interface ProtocolConfig {
    ltv: LtvConfig;
    oracle: OracleConfig;
    ledger: LedgerConfig;
    liquidation: LiquidationConfig;
    position: PositionConfig;
    superPool: SuperPoolConfig;
}

export type ProtocolConfigOverrides = {
    [K in keyof ProtocolConfig]?: Partial<ProtocolConfig[K]>;
};

const DAY = 24 * 60 * 60;

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
    ltv: {
        minLtv: WAD / 10n,              // 10%
        maxLtv: (WAD * 95n) / 100n,     // 95%
        updateTimelock: DAY,
        updateDeadline: 3 * DAY,
    },
    oracle: {
        updateTimelock: DAY,
        updateDeadline: 3 * DAY,
    },
    ledger: {
        minBurnedShares: 1_000_000n,
        defaultInterestFee: 0n,
        defaultOriginationFee: 0n,
        minBorrow: 0n,
        minDebt: 0n,
        rateModelTimelock: DAY,
        rateModelDeadline: 3 * DAY,
    },
    liquidation: {
        closeFactor: WAD / 2n,          // at most half of a market's debt per call
        discount: WAD / 10n,            // liquidator receives up to 110% of repaid value
        fee: 0n,
    },
    position: {
        maxAssets: 5,
        maxDebtMarkets: 5,
    },
    superPool: {
        minBurnedShares: 1_000n,
        virtualShares: 1_000n,
        virtualAssets: 1n,
        maxQueueLength: 10,
        feeTimelock: DAY,
        feeDeadline: 3 * DAY,
    },
};

/**
 * Create a config with per-section overrides.
 */
export function createConfig(overrides: ProtocolConfigOverrides = {}): ProtocolConfig {
    const config: ProtocolConfig = {
        ltv: { ...DEFAULT_PROTOCOL_CONFIG.ltv, ...(overrides.ltv ?? {}) },
        oracle: { ...DEFAULT_PROTOCOL_CONFIG.oracle, ...(overrides.oracle ?? {}) },
        ledger: { ...DEFAULT_PROTOCOL_CONFIG.ledger, ...(overrides.ledger ?? {}) },
        liquidation: { ...DEFAULT_PROTOCOL_CONFIG.liquidation, ...(overrides.liquidation ?? {}) },
        position: { ...DEFAULT_PROTOCOL_CONFIG.position, ...(overrides.position ?? {}) },
        superPool: { ...DEFAULT_PROTOCOL_CONFIG.superPool, ...(overrides.superPool ?? {}) },
    };
    validateConfig(config);
    return config;
}

export function validateConfig(config: ProtocolConfig): void {
    const { ltv, liquidation, position, superPool } = config;
    if (ltv.minLtv <= 0n || ltv.minLtv > ltv.maxLtv || ltv.maxLtv >= WAD) {
        throw new ProtocolError('InvalidConfig', 'ltv bounds must satisfy 0 < min <= max < 1', {
            minLtv: ltv.minLtv,
            maxLtv: ltv.maxLtv,
        });
    }
    if (liquidation.closeFactor <= 0n || liquidation.closeFactor > WAD || liquidation.fee > WAD) {
        throw new ProtocolError('InvalidConfig', 'close factor must be in (0, 1] and fee <= 1');
    }
    if (position.maxAssets < 1 || position.maxDebtMarkets < 1 || superPool.maxQueueLength < 1) {
        throw new ProtocolError('InvalidConfig', 'capacities must be positive');
    }
    if (superPool.virtualShares <= 0n || superPool.virtualAssets <= 0n) {
        throw new ProtocolError('InvalidConfig', 'virtual offsets must be positive');
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = parseInt(raw, 10);
    if (Number.isNaN(value) || value < 0) {
        throw new ProtocolError('InvalidConfig', `${name} must be a non-negative integer`, { raw });
    }
    return value;
};

const readWad = (env: Env, name: string, fallback: bigint): bigint => {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    return parseWad(raw);
};

/**
 * Build the protocol config from environment variables on top of the defaults.
 *
 * @example
 * loadProtocolConfig({ MAX_LTV: '0.9', LTV_TIMELOCK_SECONDS: '3600' })
 */
export function loadProtocolConfig(env: Env = process.env): ProtocolConfig {
    const { ltv, ledger, liquidation, position, superPool } = DEFAULT_PROTOCOL_CONFIG;
    return createConfig({
        ltv: {
            minLtv: readWad(env, 'MIN_LTV', ltv.minLtv),
            maxLtv: readWad(env, 'MAX_LTV', ltv.maxLtv),
            updateTimelock: readInt(env, 'LTV_TIMELOCK_SECONDS', ltv.updateTimelock),
            updateDeadline: readInt(env, 'LTV_DEADLINE_SECONDS', ltv.updateDeadline),
        },
        ledger: {
            defaultInterestFee: readWad(env, 'DEFAULT_INTEREST_FEE', ledger.defaultInterestFee),
            defaultOriginationFee: readWad(env, 'DEFAULT_ORIGINATION_FEE', ledger.defaultOriginationFee),
        },
        liquidation: {
            closeFactor: readWad(env, 'CLOSE_FACTOR', liquidation.closeFactor),
            discount: readWad(env, 'LIQUIDATION_DISCOUNT', liquidation.discount),
            fee: readWad(env, 'LIQUIDATION_FEE', liquidation.fee),
        },
        position: {
            maxAssets: readInt(env, 'MAX_POSITION_ASSETS', position.maxAssets),
            maxDebtMarkets: readInt(env, 'MAX_DEBT_MARKETS', position.maxDebtMarkets),
        },
        superPool: {
            maxQueueLength: readInt(env, 'SUPERPOOL_MAX_QUEUE_LENGTH', superPool.maxQueueLength),
        },
    });
}
