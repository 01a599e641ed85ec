/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * NO runtime logic at import time: nothing here creates a protocol instance
 * or reads .env. Use createProtocol() directly, or bootstrapProtocol() from
 * ./bootstrap to build one from the environment.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export { createProtocol } from './protocol';
export type { Protocol, ProtocolOptions } from './protocol';

export { DEAD_ADDRESS, MAX_UINT256, SECONDS_PER_YEAR, WAD } from './config/constants';
export { createConfig, loadProtocolConfig, DEFAULT_PROTOCOL_CONFIG } from './config/protocol';
export type { ProtocolConfig, ProtocolConfigOverrides } from './config/protocol';

export { ManualClock, SystemClock } from './core/clock';
export type { Clock } from './core/clock';
export { createContext } from './core/context';
export type { ProtocolContext } from './core/context';
export { ProtocolError, ERROR_KINDS, isProtocolError } from './core/errors';
export type { ErrorCode, ErrorKind } from './core/errors';
export type { ProtocolEvent } from './core/events';
export { deriveMarketId, labelAddress, predictPositionAddress, toSalt } from './core/identity';
export type { Address, Hex, MarketId } from './core/identity';
export type { PendingUpdate } from './core/timelock';

export { TokenBank } from './tokens/tokenBank';
export * from './ledger';
export * from './risk';
export * from './position';
export * from './superpool';
export type { PriceOracle, RateModel } from './types';
export { formatWad, parseWad, mulDiv } from './utils/math';
