// Protocol Constants for isomarket

import { keccak256, maxUint256, toHex, type Address, type Hex } from 'viem';

// ═══════════════════════════════════════════════════════════════════════════
// FIXED POINT
// ═══════════════════════════════════════════════════════════════════════════

export const WAD = 10n ** 18n;                       // 1.0 in rate / ltv / fee scale
export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;
export const MAX_UINT256 = maxUint256;               // "everything" sentinel for repay / withdraw

// ═══════════════════════════════════════════════════════════════════════════
// ADDRESSES
// ═══════════════════════════════════════════════════════════════════════════

// Receives the burned initial-deposit shares of every market and router
export const DEAD_ADDRESS: Address = '0x000000000000000000000000000000000000dEaD';

// Code hash fed into CREATE2 derivation of account addresses
export const POSITION_CODE_HASH: Hex = keccak256(toHex('isomarket.Position'));
export const SUPERPOOL_CODE_HASH: Hex = keccak256(toHex('isomarket.SuperPool'));
