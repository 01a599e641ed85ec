/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * IDENTITY DERIVATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Market ids, account addresses and router addresses are deterministic hashes
 * of the parameters that define them, so the same inputs always name the same
 * entity and collisions are rejected at creation.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    encodeAbiParameters,
    encodePacked,
    getAddress,
    getContractAddress,
    keccak256,
    parseAbiParameters,
    slice,
    toHex,
    type Address,
    type Hex,
} from 'viem';
import { POSITION_CODE_HASH, SUPERPOOL_CODE_HASH } from '../config/constants';

export type { Address, Hex };

/** 32-byte market identifier */
export type MarketId = Hex;

/**
 * Stable address for a named actor or component.
 *
 * @example
 * labelAddress('alice') // same checksummed address on every call
 */
export function labelAddress(label: string): Address {
    return getAddress(slice(keccak256(toHex(label)), 12));
}

export function deriveMarketId(owner: Address, asset: Address, rateModel: Address): MarketId {
    return keccak256(
        encodeAbiParameters(parseAbiParameters('address, address, address'), [owner, asset, rateModel])
    );
}

export function positionSalt(owner: Address, salt: Hex): Hex {
    return keccak256(encodePacked(['address', 'bytes32'], [owner, salt]));
}

export function predictPositionAddress(positionManager: Address, owner: Address, salt: Hex): Address {
    return getContractAddress({
        opcode: 'CREATE2',
        from: positionManager,
        salt: positionSalt(owner, salt),
        bytecodeHash: POSITION_CODE_HASH,
    });
}

export function predictSuperPoolAddress(factory: Address, owner: Address, nonce: bigint): Address {
    return getContractAddress({
        opcode: 'CREATE2',
        from: factory,
        salt: keccak256(encodeAbiParameters(parseAbiParameters('address, uint256'), [owner, nonce])),
        bytecodeHash: SUPERPOOL_CODE_HASH,
    });
}

/** Pad a short salt string or number into bytes32 */
export function toSalt(value: string | number | bigint): Hex {
    return toHex(value, { size: 32 });
}
