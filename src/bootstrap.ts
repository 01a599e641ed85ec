import dotenv from "dotenv";
dotenv.config();

/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — PROTOCOL FROM ENVIRONMENT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Loads .env, reads protocol parameters from the environment and builds a
 * protocol instance on the system clock.
 *
 * ENV:
 * - PROTOCOL_OWNER, FEE_RECIPIENT: checksummed addresses (required)
 * - MIN_LTV, MAX_LTV, CLOSE_FACTOR, ... : see config/protocol.ts
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { getAddress, isAddress } from 'viem';
import { loadProtocolConfig } from './config/protocol';
import { SystemClock } from './core/clock';
import { ProtocolError } from './core/errors';
import type { Address } from './core/identity';
import { createProtocol, type Protocol } from './protocol';

type Env = Record<string, string | undefined>;

function readAddress(env: Env, name: string): Address {
    const raw = env[name];
    if (raw === undefined || !isAddress(raw)) {
        throw new ProtocolError('InvalidConfig', `${name} must be set to an address`, { raw });
    }
    return getAddress(raw);
}

export function bootstrapProtocol(env: Env = process.env): Protocol {
    return createProtocol({
        owner: readAddress(env, 'PROTOCOL_OWNER'),
        feeRecipient: readAddress(env, 'FEE_RECIPIENT'),
        clock: new SystemClock(),
        config: loadProtocolConfig(env),
    });
}
