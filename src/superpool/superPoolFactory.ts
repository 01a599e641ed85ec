import { DEAD_ADDRESS } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError } from '../core/errors';
import { labelAddress, predictSuperPoolAddress, type Address } from '../core/identity';
import { StateMap, StateSlot } from '../core/journal';
import type { Ledger } from '../ledger';
import logger from '../utils/logger';
import { SuperPool, SUPERPOOL_CONFIG } from './superPool';
import type { DeploySuperPoolParams } from './types';

/**
 * Deploys SuperPools. Each deployment seeds the pool with an initial deposit
 * whose shares are burned, so the first real depositor cannot be front-run
 * into a rounding loss.
 */
export class SuperPoolFactory {
    readonly address: Address;

    private readonly nonce: StateSlot<bigint>;
    private readonly deployed: StateMap<Address, SuperPool>;

    constructor(private readonly ctx: ProtocolContext, private readonly ledger: Ledger, address?: Address) {
        this.address = address ?? labelAddress('isomarket.superPoolFactory');
        this.nonce = new StateSlot(ctx.journal, 0n);
        this.deployed = new StateMap(ctx.journal);
    }

    deploySuperPool(caller: Address, params: DeploySuperPoolParams): SuperPool {
        return this.ctx.journal.atomic(() => {
            const nonce = this.nonce.get();
            const address = predictSuperPoolAddress(this.address, params.owner, nonce);
            this.nonce.set(nonce + 1n);

            const pool = new SuperPool(this.ctx, this.ledger, address, params);
            const { tokens } = this.ctx;
            tokens.transferFrom(this.address, params.asset, caller, this.address, params.initialDeposit);
            tokens.approve(params.asset, this.address, pool.address, params.initialDeposit);
            const shares = pool.deposit(this.address, params.initialDeposit, DEAD_ADDRESS);

            const minBurned = this.ctx.config.superPool.minBurnedShares;
            if (shares < minBurned) {
                throw new ProtocolError('InitialDepositTooLow', 'initial deposit burns too few shares', {
                    shares,
                    minBurned,
                });
            }
            this.deployed.set(address, pool);

            this.ctx.events.emit('SuperPoolFactory', 'SuperPoolDeployed', {
                owner: params.owner,
                superPool: address,
                asset: params.asset,
                name: params.name,
                symbol: params.symbol,
            });
            this.ctx.journal.onCommit(() => {
                logger.info(`${SUPERPOOL_CONFIG.logPrefix} DEPLOY address=${address} asset=${params.asset} owner=${params.owner}`);
            });
            return pool;
        });
    }

    isDeployed(address: Address): boolean {
        return this.deployed.has(address);
    }

    getSuperPool(address: Address): SuperPool | undefined {
        return this.deployed.get(address);
    }
}
