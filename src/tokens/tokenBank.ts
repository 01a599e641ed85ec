/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TOKEN BANK — CUSTODY OF EVERY ASSET
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ERC-20 shaped balances and allowances for all assets the protocol touches.
 * Markets, accounts and routers hold tokens here under their own address.
 *
 * INVARIANTS:
 * - Σ balances(asset) == totalSupply(asset) at all times
 * - An allowance of MAX_UINT256 is infinite and never decremented
 * - Amounts are never negative
 * - Every mutation is journaled; a reverted call restores balances exactly
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MAX_UINT256 } from '../config/constants';
import { ProtocolError } from '../core/errors';
import type { Address } from '../core/identity';
import { Journal, StateMap } from '../core/journal';
import { requireAmount } from '../utils/math';

export class TokenBank {
    private readonly balances: StateMap<string, bigint>;
    private readonly allowances: StateMap<string, bigint>;
    private readonly supplies: StateMap<Address, bigint>;

    constructor(journal: Journal) {
        this.balances = new StateMap(journal);
        this.allowances = new StateMap(journal);
        this.supplies = new StateMap(journal);
    }

    balanceOf(asset: Address, holder: Address): bigint {
        return this.balances.getOr(`${asset}:${holder}`, 0n);
    }

    allowance(asset: Address, owner: Address, spender: Address): bigint {
        return this.allowances.getOr(`${asset}:${owner}:${spender}`, 0n);
    }

    totalSupply(asset: Address): bigint {
        return this.supplies.getOr(asset, 0n);
    }

    /** Issue new units of `asset` to `to`. Models funds arriving from outside the protocol. */
    mint(asset: Address, to: Address, amount: bigint): void {
        requireAmount(amount, { asset, to });
        this.credit(asset, to, amount);
        this.supplies.set(asset, this.totalSupply(asset) + amount);
    }

    approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
        requireAmount(amount, { asset, owner, spender });
        this.allowances.set(`${asset}:${owner}:${spender}`, amount);
    }

    transfer(asset: Address, from: Address, to: Address, amount: bigint): void {
        requireAmount(amount, { asset, from, to });
        this.debit(asset, from, amount);
        this.credit(asset, to, amount);
    }

    transferFrom(spender: Address, asset: Address, from: Address, to: Address, amount: bigint): void {
        requireAmount(amount, { asset, from, spender });
        if (spender !== from) {
            const allowed = this.allowance(asset, from, spender);
            if (allowed < amount) {
                throw new ProtocolError('InsufficientAllowance', 'allowance below transfer amount', {
                    asset,
                    from,
                    spender,
                    allowed,
                    amount,
                });
            }
            if (allowed !== MAX_UINT256) {
                this.approve(asset, from, spender, allowed - amount);
            }
        }
        this.transfer(asset, from, to, amount);
    }

    private debit(asset: Address, holder: Address, amount: bigint): void {
        const balance = this.balanceOf(asset, holder);
        if (balance < amount) {
            throw new ProtocolError('InsufficientBalance', 'balance below transfer amount', {
                asset,
                holder,
                balance,
                amount,
            });
        }
        this.balances.set(`${asset}:${holder}`, balance - amount);
    }

    private credit(asset: Address, holder: Address, amount: bigint): void {
        this.balances.set(`${asset}:${holder}`, this.balanceOf(asset, holder) + amount);
    }
}
