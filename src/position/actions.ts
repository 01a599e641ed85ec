/**
 * Position actions: one tagged variant per operation the dispatcher runs.
 */

import type { Address, Hex, MarketId } from '../core/identity';
import type { ExecArg } from './types';

export type Action =
    | { readonly op: 'NewPosition'; readonly owner: Address; readonly salt: Hex }
    | { readonly op: 'Deposit'; readonly asset: Address; readonly amount: bigint }
    | { readonly op: 'Withdraw'; readonly recipient: Address; readonly asset: Address; readonly amount: bigint }
    | { readonly op: 'AddCollateralType'; readonly asset: Address }
    | { readonly op: 'RemoveCollateralType'; readonly asset: Address }
    | { readonly op: 'Borrow'; readonly market: MarketId; readonly amount: bigint }
    | { readonly op: 'Repay'; readonly market: MarketId; readonly amount: bigint }
    | { readonly op: 'Approve'; readonly spender: Address; readonly asset: Address; readonly amount: bigint }
    | {
          readonly op: 'Exec';
          readonly target: Address;
          readonly selector: string;
          readonly args: readonly ExecArg[];
      };

export type Operation = Action['op'];

export const newPosition = (owner: Address, salt: Hex): Action => ({ op: 'NewPosition', owner, salt });

export const deposit = (asset: Address, amount: bigint): Action => ({ op: 'Deposit', asset, amount });

/** `amount` of MAX_UINT256 withdraws the whole balance. */
export const withdraw = (recipient: Address, asset: Address, amount: bigint): Action => ({
    op: 'Withdraw',
    recipient,
    asset,
    amount,
});

export const addCollateralType = (asset: Address): Action => ({ op: 'AddCollateralType', asset });

export const removeCollateralType = (asset: Address): Action => ({ op: 'RemoveCollateralType', asset });

export const borrow = (market: MarketId, amount: bigint): Action => ({ op: 'Borrow', market, amount });

/** `amount` of MAX_UINT256 repays the whole debt. */
export const repay = (market: MarketId, amount: bigint): Action => ({ op: 'Repay', market, amount });

export const approve = (spender: Address, asset: Address, amount: bigint): Action => ({
    op: 'Approve',
    spender,
    asset,
    amount,
});

export const exec = (target: Address, selector: string, args: readonly ExecArg[]): Action => ({
    op: 'Exec',
    target,
    selector,
    args,
});
