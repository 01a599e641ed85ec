/**
 * Position Module - Type Definitions
 */

import type { Address } from '../core/identity';

export type ExecArg = string | bigint | number | boolean;

export interface ExecCall {
    /** Account on whose behalf the call runs. */
    readonly position: Address;
    readonly selector: string;
    readonly args: readonly ExecArg[];
}

/**
 * An external protocol an account may call into once the (target, selector)
 * pair is allow-listed. Runs inside the caller's atomic frame: a throw reverts
 * the whole batch.
 */
export interface ExecTarget {
    readonly address: Address;
    execute(call: ExecCall): void;
}
