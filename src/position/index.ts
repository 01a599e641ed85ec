/**
 * Position Module
 *
 * Collateral accounts and the dispatcher that runs actions against them.
 */

export { Position } from './position';
export { PositionManager, POSITION_MANAGER_CONFIG } from './positionManager';
export type { PositionManagerOptions } from './positionManager';
export * as actions from './actions';
export type { Action, Operation } from './actions';
export type { ExecArg, ExecCall, ExecTarget } from './types';
