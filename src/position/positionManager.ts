/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * POSITION MANAGER — ACTION DISPATCHER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * Single entry point for everything an account does: create, fund, borrow,
 * repay, approve, call allow-listed protocols, and be liquidated.
 *
 * INVARIANTS:
 * - A batch applies atomically and the account must be healthy after it
 * - Only the owner or an authorized operator acts on an account
 * - Deposit / Withdraw / AddCollateralType / Approve touch known assets only
 * - Exec reaches allow-listed (target, selector) pairs only
 * - Account addresses are CREATE2-derived from (owner, salt)
 *
 * LIQUIDATION:
 * - liquidate: risk module validates, liquidator repays, seizes collateral
 *   minus the protocol fee; health must not worsen unless the account was
 *   bad debt
 * - liquidateBadDebt: bad-debt accounts only; collateral goes to the protocol
 *   owner and every debt is written off against depositors
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MAX_UINT256, WAD } from '../config/constants';
import type { ProtocolContext } from '../core/context';
import { ProtocolError } from '../core/errors';
import { labelAddress, predictPositionAddress, type Address, type Hex } from '../core/identity';
import { StateMap, StateSlot } from '../core/journal';
import type { Ledger } from '../ledger';
import type { RiskModule } from '../risk/riskModule';
import type { AssetSeizure, DebtRepayment } from '../risk/types';
import logger from '../utils/logger';
import { formatWad, mulWad, requireAmount } from '../utils/math';
import type { Action } from './actions';
import { Position } from './position';
import type { ExecTarget } from './types';

export const POSITION_MANAGER_CONFIG = {
    logPrefix: '[POSITION-MANAGER]',
    emitter: 'PositionManager',
};

export interface PositionManagerOptions {
    owner: Address;
    address?: Address;
}

export class PositionManager {
    readonly address: Address;

    private readonly owner: StateSlot<Address>;
    private readonly liquidationFee: StateSlot<bigint>;
    private readonly positions: StateMap<Address, Position>;
    private readonly owners: StateMap<Address, Address>;
    // `${position}:${user}`
    private readonly auth: StateMap<string, boolean>;
    private readonly knownAssets: StateMap<Address, boolean>;
    private readonly knownSpenders: StateMap<Address, boolean>;
    private readonly execTargets: StateMap<Address, ExecTarget>;
    // `${target}:${selector}`
    private readonly knownFuncs: StateMap<string, boolean>;

    constructor(
        private readonly ctx: ProtocolContext,
        private readonly ledger: Ledger,
        private readonly riskModule: RiskModule,
        options: PositionManagerOptions
    ) {
        const { journal, config } = ctx;
        this.address = options.address ?? labelAddress('isomarket.positionManager');
        this.owner = new StateSlot(journal, options.owner);
        this.liquidationFee = new StateSlot(journal, config.liquidation.fee);
        this.positions = new StateMap(journal);
        this.owners = new StateMap(journal);
        this.auth = new StateMap(journal);
        this.knownAssets = new StateMap(journal);
        this.knownSpenders = new StateMap(journal);
        this.execTargets = new StateMap(journal);
        this.knownFuncs = new StateMap(journal);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DISPATCH
    // ═══════════════════════════════════════════════════════════════════════════

    process(caller: Address, position: Address, action: Action): void {
        this.processBatch(caller, position, [action]);
    }

    /**
     * Run `actions` in order against `position`, then require the account to
     * be healthy. Any failure reverts the whole batch.
     */
    processBatch(caller: Address, position: Address, actions: readonly Action[]): void {
        this.ctx.journal.atomic(() => {
            for (const action of actions) {
                this.dispatch(caller, position, action);
            }
            const account = this.getPosition(position);
            if (!this.riskModule.isHealthy(account)) {
                throw new ProtocolError('HealthCheckFailed', 'position unhealthy after actions', { position });
            }
        });
    }

    private dispatch(caller: Address, position: Address, action: Action): void {
        if (action.op === 'NewPosition') {
            this.newPosition(position, action.owner, action.salt);
            return;
        }

        const account = this.getPosition(position);
        if (!this.isAuth(position, caller)) {
            throw new ProtocolError('NotPositionAuthorized', 'caller may not act on position', { caller, position });
        }
        if ('amount' in action) {
            requireAmount(action.amount, { position, op: action.op });
        }

        switch (action.op) {
            case 'Deposit': {
                this.requireKnownAsset(action.asset);
                this.ctx.tokens.transferFrom(this.address, action.asset, caller, position, action.amount);
                this.emit('Deposit', { position, depositor: caller, asset: action.asset, amount: action.amount });
                break;
            }
            case 'Withdraw': {
                this.requireKnownAsset(action.asset);
                const amount = action.amount === MAX_UINT256 ? account.balanceOf(action.asset) : action.amount;
                account.transfer(this.address, action.asset, action.recipient, amount);
                this.emit('Transfer', { position, caller, recipient: action.recipient, asset: action.asset, amount });
                this.releaseIfDrained(account, action.asset);
                break;
            }
            case 'AddCollateralType': {
                this.requireKnownAsset(action.asset);
                account.addToken(this.address, action.asset);
                this.emit('AddToken', { position, caller, asset: action.asset });
                break;
            }
            case 'RemoveCollateralType': {
                account.removeToken(this.address, action.asset);
                this.emit('RemoveToken', { position, caller, asset: action.asset });
                break;
            }
            case 'Borrow': {
                this.ledger.borrow(this.address, action.market, position, action.amount);
                account.borrow(this.address, action.market);
                this.emit('Borrow', { position, caller, market: action.market, amount: action.amount });
                break;
            }
            case 'Repay': {
                const asset = this.ledger.getPoolAsset(action.market);
                const amount =
                    action.amount === MAX_UINT256
                        ? this.ledger.getBorrowsOf(action.market, position)
                        : action.amount;
                account.transfer(this.address, asset, this.ledger.address, amount);
                const result = this.ledger.repay(this.address, action.market, position, action.amount);
                if (result.remainingShares === 0n) {
                    account.repay(this.address, action.market);
                }
                this.emit('Repay', { position, caller, market: action.market, amount: result.assetsRepaid });
                break;
            }
            case 'Approve': {
                this.requireKnownAsset(action.asset);
                if (!this.isKnownSpender(action.spender)) {
                    throw new ProtocolError('SpenderNotAllowed', 'spender is not allow-listed', {
                        spender: action.spender,
                    });
                }
                account.approve(this.address, action.asset, action.spender, action.amount);
                this.emit('Approve', { position, caller, spender: action.spender, asset: action.asset });
                break;
            }
            case 'Exec': {
                const target = this.execTargets.get(action.target);
                if (target === undefined || !this.isKnownFunc(action.target, action.selector)) {
                    throw new ProtocolError('ExecNotAllowed', 'call target is not allow-listed', {
                        target: action.target,
                        selector: action.selector,
                    });
                }
                account.exec(this.address, target, action.selector, action.args);
                this.emit('Exec', { position, caller, target: action.target, selector: action.selector });
                break;
            }
            default: {
                const unreachable: never = action;
                throw new ProtocolError('InvalidConfig', `unknown action ${String(unreachable)}`);
            }
        }
    }

    private newPosition(position: Address, owner: Address, salt: Hex): void {
        const predicted = predictPositionAddress(this.address, owner, salt);
        if (predicted !== position) {
            throw new ProtocolError('InvalidPositionAddress', 'position address does not match owner and salt', {
                position,
                predicted,
            });
        }
        if (this.positions.has(position)) {
            throw new ProtocolError('PositionAlreadyExists', 'position already deployed', { position });
        }
        this.positions.set(position, new Position(this.ctx, position, this.address));
        this.owners.set(position, owner);
        this.auth.set(`${position}:${owner}`, true);

        this.emit('PositionDeployed', { position, owner });
        this.log(`NEW position=${position} owner=${owner}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIQUIDATION
    // ═══════════════════════════════════════════════════════════════════════════

    liquidate(
        caller: Address,
        position: Address,
        debtData: readonly DebtRepayment[],
        assetData: readonly AssetSeizure[]
    ): void {
        this.ctx.journal.atomic(() => {
            for (const { amount } of [...debtData, ...assetData]) {
                requireAmount(amount, { position });
            }
            const account = this.getPosition(position);
            const verdict = this.riskModule.validateLiquidation(account, debtData, assetData);

            for (const { market, amount } of debtData) {
                const asset = this.ledger.getPoolAsset(market);
                this.ctx.tokens.transferFrom(this.address, asset, caller, this.ledger.address, amount);
                const result = this.ledger.repay(this.address, market, position, amount);
                if (result.remainingShares === 0n) {
                    account.repay(this.address, market);
                }
            }

            const fee = this.liquidationFee.get();
            const protocolOwner = this.owner.get();
            for (const { asset, amount } of assetData) {
                const feeAmount = mulWad(amount, fee, 'down');
                if (feeAmount > 0n) {
                    account.transfer(this.address, asset, protocolOwner, feeAmount);
                }
                account.transfer(this.address, asset, caller, amount - feeAmount);
                this.releaseIfDrained(account, asset);
            }

            if (!verdict.isBadDebt) {
                const healthFactorAfter = this.riskModule.getHealthFactor(account);
                if (healthFactorAfter < verdict.healthFactorBefore) {
                    throw new ProtocolError('LiquidationWorsenedHealth', 'liquidation lowered the health factor', {
                        position,
                        before: verdict.healthFactorBefore,
                        after: healthFactorAfter,
                    });
                }
            }

            this.emit('Liquidation', {
                position,
                liquidator: caller,
                owner: this.owners.get(position),
                repaidValue: verdict.repaidValue,
                seizedValue: verdict.seizedValue,
                badDebt: verdict.isBadDebt,
            });
            this.ctx.journal.onCommit(() => {
                logger.warn(
                    `${POSITION_MANAGER_CONFIG.logPrefix} LIQUIDATE position=${position} liquidator=${caller} repaid=${verdict.repaidValue} seized=${verdict.seizedValue} badDebt=${verdict.isBadDebt}`
                );
            });
        });
    }

    /**
     * Close out an account whose collateral is worth less than its debt. The
     * protocol owner receives the collateral; each market writes the debt off.
     */
    liquidateBadDebt(caller: Address, position: Address): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            const account = this.getPosition(position);
            const assessment = this.riskModule.validateBadDebtLiquidation(account);

            for (const asset of account.getPositionAssets()) {
                const balance = account.balanceOf(asset);
                if (balance > 0n) {
                    account.transfer(this.address, asset, caller, balance);
                }
                this.releaseIfDrained(account, asset);
            }
            for (const market of account.getDebtMarkets()) {
                this.ledger.rebalanceBadDebt(this.address, market, position);
                account.repay(this.address, market);
            }

            this.emit('BadDebtLiquidated', {
                position,
                totalCollateralValue: assessment.totalCollateralValue,
                totalDebtValue: assessment.totalDebtValue,
            });
            this.ctx.journal.onCommit(() => {
                logger.warn(
                    `${POSITION_MANAGER_CONFIG.logPrefix} BAD_DEBT position=${position} collateral=${assessment.totalCollateralValue} debt=${assessment.totalDebtValue}`
                );
            });
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ACCOUNT ADMINISTRATION
    // ═══════════════════════════════════════════════════════════════════════════

    toggleAuth(caller: Address, user: Address, position: Address): boolean {
        return this.ctx.journal.atomic(() => {
            if (this.owners.get(position) !== caller) {
                throw new ProtocolError('NotPositionAuthorized', 'only the position owner can change operators', {
                    caller,
                    position,
                });
            }
            const key = `${position}:${user}`;
            const next = !this.auth.getOr(key, false);
            this.auth.set(key, next);
            this.emit('ToggleAuth', { position, user, isAuth: next });
            return next;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PROTOCOL OWNER ADMINISTRATION
    // ═══════════════════════════════════════════════════════════════════════════

    toggleKnownAsset(caller: Address, asset: Address): boolean {
        return this.toggle(caller, this.knownAssets, asset, 'ToggleKnownAsset', { asset });
    }

    toggleKnownSpender(caller: Address, spender: Address): boolean {
        return this.toggle(caller, this.knownSpenders, spender, 'ToggleKnownSpender', { spender });
    }

    registerExecTarget(caller: Address, target: ExecTarget): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            this.execTargets.set(target.address, target);
            this.emit('ExecTargetRegistered', { target: target.address });
        });
    }

    toggleKnownFunc(caller: Address, target: Address, selector: string): boolean {
        return this.ctx.journal.atomic(() => {
            if (!this.execTargets.has(target)) {
                throw new ProtocolError('ExecNotAllowed', 'target is not registered', { target });
            }
            return this.toggle(caller, this.knownFuncs, `${target}:${selector}`, 'ToggleKnownFunc', {
                target,
                selector,
            });
        });
    }

    setLiquidationFee(caller: Address, fee: bigint): void {
        this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            requireAmount(fee);
            if (fee > WAD) {
                throw new ProtocolError('FeeTooHigh', 'liquidation fee above 100%', { fee: formatWad(fee) });
            }
            this.liquidationFee.set(fee);
            this.emit('LiquidationFeeSet', { fee });
        });
    }

    private toggle<K>(
        caller: Address,
        map: StateMap<K, boolean>,
        key: K,
        event: string,
        args: Record<string, unknown>
    ): boolean {
        return this.ctx.journal.atomic(() => {
            this.requireOwner(caller);
            const next = !map.getOr(key, false);
            map.set(key, next);
            this.emit(event, { ...args, isKnown: next });
            return next;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    predictAddress(owner: Address, salt: Hex): Address {
        return predictPositionAddress(this.address, owner, salt);
    }

    getPosition(position: Address): Position {
        const account = this.positions.get(position);
        if (account === undefined) {
            throw new ProtocolError('UnknownPosition', 'position does not exist', { position });
        }
        return account;
    }

    ownerOf(position: Address): Address | undefined {
        return this.owners.get(position);
    }

    isAuth(position: Address, user: Address): boolean {
        return this.auth.getOr(`${position}:${user}`, false);
    }

    isKnownAsset(asset: Address): boolean {
        return this.knownAssets.getOr(asset, false);
    }

    isKnownSpender(spender: Address): boolean {
        return this.knownSpenders.getOr(spender, false);
    }

    isKnownFunc(target: Address, selector: string): boolean {
        return this.knownFuncs.getOr(`${target}:${selector}`, false);
    }

    getLiquidationFee(): bigint {
        return this.liquidationFee.get();
    }

    getOwner(): Address {
        return this.owner.get();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // GUARDS
    // ═══════════════════════════════════════════════════════════════════════════

    private requireOwner(caller: Address): void {
        if (caller !== this.owner.get()) {
            throw new ProtocolError('OnlyProtocolOwner', 'caller is not the protocol owner', { caller });
        }
    }

    /** An account stops tracking collateral it no longer holds. */
    private releaseIfDrained(account: Position, asset: Address): void {
        if (account.hasAsset(asset) && account.balanceOf(asset) === 0n) {
            account.removeToken(this.address, asset);
            this.emit('RemoveToken', { position: account.address, asset });
        }
    }

    private requireKnownAsset(asset: Address): void {
        if (!this.isKnownAsset(asset)) {
            throw new ProtocolError('AssetNotAllowed', 'asset is not allow-listed', { asset });
        }
    }

    private emit(name: string, args: Record<string, unknown>): void {
        this.ctx.events.emit(POSITION_MANAGER_CONFIG.emitter, name, args);
    }

    private log(line: string): void {
        this.ctx.journal.onCommit(() => {
            logger.info(`${POSITION_MANAGER_CONFIG.logPrefix} ${line}`);
        });
    }
}
