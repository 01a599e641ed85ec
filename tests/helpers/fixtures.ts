/**
 * Shared test fixtures: actors, assets, stub collaborators and a protocol
 * builder driven by a manual clock.
 */

import { isAddress } from 'viem';
import { MAX_UINT256, WAD } from '../../src/config/constants';
import { createConfig, type ProtocolConfigOverrides } from '../../src/config/protocol';
import { ManualClock } from '../../src/core/clock';
import { ProtocolError, type ErrorCode } from '../../src/core/errors';
import { labelAddress, toSalt, type Address, type MarketId } from '../../src/core/identity';
import type { ExecCall, ExecTarget } from '../../src/position';
import { newPosition } from '../../src/position/actions';
import { createProtocol, type Protocol } from '../../src/protocol';
import type { TokenBank } from '../../src/tokens/tokenBank';
import type { PriceOracle, RateModel } from '../../src/types';
import { mulDiv } from '../../src/utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// ACTORS AND ASSETS
// ═══════════════════════════════════════════════════════════════════════════════

export const E18 = 10n ** 18n;

export const OWNER = labelAddress('test:protocol-owner');
export const FEE_RECIPIENT = labelAddress('test:fee-recipient');
export const MARKET_OWNER = labelAddress('test:market-owner');
export const ALICE = labelAddress('test:alice');
export const BOB = labelAddress('test:bob');
export const LENDER = labelAddress('test:lender');
export const LIQUIDATOR = labelAddress('test:liquidator');

export const USDC = labelAddress('token:usdc');
export const DAI = labelAddress('token:dai');
export const WETH = labelAddress('token:weth');
export const WBTC = labelAddress('token:wbtc');

export const LARGE_CAP = 10n ** 40n;
export const INITIAL_DEPOSIT = 1_000_000n;

// ═══════════════════════════════════════════════════════════════════════════════
// STUB COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

/** Constant annual rate regardless of utilization. */
export class FixedRateModel implements RateModel {
    constructor(readonly address: Address, public rate: bigint) {}

    getRate(): bigint {
        return this.rate;
    }
}

/** value = amount · price / WAD. Throws StalePrice while `stale` is set. */
export class FixedPriceOracle implements PriceOracle {
    stale = false;

    constructor(readonly address: Address, public price: bigint) {}

    getValueInReferenceUnit(asset: Address, amount: bigint): bigint {
        if (this.stale) {
            throw new ProtocolError('StalePrice', 'price feed is stale', { asset });
        }
        return mulDiv(amount, this.price, WAD, 'down');
    }
}

/**
 * swap(tokenIn, tokenOut, amountIn, amountOut): pulls amountIn from the
 * calling account against its allowance and pays amountOut from inventory.
 */
export class MockSwapRouter implements ExecTarget {
    readonly address = labelAddress('test:swap-router');

    constructor(private readonly tokens: TokenBank) {}

    execute(call: ExecCall): void {
        if (call.selector !== 'swap') {
            throw new Error(`unsupported selector ${call.selector}`);
        }
        const [tokenIn, tokenOut, amountIn, amountOut] = call.args;
        if (
            typeof tokenIn !== 'string' ||
            typeof tokenOut !== 'string' ||
            !isAddress(tokenIn) ||
            !isAddress(tokenOut) ||
            typeof amountIn !== 'bigint' ||
            typeof amountOut !== 'bigint'
        ) {
            throw new Error('malformed swap arguments');
        }
        this.tokens.transferFrom(this.address, tokenIn, call.position, this.address, amountIn);
        this.tokens.transfer(tokenOut, this.address, call.position, amountOut);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestProtocol extends Protocol {
    readonly clock: ManualClock;
    readonly tokens: TokenBank;
}

export function createTestProtocol(overrides: ProtocolConfigOverrides = {}): TestProtocol {
    const clock = new ManualClock();
    const protocol = createProtocol({
        owner: OWNER,
        feeRecipient: FEE_RECIPIENT,
        clock,
        config: createConfig(overrides),
    });
    return { ...protocol, clock, tokens: protocol.ctx.tokens };
}

/** Mint `amount` to `holder`, optionally granting `spender` an infinite allowance. */
export function fund(env: TestProtocol, asset: Address, holder: Address, amount: bigint, spender?: Address): void {
    env.tokens.mint(asset, holder, amount);
    if (spender !== undefined) {
        env.tokens.approve(asset, holder, spender, MAX_UINT256);
    }
}

export interface MarketSetup {
    asset: Address;
    rate?: bigint;
    owner?: Address;
    depositCap?: bigint;
    borrowCap?: bigint;
    initialDeposit?: bigint;
}

export interface TestMarket {
    id: MarketId;
    rateModel: FixedRateModel;
}

let rateModelCounter = 0;

export function createMarket(env: TestProtocol, setup: MarketSetup): TestMarket {
    const owner = setup.owner ?? MARKET_OWNER;
    const initialDeposit = setup.initialDeposit ?? INITIAL_DEPOSIT;
    rateModelCounter += 1;
    const rateModel = new FixedRateModel(labelAddress(`test:rate-model:${rateModelCounter}`), setup.rate ?? 0n);
    fund(env, setup.asset, owner, initialDeposit, env.ledger.address);
    const id = env.ledger.initializeMarket(owner, {
        asset: setup.asset,
        rateModel,
        depositCap: setup.depositCap ?? LARGE_CAP,
        borrowCap: setup.borrowCap ?? LARGE_CAP,
        initialDeposit,
    });
    return { id, rateModel };
}

/** Bind a fixed-price oracle for (market, asset) through the protocol owner. */
export function setPrice(env: TestProtocol, market: MarketId, asset: Address, price: bigint): FixedPriceOracle {
    const oracle = new FixedPriceOracle(labelAddress(`test:oracle:${market}:${asset}`), price);
    env.riskEngine.setOracle(OWNER, market, asset, oracle);
    return oracle;
}

/** Price `asset` in `market` and accept it as collateral at `ltv` (first LTV applies at once). */
export function enableCollateral(
    env: TestProtocol,
    market: MarketId,
    asset: Address,
    price: bigint,
    ltv: bigint
): FixedPriceOracle {
    const oracle = setPrice(env, market, asset, price);
    env.riskEngine.requestLtvUpdate(env.ledger.getMarketOwner(market), market, asset, ltv);
    return oracle;
}

export function lend(env: TestProtocol, market: MarketId, lender: Address, amount: bigint): bigint {
    fund(env, env.ledger.getPoolAsset(market), lender, amount, env.ledger.address);
    return env.ledger.deposit(lender, market, amount, lender);
}

export function openPosition(env: TestProtocol, owner: Address, salt: string = 'primary'): Address {
    const saltHex = toSalt(salt);
    const position = env.positionManager.predictAddress(owner, saltHex);
    env.positionManager.process(owner, position, newPosition(owner, saltHex));
    return position;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ASSERTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function expectProtocolError(fn: () => unknown, code: ErrorCode): ProtocolError {
    let caught: unknown;
    try {
        fn();
    } catch (error) {
        caught = error;
    }
    if (!(caught instanceof ProtocolError)) {
        throw new Error(`expected ProtocolError ${code}, got ${String(caught)}`);
    }
    expect(caught.code).toBe(code);
    return caught;
}
