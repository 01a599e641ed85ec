/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PROTOCOL ERRORS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every failure raised by the protocol is a ProtocolError carrying a stable
 * code and the kind that code belongs to. Callers branch on `code`; `kind`
 * groups codes for reporting.
 *
 * RULES:
 * 1. Each code maps to exactly one kind (ERROR_KINDS)
 * 2. Errors thrown by collaborators (oracles, rate models) are never wrapped
 * 3. A thrown error always reverts the enclosing atomic call
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type ErrorKind =
    | 'GovernanceTiming'
    | 'BoundsViolation'
    | 'Authorization'
    | 'Valuation'
    | 'HealthViolation'
    | 'DegenerateArithmetic'
    | 'InvalidInput'
    | 'TokenTransfer';

export const ERROR_KINDS = {
    // Governance timing
    TimelockNotElapsed: 'GovernanceTiming',
    TimelockExpired: 'GovernanceTiming',
    NoPendingUpdate: 'GovernanceTiming',

    // Bounds
    LtvOutOfBounds: 'BoundsViolation',
    InvalidLtvBounds: 'BoundsViolation',
    DepositCapExceeded: 'BoundsViolation',
    BorrowCapExceeded: 'BoundsViolation',
    PoolCapExceeded: 'BoundsViolation',
    SuperPoolCapExceeded: 'BoundsViolation',
    MaxAssetsExceeded: 'BoundsViolation',
    MaxDebtMarketsExceeded: 'BoundsViolation',
    InsufficientShares: 'BoundsViolation',
    InsufficientLiquidity: 'BoundsViolation',
    InsufficientWithdrawPath: 'BoundsViolation',
    BorrowAmountTooLow: 'BoundsViolation',
    DebtTooLow: 'BoundsViolation',
    FeeTooHigh: 'BoundsViolation',
    QueueTooLong: 'BoundsViolation',
    InitialDepositTooLow: 'BoundsViolation',

    // Authorization
    OnlyProtocolOwner: 'Authorization',
    OnlyMarketOwner: 'Authorization',
    OnlyPositionManager: 'Authorization',
    OnlyAllocator: 'Authorization',
    NotPositionAuthorized: 'Authorization',
    InvalidPositionAddress: 'Authorization',
    AssetNotAllowed: 'Authorization',
    SpenderNotAllowed: 'Authorization',
    ExecNotAllowed: 'Authorization',

    // Valuation
    NoOracleFound: 'Valuation',
    StalePrice: 'Valuation',
    UnsupportedAsset: 'Valuation',
    ZeroCollateralWithDebt: 'Valuation',

    // Health
    HealthCheckFailed: 'HealthViolation',
    LiquidateHealthyPosition: 'HealthViolation',
    CloseFactorExceeded: 'HealthViolation',
    SeizedTooMuchCollateral: 'HealthViolation',
    NoBadDebt: 'HealthViolation',
    LiquidationWorsenedHealth: 'HealthViolation',

    // Degenerate arithmetic
    ZeroSharesDeposit: 'DegenerateArithmetic',
    ZeroSharesBorrow: 'DegenerateArithmetic',
    ZeroSharesWithdraw: 'DegenerateArithmetic',
    ZeroSharesRepay: 'DegenerateArithmetic',
    ZeroAssetsRedeem: 'DegenerateArithmetic',
    ZeroShares: 'DegenerateArithmetic',
    ZeroAssets: 'DegenerateArithmetic',
    DivisionByZero: 'DegenerateArithmetic',

    // Input
    MarketAlreadyExists: 'InvalidInput',
    UnknownMarket: 'InvalidInput',
    MarketPaused: 'InvalidInput',
    MarketInsolvent: 'InvalidInput',
    InvalidAmount: 'InvalidInput',
    PositionAlreadyExists: 'InvalidInput',
    UnknownPosition: 'InvalidInput',
    UnknownDebtMarket: 'InvalidInput',
    UnknownCollateral: 'InvalidInput',
    AssetMismatch: 'InvalidInput',
    MarketNotInRouter: 'InvalidInput',
    MarketAlreadyInRouter: 'InvalidInput',
    MarketHasAssets: 'InvalidInput',
    InvalidQueue: 'InvalidInput',
    InvalidConfig: 'InvalidInput',

    // Token movement
    InsufficientBalance: 'TokenTransfer',
    InsufficientAllowance: 'TokenTransfer',
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof ERROR_KINDS;

export class ProtocolError extends Error {
    public readonly kind: ErrorKind;

    constructor(
        public readonly code: ErrorCode,
        message: string = code,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[${code}] ${message}`);
        this.name = 'ProtocolError';
        this.kind = ERROR_KINDS[code];
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            kind: this.kind,
            message: this.message,
            context: Object.fromEntries(
                Object.entries(this.context).map(([key, value]) => [
                    key,
                    typeof value === 'bigint' ? value.toString() : value,
                ])
            ),
        };
    }
}

export function isProtocolError(error: unknown, code?: ErrorCode): error is ProtocolError {
    return error instanceof ProtocolError && (code === undefined || error.code === code);
}
