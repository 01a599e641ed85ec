/**
 * Risk Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RiskEngine: per-(market, asset) LTVs and oracles behind timelocks
 * RiskModule: account valuation, health and liquidation validity
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export { RiskEngine, RISK_ENGINE_CONFIG } from './riskEngine';
export type { RiskEngineOptions } from './riskEngine';
export { RiskModule, RISK_MODULE_CONFIG } from './riskModule';
export type {
    AssetSeizure,
    DebtRepayment,
    LiquidationAssessment,
    LtvBounds,
    PositionAssessment,
    PositionView,
    RiskData,
} from './types';
