/**
 * ビジネス指標計算エンジン
 *
 * LTV・CAC・解約率・回収期間・シナリオ・区分判定の純粋関数を提供
 */

// 型定義
export {
  INFINITY_SENTINEL,
  NOT_AVAILABLE,
  InfinitySentinel,
  NotAvailable,
  MaybeInfinite,
  MaybeAvailable,
  LifespanSource,
  LtvInputs,
  LtvResult,
  ArpuLtvInputs,
  ArpuLtvResult,
  AnalysisPeriod,
  MarketingSpendBreakdown,
  CacInputs,
  CacResult,
  CacHealth,
  PaybackLevel,
  SpendCategoryShare,
  SpendBreakdownAnalysis,
  ChurnInputs,
  ChurnMethod,
  ChurnResult,
  RatioTier,
  RateLevel,
  RateThresholds,
  CustomerSegment,
  InsightInputs,
  InsightResult,
  RateInsight,
  SegmentSummary,
  ScenarioAdjustment,
  ScenarioResult,
  SessionBaseline,
  ScaleRecommendation,
  AdvancedRecommendation,
  StrategicStep,
  GaugeBand,
  RatioGauge,
} from "./types";

export { assertNonNegative, isInfinite, isNotAvailable } from "./guards";

// LTV
export {
  computeLtv,
  lifespanFromChurn,
  computeLtvFromArpu,
  resolveLifespan,
  calculateLtv,
  calculateArpuLtv,
} from "./ltv-calculator";

// CAC
export {
  computeCac,
  computePaybackMonths,
  computeMonthlyRoi,
  classifyPayback,
  classifyCacHealth,
  analyzeSpendBreakdown,
  calculateCac,
} from "./cac-calculator";

// 解約率
export { computeChurnRate, annualizeChurn, calculateChurn } from "./churn-calculator";

// 比率・区分
export { computeRatio, classifyRatio } from "./ratio";
export { classifyRate, summarizeSegments, analyzeInsights } from "./classifiers";

// シナリオ
export { applyScenario, calculateScenario, ScenarioBaseline, ScenarioDeltas } from "./scenario";

// 推奨アクション・ゲージ
export {
  ScaleTier,
  InsightKind,
  classifyScaleRatio,
  getScaleRecommendations,
  getAdvancedRecommendations,
  getInsightMessage,
  getCacHealthMessage,
} from "./recommendations";
export { buildRatioGauge, GAUGE_COLORS } from "./gauge";
