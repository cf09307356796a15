/**
 * ビジネス指標計算エンジン - 型定義
 *
 * 入力・計算結果はすべて値として受け渡し、エンジン側では状態を持たない
 */

import { INFINITY_SENTINEL, NOT_AVAILABLE } from "../constants";

// =============================================================================
// センチネル
// =============================================================================

export type InfinitySentinel = typeof INFINITY_SENTINEL;
export type NotAvailable = typeof NOT_AVAILABLE;

/** 分母0のとき "∞" になり得る値 */
export type MaybeInfinite = number | InfinitySentinel;

/** 分母0のとき "N/A" になり得る値 */
export type MaybeAvailable = number | NotAvailable;

export { INFINITY_SENTINEL, NOT_AVAILABLE };

// =============================================================================
// LTV
// =============================================================================

/**
 * 顧客寿命の入力方法
 *
 * - DIRECT: 年数を直接入力
 * - CHURN: 月次解約率から算出
 */
export type LifespanSource =
  | { source: "DIRECT"; lifespanYears: number }
  | { source: "CHURN"; monthlyChurnRate: number };

export interface LtvInputs {
  /** 平均購入単価 */
  avgPurchaseValue: number;
  /** 年間購入回数 */
  purchaseFrequency: number;
  lifespan: LifespanSource;
}

export interface LtvResult {
  ltv: MaybeInfinite;
  annualRevenuePerCustomer: number;
  lifespanYears: MaybeInfinite;
}

/**
 * ARPU（月次）ベースのLTV入力（Business Scale計算機）
 */
export interface ArpuLtvInputs {
  /** 顧客あたり月次売上 */
  arpu: number;
  /** 月次解約率（0〜1） */
  monthlyChurnRate: number;
  /** 粗利率（0〜1） */
  grossMargin: number;
  cac: number;
}

export interface ArpuLtvResult {
  ltv: number;
  ratio: MaybeInfinite;
  paybackMonths: number;
  status: string;
  recommendations: string[];
  gauge: RatioGauge;
}

// =============================================================================
// CAC
// =============================================================================

export type AnalysisPeriod = "MONTHLY" | "ANNUAL";

export interface MarketingSpendBreakdown {
  adSpend: number;
  teamCost: number;
  toolCost: number;
}

export interface CacInputs {
  marketingSpend: number;
  newCustomers: number;
  period: AnalysisPeriod;
  breakdown?: MarketingSpendBreakdown;
}

export interface SpendCategoryShare {
  category: "AD_SPEND" | "TEAM_COST" | "TOOLS" | "OTHER";
  amount: number;
  /** 総額に対する比率（0〜1） */
  share: number;
}

export interface SpendBreakdownAnalysis {
  categories: SpendCategoryShare[];
  otherCost: number;
  /** 内訳の合計が総額を超えている */
  overBudget: boolean;
}

/** 回収期間の区分 */
export type PaybackLevel = "FAST" | "GOOD" | "SLOW" | "CRITICAL";

/** 月次売上に対するCACの健全性 */
export type CacHealth = "HIGH" | "WARNING" | "HEALTHY";

export interface CacResult {
  cac: number;
  period: AnalysisPeriod;
  monthlyRevenuePerCustomer: number;
  paybackMonths: MaybeAvailable;
  paybackLevel: PaybackLevel | null;
  monthlyRoiPct: MaybeAvailable;
  cacHealth: CacHealth;
  costPerRevenueDollar: MaybeAvailable;
  breakdown: SpendBreakdownAnalysis | null;
}

// =============================================================================
// 解約率
// =============================================================================

/**
 * 解約率の算出方法
 *
 * - LOST_CUSTOMERS: 失った顧客数 / 期首顧客数
 * - START_END: (期首 - 期末) / 期首
 */
export type ChurnInputs =
  | { method: "LOST_CUSTOMERS"; startCustomers: number; lostCustomers: number }
  | { method: "START_END"; startCustomers: number; endCustomers: number };

export type ChurnMethod = ChurnInputs["method"];

export interface ChurnResult {
  method: ChurnMethod;
  monthlyChurnRate: number;
  annualChurnRate: number;
  lifespanYears: MaybeInfinite;
}

// =============================================================================
// 比率・区分
// =============================================================================

export type RatioTier = "CRITICAL" | "NEEDS_WORK" | "HEALTHY" | "EXCELLENT";

export type RateLevel = "LOW" | "AVERAGE" | "STRONG";

export interface RateThresholds {
  low: number;
  mid: number;
}

// =============================================================================
// インサイト
// =============================================================================

export interface CustomerSegment {
  name: string;
  averageValue: number;
  /** 顧客全体に占める割合（%） */
  percentage: number;
}

export interface InsightInputs {
  /** リピート購入率（%） */
  retentionRate: number;
  /** アップセル・クロスセル率（%） */
  upsellRate: number;
  /** 紹介率（%） */
  referralRate: number;
  segments?: CustomerSegment[];
}

export interface RateInsight {
  rate: number;
  level: RateLevel;
  message: string;
}

export interface SegmentSummary {
  segments: CustomerSegment[];
  /** 割合で重み付けした平均単価 */
  weightedAverageValue: number;
  totalPercentage: number;
}

export interface InsightResult {
  retention: RateInsight;
  upsell: RateInsight;
  referral: RateInsight;
  segments: SegmentSummary | null;
}

// =============================================================================
// シナリオ
// =============================================================================

/**
 * ベースラインに対する変化率（%）
 */
export interface ScenarioAdjustment {
  purchaseValueChangePct: number;
  cacChangePct: number;
  retentionChangePct: number;
}

/**
 * セッションごとのベースライン
 *
 * LTV/CACを計算するたびに上書きされ、シナリオ計算で参照される
 */
export interface SessionBaseline {
  baseLtv: number;
  baseCac: number;
}

export interface ScenarioResult {
  baseline: SessionBaseline;
  adjustment: ScenarioAdjustment;
  newLtv: number;
  newCac: number;
  currentRatio: MaybeInfinite;
  newRatio: MaybeInfinite;
  ratioChangePct: MaybeAvailable;
}

// =============================================================================
// 推奨アクション
// =============================================================================

export interface ScaleRecommendation {
  status: string;
  recommendations: string[];
}

export interface StrategicStep {
  title: string;
  items: string[];
}

export interface AdvancedRecommendation {
  tier: RatioTier;
  headline: string;
  quickWinsTitle: string;
  quickWins: string[];
  strategyTitle: string;
  strategy: StrategicStep[];
}

// =============================================================================
// ゲージ
// =============================================================================

export interface GaugeBand {
  from: number;
  to: number;
  color: string;
}

export interface RatioGauge {
  title: string;
  min: number;
  max: number;
  /** 表示用の実数値（"∞" を含む） */
  value: MaybeInfinite;
  /** 針の位置（軸範囲にクリップ済み） */
  needle: number;
  bands: GaugeBand[];
}
