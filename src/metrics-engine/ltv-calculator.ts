/**
 * LTV（顧客生涯価値）計算ロジック
 *
 * - 購入単価 × 年間購入回数 × 顧客寿命（年）
 * - 顧客寿命は直接入力するか、月次解約率から算出する
 * - ARPU（月次）× 平均継続月数 × 粗利率
 */

import { INFINITY_SENTINEL, PERIOD } from "../constants";
import { assertNonNegative, finiteOr, isInfinite } from "./guards";
import { ArpuLtvInputs, ArpuLtvResult, LifespanSource, LtvInputs, LtvResult, MaybeInfinite } from "./types";
import { buildRatioGauge } from "./gauge";
import { getScaleRecommendations } from "./recommendations";

// =============================================================================
// 基本計算
// =============================================================================

/**
 * LTV = 平均購入単価 × 年間購入回数 × 顧客寿命（年）
 */
export function computeLtv(avgPurchase: number, frequency: number, lifespanYears: number): number {
  assertNonNegative("avgPurchase", avgPurchase);
  assertNonNegative("frequency", frequency);
  assertNonNegative("lifespanYears", lifespanYears);

  return avgPurchase * frequency * lifespanYears;
}

/**
 * 月次解約率から顧客寿命（年）を算出
 *
 * years = 1 / (monthlyChurnRate × 12)
 * 解約率0、または極小で寿命が表現できない場合は "∞"
 */
export function lifespanFromChurn(monthlyChurnRate: number): MaybeInfinite {
  assertNonNegative("monthlyChurnRate", monthlyChurnRate);

  if (monthlyChurnRate === 0) {
    return INFINITY_SENTINEL;
  }
  return finiteOr(1 / (monthlyChurnRate * PERIOD.MONTHS_PER_YEAR), INFINITY_SENTINEL);
}

/**
 * ARPUベースのLTV = ARPU × (1 / 月次解約率) × 粗利率
 *
 * 解約率0の場合は0を返す（Business Scale計算機の業務ルール）。
 * 解約率が極小で値があふれる場合も同様に0
 */
export function computeLtvFromArpu(arpu: number, monthlyChurn: number, grossMargin: number): number {
  assertNonNegative("arpu", arpu);
  assertNonNegative("monthlyChurn", monthlyChurn);
  assertNonNegative("grossMargin", grossMargin);

  if (monthlyChurn === 0) {
    return 0;
  }
  return finiteOr(arpu * (1 / monthlyChurn) * grossMargin, 0);
}

// =============================================================================
// ディスパッチャー
// =============================================================================

/**
 * 顧客寿命の入力方法に応じて寿命（年）を解決
 */
export function resolveLifespan(lifespan: LifespanSource): MaybeInfinite {
  switch (lifespan.source) {
    case "DIRECT":
      assertNonNegative("lifespanYears", lifespan.lifespanYears);
      return lifespan.lifespanYears;
    case "CHURN":
      return lifespanFromChurn(lifespan.monthlyChurnRate);
  }
}

/**
 * LTV計算タブの結果をまとめて算出
 *
 * 寿命が "∞" の場合、年間売上が正ならLTVも "∞"、0なら0。
 * 積があふれた場合も "∞"
 */
export function calculateLtv(inputs: LtvInputs): LtvResult {
  assertNonNegative("avgPurchaseValue", inputs.avgPurchaseValue);
  assertNonNegative("purchaseFrequency", inputs.purchaseFrequency);

  const annualRevenuePerCustomer = inputs.avgPurchaseValue * inputs.purchaseFrequency;
  const lifespanYears = resolveLifespan(inputs.lifespan);

  if (isInfinite(lifespanYears)) {
    return {
      ltv: annualRevenuePerCustomer > 0 ? INFINITY_SENTINEL : 0,
      annualRevenuePerCustomer,
      lifespanYears,
    };
  }

  const ltv = computeLtv(inputs.avgPurchaseValue, inputs.purchaseFrequency, lifespanYears);
  return {
    ltv: finiteOr(ltv, INFINITY_SENTINEL),
    annualRevenuePerCustomer,
    lifespanYears,
  };
}

/**
 * Business Scale計算機（ARPU / 解約率 / 粗利率 / CAC）
 *
 * - 比率はCACが0なら0（"∞" にはしない）。CACが極小であふれた場合は "∞"
 * - 回収期間 = CAC / (ARPU × 粗利率)、分母0（またはあふれ）なら0
 */
export function calculateArpuLtv(inputs: ArpuLtvInputs): ArpuLtvResult {
  assertNonNegative("cac", inputs.cac);

  const ltv = computeLtvFromArpu(inputs.arpu, inputs.monthlyChurnRate, inputs.grossMargin);
  const ratio: MaybeInfinite = inputs.cac > 0 ? finiteOr(ltv / inputs.cac, INFINITY_SENTINEL) : 0;
  const monthlyGrossProfit = inputs.arpu * inputs.grossMargin;
  const paybackMonths = monthlyGrossProfit > 0 ? finiteOr(inputs.cac / monthlyGrossProfit, 0) : 0;
  const { status, recommendations } = getScaleRecommendations(ratio);

  return {
    ltv,
    ratio,
    paybackMonths,
    status,
    recommendations,
    gauge: buildRatioGauge(ratio),
  };
}
