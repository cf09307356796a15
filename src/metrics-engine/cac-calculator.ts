/**
 * CAC（顧客獲得コスト）分析
 *
 * CAC本体に加え、回収期間・月次ROI・マーケティング費用内訳を算出する
 */

import { CAC_HEALTH_MULTIPLIERS, NOT_AVAILABLE, PAYBACK_THRESHOLDS, PERIOD } from "../constants";
import { assertNonNegative, finiteOr, isNotAvailable } from "./guards";
import {
  CacHealth,
  CacInputs,
  CacResult,
  MarketingSpendBreakdown,
  MaybeAvailable,
  PaybackLevel,
  SpendBreakdownAnalysis,
} from "./types";

// =============================================================================
// 基本計算
// =============================================================================

/**
 * CAC = マーケティング費用 / 新規顧客数
 *
 * 新規顧客数0の場合は0
 */
export function computeCac(spend: number, newCustomers: number): number {
  assertNonNegative("spend", spend);
  assertNonNegative("newCustomers", newCustomers);

  if (newCustomers === 0) {
    return 0;
  }
  return spend / newCustomers;
}

/**
 * CAC回収期間（月）= CAC / 顧客あたり月次売上
 *
 * 月次売上0、または極小で商があふれる場合は "N/A"
 */
export function computePaybackMonths(cac: number, monthlyRevenuePerCustomer: number): MaybeAvailable {
  assertNonNegative("cac", cac);
  assertNonNegative("monthlyRevenuePerCustomer", monthlyRevenuePerCustomer);

  if (monthlyRevenuePerCustomer === 0) {
    return NOT_AVAILABLE;
  }
  return finiteOr(cac / monthlyRevenuePerCustomer, NOT_AVAILABLE);
}

/**
 * 月次ROI（%）= (月次売上 - CAC/12) / (CAC/12) × 100
 *
 * CAC0、または極小で値があふれる場合は "N/A"
 */
export function computeMonthlyRoi(monthlyRevenuePerCustomer: number, cac: number): MaybeAvailable {
  assertNonNegative("monthlyRevenuePerCustomer", monthlyRevenuePerCustomer);
  assertNonNegative("cac", cac);

  if (cac === 0) {
    return NOT_AVAILABLE;
  }
  const monthlyCac = cac / PERIOD.MONTHS_PER_YEAR;
  return finiteOr(((monthlyRevenuePerCustomer - monthlyCac) / monthlyCac) * 100, NOT_AVAILABLE);
}

// =============================================================================
// 区分判定
// =============================================================================

/**
 * 回収期間の区分
 *
 * "N/A" や0（CAC未計上）は判定対象外としてnull
 */
export function classifyPayback(months: MaybeAvailable): PaybackLevel | null {
  if (isNotAvailable(months) || months <= 0) {
    return null;
  }
  if (months < PAYBACK_THRESHOLDS.FAST_BELOW) {
    return "FAST";
  }
  if (months < PAYBACK_THRESHOLDS.GOOD_BELOW) {
    return "GOOD";
  }
  if (months < PAYBACK_THRESHOLDS.SLOW_BELOW) {
    return "SLOW";
  }
  return "CRITICAL";
}

/**
 * 月次売上に対するCACの健全性
 */
export function classifyCacHealth(cac: number, monthlyRevenuePerCustomer: number): CacHealth {
  if (cac > monthlyRevenuePerCustomer * CAC_HEALTH_MULTIPLIERS.HIGH) {
    return "HIGH";
  }
  if (cac > monthlyRevenuePerCustomer * CAC_HEALTH_MULTIPLIERS.WARNING) {
    return "WARNING";
  }
  return "HEALTHY";
}

// =============================================================================
// 費用内訳
// =============================================================================

/**
 * マーケティング費用の内訳を分析
 *
 * その他 = 総額 - (広告費 + 人件費 + ツール費)。負になる場合はoverBudget
 */
export function analyzeSpendBreakdown(
  marketingSpend: number,
  breakdown: MarketingSpendBreakdown
): SpendBreakdownAnalysis {
  assertNonNegative("marketingSpend", marketingSpend);
  assertNonNegative("adSpend", breakdown.adSpend);
  assertNonNegative("teamCost", breakdown.teamCost);
  assertNonNegative("toolCost", breakdown.toolCost);

  const otherCost = marketingSpend - (breakdown.adSpend + breakdown.teamCost + breakdown.toolCost);
  const shareOf = (amount: number): number => (marketingSpend > 0 ? amount / marketingSpend : 0);

  return {
    categories: [
      { category: "AD_SPEND", amount: breakdown.adSpend, share: shareOf(breakdown.adSpend) },
      { category: "TEAM_COST", amount: breakdown.teamCost, share: shareOf(breakdown.teamCost) },
      { category: "TOOLS", amount: breakdown.toolCost, share: shareOf(breakdown.toolCost) },
      { category: "OTHER", amount: otherCost, share: shareOf(otherCost) },
    ],
    otherCost,
    overBudget: otherCost < 0,
  };
}

// =============================================================================
// ディスパッチャー
// =============================================================================

/**
 * CAC分析タブの結果をまとめて算出
 *
 * @param inputs - マーケティング費用・新規顧客数・期間
 * @param annualRevenuePerCustomer - LTVタブで算出した顧客あたり年間売上
 */
export function calculateCac(inputs: CacInputs, annualRevenuePerCustomer: number): CacResult {
  assertNonNegative("annualRevenuePerCustomer", annualRevenuePerCustomer);

  const cac = computeCac(inputs.marketingSpend, inputs.newCustomers);
  const monthlyRevenuePerCustomer = annualRevenuePerCustomer / PERIOD.MONTHS_PER_YEAR;
  const paybackMonths = computePaybackMonths(cac, monthlyRevenuePerCustomer);

  return {
    cac,
    period: inputs.period,
    monthlyRevenuePerCustomer,
    paybackMonths,
    paybackLevel: classifyPayback(paybackMonths),
    monthlyRoiPct: computeMonthlyRoi(monthlyRevenuePerCustomer, cac),
    cacHealth: classifyCacHealth(cac, monthlyRevenuePerCustomer),
    // 売上1ドルあたりの獲得コストは回収月数と同じ商
    costPerRevenueDollar: paybackMonths,
    breakdown: inputs.breakdown ? analyzeSpendBreakdown(inputs.marketingSpend, inputs.breakdown) : null,
  };
}
