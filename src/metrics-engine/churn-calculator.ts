/**
 * 解約率（チャーン）分析
 */

import { PERIOD } from "../constants";
import { assertNonNegative } from "./guards";
import { lifespanFromChurn } from "./ltv-calculator";
import { ChurnInputs, ChurnMethod, ChurnResult } from "./types";

function clampRate(rate: number): number {
  return Math.min(Math.max(rate, 0), 1);
}

/**
 * 月次解約率
 *
 * - LOST_CUSTOMERS: lost / start
 * - START_END:      (start - end) / start
 *
 * 期首顧客数0の場合は0。結果は [0, 1] に収める
 * （失った数が期首を超える・期末が期首を上回るケース）
 */
export function computeChurnRate(method: ChurnMethod, start: number, lostOrEnd: number): number {
  assertNonNegative("startCustomers", start);
  assertNonNegative(method === "LOST_CUSTOMERS" ? "lostCustomers" : "endCustomers", lostOrEnd);

  if (start === 0) {
    return 0;
  }

  const rate = method === "LOST_CUSTOMERS" ? lostOrEnd / start : (start - lostOrEnd) / start;
  return clampRate(rate);
}

/**
 * 月次解約率を年次に換算: 1 - (1 - monthly)^12
 */
export function annualizeChurn(monthlyRate: number): number {
  assertNonNegative("monthlyRate", monthlyRate);
  return 1 - Math.pow(1 - clampRate(monthlyRate), PERIOD.MONTHS_PER_YEAR);
}

/**
 * 解約率分析タブの結果をまとめて算出
 */
export function calculateChurn(inputs: ChurnInputs): ChurnResult {
  const monthlyChurnRate =
    inputs.method === "LOST_CUSTOMERS"
      ? computeChurnRate(inputs.method, inputs.startCustomers, inputs.lostCustomers)
      : computeChurnRate(inputs.method, inputs.startCustomers, inputs.endCustomers);

  return {
    method: inputs.method,
    monthlyChurnRate,
    annualChurnRate: annualizeChurn(monthlyChurnRate),
    lifespanYears: lifespanFromChurn(monthlyChurnRate),
  };
}
