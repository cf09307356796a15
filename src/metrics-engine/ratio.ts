/**
 * LTV/CAC比率の計算と区分判定
 */

import { INFINITY_SENTINEL, RATIO_THRESHOLDS } from "../constants";
import { assertNonNegative, finiteOr, isInfinite } from "./guards";
import { MaybeInfinite, RatioTier } from "./types";

/**
 * LTV/CAC比率
 *
 * CACが0の場合、LTVが正なら "∞"、それ以外は0。
 * CACが極小で商があふれる場合も "∞"
 */
export function computeRatio(ltv: number, cac: number): MaybeInfinite {
  assertNonNegative("ltv", ltv);
  assertNonNegative("cac", cac);

  if (cac === 0) {
    return ltv > 0 ? INFINITY_SENTINEL : 0;
  }
  return finiteOr(ltv / cac, INFINITY_SENTINEL);
}

/**
 * 比率を4段階に区分
 *
 * - CRITICAL:   < 1
 * - NEEDS_WORK: 1 以上 3 未満
 * - HEALTHY:    3 以上 5 未満
 * - EXCELLENT:  5 以上（"∞" を含む）
 */
export function classifyRatio(ratio: MaybeInfinite): RatioTier {
  if (isInfinite(ratio)) {
    return "EXCELLENT";
  }
  if (ratio < RATIO_THRESHOLDS.CRITICAL_BELOW) {
    return "CRITICAL";
  }
  if (ratio < RATIO_THRESHOLDS.NEEDS_WORK_BELOW) {
    return "NEEDS_WORK";
  }
  if (ratio < RATIO_THRESHOLDS.HEALTHY_BELOW) {
    return "HEALTHY";
  }
  return "EXCELLENT";
}
