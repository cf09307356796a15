/**
 * LTV/CAC比率ゲージの表示モデル
 *
 * 描画は ui/gauge.ts が担当し、ここでは帯域と針の位置だけを決める
 */

import { GAUGE, RATIO_THRESHOLDS } from "../constants";
import { isInfinite } from "./guards";
import { MaybeInfinite, RatioGauge } from "./types";

export const GAUGE_COLORS = {
  CRITICAL: "lightcoral",
  NEEDS_WORK: "khaki",
  HEALTHY: "lightgreen",
} as const;

export function buildRatioGauge(ratio: MaybeInfinite): RatioGauge {
  const needle = isInfinite(ratio) ? GAUGE.AXIS_MAX : Math.min(Math.max(ratio, 0), GAUGE.AXIS_MAX);

  return {
    title: "LTV/CAC比率",
    min: 0,
    max: GAUGE.AXIS_MAX,
    value: ratio,
    needle,
    bands: [
      { from: 0, to: RATIO_THRESHOLDS.CRITICAL_BELOW, color: GAUGE_COLORS.CRITICAL },
      { from: RATIO_THRESHOLDS.CRITICAL_BELOW, to: RATIO_THRESHOLDS.NEEDS_WORK_BELOW, color: GAUGE_COLORS.NEEDS_WORK },
      { from: RATIO_THRESHOLDS.NEEDS_WORK_BELOW, to: GAUGE.AXIS_MAX, color: GAUGE_COLORS.HEALTHY },
    ],
  };
}
