/**
 * シナリオプランニング
 *
 * セッションのベースライン（直近に計算したLTV/CAC）に変化率を適用する
 */

import { INFINITY_SENTINEL, NOT_AVAILABLE } from "../constants";
import { assertFinite, assertNonNegative, finiteOr, isInfinite } from "./guards";
import { MaybeAvailable, MaybeInfinite, ScenarioAdjustment, ScenarioResult, SessionBaseline } from "./types";

export interface ScenarioBaseline {
  ltv: number;
  cac: number;
}

export interface ScenarioDeltas {
  ltvPct: number;
  cacPct: number;
}

/**
 * 変化率（%）を倍率に変換
 *
 * -100%を下回る値は0倍として扱う
 */
function toMultiplier(field: string, pct: number): number {
  assertFinite(field, pct);
  return Math.max(0, 1 + pct / 100);
}

/** 表現可能な最大値で頭打ちにする */
function saturate(value: number): number {
  return Math.min(value, Number.MAX_VALUE);
}

/**
 * newLtv = ltv × (1 + ltvPct/100), newCac = cac × (1 + cacPct/100)
 */
export function applyScenario(baseline: ScenarioBaseline, deltas: ScenarioDeltas): ScenarioBaseline {
  assertNonNegative("baseline.ltv", baseline.ltv);
  assertNonNegative("baseline.cac", baseline.cac);

  return {
    ltv: saturate(baseline.ltv * toMultiplier("ltvPct", deltas.ltvPct)),
    cac: saturate(baseline.cac * toMultiplier("cacPct", deltas.cacPct)),
  };
}

function ratioOrZero(ltv: number, cac: number): MaybeInfinite {
  return cac > 0 ? finiteOr(ltv / cac, INFINITY_SENTINEL) : 0;
}

/**
 * シナリオタブの影響分析
 *
 * - 比率はCAC0なら0
 * - 比率はCACが極小であふれる場合 "∞"
 * - 比率の変化率は現在の比率が0、またはどちらかが "∞" なら "N/A"
 * - retentionChangePct は結果に含めるがLTVには反映しない
 */
export function calculateScenario(baseline: SessionBaseline, adjustment: ScenarioAdjustment): ScenarioResult {
  assertFinite("retentionChangePct", adjustment.retentionChangePct);

  const { ltv: newLtv, cac: newCac } = applyScenario(
    { ltv: baseline.baseLtv, cac: baseline.baseCac },
    { ltvPct: adjustment.purchaseValueChangePct, cacPct: adjustment.cacChangePct }
  );

  const currentRatio = ratioOrZero(baseline.baseLtv, baseline.baseCac);
  const newRatio = ratioOrZero(newLtv, newCac);
  const ratioChangePct: MaybeAvailable =
    isInfinite(currentRatio) || isInfinite(newRatio) || currentRatio === 0
      ? NOT_AVAILABLE
      : (newRatio / currentRatio - 1) * 100;

  return {
    baseline: { ...baseline },
    adjustment: { ...adjustment },
    newLtv,
    newCac,
    currentRatio,
    newRatio,
    ratioChangePct,
  };
}
