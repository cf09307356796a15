/**
 * しきい値による汎用区分とインサイト判定
 *
 * リピート率・アップセル率・紹介率は同じ3段階の判定を使う
 */

import { INSIGHT_THRESHOLDS } from "../constants";
import { assertNonNegative } from "./guards";
import {
  CustomerSegment,
  InsightInputs,
  InsightResult,
  RateInsight,
  RateLevel,
  RateThresholds,
  SegmentSummary,
} from "./types";
import { getInsightMessage, InsightKind } from "./recommendations";

/**
 * 率を LOW / AVERAGE / STRONG に区分
 *
 * - LOW:     rate < lowThreshold
 * - AVERAGE: lowThreshold <= rate < midThreshold
 * - STRONG:  rate >= midThreshold
 */
export function classifyRate(rate: number, lowThreshold: number, midThreshold: number): RateLevel {
  if (rate < lowThreshold) {
    return "LOW";
  }
  if (rate < midThreshold) {
    return "AVERAGE";
  }
  return "STRONG";
}

function buildRateInsight(kind: InsightKind, rate: number, thresholds: RateThresholds): RateInsight {
  assertNonNegative(kind, rate);
  const level = classifyRate(rate, thresholds.low, thresholds.mid);
  return {
    rate,
    level,
    message: getInsightMessage(kind, level),
  };
}

/**
 * 顧客セグメントの集計
 *
 * 平均単価は割合で重み付けする。割合の合計が0なら0
 */
export function summarizeSegments(segments: CustomerSegment[]): SegmentSummary {
  let totalPercentage = 0;
  let weightedSum = 0;

  for (const segment of segments) {
    assertNonNegative(`${segment.name}.averageValue`, segment.averageValue);
    assertNonNegative(`${segment.name}.percentage`, segment.percentage);
    totalPercentage += segment.percentage;
    weightedSum += segment.averageValue * segment.percentage;
  }

  return {
    segments: segments.map((s) => ({ ...s })),
    weightedAverageValue: totalPercentage > 0 ? weightedSum / totalPercentage : 0,
    totalPercentage,
  };
}

/**
 * 詳細インサイトタブの判定
 */
export function analyzeInsights(inputs: InsightInputs): InsightResult {
  return {
    retention: buildRateInsight("retention", inputs.retentionRate, INSIGHT_THRESHOLDS.RETENTION),
    upsell: buildRateInsight("upsell", inputs.upsellRate, INSIGHT_THRESHOLDS.UPSELL),
    referral: buildRateInsight("referral", inputs.referralRate, INSIGHT_THRESHOLDS.REFERRAL),
    segments: inputs.segments && inputs.segments.length > 0 ? summarizeSegments(inputs.segments) : null,
  };
}
