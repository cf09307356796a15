/**
 * 比率・インサイト区分に応じた推奨アクション文言
 *
 * 文言は recommendations.json に置き、ここでは区分の選択のみ行う
 */

import recommendationCopy from "./recommendations.json";
import { RATIO_THRESHOLDS } from "../constants";
import { classifyRatio } from "./ratio";
import { isInfinite } from "./guards";
import {
  AdvancedRecommendation,
  CacHealth,
  MaybeInfinite,
  RateLevel,
  RatioTier,
  ScaleRecommendation,
  StrategicStep,
} from "./types";

/**
 * Business Scale計算機の3段階区分
 *
 * - CRITICAL:        < 1
 * - ROOM_TO_IMPROVE: 1 以上 3 以下
 * - GROWTH:          3 超（"∞" を含む）
 */
export type ScaleTier = "CRITICAL" | "ROOM_TO_IMPROVE" | "GROWTH";

export type InsightKind = "retention" | "upsell" | "referral";

interface AdvancedCopy {
  headline: string;
  quickWinsTitle: string;
  quickWins: string[];
  strategyTitle: string;
  strategy: StrategicStep[];
}

interface RecommendationCopy {
  scale: Record<ScaleTier, ScaleRecommendation>;
  advanced: Record<RatioTier, AdvancedCopy>;
  insights: Record<InsightKind, Record<RateLevel, string>>;
  cacHealth: Record<CacHealth, string>;
}

const COPY: RecommendationCopy = recommendationCopy;

export function classifyScaleRatio(ratio: MaybeInfinite): ScaleTier {
  if (isInfinite(ratio)) {
    return "GROWTH";
  }
  if (ratio < RATIO_THRESHOLDS.CRITICAL_BELOW) {
    return "CRITICAL";
  }
  if (ratio <= RATIO_THRESHOLDS.NEEDS_WORK_BELOW) {
    return "ROOM_TO_IMPROVE";
  }
  return "GROWTH";
}

/**
 * Business Scale計算機のステータスと推奨アクション
 */
export function getScaleRecommendations(ratio: MaybeInfinite): ScaleRecommendation {
  const copy = COPY.scale[classifyScaleRatio(ratio)];
  return {
    status: copy.status,
    recommendations: [...copy.recommendations],
  };
}

/**
 * 詳細計算機の推奨アクション（クイックウィン + 戦略）
 */
export function getAdvancedRecommendations(ratio: MaybeInfinite): AdvancedRecommendation {
  const tier = classifyRatio(ratio);
  const copy = COPY.advanced[tier];
  return {
    tier,
    headline: copy.headline,
    quickWinsTitle: copy.quickWinsTitle,
    quickWins: [...copy.quickWins],
    strategyTitle: copy.strategyTitle,
    strategy: copy.strategy.map((step) => ({ title: step.title, items: [...step.items] })),
  };
}

export function getInsightMessage(kind: InsightKind, level: RateLevel): string {
  return COPY.insights[kind][level];
}

export function getCacHealthMessage(health: CacHealth): string {
  return COPY.cacHealth[health];
}
