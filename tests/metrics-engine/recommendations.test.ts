/**
 * 推奨アクション文言とゲージ表示モデルのテスト
 */

import {
  classifyScaleRatio,
  getScaleRecommendations,
  getAdvancedRecommendations,
  getInsightMessage,
  getCacHealthMessage,
} from "../../src/metrics-engine/recommendations";
import { buildRatioGauge, GAUGE_COLORS } from "../../src/metrics-engine/gauge";

describe("classifyScaleRatio", () => {
  it("1未満・1〜3・3超の3段階", () => {
    expect(classifyScaleRatio(0.99)).toBe("CRITICAL");
    expect(classifyScaleRatio(1)).toBe("ROOM_TO_IMPROVE");
    expect(classifyScaleRatio(3)).toBe("ROOM_TO_IMPROVE");
    expect(classifyScaleRatio(3.01)).toBe("GROWTH");
  });

  it("∞はGROWTH", () => {
    expect(classifyScaleRatio("∞")).toBe("GROWTH");
  });
});

describe("getScaleRecommendations", () => {
  it("区分ごとのステータスと5つの推奨アクション", () => {
    const result = getScaleRecommendations(0.5);
    expect(result.status).toBe("危険 - 早急な対応が必要");
    expect(result.recommendations).toHaveLength(5);
    expect(result.recommendations[0]).toBe("広告費とマーケティングチャネルを最適化する");
  });

  it("返した配列を変更しても文言は変わらない", () => {
    getScaleRecommendations(5).recommendations.push("追加");
    expect(getScaleRecommendations(5).recommendations).toHaveLength(5);
  });
});

describe("getAdvancedRecommendations", () => {
  it("CRITICALは緊急対応5項目", () => {
    const result = getAdvancedRecommendations(0.5);
    expect(result.tier).toBe("CRITICAL");
    expect(result.headline).toBe("危険なLTV/CAC比率");
    expect(result.strategyTitle).toBe("緊急対応");
    expect(result.strategy).toHaveLength(5);
    expect(result.quickWins).toHaveLength(3);
  });

  it("NEEDS_WORKは3つの戦略とその施策", () => {
    const result = getAdvancedRecommendations(2);
    expect(result.tier).toBe("NEEDS_WORK");
    expect(result.strategy[0]).toEqual({
      title: "平均注文額を上げる",
      items: ["アップセルを追加", "商品バンドルを作成", "段階的な価格設定を導入"],
    });
  });

  it("∞はEXCELLENT", () => {
    expect(getAdvancedRecommendations("∞").tier).toBe("EXCELLENT");
  });

  it("同じ比率には同じ推奨アクション", () => {
    expect(getAdvancedRecommendations(2)).toEqual(getAdvancedRecommendations(2));
    expect(getAdvancedRecommendations("∞")).toEqual(getAdvancedRecommendations("∞"));
  });

  it("返した戦略を変更しても文言は変わらない", () => {
    getAdvancedRecommendations(4).strategy[0].items.length = 0;
    expect(getAdvancedRecommendations(4).strategy[0].items).toHaveLength(2);
  });
});

describe("getInsightMessage / getCacHealthMessage", () => {
  it("区分に応じた文言", () => {
    expect(getInsightMessage("referral", "STRONG")).toBe("紹介プログラムは好調 - 維持・拡大してください");
    expect(getCacHealthMessage("HEALTHY")).toBe("CACは健全 - 獲得コストと売上のバランスが良好です");
  });
});

describe("buildRatioGauge", () => {
  it("軸0〜5と3つの帯域", () => {
    const gauge = buildRatioGauge(2);
    expect(gauge.min).toBe(0);
    expect(gauge.max).toBe(5);
    expect(gauge.needle).toBe(2);
    expect(gauge.bands).toEqual([
      { from: 0, to: 1, color: GAUGE_COLORS.CRITICAL },
      { from: 1, to: 3, color: GAUGE_COLORS.NEEDS_WORK },
      { from: 3, to: 5, color: GAUGE_COLORS.HEALTHY },
    ]);
  });

  it("軸を超える値は針だけ上限に収める", () => {
    const gauge = buildRatioGauge(15);
    expect(gauge.value).toBe(15);
    expect(gauge.needle).toBe(5);
  });

  it("∞は針を上限に置く", () => {
    const gauge = buildRatioGauge("∞");
    expect(gauge.value).toBe("∞");
    expect(gauge.needle).toBe(5);
  });
});
