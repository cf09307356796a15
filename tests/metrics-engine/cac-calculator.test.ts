/**
 * CAC分析ロジックのテスト
 */

import {
  computeCac,
  computePaybackMonths,
  computeMonthlyRoi,
  classifyPayback,
  classifyCacHealth,
  analyzeSpendBreakdown,
  calculateCac,
} from "../../src/metrics-engine/cac-calculator";
import { CacInputs } from "../../src/metrics-engine/types";
import { InvalidInputError } from "../../src/errors";

function createCacInputs(overrides: Partial<CacInputs> = {}): CacInputs {
  return {
    marketingSpend: 10000,
    newCustomers: 500,
    period: "MONTHLY",
    ...overrides,
  };
}

// =============================================================================
// 基本計算
// =============================================================================

describe("computeCac", () => {
  it("費用 / 新規顧客数", () => {
    expect(computeCac(10000, 500)).toBe(20);
  });

  it("新規顧客数0なら0", () => {
    expect(computeCac(10000, 0)).toBe(0);
  });

  it("負の費用は拒否する", () => {
    expect(() => computeCac(-1, 10)).toThrow(InvalidInputError);
  });

  it("費用に対して単調非減少", () => {
    let previous = computeCac(0, 50);
    for (let spend = 500; spend <= 20000; spend += 500) {
      const cac = computeCac(spend, 50);
      expect(cac).toBeGreaterThanOrEqual(previous);
      previous = cac;
    }
  });

  it("新規顧客数（1以上）に対して単調非増加", () => {
    let previous = computeCac(10000, 1);
    for (let customers = 2; customers <= 1000; customers += 7) {
      const cac = computeCac(10000, customers);
      expect(cac).toBeLessThanOrEqual(previous);
      previous = cac;
    }
  });

  it("同じ入力には同じ結果", () => {
    expect(computeCac(12345, 67)).toBe(computeCac(12345, 67));
  });
});

describe("computePaybackMonths", () => {
  it("CAC / 月次売上", () => {
    expect(computePaybackMonths(20, 100 / 12)).toBeCloseTo(2.4, 10);
  });

  it("月次売上0ならN/A", () => {
    expect(computePaybackMonths(20, 0)).toBe("N/A");
  });

  it("CAC0なら0ヶ月", () => {
    expect(computePaybackMonths(0, 10)).toBe(0);
  });

  it("月次売上が極小で商があふれる場合はN/A", () => {
    expect(computePaybackMonths(20, 1e-320)).toBe("N/A");
  });
});

describe("computeMonthlyRoi", () => {
  it("(月次売上 - CAC/12) / (CAC/12) × 100", () => {
    expect(computeMonthlyRoi(100 / 12, 20)).toBeCloseTo(400, 6);
  });

  it("月次売上がCAC/12と同じなら0%", () => {
    expect(computeMonthlyRoi(1, 12)).toBeCloseTo(0, 10);
  });

  it("CACが極小で値があふれる場合はN/A", () => {
    expect(computeMonthlyRoi(10, 1e-310)).toBe("N/A");
  });

  it("CAC0ならN/A", () => {
    expect(computeMonthlyRoi(10, 0)).toBe("N/A");
  });
});

// =============================================================================
// 区分判定
// =============================================================================

describe("classifyPayback", () => {
  it.each([
    [2.4, "FAST"],
    [3, "GOOD"],
    [5.9, "GOOD"],
    [6, "SLOW"],
    [11.9, "SLOW"],
    [12, "CRITICAL"],
    [30, "CRITICAL"],
  ] as const)("%s ヶ月は %s", (months, expected) => {
    expect(classifyPayback(months)).toBe(expected);
  });

  it("N/A・0はnull", () => {
    expect(classifyPayback("N/A")).toBeNull();
    expect(classifyPayback(0)).toBeNull();
  });
});

describe("classifyCacHealth", () => {
  it("月次売上の3倍超はHIGH", () => {
    expect(classifyCacHealth(31, 10)).toBe("HIGH");
  });

  it("3倍ちょうどはWARNING", () => {
    expect(classifyCacHealth(30, 10)).toBe("WARNING");
  });

  it("2倍以下はHEALTHY", () => {
    expect(classifyCacHealth(20, 10)).toBe("HEALTHY");
  });
});

// =============================================================================
// 費用内訳
// =============================================================================

describe("analyzeSpendBreakdown", () => {
  it("その他 = 総額 - 内訳合計", () => {
    const result = analyzeSpendBreakdown(10000, { adSpend: 3000, teamCost: 1500, toolCost: 500 });
    expect(result.otherCost).toBe(5000);
    expect(result.overBudget).toBe(false);
    expect(result.categories).toEqual([
      { category: "AD_SPEND", amount: 3000, share: 0.3 },
      { category: "TEAM_COST", amount: 1500, share: 0.15 },
      { category: "TOOLS", amount: 500, share: 0.05 },
      { category: "OTHER", amount: 5000, share: 0.5 },
    ]);
  });

  it("内訳合計が総額を超えるとoverBudget", () => {
    const result = analyzeSpendBreakdown(4000, { adSpend: 3000, teamCost: 1500, toolCost: 500 });
    expect(result.otherCost).toBe(-1000);
    expect(result.overBudget).toBe(true);
  });

  it("総額0なら構成比はすべて0", () => {
    const result = analyzeSpendBreakdown(0, { adSpend: 0, teamCost: 0, toolCost: 0 });
    expect(result.categories.map((c) => c.share)).toEqual([0, 0, 0, 0]);
  });
});

// =============================================================================
// calculateCac
// =============================================================================

describe("calculateCac", () => {
  it("既定値の入力をまとめて計算", () => {
    const result = calculateCac(createCacInputs(), 100);
    expect(result.cac).toBe(20);
    expect(result.period).toBe("MONTHLY");
    expect(result.monthlyRevenuePerCustomer).toBeCloseTo(8.3333, 4);
    expect(result.paybackMonths).toBeCloseTo(2.4, 10);
    expect(result.paybackLevel).toBe("FAST");
    expect(result.monthlyRoiPct).toBeCloseTo(400, 6);
    expect(result.cacHealth).toBe("WARNING");
    expect(result.costPerRevenueDollar).toBeCloseTo(2.4, 10);
    expect(result.breakdown).toBeNull();
  });

  it("年間売上0なら回収期間・効率はN/A", () => {
    const result = calculateCac(createCacInputs(), 0);
    expect(result.paybackMonths).toBe("N/A");
    expect(result.paybackLevel).toBeNull();
    expect(result.costPerRevenueDollar).toBe("N/A");
  });

  it("内訳があれば分析結果を含める", () => {
    const result = calculateCac(
      createCacInputs({ period: "ANNUAL", breakdown: { adSpend: 3000, teamCost: 1500, toolCost: 500 } }),
      100
    );
    expect(result.period).toBe("ANNUAL");
    expect(result.breakdown?.otherCost).toBe(5000);
  });

  it("新規顧客数0ならCAC0", () => {
    const result = calculateCac(createCacInputs({ newCustomers: 0 }), 100);
    expect(result.cac).toBe(0);
    expect(result.paybackLevel).toBeNull();
    expect(result.monthlyRoiPct).toBe("N/A");
    expect(result.cacHealth).toBe("HEALTHY");
  });
});

describe("calculateCac の冪等性", () => {
  it("同じ入力で2回呼んでも同じ結果で、入力を変更しない", () => {
    const inputs = createCacInputs({ breakdown: { adSpend: 3000, teamCost: 1500, toolCost: 500 } });
    const snapshot = structuredClone(inputs);

    const first = calculateCac(inputs, 100);
    const second = calculateCac(inputs, 100);

    expect(second).toEqual(first);
    expect(inputs).toEqual(snapshot);
  });
});
