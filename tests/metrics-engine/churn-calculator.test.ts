/**
 * 解約率分析のテスト
 */

import { computeChurnRate, annualizeChurn, calculateChurn } from "../../src/metrics-engine/churn-calculator";
import { InvalidInputError } from "../../src/errors";

describe("computeChurnRate", () => {
  describe("LOST_CUSTOMERS", () => {
    it("失った顧客数 / 期首顧客数", () => {
      expect(computeChurnRate("LOST_CUSTOMERS", 1000, 50)).toBeCloseTo(0.05, 10);
    });

    it("期首を超える解約は1に収める", () => {
      expect(computeChurnRate("LOST_CUSTOMERS", 100, 150)).toBe(1);
    });
  });

  describe("START_END", () => {
    it("(期首 - 期末) / 期首", () => {
      expect(computeChurnRate("START_END", 1000, 950)).toBeCloseTo(0.05, 10);
    });

    it("期末が期首を上回る場合は0", () => {
      expect(computeChurnRate("START_END", 1000, 1200)).toBe(0);
    });
  });

  it("期首顧客数0なら0", () => {
    expect(computeChurnRate("LOST_CUSTOMERS", 0, 10)).toBe(0);
    expect(computeChurnRate("START_END", 0, 0)).toBe(0);
  });

  it("負の顧客数は拒否する", () => {
    expect(() => computeChurnRate("START_END", 100, -1)).toThrow("endCustomers must be a non-negative finite number");
  });
});

describe("annualizeChurn", () => {
  it("1 - (1 - 月次)^12", () => {
    expect(annualizeChurn(0.05)).toBeCloseTo(0.4596, 4);
  });

  it("0なら0、1なら1", () => {
    expect(annualizeChurn(0)).toBe(0);
    expect(annualizeChurn(1)).toBe(1);
  });

  it("月次解約率以上になる", () => {
    for (const rate of [0.01, 0.1, 0.3, 0.9]) {
      expect(annualizeChurn(rate)).toBeGreaterThanOrEqual(rate);
    }
  });

  it("負の値は拒否する", () => {
    expect(() => annualizeChurn(-0.1)).toThrow(InvalidInputError);
  });
});

describe("calculateChurn", () => {
  it("既定値（期首1000・解約50）", () => {
    const result = calculateChurn({ method: "LOST_CUSTOMERS", startCustomers: 1000, lostCustomers: 50 });
    expect(result.method).toBe("LOST_CUSTOMERS");
    expect(result.monthlyChurnRate).toBeCloseTo(0.05, 10);
    expect(result.annualChurnRate).toBeCloseTo(0.4596, 4);
    expect(result.lifespanYears).toBeCloseTo(1.6667, 4);
  });

  it("解約なしなら寿命は∞", () => {
    const result = calculateChurn({ method: "START_END", startCustomers: 1000, endCustomers: 1000 });
    expect(result.monthlyChurnRate).toBe(0);
    expect(result.annualChurnRate).toBe(0);
    expect(result.lifespanYears).toBe("∞");
  });
});
