/**
 * LTV/CAC比率と区分判定のテスト
 */

import { computeRatio, classifyRatio } from "../../src/metrics-engine/ratio";
import { InvalidInputError } from "../../src/errors";

describe("computeRatio", () => {
  it("LTV / CAC", () => {
    expect(computeRatio(300, 20)).toBe(15);
  });

  it("CAC0・LTV正なら∞", () => {
    expect(computeRatio(300, 0)).toBe("∞");
  });

  it("CAC0・LTV0なら0", () => {
    expect(computeRatio(0, 0)).toBe(0);
  });

  it("CACが極小で商があふれる場合は∞", () => {
    expect(computeRatio(1e12, 1e-300)).toBe("∞");
  });

  it("負の入力は拒否する", () => {
    expect(() => computeRatio(-1, 10)).toThrow(InvalidInputError);
    expect(() => computeRatio(10, -1)).toThrow(InvalidInputError);
  });
});

describe("classifyRatio", () => {
  it.each([
    [0, "CRITICAL"],
    [0.99, "CRITICAL"],
    [1, "NEEDS_WORK"],
    [2.99, "NEEDS_WORK"],
    [3, "HEALTHY"],
    [4.99, "HEALTHY"],
    [5, "EXCELLENT"],
    [15, "EXCELLENT"],
  ] as const)("%s は %s", (ratio, expected) => {
    expect(classifyRatio(ratio)).toBe(expected);
  });

  it("∞はEXCELLENT", () => {
    expect(classifyRatio("∞")).toBe("EXCELLENT");
  });

  it("比率が大きいほど区分は下がらない", () => {
    const order = ["CRITICAL", "NEEDS_WORK", "HEALTHY", "EXCELLENT"];
    let previous = 0;
    for (let ratio = 0; ratio <= 8; ratio += 0.25) {
      const rank = order.indexOf(classifyRatio(ratio));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});
