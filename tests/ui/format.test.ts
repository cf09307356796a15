/**
 * 表示用フォーマッタのテスト
 */

import {
  formatCurrency,
  formatDecimal,
  formatRate,
  formatPercent,
  formatSignedPercent,
  formatYears,
  formatMonths,
  formatRatioLabel,
} from "../../src/ui/format";

describe("formatCurrency", () => {
  it("通貨記号と桁区切り・小数2桁", () => {
    expect(formatCurrency(1234.5, "USD")).toBe("$1,234.50");
    expect(formatCurrency(300, "EUR")).toBe("€300.00");
  });

  it("センチネルはそのまま", () => {
    expect(formatCurrency("∞", "USD")).toBe("∞");
    expect(formatCurrency("N/A", "USD")).toBe("N/A");
  });
});

describe("数値フォーマット", () => {
  it("formatDecimal", () => {
    expect(formatDecimal(18.3333)).toBe("18.33");
    expect(formatDecimal("∞")).toBe("∞");
  });

  it("formatRate は比率を%に", () => {
    expect(formatRate(0.05)).toBe("5.0%");
    expect(formatRate(0.4596)).toBe("46.0%");
  });

  it("formatPercent は%値をそのまま", () => {
    expect(formatPercent(70)).toBe("70.0%");
  });

  it("formatSignedPercent は符号を付ける", () => {
    expect(formatSignedPercent(22.2222)).toBe("+22.2%");
    expect(formatSignedPercent(-10)).toBe("-10.0%");
    expect(formatSignedPercent(0)).toBe("+0.0%");
    expect(formatSignedPercent("N/A")).toBe("N/A");
  });

  it("年・月", () => {
    expect(formatYears(1.6667)).toBe("1.7 年");
    expect(formatYears("∞")).toBe("∞");
    expect(formatMonths(2.4)).toBe("2.4 ヶ月");
    expect(formatMonths("N/A")).toBe("N/A");
  });

  it("formatRatioLabel は整数部のみ", () => {
    expect(formatRatioLabel(15)).toBe("15:1");
    expect(formatRatioLabel(2.9)).toBe("2:1");
    expect(formatRatioLabel("∞")).toBe("∞:1");
  });
});
