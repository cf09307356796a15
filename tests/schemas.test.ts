/**
 * バリデーションスキーマと入力変換のテスト
 */

import {
  validate,
  LtvRequestSchema,
  ChurnRequestSchema,
  InsightsRequestSchema,
  ScenarioRequestSchema,
  RatioRequestSchema,
  BusinessScaleRequestSchema,
  CalculatorFormSchema,
  toLtvInputs,
  toArpuLtvInputs,
  toChurnInputs,
  splitCalculatorForm,
} from "../src/schemas";

describe("LtvRequestSchema", () => {
  it("空の入力には既定値を使う", () => {
    const result = validate(LtvRequestSchema, {});
    expect(result).toEqual({
      success: true,
      data: {
        avgPurchaseValue: 50,
        purchaseFrequency: 2,
        lifespan: { source: "DIRECT", lifespanYears: 3 },
      },
    });
  });

  it("上限を超える金額は拒否する", () => {
    const result = validate(LtvRequestSchema, { avgPurchaseValue: 1e200, purchaseFrequency: 1e200 });
    expect(result).toEqual({
      success: false,
      errors: [
        { field: "avgPurchaseValue", message: "avgPurchaseValue must be at most 1000000000000" },
        { field: "purchaseFrequency", message: "purchaseFrequency must be at most 1000000000000" },
      ],
    });
  });

  it("上限ちょうどは受け付ける", () => {
    const result = validate(LtvRequestSchema, { avgPurchaseValue: 1e12 });
    expect(result.success).toBe(true);
  });

  it("文字列のInfinityは有限数エラー", () => {
    const result = validate(CalculatorFormSchema, { avgPurchaseValue: "Infinity" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toContainEqual({ field: "avgPurchaseValue", message: "avgPurchaseValue must be a finite number" });
  });

  it("負の単価はフィールド単位のエラー", () => {
    const result = validate(LtvRequestSchema, { avgPurchaseValue: -1 });
    expect(result).toEqual({
      success: false,
      errors: [{ field: "avgPurchaseValue", message: "avgPurchaseValue must be non-negative" }],
    });
  });

  it("解約率指定は%から比率に変換される", () => {
    const result = validate(LtvRequestSchema, { lifespan: { source: "CHURN", monthlyChurnPct: 5 } });
    if (!result.success) throw new Error("validation should succeed");
    expect(toLtvInputs(result.data).lifespan).toEqual({ source: "CHURN", monthlyChurnRate: 0.05 });
  });

  it("100%を超える解約率は拒否する", () => {
    const result = validate(LtvRequestSchema, { lifespan: { source: "CHURN", monthlyChurnPct: 120 } });
    expect(result.success).toBe(false);
  });
});

describe("ChurnRequestSchema", () => {
  it("methodごとに必要な項目の既定値が入る", () => {
    const result = validate(ChurnRequestSchema, { method: "START_END" });
    if (!result.success) throw new Error("validation should succeed");
    expect(toChurnInputs(result.data)).toEqual({ method: "START_END", startCustomers: 1000, endCustomers: 950 });
  });

  it("methodがなければエラー", () => {
    const result = validate(ChurnRequestSchema, { startCustomers: 10 });
    expect(result.success).toBe(false);
  });

  it("顧客数は整数のみ", () => {
    const result = validate(ChurnRequestSchema, { method: "LOST_CUSTOMERS", lostCustomers: 1.5 });
    expect(result).toEqual({
      success: false,
      errors: [{ field: "lostCustomers", message: "lostCustomers must be an integer" }],
    });
  });
});

describe("InsightsRequestSchema", () => {
  it("セグメントは5件まで", () => {
    const segment = { name: "A", averageValue: 10, percentage: 10 };
    const result = validate(InsightsRequestSchema, { segments: Array.from({ length: 6 }, () => segment) });
    expect(result).toEqual({
      success: false,
      errors: [{ field: "segments", message: "at most 5 segments" }],
    });
  });
});

describe("ScenarioRequestSchema", () => {
  it("スライダーの範囲外は拒否する", () => {
    const result = validate(ScenarioRequestSchema, { cacChangePct: 60 });
    expect(result).toEqual({
      success: false,
      errors: [{ field: "cacChangePct", message: "cacChangePct must be between -50 and 50" }],
    });
  });

  it("範囲内の負の値は受け付ける", () => {
    const result = validate(ScenarioRequestSchema, { purchaseValueChangePct: -50 });
    expect(result.success).toBe(true);
  });
});

describe("RatioRequestSchema", () => {
  it("LTVとCACは必須", () => {
    const result = validate(RatioRequestSchema, {});
    if (result.success) throw new Error("validation should fail");
    expect(result.errors.map((e) => e.field)).toEqual(["ltv", "cac"]);
  });
});

describe("BusinessScaleRequestSchema", () => {
  it("%を比率に変換してエンジン入力にする", () => {
    const result = validate(BusinessScaleRequestSchema, { arpu: "100", monthlyChurnPct: "5", grossMarginPct: "70" });
    if (!result.success) throw new Error("validation should succeed");
    expect(toArpuLtvInputs(result.data)).toEqual({ arpu: 100, monthlyChurnRate: 0.05, grossMargin: 0.7, cac: 200 });
  });
});

describe("CalculatorFormSchema", () => {
  it("クエリなしなら全項目が既定値", () => {
    const result = validate(CalculatorFormSchema, {});
    if (!result.success) throw new Error("validation should succeed");
    expect(result.data.tab).toBe("ltv");
    expect(result.data.useChurn).toBe(false);
    expect(result.data.showBreakdown).toBe(false);
    expect(result.data.hasSegments).toBe(false);
    expect(result.data.segments).toEqual([]);
    expect(result.data.marketingSpend).toBe(10000);
  });

  it("不明なタブはltvに戻す", () => {
    const result = validate(CalculatorFormSchema, { tab: "unknown" });
    if (!result.success) throw new Error("validation should succeed");
    expect(result.data.tab).toBe("ltv");
  });

  it("クエリ文字列の値を変換する", () => {
    const result = validate(CalculatorFormSchema, { tab: "cac", useChurn: "on", monthlyChurnPct: "2.5" });
    if (!result.success) throw new Error("validation should succeed");
    expect(result.data.tab).toBe("cac");
    expect(result.data.useChurn).toBe(true);
    expect(result.data.monthlyChurnPct).toBe(2.5);
  });

  it("数値でない入力はエラー", () => {
    const result = validate(CalculatorFormSchema, { marketingSpend: "abc" });
    if (result.success) throw new Error("validation should fail");
    expect(result.errors[0].field).toBe("marketingSpend");
  });
});

describe("splitCalculatorForm", () => {
  function parseForm(query: Record<string, unknown>) {
    const result = validate(CalculatorFormSchema, query);
    if (!result.success) throw new Error("validation should succeed");
    return result.data;
  }

  it("チェックボックスに応じて寿命の入力方法を切り替える", () => {
    expect(splitCalculatorForm(parseForm({})).ltv.lifespan).toEqual({ source: "DIRECT", lifespanYears: 3 });
    expect(splitCalculatorForm(parseForm({ useChurn: "on" })).ltv.lifespan).toEqual({
      source: "CHURN",
      monthlyChurnPct: 5,
    });
  });

  it("内訳はチェック時のみ渡す", () => {
    expect(splitCalculatorForm(parseForm({})).cac.breakdown).toBeUndefined();
    expect(splitCalculatorForm(parseForm({ showBreakdown: "on" })).cac.breakdown).toEqual({
      adSpend: 3000,
      teamCost: 1500,
      toolCost: 500,
    });
  });

  it("解約率の計算方法で項目を選ぶ", () => {
    expect(splitCalculatorForm(parseForm({ churnMethod: "START_END" })).churn).toEqual({
      method: "START_END",
      startCustomers: 1000,
      endCustomers: 950,
    });
  });

  it("セグメントはセグメント数までに切り詰める", () => {
    const form = parseForm({
      hasSegments: "on",
      segmentCount: "1",
      segments: [
        { name: "A", averageValue: "100", percentage: "60" },
        { name: "B", averageValue: "50", percentage: "40" },
      ],
    });
    expect(splitCalculatorForm(form).insights.segments).toEqual([{ name: "A", averageValue: 100, percentage: 60 }]);
  });

  it("セグメント未使用ならundefined", () => {
    expect(splitCalculatorForm(parseForm({})).insights.segments).toBeUndefined();
  });
});
