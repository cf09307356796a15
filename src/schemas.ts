/**
 * ビジネス指標計算エンジン - バリデーションスキーマ
 *
 * 入力の範囲（最小・最大・既定値）はここで決め、計算エンジンには範囲内の値だけを渡す。
 * 数値はクエリ文字列からも受け取れるよう z.coerce で変換する
 */

import { z } from "zod";
import { INPUT_DEFAULTS, INPUT_LIMITS } from "./constants";
import { ValidationErrorDetail } from "./errors";
import {
  ArpuLtvInputs,
  CacInputs,
  ChurnInputs,
  InsightInputs,
  LtvInputs,
  ScenarioAdjustment,
} from "./metrics-engine";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

const amount = (field: string) =>
  z.coerce
    .number()
    .finite(`${field} must be a finite number`)
    .min(0, `${field} must be non-negative`)
    .max(INPUT_LIMITS.AMOUNT_MAX, `${field} must be at most ${INPUT_LIMITS.AMOUNT_MAX}`);

const count = (field: string) =>
  z.coerce
    .number()
    .int(`${field} must be an integer`)
    .min(0, `${field} must be non-negative`)
    .max(INPUT_LIMITS.AMOUNT_MAX, `${field} must be at most ${INPUT_LIMITS.AMOUNT_MAX}`);

const percent = (field: string) =>
  z.coerce
    .number()
    .min(0, `${field} must be between 0 and ${INPUT_LIMITS.PERCENT_MAX}`)
    .max(INPUT_LIMITS.PERCENT_MAX, `${field} must be between 0 and ${INPUT_LIMITS.PERCENT_MAX}`);

const slider = (field: string, range: { min: number; max: number }) =>
  z.coerce
    .number()
    .min(range.min, `${field} must be between ${range.min} and ${range.max}`)
    .max(range.max, `${field} must be between ${range.min} and ${range.max}`);

/** チェックボックス（未チェック時はフィールド自体が送られない） */
const checkbox = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((v) => v === true || v === "on" || v === "1" || v === "true");

export const AnalysisPeriodSchema = z.enum(["MONTHLY", "ANNUAL"]);

export const ChurnMethodSchema = z.enum(["LOST_CUSTOMERS", "START_END"]);

// =============================================================================
// APIリクエストスキーマ
// =============================================================================

export const LifespanSchema = z.discriminatedUnion("source", [
  z.object({
    source: z.literal("DIRECT"),
    lifespanYears: amount("lifespanYears").default(INPUT_DEFAULTS.LIFESPAN_YEARS),
  }),
  z.object({
    source: z.literal("CHURN"),
    monthlyChurnPct: percent("monthlyChurnPct").default(INPUT_DEFAULTS.MONTHLY_CHURN_PCT),
  }),
]);

export const LtvRequestSchema = z.object({
  avgPurchaseValue: amount("avgPurchaseValue").default(INPUT_DEFAULTS.AVG_PURCHASE_VALUE),
  purchaseFrequency: amount("purchaseFrequency").default(INPUT_DEFAULTS.PURCHASE_FREQUENCY),
  lifespan: LifespanSchema.default({ source: "DIRECT", lifespanYears: INPUT_DEFAULTS.LIFESPAN_YEARS }),
});

export const SpendBreakdownSchema = z.object({
  adSpend: amount("adSpend").default(INPUT_DEFAULTS.AD_SPEND),
  teamCost: amount("teamCost").default(INPUT_DEFAULTS.TEAM_COST),
  toolCost: amount("toolCost").default(INPUT_DEFAULTS.TOOL_COST),
});

export const CacRequestSchema = z.object({
  marketingSpend: amount("marketingSpend").default(INPUT_DEFAULTS.MARKETING_SPEND),
  newCustomers: count("newCustomers").default(INPUT_DEFAULTS.NEW_CUSTOMERS),
  period: AnalysisPeriodSchema.default("MONTHLY"),
  breakdown: SpendBreakdownSchema.optional(),
  /** 省略時はLTVのデフォルト入力から算出した年間売上を使う */
  annualRevenuePerCustomer: amount("annualRevenuePerCustomer").optional(),
});

export const ChurnRequestSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("LOST_CUSTOMERS"),
    startCustomers: count("startCustomers").default(INPUT_DEFAULTS.START_CUSTOMERS),
    lostCustomers: count("lostCustomers").default(INPUT_DEFAULTS.LOST_CUSTOMERS),
  }),
  z.object({
    method: z.literal("START_END"),
    startCustomers: count("startCustomers").default(INPUT_DEFAULTS.START_CUSTOMERS),
    endCustomers: count("endCustomers").default(INPUT_DEFAULTS.END_CUSTOMERS),
  }),
]);

export const CustomerSegmentSchema = z.object({
  name: z.string().trim().min(1, "segment name is required").max(60),
  averageValue: amount("averageValue").default(0),
  percentage: percent("percentage").default(0),
});

export const InsightsRequestSchema = z.object({
  retentionRate: percent("retentionRate").default(INPUT_DEFAULTS.RETENTION_RATE),
  upsellRate: percent("upsellRate").default(INPUT_DEFAULTS.UPSELL_RATE),
  referralRate: percent("referralRate").default(INPUT_DEFAULTS.REFERRAL_RATE),
  segments: z
    .array(CustomerSegmentSchema)
    .max(INPUT_LIMITS.SEGMENTS_MAX, `at most ${INPUT_LIMITS.SEGMENTS_MAX} segments`)
    .optional(),
});

export const ScenarioRequestSchema = z.object({
  purchaseValueChangePct: slider("purchaseValueChangePct", INPUT_LIMITS.PURCHASE_VALUE_CHANGE).default(0),
  cacChangePct: slider("cacChangePct", INPUT_LIMITS.CAC_CHANGE).default(0),
  retentionChangePct: slider("retentionChangePct", INPUT_LIMITS.RETENTION_CHANGE).default(0),
});

export const RatioRequestSchema = z.object({
  ltv: amount("ltv"),
  cac: amount("cac"),
});

export const BusinessScaleRequestSchema = z.object({
  arpu: amount("arpu").default(INPUT_DEFAULTS.ARPU),
  monthlyChurnPct: percent("monthlyChurnPct").default(INPUT_DEFAULTS.MONTHLY_CHURN_PCT),
  grossMarginPct: percent("grossMarginPct").default(INPUT_DEFAULTS.GROSS_MARGIN_PCT),
  cac: amount("cac").default(INPUT_DEFAULTS.CAC),
});

// =============================================================================
// UIフォームスキーマ（GETクエリのフラットなフィールド）
// =============================================================================

export const CalculatorTabSchema = z.enum(["ltv", "cac", "churn", "insights", "scenario"]);

export const CalculatorFormSchema = z.object({
  tab: CalculatorTabSchema.catch("ltv"),
  sessionId: z.string().optional(),

  // LTV
  avgPurchaseValue: amount("avgPurchaseValue").default(INPUT_DEFAULTS.AVG_PURCHASE_VALUE),
  purchaseFrequency: amount("purchaseFrequency").default(INPUT_DEFAULTS.PURCHASE_FREQUENCY),
  useChurn: checkbox,
  monthlyChurnPct: percent("monthlyChurnPct").default(INPUT_DEFAULTS.MONTHLY_CHURN_PCT),
  lifespanYears: amount("lifespanYears").default(INPUT_DEFAULTS.LIFESPAN_YEARS),

  // CAC
  period: AnalysisPeriodSchema.default("MONTHLY"),
  marketingSpend: amount("marketingSpend").default(INPUT_DEFAULTS.MARKETING_SPEND),
  newCustomers: count("newCustomers").default(INPUT_DEFAULTS.NEW_CUSTOMERS),
  showBreakdown: checkbox,
  adSpend: amount("adSpend").default(INPUT_DEFAULTS.AD_SPEND),
  teamCost: amount("teamCost").default(INPUT_DEFAULTS.TEAM_COST),
  toolCost: amount("toolCost").default(INPUT_DEFAULTS.TOOL_COST),

  // 解約率
  churnMethod: ChurnMethodSchema.default("LOST_CUSTOMERS"),
  startCustomers: count("startCustomers").default(INPUT_DEFAULTS.START_CUSTOMERS),
  lostCustomers: count("lostCustomers").default(INPUT_DEFAULTS.LOST_CUSTOMERS),
  endCustomers: count("endCustomers").default(INPUT_DEFAULTS.END_CUSTOMERS),

  // インサイト
  hasSegments: checkbox,
  segmentCount: z.coerce
    .number()
    .int()
    .min(INPUT_LIMITS.SEGMENTS_MIN)
    .max(INPUT_LIMITS.SEGMENTS_MAX)
    .default(INPUT_DEFAULTS.SEGMENT_COUNT),
  segments: z.array(CustomerSegmentSchema).max(INPUT_LIMITS.SEGMENTS_MAX).default([]),
  retentionRate: percent("retentionRate").default(INPUT_DEFAULTS.RETENTION_RATE),
  upsellRate: percent("upsellRate").default(INPUT_DEFAULTS.UPSELL_RATE),
  referralRate: percent("referralRate").default(INPUT_DEFAULTS.REFERRAL_RATE),

  // シナリオ
  purchaseValueChangePct: slider("purchaseValueChangePct", INPUT_LIMITS.PURCHASE_VALUE_CHANGE).default(0),
  cacChangePct: slider("cacChangePct", INPUT_LIMITS.CAC_CHANGE).default(0),
  retentionChangePct: slider("retentionChangePct", INPUT_LIMITS.RETENTION_CHANGE).default(0),
});

export const BusinessScaleFormSchema = BusinessScaleRequestSchema;

// =============================================================================
// 型エクスポート（zodから推論）
// =============================================================================

export type LtvRequest = z.infer<typeof LtvRequestSchema>;
export type CacRequest = z.infer<typeof CacRequestSchema>;
export type ChurnRequest = z.infer<typeof ChurnRequestSchema>;
export type InsightsRequest = z.infer<typeof InsightsRequestSchema>;
export type ScenarioRequest = z.infer<typeof ScenarioRequestSchema>;
export type RatioRequest = z.infer<typeof RatioRequestSchema>;
export type BusinessScaleRequest = z.infer<typeof BusinessScaleRequestSchema>;
export type CalculatorTab = z.infer<typeof CalculatorTabSchema>;
export type CalculatorForm = z.infer<typeof CalculatorFormSchema>;

// =============================================================================
// バリデーション結果型
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationErrorDetail[] };

/**
 * スキーマで検証し、エラーはフィールド単位に変換
 */
export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
  return { success: false, errors };
}

// =============================================================================
// エンジン入力への変換（% → 比率）
// =============================================================================

export function toLtvInputs(req: LtvRequest): LtvInputs {
  return {
    avgPurchaseValue: req.avgPurchaseValue,
    purchaseFrequency: req.purchaseFrequency,
    lifespan:
      req.lifespan.source === "CHURN"
        ? { source: "CHURN", monthlyChurnRate: req.lifespan.monthlyChurnPct / 100 }
        : { source: "DIRECT", lifespanYears: req.lifespan.lifespanYears },
  };
}

export function toCacInputs(req: CacRequest): CacInputs {
  return {
    marketingSpend: req.marketingSpend,
    newCustomers: req.newCustomers,
    period: req.period,
    breakdown: req.breakdown,
  };
}

export function toChurnInputs(req: ChurnRequest): ChurnInputs {
  return req.method === "LOST_CUSTOMERS"
    ? { method: req.method, startCustomers: req.startCustomers, lostCustomers: req.lostCustomers }
    : { method: req.method, startCustomers: req.startCustomers, endCustomers: req.endCustomers };
}

export function toInsightInputs(req: InsightsRequest): InsightInputs {
  return {
    retentionRate: req.retentionRate,
    upsellRate: req.upsellRate,
    referralRate: req.referralRate,
    segments: req.segments,
  };
}

export function toScenarioAdjustment(req: ScenarioRequest): ScenarioAdjustment {
  return {
    purchaseValueChangePct: req.purchaseValueChangePct,
    cacChangePct: req.cacChangePct,
    retentionChangePct: req.retentionChangePct,
  };
}

export function toArpuLtvInputs(req: BusinessScaleRequest): ArpuLtvInputs {
  return {
    arpu: req.arpu,
    monthlyChurnRate: req.monthlyChurnPct / 100,
    grossMargin: req.grossMarginPct / 100,
    cac: req.cac,
  };
}

/**
 * UIフォームの値をタブごとのリクエストに分解
 */
export function splitCalculatorForm(form: CalculatorForm): {
  ltv: LtvRequest;
  cac: CacRequest;
  churn: ChurnRequest;
  insights: InsightsRequest;
  scenario: ScenarioRequest;
} {
  return {
    ltv: {
      avgPurchaseValue: form.avgPurchaseValue,
      purchaseFrequency: form.purchaseFrequency,
      lifespan: form.useChurn
        ? { source: "CHURN", monthlyChurnPct: form.monthlyChurnPct }
        : { source: "DIRECT", lifespanYears: form.lifespanYears },
    },
    cac: {
      marketingSpend: form.marketingSpend,
      newCustomers: form.newCustomers,
      period: form.period,
      breakdown: form.showBreakdown
        ? { adSpend: form.adSpend, teamCost: form.teamCost, toolCost: form.toolCost }
        : undefined,
    },
    churn:
      form.churnMethod === "LOST_CUSTOMERS"
        ? { method: "LOST_CUSTOMERS", startCustomers: form.startCustomers, lostCustomers: form.lostCustomers }
        : { method: "START_END", startCustomers: form.startCustomers, endCustomers: form.endCustomers },
    insights: {
      retentionRate: form.retentionRate,
      upsellRate: form.upsellRate,
      referralRate: form.referralRate,
      segments: form.hasSegments ? form.segments.slice(0, form.segmentCount) : undefined,
    },
    scenario: {
      purchaseValueChangePct: form.purchaseValueChangePct,
      cacChangePct: form.cacChangePct,
      retentionChangePct: form.retentionChangePct,
    },
  };
}
