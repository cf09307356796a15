/**
 * ビジネス指標計算エンジン - 定数定義
 */

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
  /** サービス名（ログ・ヘルスチェック用） */
  SERVICE_NAME: "business-metrics-engine",
  /** JSONボディの最大サイズ */
  JSON_BODY_LIMIT: "100kb",
} as const;

// =============================================================================
// センチネル値
// =============================================================================

/** 分母0で「無限大」を表す値 */
export const INFINITY_SENTINEL = "∞" as const;

/** 分母0で「算出不可」を表す値 */
export const NOT_AVAILABLE = "N/A" as const;

// =============================================================================
// 期間換算
// =============================================================================
export const PERIOD = {
  /** 1年の月数 */
  MONTHS_PER_YEAR: 12,
} as const;

// =============================================================================
// LTV/CAC比率の区分しきい値
// =============================================================================
export const RATIO_THRESHOLDS = {
  /** これ未満はCRITICAL */
  CRITICAL_BELOW: 1,
  /** これ未満はNEEDS_WORK */
  NEEDS_WORK_BELOW: 3,
  /** これ未満はHEALTHY、以上はEXCELLENT */
  HEALTHY_BELOW: 5,
} as const;

// =============================================================================
// 回収期間（月）の区分しきい値
// =============================================================================
export const PAYBACK_THRESHOLDS = {
  FAST_BELOW: 3,
  GOOD_BELOW: 6,
  SLOW_BELOW: 12,
} as const;

// =============================================================================
// CAC健全性（月次売上に対する倍率）
// =============================================================================
export const CAC_HEALTH_MULTIPLIERS = {
  /** CACが月次売上のこの倍数を超えたらHIGH */
  HIGH: 3,
  /** CACが月次売上のこの倍数を超えたらWARNING */
  WARNING: 2,
} as const;

// =============================================================================
// インサイト指標（%）のしきい値
// =============================================================================
export const INSIGHT_THRESHOLDS = {
  RETENTION: { low: 30, mid: 50 },
  UPSELL: { low: 15, mid: 25 },
  REFERRAL: { low: 5, mid: 15 },
} as const;

// =============================================================================
// ゲージ表示
// =============================================================================
export const GAUGE = {
  /** 軸の最大値 */
  AXIS_MAX: 5,
} as const;

// =============================================================================
// 入力フォームの既定値と範囲
// =============================================================================
export const INPUT_DEFAULTS = {
  AVG_PURCHASE_VALUE: 50,
  PURCHASE_FREQUENCY: 2,
  LIFESPAN_YEARS: 3,
  MONTHLY_CHURN_PCT: 5,
  MARKETING_SPEND: 10000,
  NEW_CUSTOMERS: 500,
  AD_SPEND: 3000,
  TEAM_COST: 1500,
  TOOL_COST: 500,
  START_CUSTOMERS: 1000,
  LOST_CUSTOMERS: 50,
  END_CUSTOMERS: 950,
  RETENTION_RATE: 40,
  UPSELL_RATE: 20,
  REFERRAL_RATE: 10,
  SEGMENT_COUNT: 2,
  ARPU: 100,
  GROSS_MARGIN_PCT: 70,
  CAC: 200,
} as const;

export const INPUT_LIMITS = {
  /** パーセント入力の上限 */
  PERCENT_MAX: 100,
  /** 金額・件数入力の上限 */
  AMOUNT_MAX: 1e12,
  SEGMENTS_MIN: 1,
  SEGMENTS_MAX: 5,
  /** シナリオのスライダー範囲 */
  PURCHASE_VALUE_CHANGE: { min: -50, max: 100 },
  CAC_CHANGE: { min: -50, max: 50 },
  RETENTION_CHANGE: { min: -50, max: 100 },
} as const;

// =============================================================================
// セッション
// =============================================================================
export const SESSION = {
  /** セッションIDを受け渡すヘッダー */
  HEADER: "x-session-id",
  DEFAULT_TTL_MINUTES: 60,
  DEFAULT_MAX_ENTRIES: 1000,
} as const;
