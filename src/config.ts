/**
 * ビジネス指標計算エンジン - 環境変数設定
 */

import { SERVER, SESSION } from "./constants";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  /** 追加で許可するCORSオリジン（CORS_ALLOWED_ORIGINS、カンマ区切り） */
  corsAllowedOrigins: string[];

  /** 1分あたりのリクエスト上限（RATE_LIMIT_PER_MINUTE） */
  rateLimitPerMinute: number;

  /**
   * 金額表示に使う通貨コード（ISO 4217）
   * - 環境変数 CURRENCY で設定
   * - 不正な値や未設定の場合は "USD" にフォールバック
   */
  currency: string;

  // セッション設定
  sessionTtlMinutes: number;
  sessionMaxEntries: number;
}

const DEFAULT_RATE_LIMIT_PER_MINUTE = 120;
const DEFAULT_CURRENCY = "USD";

/**
 * 環境変数を読み込み、設定オブジェクトを返す
 *
 * 数値として読めない値は既定値にフォールバックする
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    port: parsePositiveInt(env.PORT, SERVER.DEFAULT_PORT),
    nodeEnv: env.NODE_ENV || "development",
    corsAllowedOrigins: parseOrigins(env.CORS_ALLOWED_ORIGINS),
    rateLimitPerMinute: parsePositiveInt(env.RATE_LIMIT_PER_MINUTE, DEFAULT_RATE_LIMIT_PER_MINUTE),
    currency: parseCurrency(env.CURRENCY),
    sessionTtlMinutes: parsePositiveInt(env.SESSION_TTL_MINUTES, SESSION.DEFAULT_TTL_MINUTES),
    sessionMaxEntries: parsePositiveInt(env.SESSION_MAX_ENTRIES, SESSION.DEFAULT_MAX_ENTRIES),
  };
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function parseOrigins(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

/**
 * CURRENCY環境変数をパース
 * Intl.NumberFormatが受け付けない値は "USD" にフォールバック
 */
function parseCurrency(value: string | undefined): string {
  if (value && isValidCurrency(value)) {
    return value.toUpperCase();
  }
  return DEFAULT_CURRENCY;
}

function isValidCurrency(value: string): boolean {
  if (!/^[A-Za-z]{3}$/.test(value)) {
    return false;
  }
  try {
    new Intl.NumberFormat("en-US", { style: "currency", currency: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // ポート番号の検証
  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  if (env.CURRENCY && !isValidCurrency(env.CURRENCY)) {
    errors.push(`Invalid CURRENCY value: ${env.CURRENCY}`);
  }

  for (const name of ["RATE_LIMIT_PER_MINUTE", "SESSION_TTL_MINUTES", "SESSION_MAX_ENTRIES"] as const) {
    const raw = env[name];
    if (raw !== undefined && !/^[1-9]\d*$/.test(raw)) {
      errors.push(`Invalid ${name} value: ${raw}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
