/**
 * 表示用フォーマッタ
 *
 * "∞" / "N/A" のセンチネルはそのまま表示する
 */

import { InfinitySentinel, NotAvailable } from "../metrics-engine";

type Displayable = number | InfinitySentinel | NotAvailable;

const currencyFormatters = new Map<string, Intl.NumberFormat>();

function getCurrencyFormatter(currency: string): Intl.NumberFormat {
  let formatter = currencyFormatters.get(currency);
  if (!formatter) {
    formatter = new Intl.NumberFormat("en-US", {
      style: "currency",
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    });
    currencyFormatters.set(currency, formatter);
  }
  return formatter;
}

/**
 * 金額（例: $1,234.50）
 */
export function formatCurrency(value: Displayable, currency: string): string {
  if (typeof value === "string") return value;
  return getCurrencyFormatter(currency).format(value);
}

export function formatDecimal(value: Displayable, digits = 2): string {
  if (typeof value === "string") return value;
  return value.toFixed(digits);
}

/**
 * 比率（0〜1）をパーセント表示
 */
export function formatRate(rate: number, digits = 1): string {
  return `${(rate * 100).toFixed(digits)}%`;
}

/**
 * パーセント値をそのまま表示
 */
export function formatPercent(pct: number, digits = 1): string {
  return `${pct.toFixed(digits)}%`;
}

/**
 * 符号付きパーセント（例: +10.0%）
 */
export function formatSignedPercent(pct: Displayable, digits = 1): string {
  if (typeof pct === "string") return pct;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(digits)}%`;
}

export function formatYears(years: Displayable): string {
  if (typeof years === "string") return years;
  return `${years.toFixed(1)} 年`;
}

export function formatMonths(months: Displayable): string {
  if (typeof months === "string") return months;
  return `${months.toFixed(1)} ヶ月`;
}

/**
 * 「3:1」形式（整数部のみ）
 */
export function formatRatioLabel(ratio: Displayable): string {
  if (typeof ratio === "string") return `${ratio}:1`;
  return `${Math.trunc(ratio)}:1`;
}
