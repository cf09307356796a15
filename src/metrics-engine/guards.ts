/**
 * 計算エンジン共通のガード関数
 */

import { InvalidInputError } from "../errors";
import { INFINITY_SENTINEL, NOT_AVAILABLE } from "../constants";
import { InfinitySentinel, MaybeAvailable, MaybeInfinite, NotAvailable } from "./types";

/**
 * 非負の有限数であることを確認
 *
 * @throws {InvalidInputError} 負数・NaN・Infinityの場合
 */
export function assertNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(field, value);
  }
}

/**
 * 有限数であることを確認（シナリオの変化率など負数を許す入力用）
 */
export function assertFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, value);
  }
}

/**
 * 有限値ならそのまま、Infinity / NaN なら fallback
 *
 * 極小値での除算や巨大値の積で桁あふれした結果をセンチネルに寄せる
 */
export function finiteOr<T extends number | string>(value: number, fallback: T): number | T {
  return Number.isFinite(value) ? value : fallback;
}

export function isInfinite(value: MaybeInfinite): value is InfinitySentinel {
  return value === INFINITY_SENTINEL;
}

export function isNotAvailable(value: MaybeAvailable): value is NotAvailable {
  return value === NOT_AVAILABLE;
}
