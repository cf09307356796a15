/**
 * セッションモジュール
 */

export {
  SessionBaselineStore,
  SessionBaselineStoreOptions,
  SessionContext,
} from "./baseline-store";
