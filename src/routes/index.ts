/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export { createMetricsRouter } from "./metrics";
