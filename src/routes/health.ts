/**
 * ヘルスチェック・APIルートインデックス
 */

import { Router, Request, Response } from "express";
import { SERVER } from "../constants";

const router = Router();

// ルート一覧
router.get("/api", (_req: Request, res: Response) => {
  return res.json({
    message: "Business Metrics Engine API",
    version: process.env.npm_package_version || "1.0.0",
    endpoints: {
      health: "GET /health",
      ltv: "POST /api/metrics/ltv",
      cac: "POST /api/metrics/cac",
      churn: "POST /api/metrics/churn",
      insights: "POST /api/metrics/insights",
      scenario: "POST /api/metrics/scenario",
      ratio: "POST /api/metrics/ratio",
      business_scale: "POST /api/metrics/business-scale",
      session: "GET /api/metrics/session",
      ui_calculator: "GET /ui/calculator",
      ui_business_scale: "GET /ui/business-scale",
    },
  });
});

// ヘルスチェック（外部依存がないため常にok）
router.get("/health", (_req: Request, res: Response) => {
  return res.status(200).json({
    status: "ok",
    service: SERVER.SERVICE_NAME,
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
  });
});

export default router;
