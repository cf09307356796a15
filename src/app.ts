/**
 * Express アプリケーションの組み立て
 *
 * ミドルウェア・APIルート・UIビュー・エラーハンドラを登録する。
 * listen は server.ts 側で行う（テストからは createApp だけを使う）
 */

import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { EnvConfig } from "./config";
import { logger, getTraceId } from "./logger";
import { SERVER } from "./constants";
import { AppError, ApiResponseBuilder, ErrorCode } from "./errors";
import { healthRoutes, createMetricsRouter } from "./routes";
import { SessionBaselineStore } from "./session";
import { createIndexView } from "./ui/indexView";
import { createCalculatorView } from "./ui/calculatorView";
import { createBusinessScaleView } from "./ui/businessScaleView";

/** ローカル開発で常に許可するオリジン */
const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:8080"];

/**
 * ボディパーサーなどが付与する4xxステータスを取り出す
 */
function getClientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) {
    return undefined;
  }
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(
  config: EnvConfig,
  store: SessionBaselineStore = new SessionBaselineStore({
    ttlMinutes: config.sessionTtlMinutes,
    maxEntries: config.sessionMaxEntries,
  })
): Express {
  const app = express();
  const viewContext = { env: config.nodeEnv, currency: config.currency };

  // ===========================================================================
  // CORS設定
  // ===========================================================================

  const allowedOrigins = [...DEFAULT_ALLOWED_ORIGINS, ...config.corsAllowedOrigins];

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // オリジンがない場合（サーバー間通信など）は許可
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      logger.warn("CORS request blocked", { origin });
      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Session-ID", "X-Trace-ID"],
    exposedHeaders: ["X-Session-ID", "X-Trace-ID", "RateLimit-Limit", "RateLimit-Remaining"],
    maxAge: 86400,
  };

  app.use(cors(corsOptions));

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(express.json({ limit: SERVER.JSON_BODY_LIMIT }));
  app.use(express.urlencoded({ extended: true, limit: SERVER.JSON_BODY_LIMIT }));
  app.use(logger.requestLogger());

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: config.rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req: Request, res: Response) => {
      const error = new AppError({
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: "Too many requests, please try again later.",
        statusCode: 429,
      });
      res.status(429).json(ApiResponseBuilder.error(error, getTraceId(res)));
    },
  });
  app.use(limiter);

  // ===========================================================================
  // ルート
  // ===========================================================================

  app.use("/", healthRoutes);
  app.use("/api/metrics", createMetricsRouter(store));

  app.get("/", createIndexView({ ...viewContext, version: process.env.npm_package_version || "1.0.0" }));
  app.get("/ui/calculator", createCalculatorView({ ...viewContext, store }));
  app.get("/ui/business-scale", createBusinessScaleView(viewContext));

  // 404
  app.use((req: Request, res: Response) => {
    res.status(404).json(ApiResponseBuilder.notFound("Route", `${req.method} ${req.path}`, getTraceId(res)));
  });

  // ===========================================================================
  // エラーハンドリング
  // ===========================================================================

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const traceId = getTraceId(res);

    if (err instanceof AppError) {
      logger.warn("Request failed", { traceId, path: req.path, code: err.code, message: err.message });
      res.status(err.statusCode).json(ApiResponseBuilder.error(err, traceId));
      return;
    }

    const clientStatus = getClientErrorStatus(err);
    if (clientStatus !== undefined) {
      const error = new AppError({
        code: ErrorCode.INVALID_INPUT,
        message: err instanceof Error ? err.message : "Invalid request",
        statusCode: clientStatus,
      });
      logger.warn("Malformed request", { traceId, path: req.path, statusCode: clientStatus });
      res.status(clientStatus).json(ApiResponseBuilder.error(error, traceId));
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error("Unhandled error", { traceId, path: req.path, error });
    const exposed = config.nodeEnv === "production" ? new Error("An error occurred") : error;
    res.status(500).json(ApiResponseBuilder.error(exposed, traceId));
  });

  return app;
}
