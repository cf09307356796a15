/**
 * 指標計算APIエンドポイント
 *
 * LTV・CACの計算結果はセッションのベースラインに書き込み、
 * シナリオ計算はそのベースラインを読み出して使う
 */

import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { logger, getTraceId } from "../logger";
import { INPUT_DEFAULTS, SESSION } from "../constants";
import { ApiResponseBuilder, ValidationError } from "../errors";
import {
  calculateLtv,
  calculateArpuLtv,
  calculateCac,
  calculateChurn,
  analyzeInsights,
  calculateScenario,
  computeRatio,
  classifyRatio,
  getAdvancedRecommendations,
  getCacHealthMessage,
  buildRatioGauge,
  isInfinite,
} from "../metrics-engine";
import {
  validate,
  LtvRequestSchema,
  CacRequestSchema,
  ChurnRequestSchema,
  InsightsRequestSchema,
  ScenarioRequestSchema,
  RatioRequestSchema,
  BusinessScaleRequestSchema,
  toLtvInputs,
  toCacInputs,
  toChurnInputs,
  toInsightInputs,
  toScenarioAdjustment,
  toArpuLtvInputs,
} from "../schemas";
import { SessionBaselineStore } from "../session";

function getSessionId(req: Request): string | undefined {
  return req.header(SESSION.HEADER);
}

/**
 * ボディを検証し、失敗時は400を返してundefinedを返す
 */
function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  req: Request,
  res: Response
): z.output<S> | undefined {
  const validation = validate(schema, req.body ?? {});
  if (validation.success) {
    return validation.data;
  }

  const traceId = getTraceId(res);
  logger.warn("Invalid metrics request", { traceId, path: req.path, errors: validation.errors });
  const error = new ValidationError(validation.errors);
  res.status(error.statusCode).json(ApiResponseBuilder.error(error, traceId));
  return undefined;
}

function sendSuccess<T>(res: Response, data: T, sessionId?: string): void {
  if (sessionId) {
    res.setHeader("X-Session-ID", sessionId);
  }
  res.status(200).json(ApiResponseBuilder.success(data, { requestId: getTraceId(res), sessionId }));
}

export function createMetricsRouter(store: SessionBaselineStore): Router {
  const router = Router();

  /**
   * POST /api/metrics/ltv
   * LTVを計算し、セッションのbaseLtvを更新
   */
  router.post("/ltv", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(LtvRequestSchema, req, res);
    if (!body) return;

    try {
      const result = calculateLtv(toLtvInputs(body));
      // 寿命が無限の場合はシナリオの基準にできないため0を入れる
      const baseLtv = isInfinite(result.ltv) ? 0 : result.ltv;
      const session = store.update(getSessionId(req), { baseLtv });

      logger.info("LTV computed", {
        traceId: getTraceId(res),
        sessionId: session.sessionId,
        lifespanSource: body.lifespan.source,
        ltv: result.ltv,
      });

      sendSuccess(res, { ...result, baseline: session.baseline }, session.sessionId);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/cac
   * CACを計算し、セッションのbaseCacを更新
   */
  router.post("/cac", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(CacRequestSchema, req, res);
    if (!body) return;

    try {
      const annualRevenue =
        body.annualRevenuePerCustomer ?? INPUT_DEFAULTS.AVG_PURCHASE_VALUE * INPUT_DEFAULTS.PURCHASE_FREQUENCY;
      const result = calculateCac(toCacInputs(body), annualRevenue);
      const session = store.update(getSessionId(req), { baseCac: result.cac });
      const ratio = computeRatio(session.baseline.baseLtv, result.cac);

      logger.info("CAC computed", {
        traceId: getTraceId(res),
        sessionId: session.sessionId,
        cac: result.cac,
        period: result.period,
      });

      sendSuccess(
        res,
        {
          ...result,
          cacHealthMessage: getCacHealthMessage(result.cacHealth),
          ratio,
          ratioTier: classifyRatio(ratio),
          baseline: session.baseline,
        },
        session.sessionId
      );
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/churn
   */
  router.post("/churn", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(ChurnRequestSchema, req, res);
    if (!body) return;

    try {
      sendSuccess(res, calculateChurn(toChurnInputs(body)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/insights
   */
  router.post("/insights", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(InsightsRequestSchema, req, res);
    if (!body) return;

    try {
      sendSuccess(res, analyzeInsights(toInsightInputs(body)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/scenario
   * セッションのベースラインに変化率を適用
   */
  router.post("/scenario", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(ScenarioRequestSchema, req, res);
    if (!body) return;

    try {
      const session = store.getOrCreate(getSessionId(req));
      const result = calculateScenario(session.baseline, toScenarioAdjustment(body));
      sendSuccess(res, result, session.sessionId);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/ratio
   * 比率・区分・ゲージ・推奨アクション
   */
  router.post("/ratio", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(RatioRequestSchema, req, res);
    if (!body) return;

    try {
      const ratio = computeRatio(body.ltv, body.cac);
      sendSuccess(res, {
        ratio,
        tier: classifyRatio(ratio),
        gauge: buildRatioGauge(ratio),
        recommendations: getAdvancedRecommendations(ratio),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/metrics/business-scale
   * ARPUベースのLTV/CAC計算機
   */
  router.post("/business-scale", (req: Request, res: Response, next: NextFunction) => {
    const body = parseBody(BusinessScaleRequestSchema, req, res);
    if (!body) return;

    try {
      sendSuccess(res, calculateArpuLtv(toArpuLtvInputs(body)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/metrics/session
   * 現在のベースラインを返す（未知のIDなら新規セッション）
   */
  router.get("/session", (req: Request, res: Response) => {
    const session = store.getOrCreate(getSessionId(req));
    sendSuccess(res, session.baseline, session.sessionId);
  });

  return router;
}
