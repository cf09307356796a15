/**
 * ビジネス指標計算エンジン - 構造化ログ
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { SERVER } from "./constants";

/**
 * ログレベル
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ログエントリの構造
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  severity: string;
  message: string;
  traceId?: string;
  service: string;
  version: string;
  environment: string;
  [key: string]: unknown;
}

/**
 * ログコンテキスト（リクエストごとの情報）
 */
export interface LogContext {
  traceId?: string;
  sessionId?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * 構造化ロガークラス
 */
export class StructuredLogger {
  private service: string;
  private version: string;
  private environment: string;
  private minLevel: LogLevel;
  private context: LogContext;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor() {
    const level = process.env.LOG_LEVEL ?? "";
    this.service = SERVER.SERVICE_NAME;
    this.version = process.env.npm_package_version || "1.0.0";
    this.environment = process.env.NODE_ENV || "development";
    this.minLevel = isLogLevel(level) ? level : "info";
    this.context = {};
  }

  /**
   * 出力する最小レベルを変更
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * トレースIDを生成
   */
  generateTraceId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
  }

  private buildLogEntry(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      // Cloud Loggingの重大度フィールド
      severity: level.toUpperCase(),
      message,
      service: this.service,
      version: this.version,
      environment: this.environment,
      ...this.context,
      ...data,
    };
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (this.levelPriority[level] < this.levelPriority[this.minLevel]) {
      return;
    }

    const output = JSON.stringify(this.buildLogEntry(level, message, data));

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "debug":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    // エラーオブジェクトを文字列化
    if (data?.error instanceof Error) {
      data = {
        ...data,
        error: {
          name: data.error.name,
          message: data.error.message,
          stack: data.error.stack,
        },
      };
    }
    this.log("error", message, data);
  }

  /**
   * 子ロガーを作成（追加のコンテキストを持つ）
   */
  child(additionalContext: LogContext): StructuredLogger {
    const childLogger = new StructuredLogger();
    childLogger.minLevel = this.minLevel;
    childLogger.context = { ...this.context, ...additionalContext };
    return childLogger;
  }

  /**
   * リクエストログ用のミドルウェア
   *
   * X-Trace-ID ヘッダーがあればそれを使い、res.locals.traceId に格納する
   */
  requestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const startTime = Date.now();
      const headerTraceId = req.header("x-trace-id");
      const traceId = headerTraceId && headerTraceId.length > 0 ? headerTraceId : this.generateTraceId();

      res.locals.traceId = traceId;
      res.setHeader("X-Trace-ID", traceId);

      this.debug("Request started", {
        traceId,
        method: req.method,
        path: req.path,
        ip: req.ip,
        userAgent: req.header("user-agent"),
      });

      res.on("finish", () => {
        this.info("Request completed", {
          traceId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });

      next();
    };
  }
}

// シングルトンインスタンス
export const logger = new StructuredLogger();

/**
 * requestLogger が設定したトレースIDを取得
 */
export function getTraceId(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === "string" ? traceId : undefined;
}
