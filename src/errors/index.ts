/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * APIとUIで同じエラー情報を扱えるようにする
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",
  INVALID_INPUT: "INVALID_INPUT",

  // リソースエラー (404)
  NOT_FOUND: "NOT_FOUND",

  // レート制限 (429)
  RATE_LIMIT_EXCEEDED: "RATE_LIMIT_EXCEEDED",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
    });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * 計算エンジンに不正な値が渡された場合のエラー（400）
 *
 * 通常はスキーマで弾かれるため、ここに到達するのは呼び出し側のバグ
 */
export class InvalidInputError extends AppError {
  public readonly field: string;

  constructor(field: string, received: number) {
    super({
      code: ErrorCode.INVALID_INPUT,
      message: `${field} must be a non-negative finite number`,
      statusCode: 400,
      details: { field, received: String(received) },
    });
    this.name = "InvalidInputError";
    this.field = field;
  }
}

// =============================================================================
// リソースエラー
// =============================================================================

/**
 * リソース未検出エラー（404）
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super({
      code: ErrorCode.NOT_FOUND,
      message,
      statusCode: 404,
      details: { resource, identifier },
    });
    this.name = "NotFoundError";
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

/**
 * 設定エラー
 */
export class ConfigurationError extends AppError {
  constructor(message: string, invalidConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: invalidConfig ? { invalidConfig } : undefined,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  meta?: {
    requestId?: string;
    sessionId?: string;
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  /**
   * 成功レスポンスを生成
   */
  static success<T>(
    data: T,
    options?: {
      statusCode?: number;
      requestId?: string;
      sessionId?: string;
    }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        sessionId: options?.sessionId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  /**
   * エラーレスポンスを生成
   */
  static error(error: AppError | Error, requestId?: string): ApiResponse<never> {
    if (error instanceof AppError) {
      return {
        success: false,
        statusCode: error.statusCode,
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        meta: {
          requestId,
          timestamp: new Date().toISOString(),
        },
      };
    }

    // 一般的なErrorの場合
    return {
      success: false,
      statusCode: 500,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  /**
   * Not Foundレスポンスを生成
   */
  static notFound(resource: string, identifier?: string, requestId?: string): ApiResponse<never> {
    return ApiResponseBuilder.error(new NotFoundError(resource, identifier), requestId);
  }
}

/**
 * 不明な例外をメッセージ文字列に変換
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
