/**
 * ビジネス指標計算エンジン - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import { Server } from "http";
import { createApp } from "./app";
import { validateEnvConfig, loadEnvConfig } from "./config";
import { ConfigurationError } from "./errors";
import { logger } from "./logger";
import { SessionBaselineStore } from "./session";

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * HTTPサーバーを起動する
 *
 * 環境変数の検証 → 設定読み込み → セッションストア作成 → listen
 */
export async function startServer(): Promise<Server> {
  const envValidation = validateEnvConfig();
  if (!envValidation.valid) {
    logger.error("Environment validation failed", { errors: envValidation.errors });
    // 開発環境では警告のみ、本番では起動を停止
    if (process.env.NODE_ENV === "production") {
      throw new ConfigurationError(
        `Environment validation failed: ${envValidation.errors.join(", ")}`,
        envValidation.errors
      );
    }
  }

  const config = loadEnvConfig();
  const store = new SessionBaselineStore({
    ttlMinutes: config.sessionTtlMinutes,
    maxEntries: config.sessionMaxEntries,
  });
  const app = createApp(config, store);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      logger.info("Server started", {
        port: config.port,
        environment: config.nodeEnv,
        currency: config.currency,
      });
      resolve(server);
    });
    server.on("error", reject);
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error : new Error(String(error)),
    });
    process.exit(1);
  });
}
