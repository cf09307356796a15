/**
 * 計算機UI共通レイアウト
 *
 * 全てのビューで統一されたヘッダー・ナビゲーション・フッターを提供
 */

// =============================================================================
// 型定義
// =============================================================================

/**
 * レイアウトオプション
 */
export interface LayoutOptions {
  /** ページタイトル */
  title: string;
  /** ページサブタイトル（任意） */
  subtitle?: string;
  /** 環境名（NODE_ENV） */
  env: string;
  /** ページ固有のコンテンツHTML */
  contentHtml: string;
  /** ページ固有の追加スタイル（任意） */
  extraStyles?: string;
  /** 現在のページパス（ナビゲーションのアクティブ判定用） */
  currentPath?: string;
}

/**
 * ビュー共通の表示設定
 */
export interface ViewContext {
  /** 環境名（NODE_ENV） */
  env: string;
  /** 金額表示の通貨コード */
  currency: string;
}

interface NavItem {
  href: string;
  label: string;
}

const NAV_ITEMS: NavItem[] = [
  { href: "/ui/calculator", label: "詳細計算機" },
  { href: "/ui/business-scale", label: "Business Scale" },
];

// =============================================================================
// ユーティリティ関数
// =============================================================================

/**
 * HTMLエスケープ
 */
export function escapeHtml(str: string | null | undefined): string {
  if (!str) return "";
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

// =============================================================================
// 共通レイアウト
// =============================================================================

const commonStyles = `
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Hiragino Sans", "Noto Sans CJK JP", sans-serif;
      background: #f7fafc;
      min-height: 100vh;
      display: flex;
      flex-direction: column;
      color: #2d3748;
    }
    .layout-header {
      background: linear-gradient(135deg, #1e3a5f, #2d5a87);
      color: white;
      padding: 16px 24px;
      display: flex;
      justify-content: space-between;
      align-items: center;
      box-shadow: 0 2px 4px rgba(0,0,0,0.1);
    }
    .layout-header h1 {
      font-size: 1.4rem;
      font-weight: 700;
      margin-bottom: 4px;
    }
    .layout-header .subtitle {
      font-size: 0.9rem;
      opacity: 0.9;
    }
    .env-badge {
      background: rgba(255,255,255,0.2);
      padding: 4px 12px;
      border-radius: 16px;
      font-size: 0.8rem;
      font-weight: 500;
    }
    .env-badge.production { background: #e53e3e; }
    .env-badge.development { background: #38a169; }
    .layout-nav {
      background: white;
      padding: 0 24px;
      display: flex;
      border-bottom: 1px solid #e2e8f0;
      box-shadow: 0 1px 2px rgba(0,0,0,0.05);
    }
    .layout-nav-item {
      display: inline-block;
      padding: 12px 20px;
      text-decoration: none;
      color: #4a5568;
      font-size: 0.9rem;
      font-weight: 500;
      border-bottom: 3px solid transparent;
      margin-bottom: -1px;
    }
    .layout-nav-item:hover { color: #2d3748; background: #f7fafc; }
    .layout-nav-item-active {
      color: #667eea;
      font-weight: 600;
      border-bottom-color: #667eea;
    }
    .layout-main {
      flex: 1;
      padding: 24px;
      max-width: 1200px;
      width: 100%;
      margin: 0 auto;
    }
    .layout-footer {
      background: #2d3748;
      color: #a0aec0;
      padding: 16px 24px;
      text-align: center;
      font-size: 0.85rem;
    }
    .layout-footer a { color: #63b3ed; text-decoration: none; margin-left: 8px; }
    /* 入力・結果の2カラム */
    .columns {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(320px, 1fr));
      gap: 24px;
    }
    .panel {
      background: white;
      border-radius: 8px;
      padding: 16px 20px;
      box-shadow: 0 1px 3px rgba(0,0,0,0.1);
    }
    .panel h3 { margin-bottom: 12px; font-size: 1.05rem; }
    .field { display: flex; flex-direction: column; margin-bottom: 12px; font-size: 0.9rem; }
    .field label { color: #4a5568; margin-bottom: 4px; }
    .field input[type="number"], .field input[type="text"], .field select {
      padding: 8px 12px;
      border: 1px solid #e2e8f0;
      border-radius: 4px;
      font-size: 0.9rem;
    }
    .field-inline { flex-direction: row; align-items: center; gap: 8px; }
    .field-help { color: #718096; font-size: 0.8rem; margin-top: 2px; }
    button.primary {
      background: #667eea;
      color: white;
      border: none;
      padding: 8px 16px;
      border-radius: 4px;
      cursor: pointer;
      font-size: 0.9rem;
    }
    button.primary:hover { background: #5a67d8; }
    /* 指標カード */
    .metric {
      background: #f0f2f6;
      padding: 12px 16px;
      border-radius: 5px;
      margin-bottom: 10px;
    }
    .metric-label { color: #4a5568; font-size: 0.85rem; }
    .metric-value { font-size: 1.5rem; font-weight: 600; }
    .metric-delta { font-size: 0.85rem; color: #718096; }
    /* メッセージ */
    .message { padding: 10px 14px; border-radius: 6px; margin-bottom: 10px; font-size: 0.9rem; }
    .message-success { background: #c6f6d5; color: #276749; }
    .message-info { background: #bee3f8; color: #2b6cb0; }
    .message-warning { background: #fefcbf; color: #975a16; }
    .message-error { background: #fed7d7; color: #c53030; }
    .numeric { text-align: right; }
    table { width: 100%; border-collapse: collapse; font-size: 0.85rem; }
    th, td { padding: 8px 10px; text-align: left; border-bottom: 1px solid #e2e8f0; }
    th { background: #f7fafc; color: #4a5568; font-weight: 600; font-size: 0.75rem; }
    .section { margin-top: 24px; }
    .section h2 { font-size: 1.2rem; margin-bottom: 12px; }
    /* エラーページ用スタイル */
    .error-content {
      max-width: 600px;
      margin: 48px auto;
      background: white;
      border-radius: 8px;
      box-shadow: 0 1px 3px rgba(0,0,0,0.1);
      padding: 32px;
    }
    .error-content .error-icon { font-size: 48px; text-align: center; margin-bottom: 16px; }
    .error-content .error-title { font-size: 1.25rem; color: #1a202c; margin-bottom: 16px; text-align: center; }
    .error-content .error-description { color: #4a5568; margin-bottom: 16px; line-height: 1.6; }
    .error-content .error-message {
      background: #fff5f5;
      border: 1px solid #feb2b2;
      padding: 12px 16px;
      border-radius: 6px;
      font-family: monospace;
      font-size: 0.85rem;
      color: #c53030;
      white-space: pre-wrap;
      word-break: break-word;
    }
`;

/**
 * 共通レイアウトでHTMLをレンダリング
 */
export function renderLayout(options: LayoutOptions): string {
  const { title, subtitle, env, contentHtml, extraStyles, currentPath } = options;
  const envBadgeClass = env === "production" ? "production" : "development";

  const navHtml = NAV_ITEMS.map(
    (item) =>
      `<a href="${item.href}" class="layout-nav-item${currentPath === item.href ? " layout-nav-item-active" : ""}">${escapeHtml(item.label)}</a>`
  ).join("\n    ");

  return `<!DOCTYPE html>
<html lang="ja">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} - ビジネス指標計算機</title>
  <style>
    ${commonStyles}
    ${extraStyles || ""}
  </style>
</head>
<body>
  <header class="layout-header">
    <div>
      <h1>${escapeHtml(title)}</h1>
      ${subtitle ? `<p class="subtitle">${escapeHtml(subtitle)}</p>` : ""}
    </div>
    <span class="env-badge ${envBadgeClass}">${escapeHtml(env)}</span>
  </header>

  <nav class="layout-nav">
    <a href="/" class="layout-nav-item${currentPath === "/" ? " layout-nav-item-active" : ""}">トップ</a>
    ${navHtml}
  </nav>
  <main class="layout-main">
    ${contentHtml}
  </main>

  <footer class="layout-footer">
    ビジネス指標計算機
    <a href="/">トップページへ戻る</a>
  </footer>
</body>
</html>`;
}

/**
 * エラーコンテンツを生成
 */
export function buildErrorContent(errorMessage: string, description: string): string {
  return `
    <div class="error-content">
      <div class="error-icon">&#9888;</div>
      <h2 class="error-title">エラーが発生しました</h2>
      <p class="error-description">${escapeHtml(description)}</p>
      <pre class="error-message">${escapeHtml(errorMessage)}</pre>
    </div>
  `;
}
