/**
 * トップページ
 */

import { Request, Response, RequestHandler } from "express";
import { renderLayout, escapeHtml, ViewContext } from "./layout";

interface IndexCard {
  href: string;
  title: string;
  description: string;
}

const CARDS: IndexCard[] = [
  {
    href: "/ui/calculator",
    title: "詳細ビジネス指標計算機",
    description: "LTV・CAC・解約率・インサイト・シナリオの5タブで詳細に分析します。",
  },
  {
    href: "/ui/business-scale",
    title: "Business Scale 計算機",
    description: "ARPU・解約率・粗利率・CACからLTV/CAC比率と回収期間を算出します。",
  },
  {
    href: "/api",
    title: "API一覧",
    description: "指標計算APIのエンドポイント一覧（JSON）。",
  },
  {
    href: "/health",
    title: "ヘルスチェック",
    description: "サービスの稼働状況を確認します。",
  },
];

const indexExtraStyles = `
    .grid {
      display: grid;
      grid-template-columns: repeat(auto-fit, minmax(220px, 1fr));
      gap: 16px;
    }
    .card {
      background: white;
      border-radius: 12px;
      padding: 16px 18px;
      text-decoration: none;
      color: inherit;
      box-shadow: 0 1px 3px rgba(0,0,0,0.1);
      border: 1px solid #e2e8f0;
      transition: transform 0.15s ease, border-color 0.15s ease;
    }
    .card:hover { transform: translateY(-2px); border-color: #667eea; }
    .card-title { font-size: 16px; font-weight: 600; margin-bottom: 6px; }
    .card-desc { font-size: 13px; color: #4a5568; }
    .meta { margin-bottom: 16px; font-size: 14px; color: #4a5568; }
    .meta span { display: inline-block; margin-right: 16px; }
`;

export function buildIndexContent(version: string, env: string): string {
  const cards = CARDS.map(
    (card) => `<a href="${card.href}" class="card">
        <div class="card-title">${card.title}</div>
        <div class="card-desc">${card.description}</div>
      </a>`
  ).join("\n      ");

  return `
    <div class="meta">
      <span>バージョン: v${escapeHtml(version)}</span>
      <span>環境: ${escapeHtml(env)}</span>
    </div>
    <div class="grid">
      ${cards}
    </div>`;
}

export function createIndexView(options: ViewContext & { version: string }): RequestHandler {
  const { env, version } = options;

  return (_req: Request, res: Response): void => {
    const html = renderLayout({
      title: "ビジネス指標計算機",
      subtitle: "LTV・CAC・解約率から事業の拡大余地を判断するためのツールです。",
      env,
      contentHtml: buildIndexContent(version, env),
      extraStyles: indexExtraStyles,
      currentPath: "/",
    });
    res.status(200).type("html").send(html);
  };
}
