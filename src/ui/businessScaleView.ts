/**
 * Business Scale 計算機ビュー（ARPUベースのLTV/CAC）
 */

import { Request, Response, RequestHandler } from "express";
import { logger } from "../logger";
import { toErrorMessage } from "../errors";
import { INPUT_LIMITS } from "../constants";
import { calculateArpuLtv, ArpuLtvResult } from "../metrics-engine";
import { validate, BusinessScaleFormSchema, BusinessScaleRequest, toArpuLtvInputs } from "../schemas";
import { renderLayout, buildErrorContent, escapeHtml, ViewContext } from "./layout";
import { formatCurrency, formatDecimal, formatPercent, formatMonths } from "./format";
import { renderRatioGauge } from "./gauge";
import { renderMetric, renderList, renderNumberField } from "./widgets";

export function buildBusinessScaleContent(
  form: BusinessScaleRequest,
  result: ArpuLtvResult,
  currency: string
): string {
  return `
    <div class="columns">
      <form method="get" action="/ui/business-scale" class="panel">
        <h3>📊 ビジネス指標を入力</h3>
        ${renderNumberField("arpu", "顧客あたり月次売上（ARPU）", form.arpu, {
          min: 0,
          step: 0.01,
          help: "1顧客あたりの月間平均売上",
        })}
        ${renderNumberField("monthlyChurnPct", "月次解約率（%）", form.monthlyChurnPct, {
          min: 0,
          max: INPUT_LIMITS.PERCENT_MAX,
          step: 0.1,
          help: "毎月解約する顧客の割合",
        })}
        ${renderNumberField("grossMarginPct", "粗利率（%）", form.grossMarginPct, {
          min: 0,
          max: INPUT_LIMITS.PERCENT_MAX,
          step: 0.1,
          help: "売上に対する粗利の割合",
        })}
        ${renderNumberField("cac", "顧客獲得コスト（CAC）", form.cac, {
          min: 0,
          step: 0.01,
          help: "新規顧客1人を獲得するための費用",
        })}
        <button type="submit" class="primary">計算する</button>
      </form>
      <div class="panel">
        <h3>🎯 主要な結果</h3>
        ${renderMetric("顧客生涯価値（LTV）", formatCurrency(result.ltv, currency))}
        ${renderMetric("LTV/CAC比率", formatDecimal(result.ratio))}
        ${renderMetric("CAC回収期間", formatMonths(result.paybackMonths))}
        ${renderRatioGauge(result.gauge)}
      </div>
    </div>

    <section class="section panel">
      <h2>📈 ステータス: ${escapeHtml(result.status)}</h2>
      <h3>🎯 推奨アクション</h3>
      ${renderList(result.recommendations)}
    </section>

    <section class="section">
      <h2>📊 その他の指標</h2>
      <div class="columns">
        ${renderMetric("顧客あたり月次売上", formatCurrency(form.arpu, currency))}
        ${renderMetric("月次解約率", formatPercent(form.monthlyChurnPct))}
        ${renderMetric("粗利率", formatPercent(form.grossMarginPct))}
      </div>
    </section>

    <section class="section panel">
      <h2>📘 この計算機の使い方</h2>
      <ol>
        <li>左のパネルにビジネス指標を入力する</li>
        <li>結果と推奨アクションを確認する</li>
        <li>ゲージでLTV/CAC比率を視覚的に把握する</li>
        <li>推奨アクションに沿って指標を改善する</li>
      </ol>
      <h3>🎯 目標指標</h3>
      ${renderList(["LTV/CAC比率 > 3", "月次解約率 < 5%", "CAC回収期間 < 12ヶ月"])}
    </section>`;
}

const businessScaleExtraStyles = `
    .panel ul, .panel ol { margin: 8px 0 12px 20px; }
    .section .columns .metric { margin-bottom: 0; }
`;

export function createBusinessScaleView(options: ViewContext): RequestHandler {
  const { env, currency } = options;

  return (req: Request, res: Response): void => {
    const validation = validate(BusinessScaleFormSchema, req.query);

    if (!validation.success) {
      logger.warn("Invalid business scale input", { errors: validation.errors });
      const html = renderLayout({
        title: "Business Scale 計算機 エラー",
        env,
        contentHtml: buildErrorContent(
          validation.errors.map((e) => `${e.field}: ${e.message}`).join("\n"),
          "入力値が正しくありません。値を確認して再度お試しください。"
        ),
        currentPath: "/ui/business-scale",
      });
      res.status(400).type("html").send(html);
      return;
    }

    try {
      const form = validation.data;
      const result = calculateArpuLtv(toArpuLtvInputs(form));

      const html = renderLayout({
        title: "🚀 Business Scale 計算機（LTV/CAC）",
        subtitle: "ユニットエコノミクスでビジネスの拡大余地を判断します",
        env,
        contentHtml: buildBusinessScaleContent(form, result, currency),
        extraStyles: businessScaleExtraStyles,
        currentPath: "/ui/business-scale",
      });
      res.status(200).type("html").send(html);
    } catch (error) {
      const errorMessage = toErrorMessage(error);
      logger.error("Failed to render business scale view", {
        error: errorMessage,
        stack: error instanceof Error ? error.stack : undefined,
      });

      const html = renderLayout({
        title: "Business Scale 計算機 エラー",
        env,
        contentHtml: buildErrorContent(errorMessage, "計算中にエラーが発生しました。"),
        currentPath: "/ui/business-scale",
      });
      res.status(500).type("html").send(html);
    }
  };
}
