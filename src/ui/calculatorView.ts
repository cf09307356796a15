/**
 * 詳細計算機ビュー（LTV / CAC / 解約率 / インサイト / シナリオ の5タブ）
 *
 * 全タブの入力を1つのGETフォームで送り、リクエストごとに全タブを再計算する。
 * LTV・CACの結果はセッションのベースラインを上書きし、シナリオはその値を使う
 */

import { Request, Response, RequestHandler } from "express";
import { logger } from "../logger";
import { toErrorMessage } from "../errors";
import { INPUT_LIMITS, RATIO_THRESHOLDS } from "../constants";
import {
  calculateLtv,
  calculateCac,
  calculateChurn,
  analyzeInsights,
  calculateScenario,
  computeRatio,
  getAdvancedRecommendations,
  getCacHealthMessage,
  buildRatioGauge,
  isInfinite,
  isNotAvailable,
  LtvResult,
  CacResult,
  CacHealth,
  ChurnResult,
  InsightResult,
  ScenarioResult,
  MaybeInfinite,
  AdvancedRecommendation,
  RatioGauge,
  RatioTier,
  PaybackLevel,
  RateLevel,
  RateInsight,
  SpendCategoryShare,
} from "../metrics-engine";
import {
  validate,
  CalculatorFormSchema,
  CalculatorForm,
  CalculatorTab,
  splitCalculatorForm,
  toLtvInputs,
  toCacInputs,
  toChurnInputs,
  toInsightInputs,
  toScenarioAdjustment,
} from "../schemas";
import { SessionBaselineStore } from "../session";
import { renderLayout, buildErrorContent, escapeHtml, ViewContext } from "./layout";
import {
  formatCurrency,
  formatDecimal,
  formatRate,
  formatPercent,
  formatSignedPercent,
  formatYears,
  formatMonths,
  formatRatioLabel,
} from "./format";
import { renderRatioGauge } from "./gauge";
import {
  MessageKind,
  renderMetric,
  renderMessage,
  renderList,
  renderNumberField,
  renderTextField,
  renderRangeField,
  renderCheckbox,
  renderSelect,
} from "./widgets";

// =============================================================================
// 型定義
// =============================================================================

export interface CalculatorModel {
  form: CalculatorForm;
  sessionId: string;
  ltv: LtvResult;
  cac: CacResult;
  churn: ChurnResult;
  insights: InsightResult;
  scenario: ScenarioResult;
  ratio: MaybeInfinite;
  recommendations: AdvancedRecommendation;
  gauge: RatioGauge;
}

export interface CalculatorViewOptions extends ViewContext {
  store: SessionBaselineStore;
}

const TABS: ReadonlyArray<{ tab: CalculatorTab; label: string }> = [
  { tab: "ltv", label: "💰 LTV計算" },
  { tab: "cac", label: "📈 CAC分析" },
  { tab: "churn", label: "📉 解約率分析" },
  { tab: "insights", label: "🔍 詳細インサイト" },
  { tab: "scenario", label: "🎯 シナリオ" },
];

const PAYBACK_MESSAGE_KIND: Record<PaybackLevel, MessageKind> = {
  FAST: "success",
  GOOD: "info",
  SLOW: "warning",
  CRITICAL: "error",
};

const CAC_HEALTH_MESSAGE_KIND: Record<CacHealth, MessageKind> = {
  HIGH: "error",
  WARNING: "warning",
  HEALTHY: "success",
};

const RATE_MESSAGE_KIND: Record<RateLevel, MessageKind> = {
  LOW: "error",
  AVERAGE: "warning",
  STRONG: "success",
};

const TIER_MESSAGE_KIND: Record<RatioTier, MessageKind> = {
  CRITICAL: "error",
  NEEDS_WORK: "warning",
  HEALTHY: "success",
  EXCELLENT: "success",
};

const SPEND_CATEGORY_LABELS: Record<SpendCategoryShare["category"], string> = {
  AD_SPEND: "広告費",
  TEAM_COST: "人件費",
  TOOLS: "ツール・ソフトウェア",
  OTHER: "その他",
};

// =============================================================================
// 計算
// =============================================================================

/**
 * フォーム値から全タブの結果を計算し、セッションのベースラインを更新
 */
export function buildCalculatorModel(form: CalculatorForm, store: SessionBaselineStore): CalculatorModel {
  const requests = splitCalculatorForm(form);

  const ltv = calculateLtv(toLtvInputs(requests.ltv));
  const afterLtv = store.update(form.sessionId, { baseLtv: isInfinite(ltv.ltv) ? 0 : ltv.ltv });

  // CACの回収期間はLTVタブの年間売上を基準にする
  const cac = calculateCac(toCacInputs(requests.cac), ltv.annualRevenuePerCustomer);
  const session = store.update(afterLtv.sessionId, { baseCac: cac.cac });

  const churn = calculateChurn(toChurnInputs(requests.churn));
  const insights = analyzeInsights(toInsightInputs(requests.insights));
  const scenario = calculateScenario(session.baseline, toScenarioAdjustment(requests.scenario));

  const ratio = computeRatio(session.baseline.baseLtv, session.baseline.baseCac);

  return {
    form,
    sessionId: session.sessionId,
    ltv,
    cac,
    churn,
    insights,
    scenario,
    ratio,
    recommendations: getAdvancedRecommendations(ratio),
    gauge: buildRatioGauge(ratio),
  };
}

// =============================================================================
// タブごとのコンテンツ
// =============================================================================

function buildLtvTab(model: CalculatorModel, currency: string): string {
  const { form, ltv } = model;
  return `
    <h2>📊 顧客生涯価値（LTV）の計算</h2>
    <div class="columns">
      <div class="panel">
        ${renderNumberField("avgPurchaseValue", "平均購入単価", form.avgPurchaseValue, { min: 0, step: 0.01 })}
        ${renderNumberField("purchaseFrequency", "年間購入回数", form.purchaseFrequency, { min: 0, step: 0.1 })}
        ${renderCheckbox("useChurn", "解約率から顧客寿命を計算する", form.useChurn)}
        ${renderNumberField("monthlyChurnPct", "月次解約率（%）", form.monthlyChurnPct, {
          min: 0,
          max: INPUT_LIMITS.PERCENT_MAX,
          step: 0.1,
          help: "チェック時に使用",
        })}
        ${renderNumberField("lifespanYears", "平均顧客寿命（年）", form.lifespanYears, {
          min: 0,
          step: 0.1,
          help: "チェックなしの場合に使用",
        })}
      </div>
      <div class="panel">
        ${renderMetric("LTV（顧客生涯価値）", formatCurrency(ltv.ltv, currency))}
        ${renderMetric("顧客あたり年間売上", formatCurrency(ltv.annualRevenuePerCustomer, currency))}
        ${renderMetric("平均顧客寿命", formatYears(ltv.lifespanYears))}
      </div>
    </div>`;
}

function buildBreakdownTable(model: CalculatorModel, currency: string): string {
  const breakdown = model.cac.breakdown;
  if (!breakdown) return "";

  const rows = breakdown.categories
    .map(
      (c) => `<tr>
        <td>${escapeHtml(SPEND_CATEGORY_LABELS[c.category])}</td>
        <td class="numeric">${escapeHtml(formatCurrency(c.amount, currency))}</td>
        <td class="numeric">${escapeHtml(formatRate(c.share))}</td>
      </tr>`
    )
    .join("");

  return `
    ${breakdown.overBudget ? renderMessage("warning", "⚠️ 内訳の合計がマーケティング費用の総額を超えています") : ""}
    <table>
      <thead><tr><th>区分</th><th class="numeric">金額</th><th class="numeric">構成比</th></tr></thead>
      <tbody>${rows}</tbody>
    </table>`;
}

/**
 * 回収期間のメッセージ（CAC未計上で回収期間0の場合は出さない）
 */
export function buildPaybackMessage(cac: CacResult): string {
  const text = `CAC回収期間: ${formatMonths(cac.paybackMonths)}`;
  if (cac.paybackLevel) {
    return renderMessage(PAYBACK_MESSAGE_KIND[cac.paybackLevel], text);
  }
  return isNotAvailable(cac.paybackMonths) ? renderMessage("info", text) : "";
}

function buildCacTab(model: CalculatorModel, currency: string): string {
  const { form, cac } = model;
  const periodLabel = cac.period === "MONTHLY" ? "月次" : "年次";

  return `
    <h2>💰 顧客獲得コスト（CAC）分析</h2>
    <div class="columns">
      <div class="panel">
        <h3>${periodLabel}マーケティング指標</h3>
        ${renderSelect("period", "分析期間", form.period, [
          { value: "MONTHLY", label: "月次" },
          { value: "ANNUAL", label: "年次" },
        ])}
        ${renderNumberField("marketingSpend", "マーケティング費用の総額", form.marketingSpend, { min: 0, step: 100 })}
        ${renderNumberField("newCustomers", "新規獲得顧客数", form.newCustomers, { min: 0, step: 1 })}
        ${renderCheckbox("showBreakdown", "費用の内訳を入力する", form.showBreakdown)}
        ${
          form.showBreakdown
            ? `<h3>マーケティング費用の内訳</h3>
        ${renderNumberField("adSpend", "広告費", form.adSpend, { min: 0, step: 100 })}
        ${renderNumberField("teamCost", "人件費", form.teamCost, { min: 0, step: 100 })}
        ${renderNumberField("toolCost", "ツール・ソフトウェア", form.toolCost, { min: 0, step: 100 })}
        ${buildBreakdownTable(model, currency)}`
            : ""
        }
      </div>
      <div class="panel">
        <h3>主要指標</h3>
        ${renderMetric("顧客獲得コスト（CAC）", formatCurrency(cac.cac, currency))}
        ${renderMetric("顧客あたり月次売上", formatCurrency(cac.monthlyRevenuePerCustomer, currency))}
        ${buildPaybackMessage(cac)}
        ${renderMetric("月次ROI", formatSignedPercent(cac.monthlyRoiPct))}
        <h3>マーケティング効率</h3>
        ${renderMetric("売上1ドルあたりの獲得コスト", formatCurrency(cac.costPerRevenueDollar, currency))}
        <h3>CAC評価</h3>
        ${renderMessage(CAC_HEALTH_MESSAGE_KIND[cac.cacHealth], getCacHealthMessage(cac.cacHealth))}
      </div>
    </div>`;
}

function buildChurnTab(model: CalculatorModel): string {
  const { form, churn } = model;
  return `
    <h2>📉 解約率分析</h2>
    <div class="columns">
      <div class="panel">
        ${renderSelect("churnMethod", "計算方法", form.churnMethod, [
          { value: "LOST_CUSTOMERS", label: "失った顧客数から計算" },
          { value: "START_END", label: "期首・期末の顧客数から計算" },
        ])}
        ${renderNumberField("startCustomers", "期首の顧客数", form.startCustomers, { min: 0 })}
        ${renderNumberField("lostCustomers", "期間中に失った顧客数", form.lostCustomers, { min: 0 })}
        ${renderNumberField("endCustomers", "期末の顧客数", form.endCustomers, { min: 0 })}
      </div>
      <div class="panel">
        ${renderMetric("月次解約率", formatRate(churn.monthlyChurnRate))}
        ${renderMetric("年間解約率", formatRate(churn.annualChurnRate))}
        ${renderMetric("平均顧客寿命", formatYears(churn.lifespanYears))}
      </div>
    </div>`;
}

function buildSegmentFields(form: CalculatorForm): string {
  const fields: string[] = [];
  for (let i = 0; i < form.segmentCount; i++) {
    const segment = form.segments[i];
    fields.push(`
      <h3>セグメント ${i + 1}</h3>
      ${renderTextField(`segments[${i}][name]`, "セグメント名", segment?.name ?? `セグメント${i + 1}`)}
      ${renderNumberField(`segments[${i}][averageValue]`, "平均購入単価", segment?.averageValue ?? 0, { min: 0, step: 0.01 })}
      ${renderNumberField(`segments[${i}][percentage]`, "顧客に占める割合（%）", segment?.percentage ?? 0, {
        min: 0,
        max: INPUT_LIMITS.PERCENT_MAX,
      })}`);
  }
  return fields.join("");
}

function buildSegmentSummary(model: CalculatorModel, currency: string): string {
  const summary = model.insights.segments;
  if (!summary) return "";

  const rows = summary.segments
    .map(
      (s) => `<tr>
        <td>${escapeHtml(s.name)}</td>
        <td class="numeric">${escapeHtml(formatCurrency(s.averageValue, currency))}</td>
        <td class="numeric">${escapeHtml(formatPercent(s.percentage))}</td>
      </tr>`
    )
    .join("");

  return `
    <h3>セグメント概要</h3>
    <table>
      <thead><tr><th>セグメント</th><th class="numeric">平均購入単価</th><th class="numeric">割合</th></tr></thead>
      <tbody>${rows}</tbody>
    </table>
    ${renderMetric("加重平均購入単価", formatCurrency(summary.weightedAverageValue, currency))}`;
}

function renderRateInsight(label: string, insight: RateInsight): string {
  return `${renderMetric(label, formatPercent(insight.rate))}
        ${renderMessage(RATE_MESSAGE_KIND[insight.level], insight.message)}`;
}

function buildInsightsTab(model: CalculatorModel, currency: string): string {
  const { form, insights } = model;
  return `
    <h2>🔍 詳細ビジネスインサイト</h2>
    <div class="columns">
      <div class="panel">
        ${renderCheckbox("hasSegments", "顧客セグメントを分析する", form.hasSegments)}
        ${renderNumberField("segmentCount", "セグメント数", form.segmentCount, {
          min: INPUT_LIMITS.SEGMENTS_MIN,
          max: INPUT_LIMITS.SEGMENTS_MAX,
        })}
        ${form.hasSegments ? buildSegmentFields(form) : ""}
        ${renderNumberField("retentionRate", "リピート購入率（%）", form.retentionRate, { min: 0, max: INPUT_LIMITS.PERCENT_MAX })}
        ${renderNumberField("upsellRate", "アップセル・クロスセル率（%）", form.upsellRate, { min: 0, max: INPUT_LIMITS.PERCENT_MAX })}
        ${renderNumberField("referralRate", "紹介率（%）", form.referralRate, { min: 0, max: INPUT_LIMITS.PERCENT_MAX })}
      </div>
      <div class="panel">
        <h3>主要インサイト</h3>
        ${renderRateInsight("リピート購入率", insights.retention)}
        ${renderRateInsight("アップセル・クロスセル率", insights.upsell)}
        ${renderRateInsight("紹介率", insights.referral)}
        ${buildSegmentSummary(model, currency)}
      </div>
    </div>`;
}

function buildScenarioTab(model: CalculatorModel, currency: string): string {
  const { form, scenario } = model;
  return `
    <h2>🎯 シナリオプランニング</h2>
    <div class="columns">
      <div class="panel">
        <h3>指標を調整</h3>
        ${renderRangeField("purchaseValueChangePct", "平均購入単価の変化", form.purchaseValueChangePct, INPUT_LIMITS.PURCHASE_VALUE_CHANGE)}
        ${renderRangeField("cacChangePct", "CACの変化", form.cacChangePct, INPUT_LIMITS.CAC_CHANGE)}
        ${renderRangeField("retentionChangePct", "リピート率の変化", form.retentionChangePct, INPUT_LIMITS.RETENTION_CHANGE)}
        <p class="field-help">LTV・CACタブで計算した直近の値を基準にします。</p>
      </div>
      <div class="panel">
        <h3>影響分析</h3>
        ${renderMetric("新しいLTV", formatCurrency(scenario.newLtv, currency), formatSignedPercent(form.purchaseValueChangePct))}
        ${renderMetric("新しいCAC", formatCurrency(scenario.newCac, currency), formatSignedPercent(form.cacChangePct))}
        ${renderMetric("新しいLTV/CAC比率", formatDecimal(scenario.newRatio), formatSignedPercent(scenario.ratioChangePct))}
      </div>
    </div>`;
}

// =============================================================================
// 推奨アクション・ヘルプ
// =============================================================================

function buildRecommendationsSection(model: CalculatorModel): string {
  const rec = model.recommendations;
  const strategy = rec.strategy
    .map((step, i) => `<li><strong>${i + 1}. ${escapeHtml(step.title)}</strong>${renderList(step.items)}</li>`)
    .join("");

  return `
    <section class="section">
      <h2>📋 推奨アクション</h2>
      <div class="columns">
        <div class="panel">
          <h3>現在の状況</h3>
          <h4>業界ベンチマーク</h4>
          ${renderList([
            `🔴 ${RATIO_THRESHOLDS.CRITICAL_BELOW}:1 未満 - 危険`,
            `🟡 ${RATIO_THRESHOLDS.CRITICAL_BELOW}:1 〜 ${RATIO_THRESHOLDS.NEEDS_WORK_BELOW}:1 - 要改善`,
            `🟢 ${RATIO_THRESHOLDS.NEEDS_WORK_BELOW}:1 〜 ${RATIO_THRESHOLDS.HEALTHY_BELOW}:1 - 健全`,
            `🌟 ${RATIO_THRESHOLDS.HEALTHY_BELOW}:1 以上 - 優秀`,
          ])}
          <h4>現在の比率</h4>
          <p class="current-ratio">${escapeHtml(formatRatioLabel(model.ratio))}</p>
          ${renderMessage(TIER_MESSAGE_KIND[rec.tier], `${rec.headline}: ${formatDecimal(model.ratio)}`)}
          <p><strong>${escapeHtml(rec.quickWinsTitle)}</strong></p>
          ${renderList(rec.quickWins)}
          ${renderRatioGauge(model.gauge)}
        </div>
        <div class="panel">
          <h3>戦略的な推奨事項</h3>
          <p><strong>${escapeHtml(rec.strategyTitle)}</strong></p>
          <ol class="strategy">${strategy}</ol>
        </div>
      </div>
    </section>`;
}

function buildHelpSection(): string {
  return `
    <details class="section panel">
      <summary>📘 この計算機の使い方</summary>
      <ol>
        <li>LTV計算タブで顧客の価値を把握する</li>
        <li>CAC分析タブで獲得コストを評価する</li>
        <li>解約率分析タブで顧客の定着状況を確認する</li>
        <li>詳細インサイトタブでより深く分析する</li>
        <li>シナリオタブで改善の効果を試算する</li>
      </ol>
      <p>目標指標:</p>
      ${renderList(["LTV/CAC比率 > 3", "月次解約率 < 5%", "リピート購入率 > 50%"])}
    </details>`;
}

// =============================================================================
// ページ全体
// =============================================================================

const calculatorExtraStyles = `
    .tabs { display: flex; gap: 4px; margin-bottom: 16px; flex-wrap: wrap; }
    .tab-button {
      background: white;
      border: 1px solid #e2e8f0;
      padding: 8px 14px;
      border-radius: 6px 6px 0 0;
      cursor: pointer;
      font-size: 0.9rem;
    }
    .tab-button-active { background: #667eea; color: white; border-color: #667eea; }
    .tab-panel h2 { font-size: 1.2rem; margin-bottom: 12px; }
    .current-ratio { text-align: center; font-size: 1.6rem; font-weight: 700; margin: 8px 0; }
    .strategy li { margin-bottom: 8px; }
    .panel ul, .panel ol { margin: 8px 0 12px 20px; }
    .panel h4 { margin: 8px 0 4px; font-size: 0.95rem; }
    .form-actions { margin-top: 16px; }
`;

export function buildCalculatorContent(model: CalculatorModel, currency: string): string {
  const active = model.form.tab;
  const tabButtons = TABS.map(
    ({ tab, label }) =>
      `<button type="submit" name="tab" value="${tab}" class="tab-button${tab === active ? " tab-button-active" : ""}">${escapeHtml(label)}</button>`
  ).join("");

  const panels: Record<CalculatorTab, string> = {
    ltv: buildLtvTab(model, currency),
    cac: buildCacTab(model, currency),
    churn: buildChurnTab(model),
    insights: buildInsightsTab(model, currency),
    scenario: buildScenarioTab(model, currency),
  };

  // 非表示タブの入力も送信して値を保持する
  const panelHtml = TABS.map(
    ({ tab }) => `<div class="tab-panel" data-tab="${tab}"${tab === active ? "" : " hidden"}>${panels[tab]}</div>`
  ).join("");

  return `
    <form method="get" action="/ui/calculator">
      <input type="hidden" name="sessionId" value="${escapeHtml(model.sessionId)}">
      <div class="tabs">${tabButtons}</div>
      ${panelHtml}
      <div class="form-actions">
        <button type="submit" name="tab" value="${active}" class="primary">再計算</button>
      </div>
    </form>
    ${buildRecommendationsSection(model)}
    ${buildHelpSection()}`;
}

// =============================================================================
// ハンドラ
// =============================================================================

export function createCalculatorView(options: CalculatorViewOptions): RequestHandler {
  const { store, env, currency } = options;

  return (req: Request, res: Response): void => {
    const validation = validate(CalculatorFormSchema, req.query);

    if (!validation.success) {
      logger.warn("Invalid calculator input", { errors: validation.errors });
      const contentHtml = buildErrorContent(
        validation.errors.map((e) => `${e.field}: ${e.message}`).join("\n"),
        "入力値が正しくありません。値を確認して再度お試しください。"
      );
      const html = renderLayout({
        title: "詳細ビジネス指標計算機 エラー",
        env,
        contentHtml,
        currentPath: "/ui/calculator",
      });
      res.status(400).type("html").send(html);
      return;
    }

    try {
      const model = buildCalculatorModel(validation.data, store);
      logger.debug("renderCalculatorView", { tab: model.form.tab, sessionId: model.sessionId });

      const html = renderLayout({
        title: "🚀 詳細ビジネス指標計算機",
        subtitle: "詳細分析とシナリオプランニング",
        env,
        contentHtml: buildCalculatorContent(model, currency),
        extraStyles: calculatorExtraStyles,
        currentPath: "/ui/calculator",
      });
      res.status(200).type("html").send(html);
    } catch (error) {
      const errorMessage = toErrorMessage(error);
      logger.error("Failed to render calculator view", {
        error: errorMessage,
        stack: error instanceof Error ? error.stack : undefined,
      });

      const html = renderLayout({
        title: "詳細ビジネス指標計算機 エラー",
        env,
        contentHtml: buildErrorContent(errorMessage, "計算中にエラーが発生しました。"),
        currentPath: "/ui/calculator",
      });
      res.status(500).type("html").send(html);
    }
  };
}
