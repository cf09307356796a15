/**
 * LTV/CAC比率ゲージのSVG描画
 */

import { RatioGauge } from "../metrics-engine";
import { escapeHtml } from "./layout";
import { formatDecimal } from "./format";

const CENTER_X = 150;
const CENTER_Y = 150;
const ARC_RADIUS = 120;
const ARC_WIDTH = 28;
const NEEDLE_LENGTH = 100;

interface Point {
  x: number;
  y: number;
}

/**
 * 軸上の値を半円上の座標に変換（左端がmin、右端がmax）
 */
export function gaugePoint(gauge: RatioGauge, value: number, radius: number): Point {
  const span = gauge.max - gauge.min;
  const fraction = span > 0 ? (value - gauge.min) / span : 0;
  const angle = Math.PI * (1 - fraction);
  return {
    x: CENTER_X + radius * Math.cos(angle),
    y: CENTER_Y - radius * Math.sin(angle),
  };
}

function coord(n: number): string {
  return n.toFixed(2);
}

export function renderRatioGauge(gauge: RatioGauge): string {
  const bandPaths = gauge.bands
    .map((band) => {
      const start = gaugePoint(gauge, band.from, ARC_RADIUS);
      const end = gaugePoint(gauge, band.to, ARC_RADIUS);
      return `<path d="M ${coord(start.x)} ${coord(start.y)} A ${ARC_RADIUS} ${ARC_RADIUS} 0 0 1 ${coord(end.x)} ${coord(end.y)}" fill="none" stroke="${escapeHtml(band.color)}" stroke-width="${ARC_WIDTH}" />`;
    })
    .join("\n    ");

  const tip = gaugePoint(gauge, gauge.needle, NEEDLE_LENGTH);

  return `<svg class="ratio-gauge" viewBox="0 0 300 200" width="300" height="200" role="img" aria-label="${escapeHtml(gauge.title)}">
    <text x="${CENTER_X}" y="16" text-anchor="middle" font-size="14">${escapeHtml(gauge.title)}</text>
    ${bandPaths}
    <line x1="${CENTER_X}" y1="${CENTER_Y}" x2="${coord(tip.x)}" y2="${coord(tip.y)}" stroke="darkblue" stroke-width="4" />
    <circle cx="${CENTER_X}" cy="${CENTER_Y}" r="6" fill="darkblue" />
    <text x="${CENTER_X}" y="185" text-anchor="middle" font-size="22" font-weight="600">${escapeHtml(formatDecimal(gauge.value))}</text>
  </svg>`;
}
