/**
 * フォーム部品・指標カード・メッセージのHTML断片
 */

import { escapeHtml } from "./layout";

export type MessageKind = "success" | "info" | "warning" | "error";

export function renderMetric(label: string, value: string, delta?: string): string {
  return `<div class="metric">
      <div class="metric-label">${escapeHtml(label)}</div>
      <div class="metric-value">${escapeHtml(value)}</div>
      ${delta !== undefined ? `<div class="metric-delta">${escapeHtml(delta)}</div>` : ""}
    </div>`;
}

export function renderMessage(kind: MessageKind, text: string): string {
  return `<div class="message message-${kind}">${escapeHtml(text)}</div>`;
}

export function renderList(items: string[]): string {
  if (items.length === 0) return "";
  return `<ul>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>`;
}

interface NumberFieldOptions {
  min?: number;
  max?: number;
  step?: number;
  help?: string;
}

export function renderNumberField(
  name: string,
  label: string,
  value: number,
  options: NumberFieldOptions = {}
): string {
  const attrs = [
    options.min !== undefined ? `min="${options.min}"` : "",
    options.max !== undefined ? `max="${options.max}"` : "",
    `step="${options.step ?? 1}"`,
  ]
    .filter((a) => a.length > 0)
    .join(" ");

  return `<div class="field">
      <label for="${escapeHtml(name)}">${escapeHtml(label)}</label>
      <input type="number" id="${escapeHtml(name)}" name="${escapeHtml(name)}" value="${value}" ${attrs}>
      ${options.help ? `<span class="field-help">${escapeHtml(options.help)}</span>` : ""}
    </div>`;
}

export function renderTextField(name: string, label: string, value: string): string {
  return `<div class="field">
      <label>${escapeHtml(label)}</label>
      <input type="text" name="${escapeHtml(name)}" value="${escapeHtml(value)}">
    </div>`;
}

export function renderRangeField(
  name: string,
  label: string,
  value: number,
  range: { min: number; max: number }
): string {
  return `<div class="field">
      <label for="${escapeHtml(name)}">${escapeHtml(label)}: <output>${value}</output>%</label>
      <input type="range" id="${escapeHtml(name)}" name="${escapeHtml(name)}" value="${value}" min="${range.min}" max="${range.max}" step="1" oninput="this.previousElementSibling.querySelector('output').value = this.value">
    </div>`;
}

export function renderCheckbox(name: string, label: string, checked: boolean): string {
  return `<div class="field field-inline">
      <input type="checkbox" id="${escapeHtml(name)}" name="${escapeHtml(name)}" value="on"${checked ? " checked" : ""}>
      <label for="${escapeHtml(name)}">${escapeHtml(label)}</label>
    </div>`;
}

export function renderSelect<T extends string>(
  name: string,
  label: string,
  value: T,
  choices: ReadonlyArray<{ value: T; label: string }>
): string {
  const options = choices
    .map(
      (choice) =>
        `<option value="${escapeHtml(choice.value)}"${choice.value === value ? " selected" : ""}>${escapeHtml(choice.label)}</option>`
    )
    .join("");
  return `<div class="field">
      <label for="${escapeHtml(name)}">${escapeHtml(label)}</label>
      <select id="${escapeHtml(name)}" name="${escapeHtml(name)}">${options}</select>
    </div>`;
}
