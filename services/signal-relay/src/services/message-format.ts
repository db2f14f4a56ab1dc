import type { InboundEvent } from '../utils/validators.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Bot API ceiling for `sendMessage` text. */
export const MAX_MESSAGE_LENGTH = 4096;

/**
 * Telegram HTML text for one alert. The chart link is the only field that can
 * push the text past MAX_MESSAGE_LENGTH once escaped; it is left out then.
 */
export function renderSignalMessage(event: InboundEvent): string {
  let header = `<b>${escapeHtml(event.ticker)}</b>`;
  if (event.interval) header += `  (${escapeHtml(event.interval)})`;

  const lines = [
    header,
    `Signal: <i>${event.signal}</i>  Price: ${event.price}`,
    `🕒 ${escapeHtml(event.time)}`,
  ];
  const text = lines.join('\n');
  if (!event.chart) return text;

  const withChart = `${text}\n📈 <a href="${escapeHtml(event.chart)}">Chart</a>`;
  return withChart.length <= MAX_MESSAGE_LENGTH ? withChart : text;
}
