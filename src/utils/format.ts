import { AlertPayload } from "../model/alert-model";
import { Sample } from "../model/history-model";
import { HistoryStore } from "./history-store";
import { formatMoscow } from "./time";

export const PLACEHOLDER_TEXT = "♻️ Restarting tracking…";
export const PLACEHOLDER_CAPTION = "Updating chart…";

export function signed(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;
}

export function formatWindow(ms: number): string {
  if (ms % 60_000 === 0) return `${ms / 60_000} min`;
  return `${Math.round(ms / 1000)} s`;
}

export function formatPriceMessage(
  indexName: string,
  sample: Sample,
  history: HistoryStore,
  windowMs: number,
): string {
  const lines = [
    `**${indexName}**`,
    `Current value: **${sample.value.toFixed(2)}**`,
    `Updated: ${formatMoscow(sample.timestamp, "dd.MM.yyyy HH:mm:ss")} MSK`,
  ];

  const reference = history.latestAtOrBefore(
    new Date(sample.timestamp.getTime() - windowMs),
  );
  if (reference) {
    const diff = sample.value - reference.value;
    if (Math.abs(diff) >= 0.01) {
      const arrow = diff > 0 ? "⬆️" : "⬇️";
      lines.push(`${arrow} Change over ${formatWindow(windowMs)}: ${signed(diff)}`);
    }
  }

  return lines.join("\n");
}

export function formatChartCaption(points: Sample[]): string {
  const first = points[0];
  const last = points.at(-1);
  if (!first || !last) return "No data yet";
  return (
    `Range: ${formatMoscow(first.timestamp, "dd.MM HH:mm")} – ` +
    `${formatMoscow(last.timestamp, "dd.MM HH:mm")} (MSK)\n` +
    `Points: ${points.length}`
  );
}

export function formatAlertMessage(alert: AlertPayload, windowMs: number): string {
  const arrow = alert.direction === "up" ? "🚀" : "📉";
  const label = alert.direction === "up" ? "Rise" : "Drop";
  return (
    `${arrow} ${label} of ${signed(alert.diff)} points over ${formatWindow(windowMs)}!\n` +
    `Current value: ${alert.value.toFixed(2)}`
  );
}
