import sharp from "sharp";

import { DaySummary, Sample } from "../model/history-model";
import { HistoryStore, makeSample } from "./history-store";
import { formatMoscow } from "./time";

const WIDTH = 1000;
const HEIGHT = 500;
const MARGIN = { top: 50, right: 30, bottom: 50, left: 80 };
const LINE_COLOR = "#003f5c";
const PLACEHOLDER_SPAN_MS = 5 * 60_000;

export type ChartOptions = {
  title?: string;
};

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function valueRange(values: number[]): { min: number; max: number } {
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  const padding = Math.max(1, (hi - lo) * 0.05);
  return { min: lo - padding, max: hi + padding };
}

function linePath(points: Sample[], x: (t: number) => number, y: (v: number) => number): string {
  return points
    .map((p, index) => {
      const px = x(p.timestamp.getTime());
      const py = y(p.value);
      return `${index === 0 ? "M" : "L"}${px.toFixed(2)} ${py.toFixed(2)}`;
    })
    .join(" ");
}

function summaryInset(summary: DaySummary): string {
  const w = 300;
  const h = 190;
  const x0 = WIDTH - MARGIN.right - w - 10;
  const y0 = HEIGHT - MARGIN.bottom - h - 10;
  const color = summary.close >= summary.open ? "#0b8a6a" : "#d64545";

  const spread = Math.max(summary.high - summary.low, 1e-6);
  const scale = (v: number) => y0 + h - (0.1 + 0.7 * ((v - summary.low) / spread)) * h;
  const candleX = x0 + 50;
  const bodyTop = scale(Math.max(summary.open, summary.close));
  const bodyHeight = Math.max(scale(Math.min(summary.open, summary.close)) - bodyTop, 3);

  const rows: Array<[string, number]> = [
    ["Open", summary.open],
    ["Current", summary.close],
    ["High", summary.high],
    ["Low", summary.low],
  ];
  const labels = rows
    .map(([title, value], i) => {
      const ly = y0 + 60 + i * 34;
      return (
        `<text x="${x0 + 105}" y="${ly}" font-size="15" fill="#4a4a4a">${title}</text>` +
        `<text x="${x0 + w - 12}" y="${ly}" font-size="16" text-anchor="end" fill="#111" font-family="monospace">${value.toFixed(2)}</text>`
      );
    })
    .join("");

  return [
    `<g class="day-summary">`,
    `<rect x="${x0}" y="${y0}" width="${w}" height="${h}" fill="#f8f9fb" stroke="${LINE_COLOR}" stroke-opacity="0.4"/>`,
    `<text x="${x0 + w / 2}" y="${y0 + 24}" font-size="16" font-weight="600" text-anchor="middle" fill="${LINE_COLOR}">Day candle</text>`,
    `<line x1="${candleX}" y1="${scale(summary.high).toFixed(2)}" x2="${candleX}" y2="${scale(summary.low).toFixed(2)}" stroke="${color}" stroke-width="3" stroke-linecap="round"/>`,
    `<rect x="${candleX - 12}" y="${bodyTop.toFixed(2)}" width="24" height="${bodyHeight.toFixed(2)}" fill="${color}" fill-opacity="0.9"/>`,
    labels,
    `</g>`,
  ].join("");
}

export function buildChartSvg(
  points: Sample[],
  summary?: DaySummary | null,
  opts?: ChartOptions,
): string {
  if (points.length === 0) {
    throw new Error("At least one data point is required to build a chart");
  }

  const { min, max } = valueRange(points.map((p) => p.value));
  const tStart = points[0].timestamp.getTime();
  const tEnd = points[points.length - 1].timestamp.getTime();
  const span = Math.max(tEnd - tStart, 1);

  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const x = (t: number) =>
    points.length === 1 ? MARGIN.left + plotW / 2 : MARGIN.left + ((t - tStart) / span) * plotW;
  const y = (v: number) => MARGIN.top + plotH - ((v - min) / (max - min)) * plotH;

  const grid: string[] = [];
  for (let i = 0; i <= 4; i++) {
    const v = min + ((max - min) * i) / 4;
    const gy = y(v).toFixed(2);
    grid.push(
      `<line x1="${MARGIN.left}" y1="${gy}" x2="${WIDTH - MARGIN.right}" y2="${gy}" stroke="#999" stroke-dasharray="4 4" stroke-opacity="0.4"/>`,
      `<text x="${MARGIN.left - 8}" y="${gy}" font-size="13" text-anchor="end" dominant-baseline="middle" fill="#333">${v.toFixed(2)}</text>`,
    );
  }

  const tickCount = points.length === 1 ? 1 : 7;
  for (let i = 0; i < tickCount; i++) {
    const t = tickCount === 1 ? tStart : tStart + (span * i) / (tickCount - 1);
    const tx = x(t).toFixed(2);
    grid.push(
      `<text x="${tx}" y="${HEIGHT - MARGIN.bottom + 22}" font-size="13" text-anchor="middle" fill="#333">${formatMoscow(new Date(t), "HH:mm")}</text>`,
    );
  }

  const title = escapeXml(opts?.title ?? "Index over the last 5 hours");

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="DejaVu Sans, Arial, sans-serif">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="30" font-size="20" text-anchor="middle" fill="#111">${title}</text>`,
    ...grid,
    `<path d="${linePath(points, x, y)}" fill="none" stroke="${LINE_COLOR}" stroke-width="2.5" stroke-linejoin="round" stroke-linecap="round"/>`,
    summary ? summaryInset(summary) : "",
    `</svg>`,
  ].join("");
}

export async function renderChart(
  points: Sample[],
  summary?: DaySummary | null,
  opts?: ChartOptions,
): Promise<Uint8Array> {
  const svg = buildChartSvg(points, summary, opts);
  return sharp(Buffer.from(svg)).png().toBuffer();
}

/** Trailing lookback window, or the last two samples when nothing is recent. */
export function selectChartWindow(history: HistoryStore, lookbackMs: number, now: Date): Sample[] {
  const recent = [...history.pointsSince(new Date(now.getTime() - lookbackMs))];
  if (recent.length > 0) return recent;
  return history.tail(2);
}

export function placeholderPoints(history: HistoryStore, now: Date): Sample[] {
  const last = history.lastPoint();
  if (!last) {
    return [makeSample(new Date(now.getTime() - PLACEHOLDER_SPAN_MS), 0), makeSample(now, 0)];
  }

  const from = new Date(last.timestamp.getTime() - PLACEHOLDER_SPAN_MS);
  const recent = [...history.pointsSince(from)];
  if (recent.length >= 2) return recent;
  return [makeSample(from, last.value), last];
}
