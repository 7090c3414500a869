export type Sample = Readonly<{
  timestamp: Date;
  value: number;
}>;

export type DaySummary = {
  open: number;
  high: number;
  low: number;
  close: number;
};

export interface MetricSource {
  fetchCurrent(): Promise<Sample>;
  fetchDaySummary(): Promise<DaySummary>;
  fetchCandles(start: Date, end: Date, intervalMinutes: number): Promise<Sample[]>;
}

export type ChartRenderer = (
  points: Sample[],
  summary?: DaySummary | null,
) => Promise<Uint8Array>;
