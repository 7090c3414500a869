export type AlertDirection = "up" | "down";

export type AlertPayload = {
  direction: AlertDirection;
  diff: number;
  value: number;
  timestamp: Date;
  windowStart: Date;
};
