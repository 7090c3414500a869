import { z } from "zod";

const IssTableSchema = z.object({
  columns: z.array(z.string()),
  data: z.array(z.array(z.unknown())),
});

export const IssMarketdataResponse = z.object({ marketdata: IssTableSchema });
export const IssCandlesResponse = z.object({ candles: IssTableSchema });
