export type AssetClass = "stock" | "crypto";

export type NormalizedQuote = {
  symbol: string;
  provider: string;
  assetClass: AssetClass;
  price: number;
  currency: string;
  tradingDay?: string;
  rawPayload: unknown;
};
