// Current mid prices for listed coins
export interface MarketPricesResponseDto {
  prices: Record<string, string>;  // { "BTC": "64250.5", "ETH": "3120.15" }
  lastUpdated: string;             // ISO timestamp of the fetch
  source: string;                  // always "hyperliquid"
}
