/**
 * Finnhub API response types
 */

export interface FinnhubCandle {
  c?: number[]; // Close prices
  h?: number[]; // High prices
  l?: number[]; // Low prices
  o?: number[]; // Open prices
  s: string; // Status: ok, no_data
  t?: number[]; // Unix timestamps
  v?: number[]; // Volume
}
