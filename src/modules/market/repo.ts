import type { AxiosInstance } from "axios";
import type { MarketEndpoint } from "./types";

/**
 * Fetches the `payload` envelope of one market entity. Throttling must surface
 * as RateLimitError; every other failure may throw anything.
 */
export interface MarketTransport {
  getPayload(slug: string, endpoint: MarketEndpoint): Promise<unknown>;
}

export class MissingPayloadError extends Error {
  constructor(url: string) {
    super(`Response of ${url} has no payload`);
    this.name = "MissingPayloadError";
  }
}

export const marketItemUrl = (baseUrl: string, slug: string, endpoint: MarketEndpoint) =>
  `${baseUrl}/items/${encodeURIComponent(slug)}/${endpoint}`;

export const createMarketTransport = (http: AxiosInstance, baseUrl: string): MarketTransport => ({
  async getPayload(slug, endpoint) {
    const url = marketItemUrl(baseUrl, slug, endpoint);
    const { data } = await http.get<{ payload?: unknown }>(url, {
      headers: { Platform: "pc", Language: "en" },
    });
    if (!data || typeof data !== "object" || data.payload === undefined) {
      throw new MissingPayloadError(url);
    }
    return data.payload;
  },
});
