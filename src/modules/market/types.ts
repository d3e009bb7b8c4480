/** Market API endpoints fetched per item. */
export const MARKET_ENDPOINTS = ["orders", "statistics"] as const;

export type MarketEndpoint = (typeof MARKET_ENDPOINTS)[number];

export type OrderType = "buy" | "sell";

export interface MarketOrder {
  quantity: number;
  platinum: number;
  order_type: OrderType;
  visible: boolean;
  creation_date: string;
  last_update: string;
  platform?: string;
  region?: string;
  subtype?: string;
  user?: {
    id: string;
    ingame_name: string;
    status: "ingame" | "online" | "offline";
    reputation?: number;
    region?: string;
    last_seen?: string | null;
  };
}

export interface OrdersPayload {
  orders: MarketOrder[];
}

/** One day (or hour) of closed trades. */
export interface StatisticsRecord {
  datetime: string;
  median: number;
  volume: number;
  avg_price?: number;
  min_price?: number;
  max_price?: number;
  moving_avg?: number;
  order_type?: OrderType;
  subtype?: string;
}

export interface StatisticsPayload {
  statistics_closed: Record<string, StatisticsRecord[]>;
  statistics_live?: Record<string, StatisticsRecord[]>;
}

/** An item or relic to fetch, keyed by its catalog name. */
export interface FetchTarget {
  name: string;
  slug: string;
}

/** Raw dump as persisted: one single-entry object per entity that returned data. */
export type MarketDump = Array<Record<string, unknown>>;

export interface FetchProgress {
  done: number;
  total: number;
  failed: number;
}
