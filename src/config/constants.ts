// Battle.net API
export const OAUTH_TOKEN_URL = "https://oauth.battle.net/token";
export const DEFAULT_LOCALE = "en_US";
export const REQUEST_TIMEOUT_MS = 30_000;

export function apiBaseUrl(region: string): string {
  return `https://${region}.api.blizzard.com`;
}

// Outbound rate limit
export const RATE_LIMIT_MAX_REQUESTS = 100; // per window
export const RATE_LIMIT_WINDOW_MS = 1000;
export const RATE_LIMIT_MAX_WAIT_ITERATIONS = 1000;

// OAuth credential
export const TOKEN_EXPIRY_BUFFER_MS = 60_000;
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

// Retry on transient failures
export const RETRY_MAX_ATTEMPTS = 3;
export const RETRY_BASE_DELAY_MS = 4000;
export const RETRY_MAX_DELAY_MS = 10_000;
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

// In-memory price history
export const HISTORY_MAX_ENTRIES = 288; // 24 hours of 5-minute intervals
export const BYTES_PER_DATA_POINT = 50;
export const BUDGET_SWEEP_SERIES = 100;

export interface ResourceBudget {
  maxRealmsPerRequest: number;
  maxItemsPerRealm: number;
  maxTotalItems: number;
  maxExecutionSeconds: number;
  minSecondsBetweenUpdates: number;
  maxHistoricalDataMB: number;
  maxDataPointsPerItem: number;
}

export const RESOURCE_LIMITS: ResourceBudget = {
  maxRealmsPerRequest: 5,
  maxItemsPerRealm: 500,
  maxTotalItems: 2000,
  maxExecutionSeconds: 300,
  minSecondsBetweenUpdates: 60,
  maxHistoricalDataMB: 100,
  maxDataPointsPerItem: 288,
};

// Bulk update
export const DEFAULT_TOP_ITEMS = 100;
export const MIN_TOP_ITEMS = 10;
export const DAEMON_DEFAULT_INTERVAL_MINUTES = 5;

// Result cache TTLs (ms)
export const ANALYSIS_CACHE_TTL_MS = 3_600_000; // 1 hour
export const TOKEN_PRICE_CACHE_TTL_MS = 300_000; // 5 min
export const ITEM_CACHE_TTL_MS = 86_400_000; // item data is static

// Item lookup
export const MAX_ITEM_LOOKUP = 50;

// Analytics
export const TREND_WINDOW_SIZE = 5;
export const TREND_SIGNAL_THRESHOLD = 0.05;
export const FLIP_VOLATILITY_THRESHOLD = 0.2;
export const BUY_POSITION_MAX = 0.3;
export const SELL_POSITION_MIN = 0.7;
export const MARKET_TRACK_TOP_ITEMS = 100;
export const DISPARITY_MIN_LISTINGS = 5;
export const LOW_COMPETITION_MAX_LISTINGS = 3;
export const MAX_TREND_ITEMS = 10;
export const TOP_MOVERS = 5;
export const OPPORTUNITY_LIST_LIMIT = 5;

// API pagination
export const DEFAULT_TOP_N = 20;
export const MAX_TOP_N = 100;
export const DEFAULT_HISTORY_HOURS = 24;
export const MAX_HISTORY_HOURS = 168; // durable store keeps a week; memory only 24h

// Durable store retention
export const PRICE_POINT_RETENTION_DAYS = 7;
export const SNAPSHOT_RETENTION_DAYS = 30;
