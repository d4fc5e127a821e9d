/**
 * Platform client types
 */

export interface PlanDigestClientConfig {
  /** API base URL, e.g. https://api.example.com/api/v0 */
  baseUrl: string;
  apiKey: string;
  orgId: string;
  /** Request timeout in milliseconds (default 30000) */
  timeout?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

export interface ListOptions {
  /** Page size; only the first page is fetched */
  limit?: number;
}

export type QueryParams = Record<string, string>;
