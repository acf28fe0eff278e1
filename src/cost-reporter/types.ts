/** UTC calendar date written as `YYYY-MM-DD`. */
export type IsoDate = string;

export interface DateRange {
  readonly start: IsoDate;
  readonly end: IsoDate;
}

export type OutputFormat = 'table' | 'json';

export interface CostBucket {
  date: IsoDate;
  amountCents: number;
}

export interface CostReport {
  range: DateRange;
  buckets: CostBucket[];
  totalCents: number;
  /** Response bodies exactly as the API returned them, one per page, in request order. */
  pages: string[];
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export type HttpTransport = (url: URL, headers: Record<string, string>) => Promise<HttpResponse>;

export interface CostReporterConfig {
  apiKey: string;
  baseUrl: string;
}
