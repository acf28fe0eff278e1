import { z } from 'zod';
import { addDays, countDays } from './calendar';
import { ApiError, AuthError } from './errors';
import { httpsGet } from './http-transport';
import { silentLogger, type Logger } from './logger';
import { DEFAULT_BASE_URL, redactApiKey } from './config';
import type { CostBucket, CostReport, DateRange, HttpTransport, IsoDate } from './types';

export const ANTHROPIC_VERSION = '2023-06-01';
const COST_REPORT_PATH = '/v1/organizations/cost_report';

// The endpoint rejects spans shorter than two days and returns at most 31 daily buckets per page.
const MIN_SPAN_DAYS = 2;
const MAX_BUCKETS = 31;

const CostResultSchema = z
  .object({
    amount: z.coerce.number().finite(),
    currency: z.string().optional(),
  })
  .passthrough();

const CostBucketSchema = z
  .object({
    starting_at: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
    ending_at: z.string().optional(),
    results: z.array(CostResultSchema).default([]),
  })
  .passthrough();

const CostReportResponseSchema = z
  .object({
    data: z.array(CostBucketSchema),
    has_more: z.boolean().optional(),
    next_page: z.string().nullable().optional(),
  })
  .passthrough();

type CostReportPayload = z.infer<typeof CostReportResponseSchema>;

const ApiErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

export interface FetchCostReportOptions {
  baseUrl?: string;
  transport?: HttpTransport;
  logger?: Logger;
}

export interface RequestWindow {
  startingAt: string;
  endingAt: string;
  limit: number;
}

/**
 * Maps an inclusive date range onto the endpoint's exclusive `ending_at`, padding the end
 * so the span is never shorter than the endpoint's minimum.
 */
export function getRequestWindow(range: DateRange): RequestWindow {
  let exclusiveEnd = addDays(range.end, 1);
  if (countDays(range.start, exclusiveEnd) - 1 < MIN_SPAN_DAYS) {
    exclusiveEnd = addDays(range.start, MIN_SPAN_DAYS);
  }
  const days = countDays(range.start, exclusiveEnd) - 1;

  return {
    startingAt: `${range.start}T00:00:00Z`,
    endingAt: `${exclusiveEnd}T00:00:00Z`,
    limit: Math.min(days, MAX_BUCKETS),
  };
}

export function buildCostReportUrl(
  range: DateRange,
  baseUrl: string = DEFAULT_BASE_URL,
  page?: string
): URL {
  const window = getRequestWindow(range);
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${COST_REPORT_PATH}`);
  url.searchParams.set('starting_at', window.startingAt);
  url.searchParams.set('ending_at', window.endingAt);
  url.searchParams.set('limit', String(window.limit));
  if (page) {
    url.searchParams.set('page', page);
  }
  return url;
}

function tryParseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function extractErrorMessage(body: string): string {
  const parsed = ApiErrorBodySchema.safeParse(tryParseJson(body));
  if (parsed.success) {
    return parsed.data.error.message;
  }
  return body.trim() || 'empty response body';
}

function parseResponseBody(statusCode: number, body: string): CostReportPayload {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (e) {
    throw new ApiError(statusCode, 'Invalid JSON in response body');
  }

  const parsed = CostReportResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('; ');
    throw new ApiError(statusCode, `Unexpected response payload: ${issues}`);
  }
  return parsed.data;
}

/**
 * Sums each day's line items and keeps only the days inside the requested range.
 * Amounts arrive in cents as decimals and are rounded once per day to integer cents.
 */
function toDailyBuckets(
  data: CostReportPayload['data'],
  range: DateRange
): CostBucket[] {
  const byDate = new Map<IsoDate, number>();

  for (const bucket of data) {
    const date = bucket.starting_at.slice(0, 10);
    if (date < range.start || date > range.end) continue;
    const amount = bucket.results.reduce((sum, result) => sum + result.amount, 0);
    byDate.set(date, (byDate.get(date) ?? 0) + amount);
  }

  return Array.from(byDate.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, amount]) => ({ date, amountCents: Math.round(amount) }));
}

async function fetchPage(
  url: URL,
  apiKey: string,
  transport: HttpTransport,
  logger: Logger
): Promise<{ statusCode: number; body: string; payload: CostReportPayload }> {
  const response = await transport(url, {
    'anthropic-version': ANTHROPIC_VERSION,
    'x-api-key': apiKey,
  });

  logger.debug(`Cost report request returned ${response.statusCode}`, {
    bytes: Buffer.byteLength(response.body),
  });

  if (response.statusCode === 401 || response.statusCode === 403) {
    throw new AuthError(`Authentication failed (${response.statusCode}): ${extractErrorMessage(response.body)}`);
  }
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new ApiError(response.statusCode, extractErrorMessage(response.body));
  }

  return {
    statusCode: response.statusCode,
    body: response.body,
    payload: parseResponseBody(response.statusCode, response.body),
  };
}

/**
 * Fetches every daily bucket of the range. Ranges longer than one page follow the
 * `next_page` cursor until the API reports no more pages.
 */
export async function fetchCostReport(
  range: DateRange,
  apiKey: string,
  options: FetchCostReportOptions = {}
): Promise<CostReport> {
  const { baseUrl = DEFAULT_BASE_URL, transport = httpsGet, logger = silentLogger } = options;

  if (!apiKey.trim()) {
    throw new AuthError('Missing API key');
  }

  // One page more than the range needs, so a cursor that never ends cannot loop forever.
  const maxPages = Math.ceil(countDays(range.start, range.end) / MAX_BUCKETS) + 1;
  const pages: string[] = [];
  const data: CostReportPayload['data'] = [];
  let cursor: string | undefined;

  for (;;) {
    const url = buildCostReportUrl(range, baseUrl, cursor);
    logger.debug(`Fetching cost report for ${range.start} to ${range.end}`, {
      url: url.toString(),
      apiKey: redactApiKey(apiKey),
      page: pages.length + 1,
    });

    const { statusCode, body, payload } = await fetchPage(url, apiKey, transport, logger);
    pages.push(body);
    data.push(...payload.data);

    if (!payload.has_more) break;
    if (!payload.next_page) {
      throw new ApiError(statusCode, 'Response reports more pages but carries no next_page cursor');
    }
    if (pages.length >= maxPages) {
      throw new ApiError(statusCode, `Pagination did not finish after ${pages.length} pages`);
    }
    cursor = payload.next_page;
  }

  const buckets = toDailyBuckets(data, range);
  const totalCents = buckets.reduce((sum, bucket) => sum + bucket.amountCents, 0);

  logger.debug(`Cost report parsed: ${buckets.length} of ${data.length} buckets in range`, {
    totalCents,
    pages: pages.length,
  });

  return { range, buckets, totalCents, pages };
}
