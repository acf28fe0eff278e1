import http from 'http';
import https from 'https';
import { NetworkError } from './errors';
import type { HttpResponse, HttpTransport } from './types';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpTransportOptions {
  timeoutMs?: number;
}

/**
 * Builds a transport that sends one GET request and resolves with the status and full body,
 * whatever the status. Only transport failures reject, always with a NetworkError, and an
 * idle socket counts as one after `timeoutMs`. There is no retry.
 */
export function createHttpTransport({ timeoutMs = DEFAULT_TIMEOUT_MS }: HttpTransportOptions = {}): HttpTransport {
  return (url, headers) => {
    const request: typeof http.request = url.protocol === 'http:' ? http.request : https.request;

    return new Promise<HttpResponse>((resolve, reject) => {
      const req = request(
        {
          hostname: url.hostname,
          port: url.port || (url.protocol === 'http:' ? 80 : 443),
          path: url.pathname + url.search,
          method: 'GET',
          headers,
        },
        (res) => {
          let responseBody = '';
          res.setEncoding('utf8');
          res.on('data', (chunk: string) => {
            responseBody += chunk;
          });
          res.on('end', () => {
            resolve({ statusCode: res.statusCode ?? 0, body: responseBody });
          });
          res.on('error', (error) => reject(new NetworkError(error.message)));
        }
      );

      req.setTimeout(timeoutMs, () => {
        req.destroy(new Error(`request timed out after ${timeoutMs}ms`));
      });
      req.on('error', (error) => reject(new NetworkError(error.message)));
      req.end();
    });
  };
}

export const httpsGet: HttpTransport = createHttpTransport();
