import { request as nodeHttpRequest, type RequestOptions } from 'http';
import { request as nodeHttpsRequest } from 'https';
import { URL } from 'url';
import { debugManager } from './debug-manager.js';
import { TimeoutError } from '../errors/streamer-errors.js';

export interface HttpRequestOptions {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

export interface HttpResponse {
  statusCode: number;
  statusMessage: string;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * Make an HTTP/HTTPS request. Used for the verbs fetch does not cover well
 * (SUBSCRIBE, UNSUBSCRIBE, NOTIFY) and for description documents.
 * Rejects with TimeoutError when no response arrives in time.
 */
export async function httpRequest(options: HttpRequestOptions): Promise<HttpResponse> {
  const url = new URL(options.url);
  const isHttps = url.protocol === 'https:';
  const requestFn = isHttps ? nodeHttpsRequest : nodeHttpRequest;
  const timeout = options.timeout || 10000;

  const requestOptions: RequestOptions = {
    hostname: url.hostname,
    port: url.port ? parseInt(url.port, 10) : (isHttps ? 443 : 80),
    path: url.pathname + url.search,
    method: options.method || 'GET',
    headers: options.headers || {},
    timeout
  };

  return new Promise((resolve, reject) => {
    const req = requestFn(requestOptions, (res) => {
      let body = '';
      res.setEncoding('utf8');

      res.on('data', (chunk: string) => {
        body += chunk;
      });

      res.on('end', () => {
        resolve({
          statusCode: res.statusCode || 0,
          statusMessage: res.statusMessage || '',
          headers: res.headers,
          body
        });
      });

      res.on('error', reject);
    });

    req.on('error', (error: Error) => {
      debugManager.debug('gena', `HTTP ${requestOptions.method} ${options.url} failed: ${error.message}`);
      reject(error);
    });

    req.on('timeout', () => {
      req.destroy();
      reject(new TimeoutError(`${requestOptions.method} ${options.url}`, timeout));
    });

    if (options.body) {
      req.write(options.body);
    }

    req.end();
  });
}

/**
 * First value of a response header, which node may hand back as an array
 */
export function headerValue(headers: HttpResponse['headers'], name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
