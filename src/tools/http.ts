import { z } from 'zod';

import { capability } from '../core/tools/types.js';
import type { ToolRegistry } from '../core/tools/registry.js';
import { parseParams, type BuiltinToolOptions } from './common.js';

const MAX_BODY_CHARS = 1_000_000;

const FetchParams = z.object({
  url: z.string().min(1),
  method: z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE']).default('GET'),
  headers: z.record(z.string()).default({}),
  body: z.string().optional()
});

const UrlParams = z.object({ url: z.string() });

export interface UrlCheck {
  url: string;
  valid: boolean;
  reason?: string;
}

/** Only absolute http(s) URLs with a host are accepted. */
export function checkUrl(url: string): UrlCheck {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { url, valid: false, reason: 'not a valid URL' };
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { url, valid: false, reason: `unsupported protocol '${parsed.protocol}'` };
  }
  if (!parsed.hostname) return { url, valid: false, reason: 'missing host' };
  return { url: parsed.href, valid: true };
}

export function registerHttpTools(registry: ToolRegistry, opts: BuiltinToolOptions): void {
  const doFetch = opts.fetch ?? fetch;

  registry.register(
    'http_fetch',
    capability(async (parameters, context) => {
      const { url, method, headers, body } = parseParams('http_fetch', FetchParams, parameters);
      const check = checkUrl(url);
      if (!check.valid) throw new Error(`Cannot fetch '${url}': ${check.reason}`);

      const res = await doFetch(check.url, {
        method,
        headers,
        body: body !== undefined && method !== 'GET' && method !== 'HEAD' ? body : undefined,
        signal: context.signal
      });
      const text = method === 'HEAD' ? '' : await res.text();
      const responseHeaders: Record<string, string> = {};
      res.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });
      if (!res.ok) throw new Error(`${method} ${check.url} returned HTTP ${res.status}`);
      return {
        url: check.url,
        status: res.status,
        headers: responseHeaders,
        body: text.length > MAX_BODY_CHARS ? text.slice(0, MAX_BODY_CHARS) : text,
        truncated: text.length > MAX_BODY_CHARS
      };
    }),
    'Fetch a URL over HTTP(S); non-2xx responses fail. Parameters: { "url": string, "method"?: string, "headers"?: object, "body"?: string }'
  );

  registry.register(
    'validate_url',
    capability((parameters) => checkUrl(parseParams('validate_url', UrlParams, parameters).url)),
    'Check that a string is an absolute http(s) URL. Parameters: { "url": string }'
  );
}
