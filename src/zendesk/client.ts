/**
 * Zendesk REST API HTTP client.
 * Auth: ZENDESK_EMAIL + ZENDESK_API_TOKEN via Basic Auth ("{email}/token:{token}").
 * Every request attempt goes through the run's UsageMonitor.
 */

import { resolveBaseUrl, type Config, type RetrySettings } from "../config";
import { AuthError, RemoteError } from "../errors";
import type { CallCategory, UsageMonitor } from "../monitor/usage";
import { sleep as defaultSleep } from "../pool";

export interface ZendeskClientConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface ZendeskSession {
  config: ZendeskClientConfig;
  monitor: UsageMonitor;
  retry: RetrySettings;
  fetch: typeof fetch;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
}

export interface SessionOptions {
  config: ZendeskClientConfig;
  monitor: UsageMonitor;
  retry: RetrySettings;
  fetch?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
}

export interface ZendeskUser {
  id: number | null;
  name?: string;
  email?: string | null;
}

export function getZendeskConfig(config: Config): ZendeskClientConfig | null {
  const email = process.env.ZENDESK_EMAIL;
  const apiToken = process.env.ZENDESK_API_TOKEN;

  if (!email || !apiToken) {
    return null;
  }

  return { baseUrl: resolveBaseUrl(config), email, apiToken };
}

export function createSession(opts: SessionOptions): ZendeskSession {
  return {
    config: opts.config,
    monitor: opts.monitor,
    retry: opts.retry,
    fetch: opts.fetch ?? globalThis.fetch,
    sleep: opts.sleep ?? defaultSleep,
    signal: opts.signal,
  };
}

export function authHeader(config: ZendeskClientConfig): string {
  return `Basic ${Buffer.from(`${config.email}/token:${config.apiToken}`).toString("base64")}`;
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped at max_delay_ms.
 * A larger Retry-After (seconds) from a 429 wins.
 */
export function backoffDelay(retry: RetrySettings, attempt: number, retryAfterSec?: number | null): number {
  const exp = Math.min(retry.base_delay_ms * 2 ** (attempt - 1), retry.max_delay_ms);
  if (retryAfterSec && retryAfterSec > 0) {
    return Math.max(exp, retryAfterSec * 1000);
  }
  return exp;
}

export async function zendeskFetch(session: ZendeskSession, path: string, category: CallCategory): Promise<unknown> {
  const url = path.startsWith("http") ? path : `${session.config.baseUrl}${path}`;
  const maxAttempts = session.retry.max_attempts;

  for (let attempt = 1; ; attempt++) {
    try {
      return await session.monitor.record(category, () => requestOnce(session, url));
    } catch (err) {
      if (!(err instanceof RemoteError) || !err.retryable || attempt >= maxAttempts) {
        throw err;
      }
      const delay = backoffDelay(session.retry, attempt, retryAfterOf(err));
      console.warn(`  ${category}: ${err.message}, retrying in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`);
      await session.sleep(delay, session.signal);
      session.signal?.throwIfAborted();
    }
  }
}

class RateLimitedError extends RemoteError {
  constructor(url: string, message: string, readonly retryAfterSec: number | null) {
    super(429, url, message, true);
  }
}

function retryAfterOf(err: RemoteError): number | null {
  return err instanceof RateLimitedError ? err.retryAfterSec : null;
}

async function requestOnce(session: ZendeskSession, url: string): Promise<unknown> {
  let response: Response;
  try {
    response = await session.fetch(url, {
      headers: {
        Authorization: authHeader(session.config),
        Accept: "application/json",
      },
      signal: session.signal,
    });
  } catch (err) {
    if (session.signal?.aborted) throw err;
    throw new RemoteError(null, url, `Network error: ${err instanceof Error ? err.message : String(err)}`, true, { cause: err });
  }

  if (response.status === 401 || response.status === 403) {
    throw new AuthError(response.status);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    const message = `HTTP ${response.status}${text ? ` - ${text.slice(0, 200)}` : ""}`;
    if (response.status === 429) {
      const header = Number(response.headers.get("Retry-After"));
      throw new RateLimitedError(url, message, Number.isFinite(header) ? header : null);
    }
    throw new RemoteError(response.status, url, message, response.status >= 500);
  }

  return response.json();
}

/**
 * Confirm the credentials belong to a signed-in agent.
 * Zendesk answers /users/me with an anonymous user (id null) for bad credentials.
 */
export async function verifyCredentials(session: ZendeskSession): Promise<ZendeskUser> {
  const data = await zendeskFetch(session, "/api/v2/users/me.json", "authentication");
  const user = isRecord(data) && isRecord(data.user) ? data.user : null;
  const id = user && typeof user.id === "number" ? user.id : null;

  if (!user || id === null) {
    throw new AuthError(401, "Zendesk credentials were not accepted (anonymous user returned)");
  }

  return {
    id,
    name: typeof user.name === "string" ? user.name : undefined,
    email: typeof user.email === "string" ? user.email : null,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
