import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { AuthError, EcobeeApiError, errorMessage } from "../../errors.js";
import { logger } from "../../utils/logger.js";
import { fetchWithTimeout } from "../../utils/fetchWithTimeout.js";
import { type Clock, systemClock } from "../../utils/time.js";

// Same layout the PIN authorization step leaves behind.
const CredentialCacheSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  refresh_token: z.string().min(1),
  expiry: z.string().datetime({ offset: true })
});

export type CredentialCache = z.infer<typeof CredentialCacheSchema>;

const RefreshResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  refresh_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().default(3600)
});

export interface TokenManagerConfig {
  apiKey: string;
  baseUrl: string;
  credentialsPath: string;
  skewSec: number;
  timeoutMs: number;
  clock?: Clock;
}

export async function loadCredentialCache(filePath: string): Promise<CredentialCache> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new AuthError(
      `Credential cache not readable at ${filePath}; complete PIN authorization first (${errorMessage(err)})`,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new AuthError(`Credential cache JSON parse error (${filePath}): ${errorMessage(err)}`, { cause: err });
  }

  const result = CredentialCacheSchema.safeParse(parsed);
  if (!result.success) {
    throw new AuthError(`Credential cache validation error (${filePath}): ${result.error.message}`);
  }
  return result.data;
}

export async function saveCredentialCache(filePath: string, cache: CredentialCache): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(cache, null, 2), { encoding: "utf-8", mode: 0o600 });
}

export function isTokenFresh(cache: CredentialCache, nowMs: number, skewSec: number): boolean {
  return nowMs + skewSec * 1000 < Date.parse(cache.expiry);
}

export class EcobeeTokenManager {
  private cache: CredentialCache | null = null;
  private inflight: Promise<CredentialCache> | null = null;
  private readonly clock: Clock;

  constructor(private readonly cfg: TokenManagerConfig) {
    this.clock = cfg.clock ?? systemClock;
  }

  async getAccessToken(): Promise<string> {
    if (this.cache && isTokenFresh(this.cache, this.clock.now().getTime(), this.cfg.skewSec)) {
      return this.cache.access_token;
    }

    if (!this.inflight) {
      this.inflight = this.ensureFresh().finally(() => {
        this.inflight = null;
      });
    }
    const fresh = await this.inflight;
    return fresh.access_token;
  }

  private async ensureFresh(): Promise<CredentialCache> {
    const current = this.cache ?? (await loadCredentialCache(this.cfg.credentialsPath));
    this.cache = current;
    if (isTokenFresh(current, this.clock.now().getTime(), this.cfg.skewSec)) return current;
    return this.refresh(current);
  }

  /** Drop the in-memory token so the next call re-reads or refreshes it. */
  invalidate(): void {
    if (this.cache) {
      this.cache = { ...this.cache, expiry: new Date(0).toISOString() };
    }
  }

  private async refresh(current: CredentialCache): Promise<CredentialCache> {
    const url = new URL("/token", this.cfg.baseUrl);
    url.searchParams.set("grant_type", "refresh_token");
    url.searchParams.set("code", current.refresh_token);
    url.searchParams.set("client_id", this.cfg.apiKey);

    let resp: Response;
    try {
      resp = await fetchWithTimeout(url.toString(), { method: "POST", timeoutMs: this.cfg.timeoutMs });
    } catch (err) {
      // Network trouble is not an auth problem; let the iteration retry.
      throw new Error(`ecobee token refresh request failed: ${errorMessage(err)}`, { cause: err });
    }

    const text = await resp.text();
    if (resp.status === 429 || resp.status >= 500) {
      throw new EcobeeApiError(`ecobee token endpoint unavailable: ${resp.status} ${resp.statusText}`, resp.status);
    }
    if (!resp.ok) {
      throw new AuthError(`ecobee token refresh rejected: ${resp.status} ${resp.statusText} ${text}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new AuthError(`ecobee token refresh returned non-JSON body`, { cause: err });
    }
    const parsed = RefreshResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError("Unexpected token response shape from ecobee token endpoint");
    }

    const issuedAtMs = this.clock.now().getTime();
    const next: CredentialCache = {
      access_token: parsed.data.access_token,
      token_type: parsed.data.token_type,
      refresh_token: parsed.data.refresh_token,
      expiry: new Date(issuedAtMs + parsed.data.expires_in * 1000).toISOString()
    };

    await saveCredentialCache(this.cfg.credentialsPath, next);
    this.cache = next;
    logger.info({ expiresInSec: parsed.data.expires_in }, "Refreshed ecobee access token");
    return next;
  }
}
