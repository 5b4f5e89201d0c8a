import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { AuthError, EcobeeApiError, isRetryable } from "../../errors.js";
import { EcobeeTokenManager, isTokenFresh, loadCredentialCache, saveCredentialCache } from "./auth.js";

const fixedClock = { now: () => new Date("2022-03-01T12:00:00.000Z") };

async function tempCachePath(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ecobee-auth-"));
  return path.join(dir, "ecobee-cred-cache");
}

test("freshness honours the skew", () => {
  const cache = {
    access_token: "test-access",
    token_type: "Bearer",
    refresh_token: "test-refresh",
    expiry: "2022-03-01T12:01:00.000Z"
  };
  const now = Date.parse("2022-03-01T12:00:00.000Z");
  assert.equal(isTokenFresh(cache, now, 30), true);
  assert.equal(isTokenFresh(cache, now, 60), false);
});

test("a missing cache is an auth failure", async () => {
  const filePath = await tempCachePath();
  await assert.rejects(loadCredentialCache(filePath), AuthError);
});

test("a cache that is not JSON is an auth failure", async () => {
  const filePath = await tempCachePath();
  await fs.writeFile(filePath, "not json", "utf-8");
  await assert.rejects(loadCredentialCache(filePath), /Credential cache JSON parse error/);
});

test("fresh tokens are served from the cache without a request", async (t) => {
  const filePath = await tempCachePath();
  await saveCredentialCache(filePath, {
    access_token: "test-access",
    token_type: "Bearer",
    refresh_token: "test-refresh",
    expiry: "2022-03-01T13:00:00.000Z"
  });
  const fetchMock = t.mock.method(globalThis, "fetch", async () => new Response("{}"));

  const tokens = new EcobeeTokenManager({
    apiKey: "test-api-key",
    baseUrl: "https://api.example.test",
    credentialsPath: filePath,
    skewSec: 60,
    timeoutMs: 1000,
    clock: fixedClock
  });

  assert.equal(await tokens.getAccessToken(), "test-access");
  assert.equal(fetchMock.mock.callCount(), 0);
});

test("expired tokens are refreshed and written back", async (t) => {
  const filePath = await tempCachePath();
  await saveCredentialCache(filePath, {
    access_token: "test-access",
    token_type: "Bearer",
    refresh_token: "test-refresh",
    expiry: "2022-03-01T11:00:00.000Z"
  });
  const urls: URL[] = [];
  t.mock.method(globalThis, "fetch", async (input: string | URL | Request) => {
    urls.push(new URL(String(input)));
    return new Response(
      JSON.stringify({ access_token: "test-access-2", token_type: "Bearer", refresh_token: "test-refresh-2", expires_in: 3600 })
    );
  });

  const tokens = new EcobeeTokenManager({
    apiKey: "test-api-key",
    baseUrl: "https://api.example.test",
    credentialsPath: filePath,
    skewSec: 60,
    timeoutMs: 1000,
    clock: fixedClock
  });

  const [a, b] = await Promise.all([tokens.getAccessToken(), tokens.getAccessToken()]);

  assert.equal(a, "test-access-2");
  assert.equal(b, "test-access-2");
  assert.equal(urls.length, 1);
  assert.equal(urls[0]?.pathname, "/token");
  assert.equal(urls[0]?.searchParams.get("grant_type"), "refresh_token");
  assert.equal(urls[0]?.searchParams.get("code"), "test-refresh");
  assert.equal(urls[0]?.searchParams.get("client_id"), "test-api-key");

  const saved = await loadCredentialCache(filePath);
  assert.equal(saved.refresh_token, "test-refresh-2");
  assert.equal(saved.expiry, "2022-03-01T13:00:00.000Z");
});

test("a rejected refresh is an auth failure", async (t) => {
  const filePath = await tempCachePath();
  await saveCredentialCache(filePath, {
    access_token: "test-access",
    token_type: "Bearer",
    refresh_token: "test-refresh",
    expiry: "2022-03-01T11:00:00.000Z"
  });
  t.mock.method(globalThis, "fetch", async () =>
    new Response(JSON.stringify({ error: "invalid_grant" }), { status: 400, statusText: "Bad Request" })
  );

  const tokens = new EcobeeTokenManager({
    apiKey: "test-api-key",
    baseUrl: "https://api.example.test",
    credentialsPath: filePath,
    skewSec: 60,
    timeoutMs: 1000,
    clock: fixedClock
  });

  await assert.rejects(tokens.getAccessToken(), AuthError);
});

test("an unavailable token endpoint is a retryable failure", async (t) => {
  const filePath = await tempCachePath();
  await saveCredentialCache(filePath, {
    access_token: "test-access",
    token_type: "Bearer",
    refresh_token: "test-refresh",
    expiry: "2022-03-01T11:00:00.000Z"
  });
  t.mock.method(globalThis, "fetch", async () => new Response("", { status: 503, statusText: "Service Unavailable" }));

  const tokens = new EcobeeTokenManager({
    apiKey: "test-api-key",
    baseUrl: "https://api.example.test",
    credentialsPath: filePath,
    skewSec: 60,
    timeoutMs: 1000,
    clock: fixedClock
  });

  await assert.rejects(tokens.getAccessToken(), (err: unknown) => {
    assert.ok(err instanceof EcobeeApiError);
    assert.equal(err.statusCode, 503);
    assert.equal(isRetryable(err), true);
    return true;
  });
  const cached = await loadCredentialCache(filePath);
  assert.equal(cached.refresh_token, "test-refresh");
});
