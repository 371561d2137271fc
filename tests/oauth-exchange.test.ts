import { describe, expect, test } from "vitest";
import { ExchangeError } from "../src/oauth/errors.js";
import { buildTokenRequest, exchangeCode } from "../src/oauth/token-exchange.js";
import { getAdapter } from "../src/providers/adapters.js";
import { getService } from "../src/providers/registry.js";

const CREDENTIALS = { clientId: "test-client", clientSecret: "test-secret" };
const REDIRECT_URI = "http://localhost:8888/callback";
const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(
  status: number,
  body: string,
): { fetchFn: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init });
    return new Response(body, {
      status,
      headers: { "Content-Type": "application/json" },
    });
  };
  return { fetchFn, requests };
}

async function exchangeError(promise: Promise<unknown>): Promise<ExchangeError> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err,
  );
  if (!(error instanceof ExchangeError)) {
    throw new Error(`expected ExchangeError, got ${String(error)}`);
  }
  return error;
}

describe("buildTokenRequest", () => {
  test("puts client credentials in the body for body auth", () => {
    const { headers, body } = buildTokenRequest(
      getAdapter("standard"),
      CREDENTIALS,
      "code-1",
      REDIRECT_URI,
    );

    expect(headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
      Accept: "application/json",
    });
    expect(Object.fromEntries(body)).toEqual({
      grant_type: "authorization_code",
      code: "code-1",
      redirect_uri: REDIRECT_URI,
      client_id: "test-client",
      client_secret: "test-secret",
    });
  });

  test("uses an Authorization header for basic auth", () => {
    const { headers, body } = buildTokenRequest(
      getAdapter("notion"),
      CREDENTIALS,
      "code-1",
      REDIRECT_URI,
    );

    expect(headers["Authorization"]).toBe(
      `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`,
    );
    expect(body.has("client_id")).toBe(false);
    expect(body.has("client_secret")).toBe(false);
  });
});

describe("exchangeCode", () => {
  test("posts the form to the token endpoint and parses the token", async () => {
    const { fetchFn, requests } = fakeFetch(
      200,
      JSON.stringify({ access_token: "lin_access", expires_in: 3600 }),
    );

    const token = await exchangeCode({
      provider: getService("linear"),
      credentials: CREDENTIALS,
      code: "abc123",
      redirectUri: REDIRECT_URI,
      fetch: fetchFn,
      now: () => NOW,
    });

    expect(token).toEqual({
      accessToken: "lin_access",
      expiresAt: NOW + 3_600_000,
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://api.linear.app/oauth/token");
    expect(requests[0]?.init?.method).toBe("POST");
    const form = new URLSearchParams(String(requests[0]?.init?.body));
    expect(form.get("code")).toBe("abc123");
    expect(form.get("redirect_uri")).toBe(REDIRECT_URI);
  });

  test("reports a 400 with the response body", async () => {
    const { fetchFn } = fakeFetch(400, '{"error":"invalid_grant"}');

    const error = await exchangeError(
      exchangeCode({
        provider: getService("linear"),
        credentials: CREDENTIALS,
        code: "expired",
        redirectUri: REDIRECT_URI,
        fetch: fetchFn,
      }),
    );

    expect(error.message).toBe(
      'token exchange failed (HTTP 400): {"error":"invalid_grant"}',
    );
    expect(error.body).toBe('{"error":"invalid_grant"}');
    expect(error.status).toBe(400);
  });

  test("reports Slack errors delivered with HTTP 200", async () => {
    const { fetchFn } = fakeFetch(
      200,
      JSON.stringify({ ok: false, error: "bad_redirect_uri" }),
    );

    const error = await exchangeError(
      exchangeCode({
        provider: getService("slack"),
        credentials: CREDENTIALS,
        code: "abc",
        redirectUri: "https://localhost:8888/callback",
        fetch: fetchFn,
      }),
    );

    expect(error.message).toBe("slack auth failed: bad_redirect_uri");
  });

  test("wraps transport failures", async () => {
    const failingFetch: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };

    const error = await exchangeError(
      exchangeCode({
        provider: getService("linear"),
        credentials: CREDENTIALS,
        code: "abc",
        redirectUri: REDIRECT_URI,
        fetch: failingFetch,
      }),
    );

    expect(error.message).toBe("token request failed: fetch failed");
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  test("times out a hanging token endpoint", async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(init?.signal?.reason);
        });
      });

    const error = await exchangeError(
      exchangeCode({
        provider: getService("linear"),
        credentials: CREDENTIALS,
        code: "abc",
        redirectUri: REDIRECT_URI,
        fetch: hangingFetch,
        timeoutMs: 50,
      }),
    );

    expect(error.message).toBe("token request timed out after 0s");
  });
});
