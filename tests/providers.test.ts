import { describe, expect, test } from "vitest";
import { ConfigError } from "../src/config/load.js";
import { ExchangeError } from "../src/oauth/errors.js";
import { getAdapter, NOTION_API_VERSION } from "../src/providers/adapters.js";
import {
  getService,
  listServices,
  requiresHttps,
  UnknownServiceError,
} from "../src/providers/registry.js";

const ISSUED_AT = Date.UTC(2026, 0, 15, 12, 0, 0);

function exchangeErrorOf(fn: () => unknown): ExchangeError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExchangeError) {
      return err;
    }
    throw err;
  }
  return undefined;
}

describe("provider registry", () => {
  test("lists built-in services sorted by id", () => {
    expect(listServices().map((service) => service.id)).toEqual([
      "honeycomb",
      "linear",
      "notion",
      "slack",
    ]);
  });

  test("names supported services for an unknown id", () => {
    expect(() => getService("nope")).toThrow(UnknownServiceError);
    expect(() => getService("nope")).toThrow(
      "Unknown service: nope\n\nSupported services: honeycomb, linear, notion, slack",
    );
  });

  test("adds providers from config", () => {
    const github = getService("github", {
      providers: {
        github: {
          name: "GitHub",
          authUrl: "https://github.com/login/oauth/authorize",
          tokenUrl: "https://github.com/login/oauth/access_token",
          scopes: ["repo"],
        },
      },
    });

    expect(github).toEqual({
      id: "github",
      name: "GitHub",
      authType: "oauth",
      authUrl: "https://github.com/login/oauth/authorize",
      tokenUrl: "https://github.com/login/oauth/access_token",
      scopes: ["repo"],
      apiBaseUrl: "",
      requiresHttps: false,
      adapter: "standard",
      setupUrl: "",
      setupInstructions: "",
    });
  });

  test("overrides only the fields a config entry sets", () => {
    const linear = getService("linear", {
      providers: { linear: { scopes: ["read"] } },
    });

    expect(linear.scopes).toEqual(["read"]);
    expect(linear.tokenUrl).toBe("https://api.linear.app/oauth/token");
  });

  test("rejects a configured OAuth provider without endpoints", () => {
    expect(() =>
      listServices({ providers: { custom: { name: "Custom" } } }),
    ).toThrow(ConfigError);
  });

  test("https is required by the entry or by its adapter", () => {
    expect(requiresHttps(getService("slack"))).toBe(true);
    expect(requiresHttps(getService("linear"))).toBe(false);
    expect(
      requiresHttps(
        getService("linear", { providers: { linear: { requiresHttps: true } } }),
      ),
    ).toBe(true);
  });
});

describe("standard adapter", () => {
  const adapter = getAdapter("standard");

  test("parses a flat token response", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({
        access_token: "lin_access",
        refresh_token: "lin_refresh",
        token_type: "Bearer",
        scope: "read write",
        expires_in: 3600,
      }),
      ISSUED_AT,
    );

    expect(token).toEqual({
      accessToken: "lin_access",
      refreshToken: "lin_refresh",
      tokenType: "Bearer",
      scope: "read write",
      expiresAt: ISSUED_AT + 3_600_000,
    });
  });

  test("treats a missing or zero lifetime as never expiring", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({ access_token: "a", expires_in: 0 }),
      ISSUED_AT,
    );

    expect(token).toEqual({ accessToken: "a" });
  });

  test("accepts expires_in as a string", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({ access_token: "a", expires_in: "60" }),
      ISSUED_AT,
    );

    expect(token.expiresAt).toBe(ISSUED_AT + 60_000);
  });

  test("rejects a response without an access token", () => {
    const body = JSON.stringify({ token_type: "Bearer" });
    const error = exchangeErrorOf(() => adapter.parseTokenResponse(body, ISSUED_AT));

    expect(error?.message).toBe(`no access token in response: ${body}`);
    expect(error?.kind).toBe("exchange");
  });

  test("rejects an empty access token", () => {
    const error = exchangeErrorOf(() =>
      adapter.parseTokenResponse(JSON.stringify({ access_token: "" }), ISSUED_AT),
    );

    expect(error).toBeInstanceOf(ExchangeError);
  });

  test("rejects a body that is not JSON", () => {
    const error = exchangeErrorOf(() =>
      adapter.parseTokenResponse("<html>oops</html>", ISSUED_AT),
    );

    expect(error?.message.startsWith("failed to parse token response: ")).toBe(true);
    expect(error?.message.endsWith(": <html>oops</html>")).toBe(true);
    expect(error?.body).toBe("<html>oops</html>");
  });

  test("uses body client auth and space-separated scopes", () => {
    expect(adapter.clientAuth).toBe("body");
    expect(adapter.scopeParam).toEqual({ name: "scope", separator: " " });
    expect(adapter.requiresHttps).toBe(false);
  });

  test("sends API requests with a bearer token", () => {
    expect(adapter.apiHeaders("hny_test")).toEqual({
      Authorization: "Bearer hny_test",
    });
  });
});

describe("linear adapter", () => {
  const adapter = getAdapter("linear");

  test("parses a flat token response", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({ access_token: "lin_access", token_type: "Bearer" }),
      ISSUED_AT,
    );

    expect(token.accessToken).toBe("lin_access");
    expect(token.expiresAt).toBeUndefined();
  });

  test("sends the bare token as Authorization", () => {
    expect(adapter.apiHeaders("lin_access")).toEqual({
      Authorization: "lin_access",
    });
  });

  test("uses body client auth over http", () => {
    expect(adapter.clientAuth).toBe("body");
    expect(adapter.requiresHttps).toBe(false);
  });

  test("is the adapter of the built-in linear service", () => {
    expect(getService("linear").adapter).toBe("linear");
  });
});

describe("notion adapter", () => {
  const adapter = getAdapter("notion");

  test("maps the workspace to team and user", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({
        access_token: "secret_notion",
        token_type: "bearer",
        bot_id: "bot-1",
        workspace_id: "ws-1",
        workspace_name: "Acme Docs",
      }),
      ISSUED_AT,
    );

    expect(token).toEqual({
      accessToken: "secret_notion",
      tokenType: "bearer",
      teamId: "ws-1",
      user: "Acme Docs",
    });
  });

  test("authenticates with HTTP Basic", () => {
    expect(adapter.clientAuth).toBe("basic");
  });

  test("pins the API version on requests", () => {
    expect(adapter.apiHeaders("secret_notion")).toEqual({
      Authorization: "Bearer secret_notion",
      "Notion-Version": NOTION_API_VERSION,
    });
    expect(NOTION_API_VERSION).toBe("2022-06-28");
  });
});

describe("slack adapter", () => {
  const adapter = getAdapter("slack");

  test("reads the user token from authed_user", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({
        ok: true,
        app_id: "A1",
        authed_user: {
          id: "U1",
          scope: "channels:read,chat:write",
          access_token: "xoxp-user",
          token_type: "user",
        },
        team: { id: "T1", name: "Acme" },
      }),
      ISSUED_AT,
    );

    expect(token).toEqual({
      accessToken: "xoxp-user",
      tokenType: "user",
      scope: "channels:read,chat:write",
      teamId: "T1",
      user: "Acme",
    });
  });

  test("falls back to the top-level token", () => {
    const token = adapter.parseTokenResponse(
      JSON.stringify({
        ok: true,
        access_token: "xoxb-bot",
        token_type: "bot",
        team: { id: "T1", name: "Acme" },
      }),
      ISSUED_AT,
    );

    expect(token.accessToken).toBe("xoxb-bot");
    expect(token.tokenType).toBe("bot");
  });

  test("fails on ok: false even with HTTP 200", () => {
    const error = exchangeErrorOf(() =>
      adapter.parseTokenResponse(
        JSON.stringify({ ok: false, error: "invalid_code" }),
        ISSUED_AT,
      ),
    );

    expect(error?.message).toBe("slack auth failed: invalid_code");
  });

  test("requires https and comma-separated user scopes", () => {
    expect(adapter.requiresHttps).toBe(true);
    expect(adapter.scopeParam).toEqual({ name: "user_scope", separator: "," });
  });

  test("sends API requests with a bearer token", () => {
    expect(adapter.apiHeaders("xoxp-test")).toEqual({
      Authorization: "Bearer xoxp-test",
    });
  });
});
