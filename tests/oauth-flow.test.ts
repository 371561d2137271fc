import { createServer as createNetServer } from "node:net";
import { describe, expect, test } from "vitest";
import { CertificateError } from "../src/certs/errors.js";
import type { AuthorizationRequest } from "../src/oauth/authorization-url.js";
import {
  type CallbackServerOptions,
  OAuthCallbackServer,
} from "../src/oauth/callback-server.js";
import {
  CsrfMismatchError,
  ExchangeError,
  FlowCancelledError,
  FlowTimeoutError,
  ListenerError,
  ProviderDeniedError,
} from "../src/oauth/errors.js";
import {
  type AuthorizationFlowOptions,
  type FlowState,
  runAuthorizationFlow,
} from "../src/oauth/flow.js";
import { getService } from "../src/providers/registry.js";
import { createLogger } from "../src/utils/logger.js";

const CREDENTIALS = { clientId: "test-client", clientSecret: "test-secret" };
const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

function tokenEndpoint(status: number, body: string) {
  const forms: URLSearchParams[] = [];
  const fetchFn: typeof fetch = async (_input, init) => {
    forms.push(new URLSearchParams(String(init?.body)));
    return new Response(body, { status });
  };
  return { fetchFn, forms };
}

/**
 * Browser stand-in: follows the authorization URL straight to the
 * loopback callback with the given query.
 */
function browserRedirecting(query: (state: string) => string) {
  return async (authorizationUrl: string): Promise<boolean> => {
    const url = new URL(authorizationUrl);
    const redirect = new URL(url.searchParams.get("redirect_uri") ?? "");
    const state = url.searchParams.get("state") ?? "";
    const response = await fetch(
      `http://127.0.0.1:${redirect.port}${redirect.pathname}?${query(state)}`,
    );
    await response.text();
    return true;
  };
}

function portIsFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = createNetServer();
    probe.once("error", () => resolve(false));
    probe.listen(port, "127.0.0.1", () => {
      probe.close(() => resolve(true));
    });
  });
}

async function run(overrides: Partial<AuthorizationFlowOptions> = {}) {
  const states: FlowState[] = [];
  let request: AuthorizationRequest | undefined;
  const { fetchFn, forms } = tokenEndpoint(
    200,
    JSON.stringify({ access_token: "lin_access", token_type: "Bearer" }),
  );

  const promise = runAuthorizationFlow({
    provider: getService("linear"),
    credentials: CREDENTIALS,
    port: 0,
    timeoutMs: 5_000,
    shutdownTimeoutMs: 100,
    openBrowser: false,
    fetch: fetchFn,
    now: () => NOW,
    onStateChange: (state) => states.push(state),
    onListening: (value) => {
      request = value;
    },
    ...overrides,
  });

  const outcome = await promise.then(
    (result) => ({ result, error: undefined }),
    (error: unknown) => ({ result: undefined, error }),
  );
  return { ...outcome, states, forms, request: () => request };
}

describe("runAuthorizationFlow", () => {
  test("exchanges the code from a valid callback", async () => {
    const { result, error, states, forms, request } = await run({
      openBrowser: browserRedirecting((state) => `code=abc123&state=${state}`),
    });

    expect(error).toBeUndefined();
    expect(result?.token).toEqual({ accessToken: "lin_access", tokenType: "Bearer" });
    expect(states).toEqual(["awaiting_callback", "succeeded"]);
    expect(forms[0]?.get("code")).toBe("abc123");
    expect(forms[0]?.get("redirect_uri")).toBe(request()?.redirectUri);
    expect(result?.request).toBe(request());
  });

  test("fails with the provider's description when access is denied", async () => {
    const { error, states, forms } = await run({
      openBrowser: browserRedirecting(
        () => "error=access_denied&error_description=user+cancelled",
      ),
    });

    expect(error).toBeInstanceOf(ProviderDeniedError);
    if (error instanceof ProviderDeniedError) {
      expect(error.error).toBe("access_denied");
      expect(error.description).toBe("user cancelled");
    }
    expect(states).toEqual(["awaiting_callback", "failed"]);
    expect(forms).toHaveLength(0);
  });

  test("rejects a callback with a forged state", async () => {
    const { error, forms } = await run({
      openBrowser: browserRedirecting((state) => `code=abc123&state=${state}x`),
    });

    expect(error).toBeInstanceOf(CsrfMismatchError);
    expect(forms).toHaveLength(0);
  });

  test("times out and stops listening when no callback arrives", async () => {
    const { error, states, request } = await run({ timeoutMs: 100 });

    expect(error).toBeInstanceOf(FlowTimeoutError);
    expect(states).toEqual(["awaiting_callback", "timed_out"]);
    const port = Number(new URL(request()?.redirectUri ?? "").port);
    expect(port).toBeGreaterThan(0);
    expect(await portIsFree(port)).toBe(true);
  });

  test("warns when the browser cannot be opened", async () => {
    const err: string[] = [];
    const { error } = await run({
      timeoutMs: 100,
      openBrowser: async () => false,
      logger: createLogger({ out: () => {}, err: (line) => err.push(line) }),
    });

    expect(error).toBeInstanceOf(FlowTimeoutError);
    expect(err).toEqual([
      "\x1b[33mWarning:\x1b[0m [flow] Could not open the browser automatically. Open the URL above manually.",
    ]);
  });

  test("cancels through the abort signal", async () => {
    const controller = new AbortController();
    const { error, states } = await run({
      signal: controller.signal,
      onListening: () => {
        controller.abort();
      },
    });

    expect(error).toBeInstanceOf(FlowCancelledError);
    expect(states).toEqual(["awaiting_callback", "cancelled"]);
  });

  test("does not listen at all when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let listened = false;

    const { error, states } = await run({
      signal: controller.signal,
      onListening: () => {
        listened = true;
      },
    });

    expect(error).toBeInstanceOf(FlowCancelledError);
    expect(listened).toBe(false);
    expect(states).toEqual(["cancelled"]);
  });

  test("reports a rejected code exchange", async () => {
    const { fetchFn } = tokenEndpoint(400, '{"error":"invalid_grant"}');

    const { error, states } = await run({
      fetch: fetchFn,
      openBrowser: browserRedirecting((state) => `code=abc123&state=${state}`),
    });

    expect(error).toBeInstanceOf(ExchangeError);
    if (error instanceof ExchangeError) {
      expect(error.body).toBe('{"error":"invalid_grant"}');
    }
    expect(states).toEqual(["awaiting_callback", "failed"]);
  });

  test("fails and stops listening when the listener breaks mid-wait", async () => {
    class BreakingServer extends OAuthCallbackServer {
      override async start(): Promise<void> {
        await super.start();
        this.server?.emit("error", new Error("socket exploded"));
      }
    }
    const created: OAuthCallbackServer[] = [];

    const { error, states } = await run({
      timeoutMs: 5000,
      createServer: (options: CallbackServerOptions) => {
        const server = new BreakingServer(options);
        created.push(server);
        return server;
      },
    });

    expect(error).toBeInstanceOf(ListenerError);
    if (error instanceof ListenerError) {
      expect(error.kind).toBe("listener");
      expect(error.message).toBe("Callback server error: socket exploded");
    }
    expect(states).toEqual(["awaiting_callback", "failed"]);
    expect(created).toHaveLength(1);
    expect(created[0]?.listening).toBe(false);
  });

  test("needs a certificate for https providers", async () => {
    const { error, states } = await run({ provider: getService("slack") });

    expect(error).toBeInstanceOf(CertificateError);
    expect(states).toEqual(["failed"]);
  });
});
