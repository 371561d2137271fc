import { afterEach, describe, expect, test } from "vitest";
import { runSetup } from "../src/setup/runner.js";
import { createTestContext, type TestContext } from "./helpers/context.js";

let t: TestContext;

afterEach(() => {
  t.cleanup();
});

describe("runSetup", () => {
  test("stores the entered client credentials", async () => {
    t = createTestContext();
    t.answers.push("my-client", "test-secret");

    const code = await runSetup("linear", { open: false }, t.ctx);

    expect(code).toBe(0);
    expect(t.ctx.prompt.ask).toHaveBeenCalledWith("Client ID: ");
    expect(t.ctx.prompt.secret).toHaveBeenCalledWith("Client Secret: ");
    expect(t.ctx.credentials.get("linear")).toEqual({
      clientId: "my-client",
      clientSecret: "test-secret",
    });
    expect(t.out).toContain("Redirect URI: http://localhost:8888/callback");
    expect(t.out).toContain("✓ Credentials saved for Linear");
    expect(t.ctx.openBrowser).not.toHaveBeenCalled();
  });

  test("shows an https redirect URI for Slack", async () => {
    t = createTestContext();
    t.answers.push("slack-client", "test-secret");

    await runSetup("slack", { open: false }, t.ctx);

    expect(t.out).toContain("Redirect URI: https://localhost:8888/callback");
  });

  test("opens the app registration page with --open", async () => {
    t = createTestContext();
    t.answers.push("my-client", "test-secret");

    await runSetup("linear", { open: true }, t.ctx);

    expect(t.ctx.openBrowser).toHaveBeenCalledWith("https://linear.app/settings/api");
  });

  test("fails on an empty client id", async () => {
    t = createTestContext();

    const code = await runSetup("linear", { open: false }, t.ctx);

    expect(code).toBe(1);
    expect(t.err).toEqual(["Error: Client ID cannot be empty"]);
    expect(t.ctx.credentials.get("linear")).toBeUndefined();
  });

  test("fails on an empty client secret", async () => {
    t = createTestContext();
    t.answers.push("my-client");

    const code = await runSetup("linear", { open: false }, t.ctx);

    expect(code).toBe(1);
    expect(t.err).toEqual(["Error: Client secret cannot be empty"]);
  });

  test("notes that environment variables take precedence", async () => {
    t = createTestContext({ env: { TOKENLINK_LINEAR_CLIENT_ID: "env-client" } });
    t.answers.push("my-client", "test-secret");

    await runSetup("linear", { open: false }, t.ctx);

    expect(t.out[0]).toBe("Note: TOKENLINK_LINEAR_CLIENT_ID is set for Linear.");
  });

  test("points API-key services to login", async () => {
    t = createTestContext();

    const code = await runSetup("honeycomb", { open: false }, t.ctx);

    expect(code).toBe(0);
    expect(t.out).toEqual([
      "Honeycomb uses an API key, not an OAuth app. Run 'tokenlink login honeycomb' to enter it.",
    ]);
    expect(t.ctx.prompt.ask).not.toHaveBeenCalled();
  });
});
