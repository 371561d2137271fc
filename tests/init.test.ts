import { afterEach, describe, expect, test } from "vitest";
import { CA_COMMON_NAME } from "../src/certs/authority.js";
import { TrustStore } from "../src/certs/trust.js";
import { runInit } from "../src/init/runner.js";
import { createTestContext, type TestContext } from "./helpers/context.js";

let t: TestContext;

afterEach(() => {
  t.cleanup();
});

describe("runInit", () => {
  test("generates the CA and installs it without prompting", async () => {
    t = createTestContext();

    const code = await runInit({ force: false, uninstall: false, yes: true }, t.ctx);

    expect(code).toBe(0);
    expect(t.ctx.authority.authorityExists()).toBe(true);
    expect(t.ctx.prompt.confirm).not.toHaveBeenCalled();
    expect(t.commands).toContainEqual([
      "security",
      "add-trusted-cert",
      "-r",
      "trustRoot",
      "-k",
      "login.keychain",
      t.ctx.authority.certificatePath,
    ]);
    expect(t.out.slice(-3)).toEqual([
      "Setup complete. Next steps:",
      "  1. Store OAuth app credentials: tokenlink setup <service>",
      "  2. Sign in: tokenlink login <service>",
    ]);
  });

  test("keeps the CA untrusted when the user declines", async () => {
    t = createTestContext();
    t.answers.push("n");

    const code = await runInit({ force: false, uninstall: false, yes: false }, t.ctx);

    expect(code).toBe(0);
    expect(t.ctx.authority.authorityExists()).toBe(true);
    expect(t.out).toContain("Certificate authority was not installed.");
    expect(t.commands.some((command) => command[1] === "add-trusted-cert")).toBe(
      false,
    );
  });

  test("reports an already trusted CA", async () => {
    t = createTestContext({
      trustStore: new TrustStore({
        platform: "darwin",
        runner: async () => ({ code: 0, output: "" }),
      }),
    });
    await t.ctx.authority.generateAuthority();

    const code = await runInit({ force: false, uninstall: false, yes: false }, t.ctx);

    expect(code).toBe(0);
    expect(t.out).toEqual([
      `✓ Certificate authority already installed (${t.ctx.authority.certificatePath})`,
      "Use --force to regenerate it.",
    ]);
  });

  test("removes the CA from the trust store", async () => {
    t = createTestContext();

    const code = await runInit({ force: false, uninstall: true, yes: false }, t.ctx);

    expect(code).toBe(0);
    expect(t.commands).toEqual([
      ["security", "delete-certificate", "-c", CA_COMMON_NAME, "login.keychain"],
    ]);
    expect(t.out[1]).toBe("✓ Certificate authority removed");
  });

  test("fails when the trust store refuses the removal", async () => {
    t = createTestContext({}, { code: 1, output: "not found" });

    const code = await runInit({ force: false, uninstall: true, yes: false }, t.ctx);

    expect(code).toBe(1);
    expect(t.err).toEqual([
      "Error: Failed to uninstall CA on macOS (exit 1)\nOutput: not found",
    ]);
  });
});
