import { afterEach, describe, expect, test, vi } from "vitest";

interface FakeChild {
  on(event: string, handler: (err?: Error) => void): FakeChild;
  unref(): void;
}

const { spawnMock } = vi.hoisted(() => {
  const spawnMock = vi.fn(
    (
      _command: string,
      _args: string[],
      _options: Record<string, unknown>,
    ): FakeChild => {
      const handlers = new Map<string, (err?: Error) => void>();
      const child: FakeChild = {
        on: (event, handler) => {
          handlers.set(event, handler);
          return child;
        },
        unref: vi.fn(() => {}),
      };

      queueMicrotask(() => {
        const spawnHandler = handlers.get("spawn");
        if (spawnHandler) {
          spawnHandler();
        }
      });

      return child;
    },
  );
  return { spawnMock };
});

vi.mock("node:child_process", () => ({
  spawn: spawnMock,
}));

import { browserCommand, openBrowser } from "../src/oauth/browser.js";

function setPlatformForTest(platform: NodeJS.Platform): () => void {
  const descriptor = Object.getOwnPropertyDescriptor(process, "platform");

  Object.defineProperty(process, "platform", {
    value: platform,
    configurable: true,
  });

  return () => {
    if (descriptor) {
      Object.defineProperty(process, "platform", descriptor);
    }
  };
}

describe("openBrowser", () => {
  afterEach(() => {
    spawnMock.mockClear();
  });

  test("uses open on macOS", async () => {
    const restorePlatform = setPlatformForTest("darwin");

    const url = "https://example.com/oauth?state=abc";
    const result = await openBrowser(url);

    expect(result).toBe(true);
    expect(spawnMock).toHaveBeenCalledWith("open", [url], {
      detached: true,
      stdio: "ignore",
    });

    restorePlatform();
  });

  test("uses xdg-open on Linux", async () => {
    const restorePlatform = setPlatformForTest("linux");

    const url = "https://example.com/oauth?state=linux";
    const result = await openBrowser(url);

    expect(result).toBe(true);
    expect(spawnMock).toHaveBeenCalledWith("xdg-open", [url], {
      detached: true,
      stdio: "ignore",
    });

    restorePlatform();
  });

  test("uses PowerShell Start-Process on Windows instead of cmd.exe", async () => {
    const restorePlatform = setPlatformForTest("win32");

    const url = "https://example.com/oauth?state=windows";
    const result = await openBrowser(url);

    expect(result).toBe(true);
    expect(spawnMock).toHaveBeenCalledWith(
      "powershell",
      [
        "-NoProfile",
        "-NonInteractive",
        "-Command",
        `Start-Process ${JSON.stringify(url)}`,
      ],
      {
        detached: true,
        stdio: "ignore",
      },
    );

    const [command] = spawnMock.mock.calls[0] ?? [];
    expect(command).not.toBe("cmd");

    restorePlatform();
  });

  test("resolves false when the browser cannot be spawned", async () => {
    spawnMock.mockImplementationOnce(() => {
      const handlers = new Map<string, (err?: Error) => void>();
      const child: FakeChild = {
        on: (event, handler) => {
          handlers.set(event, handler);
          return child;
        },
        unref: vi.fn(() => {}),
      };
      queueMicrotask(() => {
        handlers.get("error")?.(new Error("spawn xdg-open ENOENT"));
      });
      return child;
    });

    const result = await openBrowser("https://example.com/oauth");

    expect(result).toBe(false);
  });
});

describe("browserCommand", () => {
  test("keeps query separators intact in a single argument", () => {
    const url = "https://example.com/cb?x=1&y=2#frag";
    const { args } = browserCommand(url, "linux");

    expect(args).toEqual([url]);
  });
});
