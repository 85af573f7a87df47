import { afterEach, describe, expect, it } from "vitest";
import { MAX_SOCKET_PATH_BYTES, defaultSocketPath, resolveSocketPath, socketPathFits } from "../src/config.js";

describe("socket path", () => {
  const saved = process.env.PANE_SOCKET;

  afterEach(() => {
    if (saved === undefined) delete process.env.PANE_SOCKET;
    else process.env.PANE_SOCKET = saved;
  });

  it("derives the default from the uid", () => {
    expect(defaultSocketPath(501)).toBe("/tmp/pane-501/pane.sock");
  });

  it("prefers an explicit path over the environment", () => {
    process.env.PANE_SOCKET = "/run/pane/env.sock";
    expect(resolveSocketPath("  /run/pane/arg.sock ")).toBe("/run/pane/arg.sock");
    expect(resolveSocketPath()).toBe("/run/pane/env.sock");
  });

  it("falls back to the default when nothing is set", () => {
    delete process.env.PANE_SOCKET;
    expect(resolveSocketPath("   ")).toBe(defaultSocketPath());
  });

  it("checks the socket address limit in bytes", () => {
    const fits = `/${"a".repeat(MAX_SOCKET_PATH_BYTES - 2)}`;
    expect(socketPathFits(fits)).toBe(true);
    expect(socketPathFits(`${fits}b`)).toBe(false);
    expect(socketPathFits(`/${"é".repeat(60)}`)).toBe(false);
  });
});
