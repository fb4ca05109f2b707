import { describe, it, expect } from "vitest";
import { hasTransportFlag } from "./server";

describe("hasTransportFlag", () => {
  it("should fall back to stdio for a bare lsp command", () => {
    expect(hasTransportFlag(["node", "cli.js", "lsp"])).toBe(false);
  });

  it("should recognise the transports the connection reads itself", () => {
    expect(hasTransportFlag(["node", "cli.js", "lsp", "--stdio"])).toBe(true);
    expect(hasTransportFlag(["node", "cli.js", "lsp", "--node-ipc"])).toBe(true);
    expect(hasTransportFlag(["node", "cli.js", "lsp", "--socket=6009"])).toBe(true);
    expect(hasTransportFlag(["node", "cli.js", "lsp", "--pipe=rivet"])).toBe(true);
  });
});
