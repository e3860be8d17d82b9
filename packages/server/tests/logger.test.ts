import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  it("prefixes messages with the namespace", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = createConsoleLogger("rps-server", {});

    logger.info("Server listening", { port: 8787 });
    logger.info("Ready");

    expect(info).toHaveBeenNthCalledWith(1, "[rps-server]", "Server listening", { port: 8787 });
    expect(info).toHaveBeenNthCalledWith(2, "[rps-server]", "Ready", "");
  });

  it("emits debug output only when DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    createConsoleLogger("quiet", {}).debug("hidden");
    createConsoleLogger("loud", { DEBUG: "1" }).debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[loud]", "shown", "");
  });
});
