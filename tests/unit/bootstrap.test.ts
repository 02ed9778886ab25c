import { describe, expect, it } from "vitest";
import { configOverridesFor } from "../../src/cli/bootstrap";
import { loadConfig } from "../../src/infrastructure/config/load";

const env = { NVIDIA_API_KEY: "test-key", LOG_LEVEL: "error" };

describe("configOverridesFor", () => {
  it("keeps the configured log level without verbosity flags", async () => {
    expect(configOverridesFor({})).toEqual({});
    const config = await loadConfig({ env, overrides: configOverridesFor({}) });
    expect(config.logLevel).toBe("error");
  });

  it("raises the level for --verbose and --debug", async () => {
    const verbose = await loadConfig({ env, overrides: configOverridesFor({ verbose: true }) });
    const debug = await loadConfig({
      env,
      overrides: configOverridesFor({ verbose: true, debug: true }),
    });

    expect(verbose.logLevel).toBe("info");
    expect(debug.logLevel).toBe("debug");
  });
});
