import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      OPENAI_API_KEY: "test-key",
      AGENT_MODEL: "gpt-4o-mini",
      JUDGE_MODEL: "gpt-4o",
      AGENT_TEMPERATURE: 0.7,
      AGENT_MAX_TOKENS: 200,
      MAX_ROUNDS: 10,
      LOG_LEVEL: "info",
      HOST: "0.0.0.0",
      PORT: 3000,
      CORS_ORIGINS: [],
    });
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key", PORT: "8080", MAX_ROUNDS: "4", AGENT_TEMPERATURE: "0" });

    expect(config.PORT).toBe(8080);
    expect(config.MAX_ROUNDS).toBe(4);
    expect(config.AGENT_TEMPERATURE).toBe(0);
  });

  it("splits CORS origins", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key", CORS_ORIGINS: " http://a.test , ,http://b.test" });

    expect(config.CORS_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
  });

  it("names the missing key", () => {
    const err = thrownBy(() => loadConfig({}));

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ keys: ["OPENAI_API_KEY"], message: "Invalid configuration: OPENAI_API_KEY" });
  });

  it("names every invalid key", () => {
    const err = thrownBy(() => loadConfig({ OPENAI_API_KEY: "test-key", MAX_ROUNDS: "0", LOG_LEVEL: "verbose" }));

    expect(err).toMatchObject({ keys: ["MAX_ROUNDS", "LOG_LEVEL"] });
  });
});
