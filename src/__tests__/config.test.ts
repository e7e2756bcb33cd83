import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "127.0.0.1",
      corpusRoot: "./corpus",
      indexPath: "./index.dat",
      categories: ["business", "entertainment", "politics", "sport", "tech"],
      snippetWindow: 80,
      pageSize: 10,
      logLevel: "info",
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      PORT: "8080",
      CORPUS_ROOT: "/data/bbc",
      CATEGORIES: " tech, sport ,,",
      SNIPPET_WINDOW: "40",
      LOG_LEVEL: "warn",
    });
    expect(config.port).toBe(8080);
    expect(config.corpusRoot).toBe("/data/bbc");
    expect(config.categories).toEqual(["tech", "sport"]);
    expect(config.snippetWindow).toBe(40);
    expect(config.logLevel).toBe("warn");
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ PORT: "", HOST: "" }).port).toBe(3000);
  });

  it("lets DEBUG force debug logging", () => {
    expect(loadConfig({ DEBUG: "1", LOG_LEVEL: "error" }).logLevel).toBe("debug");
    expect(loadConfig({ DEBUG: "true" }).logLevel).toBe("debug");
    expect(loadConfig({ DEBUG: "0" }).logLevel).toBe("info");
  });

  it.each([
    { PORT: "abc" },
    { PORT: "70000" },
    { PAGE_SIZE: "500" },
    { CATEGORIES: ",," },
    { LOG_LEVEL: "loud" },
  ])("rejects %o", (env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });

  it("names the offending variable", () => {
    try {
      loadConfig({ PAGE_SIZE: "0" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.issues[0]).toMatch(/^PAGE_SIZE: /);
    }
  });
});
