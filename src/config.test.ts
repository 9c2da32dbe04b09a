import { describe, expect, test } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      dataFile: "data/patients.json",
      storeMaxRetries: 3,
      storeMinDelayMs: 50,
      dev: true,
      apiBaseUrl: "http://localhost:3000",
    });
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      PATIENT_DATA_FILE: " /tmp/p.json ",
      PATIENT_STORE_MAX_RETRIES: "0",
      PATIENT_API_URL: "http://api.test/",
      NODE_ENV: "production",
    });
    expect(config.port).toBe(8080);
    expect(config.dataFile).toBe("/tmp/p.json");
    expect(config.storeMaxRetries).toBe(0);
    expect(config.apiBaseUrl).toBe("http://api.test");
    expect(config.dev).toBe(false);
  });

  test("unparseable integers fall back to defaults", () => {
    const config = loadConfig({ PORT: "abc", PATIENT_STORE_MIN_DELAY_MS: "-5" });
    expect(config.port).toBe(3000);
    expect(config.storeMinDelayMs).toBe(50);
  });
});
