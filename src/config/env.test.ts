/**
 * Environment configuration tests.
 *
 * Run: node --import tsx --test src/config/env.test.ts
 */

import { strict as assert } from "node:assert";
import { afterEach, describe, test } from "node:test";

import { ConfigError, loadConfig, resolveLogLevel, validateConfig, type AppConfig } from "./index.js";
import { optionalEnv, optionalEnvBool } from "./env.js";

const KEYS = ["PLOT_TEST_FLAG", "PLOT_TEST_VALUE", "PIPELINE_CONFIG"];
const saved = new Map<string, string | undefined>(KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const [key, value] of saved) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function appConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: "test",
    debug: false,
    logLevel: "info",
    appName: "study-plot-pipeline",
    pipelineConfigPath: "config/pipeline.json",
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENV HELPERS
// ═══════════════════════════════════════════════════════════════════════════

describe("env helpers", () => {
  test("optionalEnv falls back on unset and empty values", () => {
    delete process.env["PLOT_TEST_VALUE"];
    assert.equal(optionalEnv("PLOT_TEST_VALUE", "fallback"), "fallback");
    process.env["PLOT_TEST_VALUE"] = "";
    assert.equal(optionalEnv("PLOT_TEST_VALUE", "fallback"), "fallback");
    process.env["PLOT_TEST_VALUE"] = "set";
    assert.equal(optionalEnv("PLOT_TEST_VALUE", "fallback"), "set");
  });

  test("optionalEnvBool accepts the usual spellings", () => {
    process.env["PLOT_TEST_FLAG"] = "YES";
    assert.equal(optionalEnvBool("PLOT_TEST_FLAG", false), true);
    process.env["PLOT_TEST_FLAG"] = "0";
    assert.equal(optionalEnvBool("PLOT_TEST_FLAG", true), false);
  });

  test("optionalEnvBool rejects anything else", () => {
    process.env["PLOT_TEST_FLAG"] = "maybe";
    assert.throws(() => optionalEnvBool("PLOT_TEST_FLAG", false), ConfigError);
  });

  test("PIPELINE_CONFIG sets the config path", () => {
    process.env["PIPELINE_CONFIG"] = "custom/pipeline.json";
    assert.equal(loadConfig().pipelineConfigPath, "custom/pipeline.json");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATE CONFIG
// ═══════════════════════════════════════════════════════════════════════════

describe("validateConfig", () => {
  test("accepts a valid configuration", () => {
    assert.doesNotThrow(() => validateConfig(appConfig()));
  });

  test("rejects an unknown environment", () => {
    assert.throws(() => validateConfig(appConfig({ env: "staging" })), /Invalid NODE_ENV: staging/);
  });

  test("rejects an unknown log level", () => {
    assert.throws(() => validateConfig(appConfig({ logLevel: "verbose" })), ConfigError);
  });

  test("DEBUG forces the debug level", () => {
    assert.equal(resolveLogLevel(appConfig({ debug: true, logLevel: "warn" })), "debug");
    assert.equal(resolveLogLevel(appConfig({ logLevel: "warn" })), "warn");
  });
});
