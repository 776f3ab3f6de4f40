// packages/cli/src/lib/config.test.ts

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { HeadmetaError } from "@headmeta/shared";
import { loadConfig, parseTemperature, requireCredential, resolveSettings } from "./config.js";

function thrown(fn: () => unknown): HeadmetaError {
  try {
    fn();
  } catch (err) {
    if (err instanceof HeadmetaError) return err;
    throw err;
  }
  throw new Error("expected an error");
}

describe("configuration", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "headmeta-config-"));
    configPath = join(dir, "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("requireCredential", () => {
    test("returns the API key", () => {
      expect(requireCredential({ OPENAI_API_KEY: "test-key" })).toBe("test-key");
    });

    test("fails on a missing or blank key", () => {
      expect(thrown(() => requireCredential({})).code).toBe("MISSING_CREDENTIAL");
      expect(thrown(() => requireCredential({ OPENAI_API_KEY: "  " })).message).toBe(
        "The environment variable OPENAI_API_KEY is not set."
      );
    });
  });

  describe("loadConfig", () => {
    test("returns an empty config when the file is missing", () => {
      expect(loadConfig(configPath)).toEqual({});
    });

    test("reads known keys", () => {
      writeFileSync(configPath, JSON.stringify({ model: "gpt-4o-mini", temperature: 0.3 }));
      expect(loadConfig(configPath)).toEqual({ model: "gpt-4o-mini", temperature: 0.3 });
    });

    test("rejects invalid JSON", () => {
      writeFileSync(configPath, "{ model: ");
      expect(thrown(() => loadConfig(configPath)).code).toBe("INVALID_CONFIG");
    });

    test("rejects unknown keys and out-of-range values", () => {
      writeFileSync(configPath, JSON.stringify({ modle: "x" }));
      expect(thrown(() => loadConfig(configPath)).code).toBe("INVALID_CONFIG");

      writeFileSync(configPath, JSON.stringify({ temperature: 2 }));
      expect(thrown(() => loadConfig(configPath)).code).toBe("INVALID_CONFIG");
    });
  });

  describe("parseTemperature", () => {
    test("accepts numbers between 0 and 1", () => {
      expect(parseTemperature("0")).toBe(0);
      expect(parseTemperature(" 0.25 ")).toBe(0.25);
      expect(parseTemperature("1")).toBe(1);
    });

    test("rejects anything else", () => {
      expect(thrown(() => parseTemperature("warm")).message).toBe(
        "Invalid --temperature: warm. Expected a number between 0 and 1"
      );
      expect(thrown(() => parseTemperature("")).code).toBe("INVALID_OPTION");
      expect(thrown(() => parseTemperature("1.01")).code).toBe("INVALID_OPTION");
    });
  });

  describe("resolveSettings", () => {
    const env = { OPENAI_API_KEY: "test-key" };

    test("falls back to defaults", () => {
      expect(resolveSettings({}, env, configPath)).toEqual({
        credentials: { apiKey: "test-key", baseURL: undefined },
        completion: { model: "gpt-4o", temperature: 0.7 },
      });
    });

    test("prefers CLI flags over env vars over the config file", () => {
      writeFileSync(
        configPath,
        JSON.stringify({ model: "from-config", temperature: 0.1, baseURL: "https://config.example.com/v1" })
      );

      expect(resolveSettings({}, env, configPath).completion).toEqual({
        model: "from-config",
        temperature: 0.1,
      });

      const withEnv = {
        ...env,
        HEADMETA_MODEL: "from-env",
        HEADMETA_TEMPERATURE: "0.5",
        OPENAI_BASE_URL: "https://env.example.com/v1",
      };
      expect(resolveSettings({}, withEnv, configPath)).toEqual({
        credentials: { apiKey: "test-key", baseURL: "https://env.example.com/v1" },
        completion: { model: "from-env", temperature: 0.5 },
      });

      expect(
        resolveSettings({ model: "from-cli", temperature: 0 }, withEnv, configPath).completion
      ).toEqual({ model: "from-cli", temperature: 0 });
    });

    test("rejects an invalid temperature from the environment", () => {
      const err = thrown(() =>
        resolveSettings({}, { ...env, HEADMETA_TEMPERATURE: "3" }, configPath)
      );
      expect(err.message).toBe("Invalid HEADMETA_TEMPERATURE: 3. Expected a number between 0 and 1");
    });

    test("checks the credential before reading the config file", () => {
      writeFileSync(configPath, "not json");
      expect(thrown(() => resolveSettings({}, {}, configPath)).code).toBe("MISSING_CREDENTIAL");
    });
  });
});
