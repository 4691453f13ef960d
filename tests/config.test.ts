import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  clearConfig,
  getConfig,
  saveOutputDir,
  saveUseExternalGenerator,
  validateConfig,
} from "../src/config/index.js";
import { configCommand } from "../src/cli/commands/config.js";

describe("Config", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    clearConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearConfig();
  });

  describe("getConfig", () => {
    it("should return default values", () => {
      // Clear LOG_LEVEL set by setup.ts to test actual default
      delete process.env.LOG_LEVEL;
      delete process.env.PRIMARY_PROVIDER;
      delete process.env.ANTHROPIC_MODEL;
      delete process.env.OPENAI_MODEL;
      delete process.env.MAX_TOKENS;
      delete process.env.TEMPERATURE;
      delete process.env.GENERATOR_TIMEOUT_MS;
      delete process.env.GENERATOR_MAX_ATTEMPTS;
      delete process.env.GENERATOR_RETRY_BASE_DELAY_MS;
      delete process.env.USE_EXTERNAL_GENERATOR;
      delete process.env.OUTPUT_DIR;

      const config = getConfig();

      expect(config.primaryProvider).toBe("anthropic");
      expect(config.model).toBe("claude-3-5-haiku-latest");
      expect(config.openaiModel).toBe("gpt-4o-mini");
      expect(config.maxTokens).toBe(1024);
      expect(config.temperature).toBe(0.2);
      expect(config.useExternalGenerator).toBe(false);
      expect(config.generatorTimeoutMs).toBe(15000);
      expect(config.generatorMaxAttempts).toBe(2);
      expect(config.generatorRetryBaseDelayMs).toBe(500);
      expect(config.outputDir).toBe(".");
      expect(config.logLevel).toBe("info");
    });

    it("should use environment variables", () => {
      process.env.PRIMARY_PROVIDER = "openai";
      process.env.OPENAI_API_KEY = "test-secret";
      process.env.OPENAI_MODEL = "gpt-4o";
      process.env.MAX_TOKENS = "2048";
      process.env.TEMPERATURE = "0.5";
      process.env.GENERATOR_TIMEOUT_MS = "3000";
      process.env.OUTPUT_DIR = "exports";
      process.env.LOG_LEVEL = "DEBUG";

      const config = getConfig();

      expect(config.primaryProvider).toBe("openai");
      expect(config.model).toBe("gpt-4o");
      expect(config.openaiApiKey).toBe("test-secret");
      expect(config.maxTokens).toBe(2048);
      expect(config.temperature).toBe(0.5);
      expect(config.generatorTimeoutMs).toBe(3000);
      expect(config.outputDir).toBe("exports");
      expect(config.logLevel).toBe("debug");
    });

    it("should fall back to anthropic for an unknown provider", () => {
      process.env.PRIMARY_PROVIDER = "mystery";
      delete process.env.ANTHROPIC_MODEL;

      const config = getConfig();

      expect(config.primaryProvider).toBe("anthropic");
      expect(config.model).toBe("claude-3-5-haiku-latest");
    });

    it("should read the stored external generator toggle", () => {
      delete process.env.USE_EXTERNAL_GENERATOR;
      saveUseExternalGenerator(true);

      expect(getConfig().useExternalGenerator).toBe(true);
    });

    it("should let USE_EXTERNAL_GENERATOR override the stored toggle", () => {
      saveUseExternalGenerator(true);
      process.env.USE_EXTERNAL_GENERATOR = "false";

      expect(getConfig().useExternalGenerator).toBe(false);
    });

    it("should read the stored output directory when OUTPUT_DIR is unset", () => {
      delete process.env.OUTPUT_DIR;
      saveOutputDir("submissions");

      expect(getConfig().outputDir).toBe("submissions");
    });
  });

  describe("validateConfig", () => {
    it("should return no errors for valid config", () => {
      const config = { ...getConfig(), useExternalGenerator: false, generatorTimeoutMs: 15000, generatorMaxAttempts: 2 };
      const errors = validateConfig(config);

      expect(errors).toHaveLength(0);
    });

    it("should not require an API key while the external generator is off", () => {
      const config = { ...getConfig(), useExternalGenerator: false, anthropicApiKey: "", openaiApiKey: "" };

      expect(validateConfig(config)).toEqual([]);
    });

    it("should require primary provider API key when the external generator is on", () => {
      process.env.PRIMARY_PROVIDER = "anthropic";
      delete process.env.ANTHROPIC_API_KEY;
      delete process.env.OPENAI_API_KEY;

      const config = { ...getConfig(), useExternalGenerator: true };
      const errors = validateConfig(config);

      expect(errors).toContain(
        "ANTHROPIC_API_KEY is required when PRIMARY_PROVIDER=anthropic and the external generator is enabled"
      );
    });

    it("should require OPENAI_API_KEY when openai is primary", () => {
      const config = { ...getConfig(), primaryProvider: "openai" as const, openaiApiKey: "", useExternalGenerator: true };

      expect(validateConfig(config)).toContain(
        "OPENAI_API_KEY is required when PRIMARY_PROVIDER=openai and the external generator is enabled"
      );
    });

    it("should reject a non-positive timeout and zero attempts", () => {
      const config = { ...getConfig(), generatorTimeoutMs: 0, generatorMaxAttempts: 0 };

      expect(validateConfig(config)).toEqual([
        "GENERATOR_TIMEOUT_MS must be a positive number",
        "GENERATOR_MAX_ATTEMPTS must be at least 1",
      ]);
    });
  });

  describe("config command", () => {
    beforeEach(() => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      delete process.env.USE_EXTERNAL_GENERATOR;
      delete process.env.OUTPUT_DIR;
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should persist the output directory", () => {
      configCommand({ output: "  exports  " });

      expect(getConfig().outputDir).toBe("exports");
    });

    it("should persist the external generator toggle", () => {
      configCommand({ external: "on" });
      expect(getConfig().useExternalGenerator).toBe(true);

      configCommand({ external: "off" });
      expect(getConfig().useExternalGenerator).toBe(false);
    });

    it("should exit on an unknown toggle value", () => {
      vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit");
      });

      expect(() => configCommand({ external: "maybe" })).toThrow("process.exit");
      expect(getConfig().useExternalGenerator).toBe(false);
    });
  });
});
