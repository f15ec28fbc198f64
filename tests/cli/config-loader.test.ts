import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  CONFIG_PATH_ENV,
  getConfigPath,
  loadConfig,
  resolveToken,
  saveConfig,
  updateExpertise,
} from "../../src/cli/config/loader.js";
import { ConfigurationError } from "../../src/infra/errors.js";
import { ConfigSchema } from "../../src/types/config.js";

describe("config loader", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "issue-compass-config-test-"));
    configPath = join(tempDir, "config.json");
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("getConfigPath", () => {
    it("should prefer an explicit path", () => {
      vi.stubEnv(CONFIG_PATH_ENV, "/from/env.json");

      expect(getConfigPath("/explicit.json")).toBe("/explicit.json");
    });

    it("should fall back to the environment variable", () => {
      vi.stubEnv(CONFIG_PATH_ENV, "/from/env.json");

      expect(getConfigPath()).toBe("/from/env.json");
    });

    it("should default to a file in the home directory", () => {
      vi.stubEnv(CONFIG_PATH_ENV, "");

      expect(getConfigPath()).toMatch(/\.issue-compass[\\/]config\.json$/);
    });
  });

  describe("loadConfig", () => {
    it("should return defaults when the file does not exist", () => {
      expect(loadConfig(configPath)).toEqual(ConfigSchema.parse({}));
    });

    it("should merge the file over the defaults", () => {
      writeFileSync(
        configPath,
        JSON.stringify({ github: { repository: "octo/widgets" }, rateLimit: { maxRetries: 3 } })
      );

      const config = loadConfig(configPath);

      expect(config.github.repository).toBe("octo/widgets");
      expect(config.rateLimit).toEqual({ minRemaining: 5, marginSeconds: 1, maxRetries: 3 });
    });

    it("should reject unparsable JSON", () => {
      writeFileSync(configPath, "{ not json");

      expect(() => loadConfig(configPath)).toThrow(ConfigurationError);
    });

    it("should reject a file that is not an object", () => {
      writeFileSync(configPath, "[]");

      expect(() => loadConfig(configPath)).toThrow(
        `Config file must contain a JSON object: ${configPath}`
      );
    });

    it("should name the invalid fields", () => {
      writeFileSync(configPath, JSON.stringify({ scoring: { profile: "fancy" } }));

      expect(() => loadConfig(configPath)).toThrow(
        new RegExp(`^Invalid configuration in .*config\\.json: scoring\\.profile: `)
      );
    });
  });

  describe("resolveToken", () => {
    it("should let the environment override the configured token", () => {
      const config = ConfigSchema.parse({ github: { token: "from-config" } });

      expect(resolveToken(config, { GITHUB_TOKEN: "from-env" })).toBe("from-env");
    });

    it("should fall back to the configured token", () => {
      const config = ConfigSchema.parse({ github: { token: "from-config" } });

      expect(resolveToken(config, {})).toBe("from-config");
      expect(resolveToken(config, { GITHUB_TOKEN: "" })).toBe("from-config");
    });

    it("should read the configured environment variable", () => {
      const config = ConfigSchema.parse({ github: { tokenEnvVar: "MY_TOKEN" } });

      expect(resolveToken(config, { MY_TOKEN: "test-secret" })).toBe("test-secret");
      expect(resolveToken(config, { GITHUB_TOKEN: "test-secret" })).toBeUndefined();
    });

    it("should treat an empty variable as unset", () => {
      expect(resolveToken(ConfigSchema.parse({}), { GITHUB_TOKEN: "" })).toBeUndefined();
    });
  });

  describe("saveConfig", () => {
    it("should create the file and its directory", () => {
      const nested = join(tempDir, "nested", "config.json");

      saveConfig({ agent: { userExpertise: ["go"] } }, nested);

      expect(readFileSync(nested, "utf-8")).toBe(
        '{\n  "agent": {\n    "userExpertise": [\n      "go"\n    ]\n  }\n}\n'
      );
    });

    it("should keep keys the update does not touch", () => {
      writeFileSync(
        configPath,
        JSON.stringify({ github: { repository: "octo/widgets" }, agent: { userExpertise: ["old"] } })
      );

      saveConfig({ agent: { userExpertise: ["new"] } }, configPath);

      expect(JSON.parse(readFileSync(configPath, "utf-8"))).toEqual({
        github: { repository: "octo/widgets" },
        agent: { userExpertise: ["new"] },
      });
    });
  });

  describe("updateExpertise", () => {
    it("should persist the keywords and return a config that uses them", () => {
      writeFileSync(configPath, JSON.stringify({ github: { repository: "octo/widgets" } }));
      const config = loadConfig(configPath);

      const updated = updateExpertise(config, ["rust", "wasm"], configPath);

      expect(updated.agent.userExpertise).toEqual(["rust", "wasm"]);
      expect(updated.github.repository).toBe("octo/widgets");
      expect(loadConfig(configPath).agent.userExpertise).toEqual(["rust", "wasm"]);
    });

    it("should warn and carry on when the file cannot be written", () => {
      // A directory where the file should be makes the write fail
      const config = ConfigSchema.parse({});

      const updated = updateExpertise(config, ["rust"], tempDir);

      expect(updated.agent.userExpertise).toEqual(["rust"]);
      expect(console.warn).toHaveBeenCalled();
    });
  });
});
