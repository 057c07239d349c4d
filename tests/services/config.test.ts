import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { FastifyBaseLogger } from "fastify";
import {
  loadServiceConfig,
  validateConfig,
  getServiceConfig,
  updateServiceConfig,
  resetServiceConfig,
  reloadServiceConfigSafe,
  bootstrapServiceConfig,
  DEFAULT_SERVICE_CONFIG,
} from "../../src/services/config.js";
import { ConfigError } from "../../src/errors.js";

const ENV_KEYS = ["ALERTMANAGER_ENABLED", "ALERTMANAGER_URL", "ALERTMANAGER_RETRY_FOLDER", "ALERTMANAGER_CONFIG_PATH"] as const;

const mockLog = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  trace: vi.fn(),
  child: vi.fn(),
} as unknown as FastifyBaseLogger;

let testDir: string;
const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "am-config-"));
  for (const k of ENV_KEYS) {
    saved[k] = process.env[k];
    delete process.env[k];
  }
  resetServiceConfig();
  vi.clearAllMocks();
});

afterEach(() => {
  for (const k of ENV_KEYS) {
    const value = saved[k];
    if (value === undefined) delete process.env[k];
    else process.env[k] = value;
  }
  resetServiceConfig();
  rmSync(testDir, { recursive: true, force: true });
});

function writeConfig(name: string, data: unknown): string {
  const path = join(testDir, name);
  writeFileSync(path, typeof data === "string" ? data : JSON.stringify(data));
  return path;
}

describe("validateConfig", () => {
  it("accepts an enabled config with a valid URL and an existing folder", () => {
    expect(() => validateConfig({ enabled: true, url: "http://example.com", retryFolder: testDir, handlers: {} })).not.toThrow();
  });

  it("rejects an enabled config with an empty URL", () => {
    expect(() => validateConfig({ enabled: true, url: "", retryFolder: testDir, handlers: {} })).toThrow(new ConfigError("url cannot be empty"));
  });

  it("rejects an enabled config whose URL does not parse, naming the URL", () => {
    const url = "not a url with spaces and no scheme??";
    expect(() => validateConfig({ enabled: true, url, retryFolder: testDir, handlers: {} })).toThrow(ConfigError);
    expect(() => validateConfig({ enabled: true, url, retryFolder: testDir, handlers: {} })).toThrow(
      'invalid AlertManager URL: "not a url with spaces and no scheme??"'
    );
  });

  it("rejects a missing retry folder, naming the folder", () => {
    const call = () => validateConfig({ enabled: true, url: "http://example.com", retryFolder: "/does/not/exist", handlers: {} });
    expect(call).toThrow(ConfigError);
    expect(call).toThrow('folder "/does/not/exist" does not exist');
  });

  it("skips the URL check when disabled", () => {
    expect(() => validateConfig({ enabled: false, url: "::::", retryFolder: testDir, handlers: {} })).not.toThrow();
  });

  it("still checks the retry folder when disabled", () => {
    expect(() => validateConfig({ enabled: false, url: "", retryFolder: join(testDir, "nope"), handlers: {} })).toThrow(/does not exist/);
    expect(() => validateConfig(DEFAULT_SERVICE_CONFIG)).toThrow('folder "" does not exist');
  });

  it("checks the retry folder of a named handler, naming the handler", () => {
    const config = { enabled: true, url: "http://example.com", retryFolder: testDir, handlers: { ops: { retryFolder: "/does/not/exist" } } };
    expect(() => validateConfig(config)).toThrow(new ConfigError('handler "ops": folder "/does/not/exist" does not exist'));
  });

  it("checks the URL of a named handler only when enabled", () => {
    const handlers = { ops: { url: "::::" } };
    expect(() => validateConfig({ enabled: true, url: "http://example.com", retryFolder: testDir, handlers })).toThrow(
      new ConfigError('handler "ops": invalid AlertManager URL: "::::"')
    );
    expect(() => validateConfig({ enabled: false, url: "", retryFolder: testDir, handlers })).not.toThrow();
  });

  it("accepts named handlers that only set some fields", () => {
    const handlers = { ops: { url: "http://ops" }, spool: { retryFolder: testDir } };
    expect(() => validateConfig({ enabled: true, url: "http://example.com", retryFolder: testDir, handlers })).not.toThrow();
  });
});

describe("loadServiceConfig", () => {
  it("returns the defaults when the file does not exist", () => {
    expect(loadServiceConfig(join(testDir, "missing.json"))).toEqual({ enabled: false, url: "", retryFolder: "", handlers: {} });
  });

  it("maps retry-folder from the file", () => {
    const path = writeConfig("am.json", { enabled: true, url: "http://am:9093/api/v1/alerts", "retry-folder": "/var/retry" });
    expect(loadServiceConfig(path)).toEqual({ enabled: true, url: "http://am:9093/api/v1/alerts", retryFolder: "/var/retry", handlers: {} });
  });

  it("reads named handlers, mapping retry-folder", () => {
    const path = writeConfig("handlers.json", {
      enabled: true,
      url: "http://am",
      "retry-folder": "/var/retry",
      handlers: { ops: { url: "http://ops", "retry-folder": "/var/ops" }, paging: { url: "http://pager" } },
    });
    const config = loadServiceConfig(path);
    expect(config.handlers).toEqual({ ops: { url: "http://ops", retryFolder: "/var/ops" }, paging: { url: "http://pager" } });
    expect(Object.keys(config.handlers.paging)).toEqual(["url"]);
    expect(Object.isFrozen(config.handlers)).toBe(true);
  });

  it("throws ConfigError for a handler entry of the wrong type", () => {
    const path = writeConfig("bad-handler.json", { handlers: { ops: { url: 42 } } });
    expect(() => loadServiceConfig(path)).toThrow(/invalid config file .*: handlers\.ops\.url: /);
  });

  it("fills missing keys with defaults", () => {
    const path = writeConfig("partial.json", { url: "http://am" });
    expect(loadServiceConfig(path)).toEqual({ enabled: false, url: "http://am", retryFolder: "", handlers: {} });
  });

  it("reads the path from ALERTMANAGER_CONFIG_PATH", () => {
    process.env.ALERTMANAGER_CONFIG_PATH = writeConfig("env-path.json", { enabled: true });
    expect(loadServiceConfig().enabled).toBe(true);
  });

  it("lets environment variables override file values", () => {
    const path = writeConfig("override.json", { enabled: false, url: "http://file", "retry-folder": "/file" });
    process.env.ALERTMANAGER_ENABLED = "yes";
    process.env.ALERTMANAGER_URL = "http://env";
    expect(loadServiceConfig(path)).toEqual({ enabled: true, url: "http://env", retryFolder: "/file", handlers: {} });
  });

  it("returns a frozen snapshot", () => {
    const config = loadServiceConfig(join(testDir, "missing.json"));
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("throws ConfigError for invalid JSON", () => {
    const path = writeConfig("bad.json", "{ broken json ");
    expect(() => loadServiceConfig(path)).toThrow(ConfigError);
  });

  it("throws ConfigError naming the key with the wrong type", () => {
    const path = writeConfig("types.json", { enabled: "sometimes" });
    expect(() => loadServiceConfig(path)).toThrow(/invalid config file .*: enabled: /);
  });
});

describe("updateServiceConfig", () => {
  it("swaps the snapshot seen by later reads", () => {
    const before = getServiceConfig();
    updateServiceConfig([{ enabled: true, url: "http://am", retryFolder: testDir }]);
    expect(getServiceConfig()).toEqual({ enabled: true, url: "http://am", retryFolder: testDir, handlers: {} });
    expect(before).toEqual(DEFAULT_SERVICE_CONFIG);
    expect(Object.isFrozen(getServiceConfig())).toBe(true);
  });

  it("does not alias the object it was given", () => {
    const input = { enabled: true, url: "http://am", retryFolder: testDir };
    updateServiceConfig([input]);
    input.url = "http://changed";
    expect(getServiceConfig().url).toBe("http://am");
  });

  it("rejects anything but exactly one config object", () => {
    expect(() => updateServiceConfig([])).toThrow("expected only one new config object, got 0");
    const c = { enabled: false, url: "", retryFolder: "" };
    expect(() => updateServiceConfig([c, c])).toThrow("expected only one new config object, got 2");
  });

  it("rejects an object of the wrong shape and keeps the current config", () => {
    updateServiceConfig([{ enabled: true, url: "http://am", retryFolder: testDir }]);
    expect(() => updateServiceConfig([{ enabled: "yes" }])).toThrow("expected config object of type ServiceConfig");
    expect(getServiceConfig().url).toBe("http://am");
  });

  it("keeps named handlers and freezes them", () => {
    updateServiceConfig([{ enabled: true, url: "http://am", retryFolder: testDir, handlers: { ops: { url: "http://ops" } } }]);
    expect(getServiceConfig().handlers).toEqual({ ops: { url: "http://ops" } });
    expect(Object.isFrozen(getServiceConfig().handlers.ops)).toBe(true);
  });
});

describe("reloadServiceConfigSafe", () => {
  it("loads, validates and applies a good file", () => {
    const path = writeConfig("good.json", { enabled: true, url: "http://am", "retry-folder": testDir });
    const result = reloadServiceConfigSafe(path);
    expect(result).toEqual({ ok: true, config: { enabled: true, url: "http://am", retryFolder: testDir, handlers: {} } });
    expect(getServiceConfig().enabled).toBe(true);
  });

  it("leaves the running config untouched when validation fails", () => {
    updateServiceConfig([{ enabled: true, url: "http://am", retryFolder: testDir }]);
    const path = writeConfig("bad-folder.json", { enabled: true, url: "http://other", "retry-folder": "/does/not/exist" });
    const result = reloadServiceConfigSafe(path);
    expect(result).toEqual({ ok: false, error: 'folder "/does/not/exist" does not exist' });
    expect(getServiceConfig().url).toBe("http://am");
  });
});

describe("bootstrapServiceConfig", () => {
  it("applies the file and logs the bootstrap", () => {
    const path = writeConfig("boot.json", { enabled: true, url: "http://am", "retry-folder": testDir });
    bootstrapServiceConfig(mockLog, path);
    expect(getServiceConfig().url).toBe("http://am");
    expect(mockLog.info).toHaveBeenCalledWith(
      expect.objectContaining({ component: "config", event: "bootstrap", enabled: true }),
      "config_bootstrapped"
    );
  });

  it("throws ConfigError for an invalid config", () => {
    const path = writeConfig("boot-bad.json", { enabled: true, url: "", "retry-folder": testDir });
    expect(() => bootstrapServiceConfig(mockLog, path)).toThrow("url cannot be empty");
    expect(getServiceConfig()).toEqual(DEFAULT_SERVICE_CONFIG);
  });
});
