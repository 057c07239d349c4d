import { readFileSync, existsSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { FastifyBaseLogger } from "fastify";
import type { HandlerConfig, ServiceConfig } from "../types/config.js";
import { ConfigError, errorMessage } from "../errors.js";

const DEFAULT_PATH = "/config/alertmanager.json";

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = Object.freeze({
  enabled: false,
  url: "",
  retryFolder: "",
  handlers: Object.freeze({}),
});

/** On-disk shape, using the external key names. */
const configFileSchema = z.object({
  enabled: z.boolean().default(false),
  url: z.string().default(""),
  "retry-folder": z.string().default(""),
  handlers: z
    .record(
      z.object({
        url: z.string().optional(),
        "retry-folder": z.string().optional(),
      })
    )
    .default({}),
});

/** In-memory shape accepted by the hot-reload path. */
const serviceConfigSchema = z.object({
  enabled: z.boolean(),
  url: z.string(),
  retryFolder: z.string(),
  handlers: z
    .record(
      z.object({
        url: z.string().optional(),
        retryFolder: z.string().optional(),
      })
    )
    .default({}),
});

type HandlerOverrides = ServiceConfig["handlers"];

/** Copy and freeze the handler map, keeping only the fields that were set. */
function freezeHandlers(handlers: Record<string, Partial<HandlerConfig>>): HandlerOverrides {
  const out: Record<string, Partial<HandlerConfig>> = Object.create(null);
  for (const [name, handler] of Object.entries(handlers)) {
    out[name] = Object.freeze({
      ...(handler.url !== undefined ? { url: handler.url } : {}),
      ...(handler.retryFolder !== undefined ? { retryFolder: handler.retryFolder } : {}),
    });
  }
  return Object.freeze(out);
}

function parseBoolean(raw: string): boolean {
  return /^(1|true|yes)$/i.test(raw.trim());
}

/** ALERTMANAGER_ENABLED / _URL / _RETRY_FOLDER take precedence over file values. */
function applyEnvOverrides(config: ServiceConfig): ServiceConfig {
  const enabled = process.env.ALERTMANAGER_ENABLED;
  const url = process.env.ALERTMANAGER_URL;
  const retryFolder = process.env.ALERTMANAGER_RETRY_FOLDER;
  return Object.freeze({
    enabled: enabled !== undefined ? parseBoolean(enabled) : config.enabled,
    url: url ?? config.url,
    retryFolder: retryFolder ?? config.retryFolder,
    handlers: config.handlers,
  });
}

/**
 * Read the config file (JSON with `enabled`, `url`, `retry-folder` and an
 * optional `handlers` map of named `{ url, retry-folder }` targets) and apply
 * environment overrides. A missing file yields the defaults; a malformed one throws ConfigError.
 */
export function loadServiceConfig(path?: string): ServiceConfig {
  const configPath = resolve(path ?? process.env.ALERTMANAGER_CONFIG_PATH ?? DEFAULT_PATH);
  if (!existsSync(configPath)) return applyEnvOverrides(DEFAULT_SERVICE_CONFIG);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`cannot read config file ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigError(`invalid config file ${configPath}: ${where}: ${issue?.message ?? "invalid"}`);
  }
  const handlers: Record<string, Partial<HandlerConfig>> = Object.create(null);
  for (const [name, h] of Object.entries(parsed.data.handlers)) {
    handlers[name] = { url: h.url, retryFolder: h["retry-folder"] };
  }
  return applyEnvOverrides({
    enabled: parsed.data.enabled,
    url: parsed.data.url,
    retryFolder: parsed.data["retry-folder"],
    handlers: freezeHandlers(handlers),
  });
}

function checkUrl(url: string, prefix: string): void {
  if (url === "") {
    throw new ConfigError(`${prefix}url cannot be empty`);
  }
  if (!URL.canParse(url)) {
    throw new ConfigError(`${prefix}invalid AlertManager URL: ${JSON.stringify(url)}`);
  }
}

function checkFolder(folder: string, prefix: string): void {
  try {
    statSync(folder);
  } catch (err) {
    throw new ConfigError(`${prefix}folder ${JSON.stringify(folder)} does not exist`, { cause: err });
  }
}

/**
 * Check the config before it is put in service. The URL is only checked when
 * enabled; the retry folder must exist in both states. Named handlers are held
 * to the same rules for the fields they set.
 */
export function validateConfig(config: ServiceConfig): void {
  if (config.enabled) checkUrl(config.url, "");
  checkFolder(config.retryFolder, "");
  for (const [name, handler] of Object.entries(config.handlers)) {
    const prefix = `handler ${JSON.stringify(name)}: `;
    if (config.enabled && handler.url !== undefined) checkUrl(handler.url, prefix);
    if (handler.retryFolder !== undefined) checkFolder(handler.retryFolder, prefix);
  }
}

let current: ServiceConfig = DEFAULT_SERVICE_CONFIG;

/** Current snapshot. Callers read it once per operation and keep the reference. */
export function getServiceConfig(): ServiceConfig {
  return current;
}

/**
 * Hot-reload entry point: exactly one replacement config object, swapped in
 * as a single frozen snapshot.
 */
export function updateServiceConfig(configs: readonly unknown[]): void {
  if (configs.length !== 1) {
    throw new ConfigError(`expected only one new config object, got ${configs.length}`);
  }
  const parsed = serviceConfigSchema.safeParse(configs[0]);
  if (!parsed.success) {
    throw new ConfigError("expected config object of type ServiceConfig");
  }
  current = Object.freeze({
    enabled: parsed.data.enabled,
    url: parsed.data.url,
    retryFolder: parsed.data.retryFolder,
    handlers: freezeHandlers(parsed.data.handlers),
  });
}

export function resetServiceConfig(): void {
  current = DEFAULT_SERVICE_CONFIG;
}

/** Load, validate and swap in the config file. The running config is untouched on failure. */
export function reloadServiceConfigSafe(
  path?: string
): { ok: true; config: ServiceConfig } | { ok: false; error: string } {
  try {
    const config = loadServiceConfig(path);
    validateConfig(config);
    updateServiceConfig([config]);
    return { ok: true, config: getServiceConfig() };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/** Startup load. A ConfigError here is meant to stop the process. */
export function bootstrapServiceConfig(log: FastifyBaseLogger, path?: string): ServiceConfig {
  const config = loadServiceConfig(path);
  validateConfig(config);
  updateServiceConfig([config]);
  log.info(
    { component: "config", event: "bootstrap", enabled: config.enabled, url: config.url, retryFolder: config.retryFolder },
    "config_bootstrapped"
  );
  return config;
}
