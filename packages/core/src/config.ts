import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AnalysisConfig, AppConfig, DiscoveryConfig, LogLevel, ServerConfig } from "@perfscope/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { parseLanes } from "./timeline.js";
import { asArray, asRecord, toFiniteNumber } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".perfscope", "config.toml");

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function stringListOrDefault(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return [...fallback];
  return asArray(value)
    .map((item) => String(item ?? "").trim())
    .filter((item) => item.length > 0);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function mergeServer(input: Record<string, unknown>): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = toFiniteNumber(input.port);
  const logLevel = String(input.logLevel ?? "").trim().toLowerCase();
  return {
    host: nonEmptyStringOrDefault(input.host, defaults.host),
    port: port !== null && port >= 0 && port <= 65_535 ? Math.round(port) : defaults.port,
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
  };
}

function mergeAnalysis(input: Record<string, unknown>): AnalysisConfig {
  const defaults = DEFAULT_CONFIG.analysis;
  const lanes = Array.isArray(input.timelineLanes)
    ? parseLanes(asArray(input.timelineLanes).map((lane) => String(lane)))
    : defaults.timelineLanes;
  return {
    hotPathMaxDepth: positiveIntOrDefault(input.hotPathMaxDepth, defaults.hotPathMaxDepth),
    callTreeDepth: positiveIntOrDefault(input.callTreeDepth, defaults.callTreeDepth),
    timelineBuckets: positiveIntOrDefault(input.timelineBuckets, defaults.timelineBuckets),
    timelineLanes: lanes.length > 0 ? [...lanes] : [...defaults.timelineLanes],
    snapshotWindowMs: positiveIntOrDefault(input.snapshotWindowMs, defaults.snapshotWindowMs),
    flatTop: positiveIntOrDefault(input.flatTop, defaults.flatTop),
    largeObjectThresholdBytes: positiveIntOrDefault(input.largeObjectThresholdBytes, defaults.largeObjectThresholdBytes),
  };
}

function mergeDiscovery(input: Record<string, unknown>): DiscoveryConfig {
  const defaults = DEFAULT_CONFIG.discovery;
  const includeGlobs = stringListOrDefault(input.includeGlobs, defaults.includeGlobs);
  return {
    roots: stringListOrDefault(input.roots, defaults.roots),
    includeGlobs: includeGlobs.length > 0 ? includeGlobs : [...defaults.includeGlobs],
    excludeGlobs: stringListOrDefault(input.excludeGlobs, defaults.excludeGlobs),
    maxDepth: positiveIntOrDefault(input.maxDepth, defaults.maxDepth),
  };
}

/** Fills every missing or invalid field from the defaults. */
export function mergeConfig(input?: unknown): AppConfig {
  const raw = asRecord(input);
  return {
    server: mergeServer(asRecord(raw.server)),
    analysis: mergeAnalysis(asRecord(raw.analysis)),
    discovery: mergeDiscovery(asRecord(raw.discovery)),
  };
}

export function toTomlDocument(config: AppConfig): JsonMap {
  return {
    server: { host: config.server.host, port: config.server.port, logLevel: config.server.logLevel },
    analysis: {
      hotPathMaxDepth: config.analysis.hotPathMaxDepth,
      callTreeDepth: config.analysis.callTreeDepth,
      timelineBuckets: config.analysis.timelineBuckets,
      timelineLanes: [...config.analysis.timelineLanes],
      snapshotWindowMs: config.analysis.snapshotWindowMs,
      flatTop: config.analysis.flatTop,
      largeObjectThresholdBytes: config.analysis.largeObjectThresholdBytes,
    },
    discovery: {
      roots: [...config.discovery.roots],
      includeGlobs: [...config.discovery.includeGlobs],
      excludeGlobs: [...config.discovery.excludeGlobs],
      maxDepth: config.discovery.maxDepth,
    },
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  try {
    return mergeConfig(TOML.parse(raw));
  } catch (error) {
    throw new Error(`invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(toTomlDocument(config));
  await writeFile(configPath, content, "utf8");
}

function splitKey(key: string): [string, string] {
  const [section, field, ...rest] = key.split(".");
  if (!section || !field || rest.length > 0) {
    throw new Error(`invalid config key: ${key} (expected section.field)`);
  }
  return [section, field];
}

export function getConfigValue(config: AppConfig, key: string): unknown {
  const [section, field] = splitKey(key);
  const values = asRecord(toTomlDocument(config)[section]);
  if (!(field in values)) {
    throw new Error(`unknown config key: ${key}`);
  }
  return values[field];
}

/**
 * Sets one `section.field` from command-line text. Numbers and comma lists
 * are converted to match the current value; the result is normalised again.
 */
export function setConfigValue(config: AppConfig, key: string, rawValue: string): AppConfig {
  const [section, field] = splitKey(key);
  const document = toTomlDocument(config);
  const values = asRecord(document[section]);
  if (!(field in values)) {
    throw new Error(`unknown config key: ${key}`);
  }
  const current = values[field];
  let next: unknown = rawValue;
  if (typeof current === "number") {
    const parsed = Number(rawValue);
    if (!Number.isFinite(parsed)) throw new Error(`config key ${key} expects a number`);
    next = parsed;
  } else if (Array.isArray(current)) {
    next = rawValue
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return mergeConfig({ ...document, [section]: { ...values, [field]: next } });
}
