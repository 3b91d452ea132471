import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { LogLevel } from "../observability/types";
import { AppConfig, StorageBackend } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  backend: "memory",
  storePath: "data/doc-scan.sqlite",
  storeTimeoutMs: 5_000,
  maxUploadBytes: 10 * 1024 * 1024,
  tempDir: os.tmpdir(),
  logLevel: "info",
};

type FileConfig = Record<string, unknown>;

function isRecord(value: unknown): value is FileConfig {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readConfigFile(configPath?: string): FileConfig {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function stringField(config: FileConfig, key: keyof AppConfig): string | undefined {
  const value = config[key];
  return typeof value === "string" ? value : undefined;
}

function numberField(config: FileConfig, key: keyof AppConfig): number | undefined {
  const value = config[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBackend(value: string | undefined, fallback: StorageBackend): StorageBackend {
  const normalized = value?.trim().toLowerCase();
  return normalized === "memory" || normalized === "sqlite" ? normalized : fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  return {
    backend: toBackend(env.STORAGE_BACKEND, toBackend(stringField(fileConfig, "backend"), DEFAULT_CONFIG.backend)),
    storePath: env.STORE_PATH ?? stringField(fileConfig, "storePath") ?? DEFAULT_CONFIG.storePath,
    storeTimeoutMs: toInt(
      env.STORE_TIMEOUT_MS,
      numberField(fileConfig, "storeTimeoutMs") ?? DEFAULT_CONFIG.storeTimeoutMs,
    ),
    maxUploadBytes: toInt(
      env.MAX_UPLOAD_BYTES,
      numberField(fileConfig, "maxUploadBytes") ?? DEFAULT_CONFIG.maxUploadBytes,
    ),
    tempDir: env.TEMP_DIR ?? stringField(fileConfig, "tempDir") ?? DEFAULT_CONFIG.tempDir,
    logLevel: toLogLevel(env.LOG_LEVEL, toLogLevel(stringField(fileConfig, "logLevel"), DEFAULT_CONFIG.logLevel)),
  };
}

export { DEFAULT_CONFIG };
