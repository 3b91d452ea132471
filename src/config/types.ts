import { LogLevel } from "../observability/types";

export type StorageBackend = "memory" | "sqlite";

export interface AppConfig {
  backend: StorageBackend;
  storePath: string;
  storeTimeoutMs: number;
  maxUploadBytes: number;
  tempDir: string;
  logLevel: LogLevel;
}
