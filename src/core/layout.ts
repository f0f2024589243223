import os from "os";
import path from "path";

export const APP_DIRNAME = ".vecsync";
export const HOME_ENV = "VECSYNC_HOME";

export const SETTINGS_FILENAME = "settings.json";
export const REGISTRY_FILENAME = "projects.json";
export const VECTOR_DB_FILENAME = "vectors.db";
export const METADATA_DIRNAME = "metadata";
export const LOCKS_DIRNAME = "locks";

export const PROJECT_CONFIG_FILENAME = ".vecsync.json";
export const DEFAULT_IGNORE_FILENAME = ".vecsyncignore";

export function getRootDir(): string {
  const override = process.env[HOME_ENV]?.trim();
  if (override) return path.resolve(override);
  return path.join(os.homedir(), APP_DIRNAME);
}

export function settingsFilePath(): string {
  return path.join(getRootDir(), SETTINGS_FILENAME);
}

export function registryPath(): string {
  return path.join(getRootDir(), REGISTRY_FILENAME);
}

export function vectorDbPath(): string {
  return path.join(getRootDir(), VECTOR_DB_FILENAME);
}

export function metadataDirPath(): string {
  return path.join(getRootDir(), METADATA_DIRNAME);
}

export function locksDirPath(): string {
  return path.join(getRootDir(), LOCKS_DIRNAME);
}
