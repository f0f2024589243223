import { readLogLevelEnv, setLogLevel } from "../core/logger";
import { openIndexService, type IndexService } from "../core/service";
import { ensureSettings, type Settings } from "../core/settings";

export function loadSettings(): Settings {
  const settings = ensureSettings();
  setLogLevel(readLogLevelEnv() ?? settings.debug.logLevel);
  return settings;
}

/** Opens the service for one command and always closes it. */
export async function withService<T>(fn: (service: IndexService, settings: Settings) => Promise<T>): Promise<T> {
  const settings = loadSettings();
  const service = await openIndexService(settings);
  try {
    return await fn(service, settings);
  } finally {
    await service.close();
  }
}

export function parseIntOption(raw: string | undefined, flag: string, min = 0): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${flag} must be an integer >= ${min} (got ${raw})`);
  }
  return value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
