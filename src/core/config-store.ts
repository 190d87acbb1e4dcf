import { existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { ConfigError, FileSystemError, errorMessage } from "./errors.js";
import { DEFAULT_AGENT } from "./registry.js";
import { describeIssues, safeValidateConfig, type X100Config } from "./validation.js";

export const X100_DIR = ".x100";
export const CONFIG_FILE = "config.json";
export const NEXTSTEP_FILE = "nextstep.json";

export function configPathFor(projectRoot: string): string {
  return join(projectRoot, X100_DIR, CONFIG_FILE);
}

export function nextstepConfigPathFor(projectRoot: string): string {
  return join(projectRoot, X100_DIR, NEXTSTEP_FILE);
}

/**
 * Read .x100/config.json. A missing file is an empty config; anything that is
 * not a JSON object of the expected shape is a ConfigError.
 */
export function loadConfig(configPath: string): X100Config {
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(configPath, "Cannot read config", { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Malformed JSON in config, fix it manually: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(configPath, "Config must be a JSON object");
  }

  const result = safeValidateConfig(data);
  if (!result.success) {
    throw new ConfigError(configPath, `Invalid config: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Write the config through a temp file + rename so a crash never leaves a
 * half-written config behind.
 */
export function saveConfig(configPath: string, config: X100Config): void {
  writeJsonAtomic(configPath, config);
}

/**
 * Read-modify-write. Returns the config that was written.
 */
export function updateConfig(
  configPath: string,
  mutate: (config: X100Config) => X100Config | void
): X100Config {
  const current = loadConfig(configPath);
  const next = mutate(current) ?? current;
  saveConfig(configPath, next);
  return next;
}

export function writeJsonAtomic(filePath: string, data: unknown): void {
  const tmpPath = `${filePath}.tmp`;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    renameSync(tmpPath, filePath);
  } catch (err) {
    throw new FileSystemError("write", filePath, err);
  }
}

/**
 * An x100 project has a .x100/ directory containing config.json.
 */
export function isX100Project(projectRoot: string): boolean {
  const dir = join(projectRoot, X100_DIR);
  const file = join(dir, CONFIG_FILE);
  return isDirectory(dir) && existsSync(file) && statSync(file).isFile();
}

export function getDefaultAgent(config: X100Config): string {
  return config.default_agent || DEFAULT_AGENT;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}
