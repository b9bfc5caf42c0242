/**
 * Configuration file support for imagetree.
 *
 * Config file locations (in order of precedence):
 *   1. the -c/--configfile file (default ./config.yaml)
 *   2. $XDG_CONFIG_HOME/imagetree.yaml, else ~/.config/imagetree.yaml
 *   3. built-in defaults
 *
 * Dependency direction:
 *   This module imports from: config.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, builder, commands
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { makeConfig, type ConfigValue, type ImageTreeConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

type ConfigMap = { [key: string]: ConfigValue };

interface YamlLine {
  indent: number;
  text: string;
  lineNo: number;
}

/**
 * Parse a scalar: quoted strings, booleans, null, numbers and flat
 * `[a, b]` lists.
 */
function parseScalar(raw: string): ConfigValue {
  const value = raw.trim();
  const quoted = value.match(/^"(.*)"$/) ?? value.match(/^'(.*)'$/);
  if (quoted) {
    return quoted[1] ?? "";
  }
  if (value === "true") {return true;}
  if (value === "false") {return false;}
  if (value === "null" || value === "~") {return null;}
  if (/^-?\d+$/.test(value)) {return parseInt(value, 10);}
  if (/^-?\d+\.\d+$/.test(value)) {return parseFloat(value);}
  if (value === "{}") {return {};}
  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    return inner === "" ? [] : inner.split(",").map((item) => parseScalar(item));
  }
  return value;
}

function isListItem(line: YamlLine): boolean {
  return line.text === "-" || line.text.startsWith("- ");
}

/**
 * Parse the block starting at lines[pos], whose lines share `indent`.
 * Returns the value and the index of the first line after the block.
 */
function parseBlock(lines: YamlLine[], pos: number, indent: number): [ConfigValue, number] {
  const first = lines[pos];
  if (first && isListItem(first)) {
    const items: ConfigValue[] = [];
    let line = lines[pos];
    while (line && line.indent === indent && isListItem(line)) {
      items.push(parseScalar(line.text.slice(1)));
      pos++;
      line = lines[pos];
    }
    return [items, pos];
  }

  const result: ConfigMap = {};
  let line = lines[pos];
  while (line && line.indent === indent) {
    const match = line.text.match(/^([^\s:#-][^:]*?):(?:\s+(.*))?$/);
    if (!match?.[1]) {
      throw new ConfigError(`line ${line.lineNo}: expected "key: value", got "${line.text}"`);
    }
    const key = match[1];
    const rest = match[2]?.trim() ?? "";
    pos++;

    let value: ConfigValue = null;
    const next = lines[pos];
    if (rest !== "") {
      value = parseScalar(rest);
    } else if (next && next.indent > indent) {
      [value, pos] = parseBlock(lines, pos, next.indent);
    } else if (next && next.indent === indent && isListItem(next)) {
      // "key:" followed by unindented "- item" lines
      [value, pos] = parseBlock(lines, pos, indent);
    }
    result[key] = value;
    line = lines[pos];
  }
  return [result, pos];
}

/**
 * Parse the YAML subset imagetree configuration files use: nested
 * mappings by indentation, `- item` lists and scalars. Full-line comments
 * are skipped.
 */
export function parseSimpleYaml(content: string): ConfigMap {
  const lines: YamlLine[] = [];
  content.split("\n").forEach((raw, index) => {
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      return;
    }
    lines.push({ indent: raw.length - raw.trimStart().length, text: trimmed, lineNo: index + 1 });
  });

  const first = lines[0];
  if (!first) {
    return {};
  }
  const [value, pos] = parseBlock(lines, 0, first.indent);
  const stray = lines[pos];
  if (stray) {
    throw new ConfigError(`line ${stray.lineNo}: unexpected indentation`);
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigError("top level must be a mapping");
  }
  return value;
}

// === Typed accessors ===

function readString(raw: ConfigMap, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) {return undefined;}
  if (typeof value === "string") {return value;}
  if (typeof value === "number") {return String(value);}
  throw new ConfigError(`"${key}" must be a string`);
}

function readNullableString(raw: ConfigMap, key: string): string | null | undefined {
  return raw[key] === null ? null : readString(raw, key);
}

function readNumber(raw: ConfigMap, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {return undefined;}
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {return value;}
  throw new ConfigError(`"${key}" must be a positive integer`);
}

function readBoolean(raw: ConfigMap, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) {return undefined;}
  if (typeof value === "boolean") {return value;}
  throw new ConfigError(`"${key}" must be true or false`);
}

function readStringList(raw: ConfigMap, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) {return undefined;}
  if (value === null) {return [];}
  if (Array.isArray(value)) {
    return value.map((item) => {
      if (typeof item === "string" || typeof item === "number") {
        return String(item);
      }
      throw new ConfigError(`"${key}" must be a list of strings`);
    });
  }
  throw new ConfigError(`"${key}" must be a list`);
}

function readUidMap(raw: ConfigMap, key: string): Record<string, number> | undefined {
  const value = raw[key];
  if (value === undefined) {return undefined;}
  if (value === null) {return {};}
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError(`"${key}" must be a mapping of user names to ids`);
  }
  const result: Record<string, number> = {};
  for (const [user, uid] of Object.entries(value)) {
    if (typeof uid !== "number" || !Number.isInteger(uid)) {
      throw new ConfigError(`"${key}.${user}" must be an integer`);
    }
    result[user] = uid;
  }
  return result;
}

const KNOWN_KEYS = new Set([
  "registry", "namespace", "username", "password", "seed_image", "apt_options",
  "apt_only_proxy", "http_proxy", "base_images", "scan_workers", "fallback_author",
  "fallback_email", "distribution", "update_id", "known_uid_mappings",
  "force_numeric_user", "verify_command", "verify_args", "driver",
]);

/**
 * Map a parsed file onto config fields. Only keys present in the file are set.
 */
export function toConfigOverrides(raw: ConfigMap): Partial<ImageTreeConfig> {
  const config: Partial<ImageTreeConfig> = {};

  const registry = readNullableString(raw, "registry");
  if (registry !== undefined) {config.registry = registry;}
  const namespace = readNullableString(raw, "namespace");
  if (namespace !== undefined) {config.namespace = namespace;}
  const username = readNullableString(raw, "username");
  if (username !== undefined) {config.username = username;}
  const password = readNullableString(raw, "password");
  if (password !== undefined) {config.password = password;}
  const aptOnlyProxy = readNullableString(raw, "apt_only_proxy");
  if (aptOnlyProxy !== undefined) {config.aptOnlyProxy = aptOnlyProxy;}
  const httpProxy = readNullableString(raw, "http_proxy");
  if (httpProxy !== undefined) {config.httpProxy = httpProxy;}

  const seedImage = readString(raw, "seed_image");
  if (seedImage !== undefined) {config.seedImage = seedImage;}
  const aptOptions = readString(raw, "apt_options");
  if (aptOptions !== undefined) {config.aptOptions = aptOptions;}
  const fallbackAuthor = readString(raw, "fallback_author");
  if (fallbackAuthor !== undefined) {config.fallbackAuthor = fallbackAuthor;}
  const fallbackEmail = readString(raw, "fallback_email");
  if (fallbackEmail !== undefined) {config.fallbackEmail = fallbackEmail;}
  const distribution = readString(raw, "distribution");
  if (distribution !== undefined) {config.distribution = distribution;}
  const updateId = readString(raw, "update_id");
  if (updateId !== undefined) {config.updateId = updateId;}
  const verifyCommand = readString(raw, "verify_command");
  if (verifyCommand !== undefined) {config.verifyCommand = verifyCommand;}
  const driver = readString(raw, "driver");
  if (driver !== undefined) {config.driver = driver;}

  const scanWorkers = readNumber(raw, "scan_workers");
  if (scanWorkers !== undefined) {config.scanWorkers = scanWorkers;}
  const forceNumericUser = readBoolean(raw, "force_numeric_user");
  if (forceNumericUser !== undefined) {config.forceNumericUser = forceNumericUser;}
  const baseImages = readStringList(raw, "base_images");
  if (baseImages !== undefined) {config.baseImages = baseImages;}
  const verifyArgs = readStringList(raw, "verify_args");
  if (verifyArgs !== undefined) {config.verifyArgs = verifyArgs;}
  const uids = readUidMap(raw, "known_uid_mappings");
  if (uids !== undefined) {config.knownUidMappings = uids;}

  const extra: ConfigMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      extra[key] = value;
    }
  }
  if (Object.keys(extra).length > 0) {
    config.extra = extra;
  }
  return config;
}

/**
 * Load one configuration file. Returns null when it does not exist.
 */
export function loadConfigFile(path: string): Partial<ImageTreeConfig> | null {
  if (!existsSync(path)) {
    return null;
  }
  const content = readFileSync(path, "utf-8");
  try {
    const overrides = toConfigOverrides(parseSimpleYaml(content));
    log.debug(`Loaded config: ${path}`);
    return overrides;
  } catch (e) {
    if (e instanceof ConfigError) {
      throw new ConfigError(`${path}: ${e.message}`);
    }
    throw e;
  }
}

/**
 * Path of the per-user configuration file.
 */
export function userConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, "imagetree.yaml");
}

/**
 * Merge configurations with proper precedence; later arguments win.
 * `extra` keys merge instead of replacing each other.
 */
export function mergeConfigs(...overrides: (Partial<ImageTreeConfig> | null)[]): ImageTreeConfig {
  let result = makeConfig();
  for (const override of overrides) {
    if (!override) {continue;}
    result = { ...result, ...override, extra: { ...result.extra, ...override.extra } };
  }
  return result;
}

export interface LoadConfigOptions {
  /** Fail when the local file is missing (it was named explicitly) */
  required?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load imagetree configuration: defaults < user file < local file.
 */
export function loadConfig(configFile: string, options: LoadConfigOptions = {}): ImageTreeConfig {
  const userConfig = loadConfigFile(userConfigPath(options.env));
  const localConfig = loadConfigFile(configFile);
  if (localConfig === null) {
    if (options.required) {
      throw new ConfigError(`Configuration file ${configFile} not found`);
    }
    log.debug(`No configuration file at ${configFile}, using defaults`);
  }
  return mergeConfigs(userConfig, localConfig);
}
