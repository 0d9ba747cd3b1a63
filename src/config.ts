import * as core from "@actions/core";
import * as fs from "fs";
import * as yaml from "yaml";
import { ConfigError, describeError } from "./errors.js";
import type {
  AllowlistEntry,
  CustomRule,
  EnforcementMode,
  EnforcementSettings,
  ReviewConfig,
  Severity,
} from "./types.js";

/**
 * Settings before validation. Every layer (defaults, config file, action
 * inputs) produces one of these; `validateReviewConfig` turns the merged
 * result into a ReviewConfig.
 */
export interface ReviewSettings {
  maxLineLength?: number;
  maxInlineComments?: number;
  ignore?: readonly string[];
  customRules?: readonly CustomRule[];
  allowlist?: readonly AllowlistEntry[];
  enforcement?: Partial<EnforcementSettings>;
}

export interface ActionInputs {
  maxLineLength?: string;
  maxInlineComments?: string;
  mode?: string;
}

export const DEFAULT_SETTINGS = {
  maxLineLength: 120,
  maxInlineComments: 50,
  ignore: [],
  customRules: [],
  allowlist: [],
  enforcement: {
    mode: "warn",
    blockOn: ["error"],
  },
} satisfies ReviewSettings;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidSeverity(s: unknown): s is Severity {
  return s === "error" || s === "warning" || s === "info";
}

function isEnforcementMode(s: unknown): s is EnforcementMode {
  return s === "warn" || s === "enforce";
}

function readString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigError(`${where}.${key} must be a string`);
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") throw new ConfigError(`${where}.${key} must be a number`);
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`${where}.${key} must be a list of strings`);
  }
  return value;
}

function readRecordList(raw: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ConfigError(`${key} must be a list of mappings`);
  }
  return value;
}

function toCustomRule(raw: Record<string, unknown>, index: number): CustomRule {
  const where = `custom_rules[${index}]`;
  const id = readString(raw, "id", where);
  const pattern = readString(raw, "pattern", where);
  if (!id || !pattern) throw new ConfigError(`${where} needs an id and a pattern`);

  const analyzer = readString(raw, "analyzer", where) ?? "lint";
  if (analyzer !== "lint" && analyzer !== "security-pattern") {
    throw new ConfigError(`${where}.analyzer must be "lint" or "security-pattern"`);
  }

  const severity = raw.severity ?? "warning";
  if (!isValidSeverity(severity)) {
    throw new ConfigError(`${where}.severity must be one of error, warning, info`);
  }

  return {
    id,
    description: readString(raw, "description", where) ?? id,
    analyzer,
    pattern,
    severity,
    scope: readString(raw, "scope", where) ?? "**",
    message: readString(raw, "message", where),
  };
}

function toAllowlistEntry(raw: Record<string, unknown>, index: number): AllowlistEntry {
  const where = `allowlist[${index}]`;
  const path = readString(raw, "path", where);
  if (!path) throw new ConfigError(`${where} needs a path`);
  return {
    path,
    ruleIds: readStringList(raw, "rule_ids", where),
    reason: readString(raw, "reason", where),
  };
}

/**
 * Read the settings a YAML config document declares. Keys it leaves out stay
 * undefined so lower-precedence layers can fill them.
 */
export function parseConfigDocument(source: string): ReviewSettings {
  let parsed: unknown;
  try {
    parsed = yaml.parse(source);
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${describeError(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError("Config file must be a mapping");

  const settings = isRecord(parsed.settings) ? parsed.settings : {};
  const enforcement = isRecord(parsed.enforcement) ? parsed.enforcement : {};

  const rawMode = enforcement.mode;
  let mode: EnforcementMode | undefined;
  if (rawMode !== undefined && rawMode !== null) {
    if (!isEnforcementMode(rawMode)) {
      throw new ConfigError(`enforcement.mode must be "warn" or "enforce"`);
    }
    mode = rawMode;
  }
  const blockOn = readStringList(enforcement, "block_on", "enforcement");
  if (blockOn && !blockOn.every(isValidSeverity)) {
    throw new ConfigError("enforcement.block_on may only list error, warning, info");
  }

  return {
    maxLineLength: readNumber(settings, "max_line_length", "settings"),
    maxInlineComments: readNumber(settings, "max_inline_comments", "settings"),
    ignore: readStringList(parsed, "ignore", "config"),
    customRules: readRecordList(parsed, "custom_rules").map(toCustomRule),
    allowlist: readRecordList(parsed, "allowlist").map(toAllowlistEntry),
    enforcement: {
      mode,
      blockOn: blockOn?.filter(isValidSeverity),
    },
  };
}

export function loadConfig(configPath: string): ReviewSettings {
  if (!fs.existsSync(configPath)) {
    core.info(`No config file found at ${configPath}, using defaults`);
    return {};
  }
  return parseConfigDocument(fs.readFileSync(configPath, "utf-8"));
}

function parseIntegerInput(name: string, value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Input ${name} must be an integer, got "${trimmed}"`);
  }
  return parsed;
}

/**
 * Merge settings layers. Precedence: action inputs, then the config file,
 * then built-in defaults.
 */
export function resolveSettings(fileSettings: ReviewSettings, inputs: ActionInputs = {}): ReviewSettings {
  const rawMode = inputs.mode?.trim();
  let mode: EnforcementMode | undefined;
  if (rawMode) {
    if (!isEnforcementMode(rawMode)) {
      throw new ConfigError(`Input mode must be "warn" or "enforce", got "${rawMode}"`);
    }
    mode = rawMode;
  }

  return {
    maxLineLength:
      parseIntegerInput("max-line-length", inputs.maxLineLength) ??
      fileSettings.maxLineLength ??
      DEFAULT_SETTINGS.maxLineLength,
    maxInlineComments:
      parseIntegerInput("max-inline-comments", inputs.maxInlineComments) ??
      fileSettings.maxInlineComments ??
      DEFAULT_SETTINGS.maxInlineComments,
    ignore: fileSettings.ignore ?? DEFAULT_SETTINGS.ignore,
    customRules: fileSettings.customRules ?? DEFAULT_SETTINGS.customRules,
    allowlist: fileSettings.allowlist ?? DEFAULT_SETTINGS.allowlist,
    enforcement: {
      mode: mode ?? fileSettings.enforcement?.mode ?? DEFAULT_SETTINGS.enforcement.mode,
      blockOn: fileSettings.enforcement?.blockOn ?? [...DEFAULT_SETTINGS.enforcement.blockOn],
    },
  };
}

/**
 * Validate settings into an immutable ReviewConfig. Both numeric limits are
 * required here: callers resolve defaults before this point.
 */
export function validateReviewConfig(settings: ReviewSettings): ReviewConfig {
  const { maxLineLength, maxInlineComments } = settings;

  if (maxLineLength === undefined) throw new ConfigError("maxLineLength is required");
  if (!Number.isInteger(maxLineLength) || maxLineLength <= 0) {
    throw new ConfigError(`maxLineLength must be a positive integer (got ${maxLineLength})`);
  }
  if (maxInlineComments === undefined) throw new ConfigError("maxInlineComments is required");
  if (!Number.isInteger(maxInlineComments) || maxInlineComments < 0) {
    throw new ConfigError(`maxInlineComments must be a non-negative integer (got ${maxInlineComments})`);
  }

  const customRules = settings.customRules ?? [];
  for (const rule of customRules) {
    try {
      new RegExp(rule.pattern);
    } catch (err) {
      throw new ConfigError(`Custom rule ${rule.id} has an invalid pattern: ${describeError(err)}`);
    }
  }

  return Object.freeze({
    maxLineLength,
    maxInlineComments,
    ignore: Object.freeze([...(settings.ignore ?? [])]),
    customRules: Object.freeze(customRules.map((rule) => Object.freeze({ ...rule }))),
    allowlist: Object.freeze((settings.allowlist ?? []).map((entry) => Object.freeze({ ...entry }))),
    enforcement: Object.freeze({
      mode: settings.enforcement?.mode ?? "warn",
      blockOn: [...(settings.enforcement?.blockOn ?? ["error"])],
    }),
  });
}
