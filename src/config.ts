/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import {
  DEFAULTS,
  DEFAULT_OPENAI_URL,
  DEFAULT_OPENROUTER_URL,
  SHELLMATE_FILES
} from './constants.js';
import type {
  CLIOptions,
  LoadedConfig,
  ProviderName,
  ProviderSettings,
  RuntimeSettings,
  ShellmateConfig
} from './types.js';

/**
 * Fatal configuration problem. Raised only at startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const ProviderSettingsSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  model: z.string().min(1)
});

export const ConfigFileSchema = z.object({
  provider: z.enum(['openai', 'openrouter']).optional(),
  openai: ProviderSettingsSchema.optional(),
  openrouter: ProviderSettingsSchema.optional(),
  session: z.object({
    commandTimeoutSeconds: z.number().int().optional(),
    safeMode: z.boolean().optional(),
    showTokens: z.boolean().optional(),
    maxOutputTokens: z.number().int().positive().optional(),
    contextTokens: z.number().int().positive().optional()
  }).optional(),
  logging: z.object({
    file: z.string().optional()
  }).optional()
});

type Env = Record<string, string | undefined>;

const FALSE_VALUES = new Set(['0', 'false', 'off', 'no']);

export function getDefaultConfigPath(): string {
  return SHELLMATE_FILES.configJson;
}

/**
 * Parse an on/off flag. Anything other than an explicit "off" value is on.
 */
export function parseToggle(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) {
    return fallback;
  }
  return !FALSE_VALUES.has(raw.trim().toLowerCase());
}

/**
 * Timeout in seconds; non-positive disables it, unparseable falls back to the default.
 */
export function parseTimeoutSeconds(raw: string | number | undefined): number | null {
  if (raw === undefined) {
    return DEFAULTS.commandTimeoutSeconds;
  }
  const value = typeof raw === 'number' ? raw : Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    return DEFAULTS.commandTimeoutSeconds;
  }
  return value > 0 ? Math.floor(value) : null;
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function expandHome(filePath: string): string {
  return filePath.startsWith('~') ? path.join(os.homedir(), filePath.slice(1)) : filePath;
}

function isProviderName(value: string): value is ProviderName {
  return value === 'openai' || value === 'openrouter';
}

/**
 * Merge file config, environment and CLI flags into the settings object
 * shared by the session. Precedence: flags, then environment, then file.
 */
export function resolveRuntimeSettings(
  config: ShellmateConfig,
  env: Env = process.env,
  options: CLIOptions = {}
): RuntimeSettings {
  const session = config.session ?? {};

  const providerRaw = options.provider ?? env.SHELLMATE_PROVIDER ?? config.provider ?? 'openai';
  if (!isProviderName(providerRaw)) {
    throw new ConfigError(`Unknown provider "${providerRaw}". Use "openai" or "openrouter".`);
  }

  const model =
    options.model ??
    env.SHELLMATE_MODEL ??
    env.OPENAI_MODEL ??
    config[providerRaw]?.model ??
    DEFAULTS.model;

  let commandTimeoutSeconds = parseTimeoutSeconds(session.commandTimeoutSeconds);
  if (env.SHELLMATE_COMMAND_TIMEOUT !== undefined) {
    commandTimeoutSeconds = parseTimeoutSeconds(env.SHELLMATE_COMMAND_TIMEOUT);
  }
  if (options.timeout !== undefined) {
    commandTimeoutSeconds = parseTimeoutSeconds(options.timeout);
  }

  let safeMode = parseToggle(env.SHELLMATE_SAFE_MODE, session.safeMode ?? DEFAULTS.safeMode);
  if (options.unsafe) {
    safeMode = false;
  }

  let showTokens = parseToggle(env.SHELLMATE_SHOW_TOKENS, session.showTokens ?? DEFAULTS.showTokens);
  if (options.tokens === false) {
    showTokens = false;
  }

  const maxOutputTokens = parsePositiveInt(
    env.SHELLMATE_MAX_OUTPUT_TOKENS,
    session.maxOutputTokens ?? DEFAULTS.maxOutputTokens
  );
  const contextTokens = parsePositiveInt(
    env.SHELLMATE_CONTEXT_TOKENS,
    session.contextTokens ?? DEFAULTS.contextTokens
  );

  if (maxOutputTokens >= contextTokens) {
    throw new ConfigError(
      `maxOutputTokens (${maxOutputTokens}) must be smaller than contextTokens (${contextTokens}).`
    );
  }

  const logFile = expandHome(
    options.logFile ?? env.SHELLMATE_LOG_FILE ?? config.logging?.file ?? SHELLMATE_FILES.interactionLog
  );

  return {
    provider: providerRaw,
    model,
    commandTimeoutSeconds,
    safeMode,
    showTokens,
    maxOutputTokens,
    contextTokens,
    logFile: path.resolve(logFile)
  };
}

export async function loadConfig(
  options: CLIOptions = {},
  env: Env = process.env
): Promise<LoadedConfig> {
  const configPath = path.resolve(expandHome(options.config ?? env.SHELLMATE_CONFIG ?? getDefaultConfigPath()));

  let fileConfig: ShellmateConfig = {};
  if (await fs.pathExists(configPath)) {
    let parsed: unknown;
    try {
      parsed = await fs.readJSON(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to parse config at ${configPath}: ${(error as Error).message}`);
    }
    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config at ${configPath}: ${issues}`);
    }
    fileConfig = result.data;
  }

  const settings = resolveRuntimeSettings(fileConfig, env, options);
  return { ...fileConfig, configPath, settings };
}

/**
 * Provider credentials for the selected provider. A missing key is fatal.
 */
export function getProviderConfig(config: LoadedConfig, env: Env = process.env): ProviderSettings {
  const { provider, model } = config.settings;
  const entry = config[provider];

  if (provider === 'openrouter') {
    const apiKey = env.OPENROUTER_API_KEY ?? entry?.apiKey;
    if (!apiKey) {
      throw new ConfigError('Error: OPENROUTER_API_KEY is not set (or openrouter.apiKey in the config file).');
    }
    return { apiKey, model, baseUrl: entry?.baseUrl ?? DEFAULT_OPENROUTER_URL };
  }

  const apiKey = env.OPENAI_API_KEY ?? entry?.apiKey;
  if (!apiKey) {
    throw new ConfigError('Error: OPENAI_API_KEY is not set (or openai.apiKey in the config file).');
  }
  return { apiKey, model, baseUrl: entry?.baseUrl ?? DEFAULT_OPENAI_URL };
}
