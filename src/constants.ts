/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Centralized constants for shellmate
 */
import os from 'node:os';
import path from 'node:path';

/**
 * Base directory for all shellmate user data and configuration.
 * Default: ~/.shellmate/
 * Override: Set SHELLMATE_HOME environment variable
 */
export const SHELLMATE_HOME = process.env.SHELLMATE_HOME || path.join(os.homedir(), '.shellmate');

export const SHELLMATE_FILES = {
  /** Main config file */
  configJson: path.join(SHELLMATE_HOME, 'config.json'),

  /** Prompt history, one entry per line, oldest first */
  history: path.join(SHELLMATE_HOME, 'history'),

  /** Interaction log (JSON lines) */
  interactionLog: path.join(SHELLMATE_HOME, 'logs', 'shellmate.log'),
} as const;

export const APP_NAME = 'shellmate';

export const DEFAULTS = {
  model: 'gpt-4o-mini',
  commandTimeoutSeconds: 300,
  maxOutputTokens: 1200,
  contextTokens: 16_000,
  safeMode: true,
  showTokens: true,
} as const;

/** Name of the single tool the model may call */
export const GET_COMMANDS_TOOL = 'get_commands';

/** Follow-up rounds allowed while resolving tool calls in one exchange */
export const MAX_TOOL_ROUNDS = 3;

export const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1';
export const DEFAULT_OPENROUTER_URL = 'https://openrouter.ai/api/v1';
