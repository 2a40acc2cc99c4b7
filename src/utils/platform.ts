/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import os from 'node:os';
import path from 'node:path';

/**
 * Host description used in the command tool schema
 */
export interface PlatformInfo {
  platform: NodeJS.Platform;
  /** e.g. "Linux 6.5.0", "Darwin 23.4.0", "Windows 10.0.22631" */
  osName: string;
  /** Basename of the login shell, e.g. "zsh" */
  shellName: string;
  isWindows: boolean;
}

const OS_LABELS: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'Linux',
  darwin: 'Darwin',
  win32: 'Windows',
  freebsd: 'FreeBSD',
  openbsd: 'OpenBSD'
};

export function detectShellName(env: Record<string, string | undefined> = process.env): string {
  const platform = process.platform;
  const shell = env.SHELL ?? (platform === 'win32' ? env.ComSpec : undefined);
  if (!shell) {
    return platform === 'win32' ? 'cmd' : 'sh';
  }
  return platform === 'win32' ? path.win32.basename(shell).replace(/\.exe$/i, '') : path.basename(shell);
}

export function getPlatformInfo(env: Record<string, string | undefined> = process.env): PlatformInfo {
  const platform = process.platform;
  const label = OS_LABELS[platform] ?? platform;

  return {
    platform,
    osName: `${label} ${os.release()}`,
    shellName: detectShellName(env),
    isWindows: platform === 'win32'
  };
}
