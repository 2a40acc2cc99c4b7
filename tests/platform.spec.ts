/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import os from 'node:os';
import { detectShellName, getPlatformInfo } from '../src/utils/platform.js';

describe.runIf(process.platform !== 'win32')('platform detection', () => {
  it('uses the basename of the login shell', () => {
    expect(detectShellName({ SHELL: '/usr/local/bin/zsh' })).toBe('zsh');
  });

  it('falls back to sh without SHELL', () => {
    expect(detectShellName({})).toBe('sh');
  });

  it('names the OS with its release', () => {
    const info = getPlatformInfo({ SHELL: '/bin/bash' });
    expect(info.shellName).toBe('bash');
    expect(info.isWindows).toBe(false);
    expect(info.osName.endsWith(` ${os.release()}`)).toBe(true);
  });
});
