/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Global test setup:
 * - Disables chalk colors so console assertions compare plain text
 * - Points the interaction log away from the user's home directory
 */
import chalk from 'chalk';
import os from 'node:os';
import path from 'node:path';

chalk.level = 0;
process.env.SHELLMATE_HOME = path.join(os.tmpdir(), 'shellmate-test-home');
