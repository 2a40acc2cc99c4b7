/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RuntimeSettings } from '../types.js';
import type { InteractionLogger } from './interactionLogger.js';

/**
 * Signals a runtime command hands back to the session loop
 */
export type RuntimeSignal = '/quit' | '/manual';

export interface RuntimeCommand {
    command: string;
    description: string;
    implemented: boolean;
}

export interface RuntimeCommandContext {
    /** Shared settings object; toggles mutate it in place */
    settings: RuntimeSettings;
    confirm: (message: string) => Promise<boolean>;
    logger?: InteractionLogger;
    print: (line: string) => void;
}
