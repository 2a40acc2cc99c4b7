/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LLMRequest, LLMResponse } from '../types.js';

/**
 * Chat backend the tool-call resolver talks to
 */
export interface LLMProvider {
    /** Name used in error messages and logs */
    getName(): string;

    /**
     * Send the transcript and tool definitions; resolves with the normalized reply.
     * Rejects on transport failures and non-2xx responses.
     */
    complete(request: LLMRequest): Promise<LLMResponse>;

    getModel(): string;
}
