/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { OpenAIProvider } from './OpenAIProvider.js';
import type { ProviderSettings } from '../types.js';
import { APP_NAME, DEFAULT_OPENROUTER_URL } from '../constants.js';

/**
 * OpenRouter speaks the chat-completions protocol; only the endpoint,
 * attribution headers and error wording differ.
 */
export class OpenRouterProvider extends OpenAIProvider {
    constructor(config: ProviderSettings) {
        super(
            { ...config, baseUrl: config.baseUrl || DEFAULT_OPENROUTER_URL },
            {
                name: 'openrouter',
                headers: {
                    'HTTP-Referer': 'https://www.npmjs.com/package/shellmate',
                    'X-Title': APP_NAME
                }
            }
        );
    }

    protected override async buildErrorMessage(response: Response): Promise<string> {
        if (response.status === 429) {
            return 'You hit the rate limit for this OpenRouter model. Please try again later or choose another model with --model.';
        }
        return super.buildErrorMessage(response);
    }
}
