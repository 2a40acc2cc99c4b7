/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LLMProvider } from './LLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';
import { OpenRouterProvider } from './OpenRouterProvider.js';
import type { ProviderName, ProviderSettings } from '../types.js';

/**
 * Custom error class for unconfigured provider
 */
export class ProviderNotConfiguredError extends Error {
    constructor(public readonly providerName: string) {
        super(`Provider "${providerName}" is not configured. Set its API key in the environment or config file.`);
        this.name = 'ProviderNotConfiguredError';
    }
}

export class ProviderFactory {
    /**
     * Create an LLM provider for the resolved settings.
     * A provider without an API key is rejected up front.
     */
    static create(providerName: ProviderName, settings: ProviderSettings): LLMProvider {
        if (!settings.apiKey) {
            throw new ProviderNotConfiguredError(providerName);
        }

        switch (providerName) {
            case 'openrouter':
                return new OpenRouterProvider(settings);
            case 'openai':
            default:
                return new OpenAIProvider(settings);
        }
    }
}
