/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type { LLMProvider } from './LLMProvider.js';
import type {
    FunctionDefinition,
    LLMMessage,
    LLMRequest,
    LLMResponse,
    LLMToolCall,
    LLMUsage,
    ProviderSettings
} from '../types.js';
import { DEFAULT_OPENAI_URL, DEFAULTS } from '../constants.js';

const OpenAIToolCallSchema = z.object({
    id: z.string().optional(),
    type: z.string().optional(),
    function: z.object({
        name: z.string(),
        arguments: z.string().nullish()
    })
});

const OpenAIChatResponseSchema = z.object({
    id: z.string().optional(),
    created: z.number().optional(),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().optional(),
            content: z.string().nullish(),
            tool_calls: z.array(OpenAIToolCallSchema).nullish()
        }),
        finish_reason: z.string().nullish()
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional()
    }).nullish()
});

type OpenAIChatResponse = z.infer<typeof OpenAIChatResponseSchema>;

const FINISH_REASONS = ['stop', 'tool_calls', 'length', 'content_filter'] as const;
type FinishReason = (typeof FINISH_REASONS)[number];

function isFinishReason(value: string | null | undefined): value is FinishReason {
    return FINISH_REASONS.some((reason) => reason === value);
}

export interface OpenAIProviderOptions {
    /** Provider name reported by getName() */
    name?: string;
    /** Extra headers sent with every request */
    headers?: Record<string, string>;
}

/**
 * Chat-completions transport. Also the base for OpenAI-compatible gateways.
 */
export class OpenAIProvider implements LLMProvider {
    protected readonly baseUrl: string;
    protected readonly apiKey: string;
    protected readonly model: string;
    private readonly name: string;
    private readonly extraHeaders: Record<string, string>;

    constructor(config: ProviderSettings, options: OpenAIProviderOptions = {}) {
        this.baseUrl = (config.baseUrl || DEFAULT_OPENAI_URL).replace(/\/+$/, '');
        this.apiKey = config.apiKey || '';
        this.model = config.model || DEFAULTS.model;
        this.name = options.name ?? 'openai';
        this.extraHeaders = options.headers ?? {};
    }

    getName(): string {
        return this.name;
    }

    getModel(): string {
        return this.model;
    }

    async complete(request: LLMRequest): Promise<LLMResponse> {
        const body: Record<string, unknown> = {
            model: request.model || this.model,
            messages: request.messages.map(toWireMessage)
        };
        if (request.maxTokens !== undefined) {
            body.max_tokens = request.maxTokens;
        }

        // Add function calling support if tools are provided
        if (request.tools && request.tools.length > 0) {
            body.tools = request.tools.map((tool: FunctionDefinition) => ({
                type: 'function',
                function: {
                    name: tool.name,
                    description: tool.description,
                    parameters: tool.parameters ?? { type: 'object', properties: {} }
                }
            }));

            if (request.toolChoice) {
                body.tool_choice = request.toolChoice;
            }
        }

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.apiKey}`,
                    ...this.extraHeaders
                },
                body: JSON.stringify(body),
                signal: request.signal
            });
        } catch (error) {
            throw new Error(
                `Failed to reach ${this.name} (${(error as Error).message}). Check your network connection or base URL.`
            );
        }

        if (!response.ok) {
            throw new Error(await this.buildErrorMessage(response));
        }

        const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error(`Unexpected ${this.name} response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        }
        return normalizeResponse(parsed.data);
    }

    protected async buildErrorMessage(response: Response): Promise<string> {
        const status = response.status;
        const text = await response.text();
        let detail = text;
        try {
            const data: unknown = JSON.parse(text);
            const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(data);
            if (parsed.success) {
                detail = parsed.data.error.message;
            }
        } catch {
            // Body is not JSON; keep the raw text
        }
        if (status === 401) {
            return `${this.name} rejected the API key (401). Check your credentials.`;
        }
        if (status === 429) {
            return `You hit the rate limit for ${this.name}. Please try again later.`;
        }
        return `${this.name} API error: ${status} ${detail}`.trim();
    }
}

function toWireMessage(message: LLMMessage): Record<string, unknown> {
    const mapped: Record<string, unknown> = {
        role: message.role,
        content: message.content ?? null
    };
    if (message.role === 'tool' && message.tool_call_id) {
        mapped.tool_call_id = message.tool_call_id;
    }
    if (message.role === 'assistant' && message.tool_calls && message.tool_calls.length > 0) {
        mapped.tool_calls = message.tool_calls;
    }
    if (message.name) {
        mapped.name = message.name;
    }
    return mapped;
}

/**
 * Normalize a chat-completions payload. Tool calls without an id get a
 * stable positional one so acknowledgments can still reference them.
 */
export function normalizeResponse(data: OpenAIChatResponse): LLMResponse {
    const [choice] = data.choices;
    const message = choice.message;

    let toolCalls: LLMToolCall[] | undefined;
    if (message.tool_calls && message.tool_calls.length > 0) {
        toolCalls = message.tool_calls.map((tc, index) => ({
            id: tc.id || `call_${index}`,
            type: 'function' as const,
            function: {
                name: tc.function.name,
                arguments: tc.function.arguments ?? ''
            }
        }));
    }

    let usage: LLMUsage | undefined;
    if (data.usage) {
        const promptTokens = data.usage.prompt_tokens ?? 0;
        const completionTokens = data.usage.completion_tokens ?? 0;
        usage = {
            promptTokens,
            completionTokens,
            totalTokens: data.usage.total_tokens ?? promptTokens + completionTokens
        };
    }

    return {
        id: data.id ?? 'local',
        created: data.created ?? Date.now(),
        content: message.content ?? '',
        toolCalls,
        finishReason: isFinishReason(choice.finish_reason) ? choice.finish_reason : undefined,
        usage,
        raw: data
    };
}
