import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export interface LLMRequest {
  systemPrompt: string;
  userMessage: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json';
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number; totalTokens: number };
  finishReason: string;
}

/**
 * OpenAI-compatible chat client used by the layout producer.
 * Any endpoint speaking the chat-completions protocol works via AI_BASE_URL.
 */
@Injectable()
export class OpenAIClientService implements OnModuleInit {
  private readonly logger = new Logger(OpenAIClientService.name);
  private client: OpenAI | null = null;
  private model = 'gpt-4o';
  private maxTokens = 16_384;

  constructor(private readonly config: ConfigService) {}

  onModuleInit(): void {
    const configuredMaxTokens = this.config.get<number>('AI_MAX_TOKENS');
    if (typeof configuredMaxTokens === 'number' && Number.isFinite(configuredMaxTokens)) {
      this.maxTokens = configuredMaxTokens;
    }
    this.model = this.config.get<string>('AI_MODEL') ?? this.model;

    const apiKey = this.config.get<string>('AI_API_KEY');
    const baseURL = this.config.get<string>('AI_BASE_URL');
    if (!apiKey) {
      this.logger.warn('AI_API_KEY not set; layout generation disabled');
      return;
    }

    this.client = new OpenAI({
      apiKey,
      ...(baseURL ? { baseURL } : {}),
      timeout: 120_000,
    });
    this.logger.log(`LLM client initialized (model: ${this.model})`);
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    if (!this.client) {
      throw new Error('No LLM client initialized; set AI_API_KEY in .env');
    }

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userMessage },
    ];

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      max_tokens: request.maxTokens ?? this.maxTokens,
      temperature: request.temperature ?? 0.2,
      ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const choice = completion.choices[0];
    if (!choice) {
      throw new Error(`No response from ${this.model}`);
    }

    return {
      content: choice.message.content ?? '',
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
      finishReason: choice.finish_reason ?? 'unknown',
    };
  }
}
