import OpenAI from 'openai';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import type { AnalysisClient } from './types';

export interface OpenAIAnalysisClientOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export class OpenAIAnalysisClient implements AnalysisClient {
  private readonly openai: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: OpenAIAnalysisClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('OpenAI API key is required');
    }
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gpt-4o-mini';
    this.maxTokens = options.maxTokens ?? 500;
    this.temperature = options.temperature ?? 0.2;
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content || content.trim() === '') {
      throw new Error('Empty response from OpenAI');
    }
    return content;
  }
}
