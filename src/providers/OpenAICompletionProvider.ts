/**
 * OpenAI completion provider.
 * Chat completions in JSON mode, so replies parse as a single object.
 */

import OpenAI from 'openai';
import type { CompletionRequest, ICompletionProvider } from './ICompletionProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TEMPERATURE = 0.2;

export class OpenAICompletionProvider implements ICompletionProvider {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    temperature?: number;
  }) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.temperature = opts?.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
    });

    return response.choices[0]?.message?.content ?? '';
  }
}
