import { Logger } from '@nestjs/common';
import { request } from 'undici';
import { z } from 'zod';
import { GenerationPrompt, TextGenerator } from './text-generator';

type DeepSeekRole = 'system' | 'user' | 'assistant';

export interface DeepSeekConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
}

const completionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
});

const readContent = (json: unknown): string | undefined => {
  const parsed = completionSchema.safeParse(json);
  return parsed.success ? parsed.data.choices[0].message.content : undefined;
};

export class DeepSeekService implements TextGenerator {
  readonly provider = 'deepseek';
  private readonly logger = new Logger(DeepSeekService.name);
  private readonly baseUrl: string;

  constructor(private readonly config: DeepSeekConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async complete(prompt: GenerationPrompt): Promise<string> {
    if (!this.config.apiKey) {
      throw new Error('DEEPSEEK_API_KEY is not set');
    }

    const messages: Array<{ role: DeepSeekRole; content: string }> = [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ];

    const url = `${this.baseUrl}/v1/chat/completions`;

    try {
      const res = await request(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({ model: this.config.model, messages, temperature: 0.3 }),
      });

      const json: unknown = await res.body.json();
      if (res.statusCode >= 400) {
        throw new Error(`DeepSeek responded with HTTP ${res.statusCode}`);
      }

      const content = readContent(json);
      if (!content) {
        throw new Error('DeepSeek response missing content');
      }
      return content;
    } catch (error) {
      this.logger.error('DeepSeek completion failed', error);
      throw error;
    }
  }
}
