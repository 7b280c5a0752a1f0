import { Logger } from '@nestjs/common';
import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { Embedder, GenerationPrompt, TextGenerator } from './text-generator';

export interface GeminiConfig {
  apiKey?: string;
  model: string;
  embeddingModel: string;
}

export class GeminiService implements TextGenerator, Embedder {
  readonly provider = 'gemini';
  private readonly logger = new Logger(GeminiService.name);
  private model: GenerativeModel;
  private embeddingModel: GenerativeModel;

  constructor(config: GeminiConfig) {
    if (!config.apiKey) {
      throw new Error('GOOGLE_API_KEY is not set');
    }

    const genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = genAI.getGenerativeModel({
      model: config.model,
      generationConfig: {
        temperature: 0.3,
        topK: 32,
        topP: 0.95,
        maxOutputTokens: 8192,
      },
    });
    this.embeddingModel = genAI.getGenerativeModel({ model: config.embeddingModel });
  }

  async complete(prompt: GenerationPrompt): Promise<string> {
    try {
      const result = await this.model.generateContent([prompt.system, prompt.user]);
      return result.response.text();
    } catch (error) {
      this.logger.error('Error generating contract text with Gemini:', error);
      throw error;
    }
  }

  async embed(text: string): Promise<number[]> {
    try {
      const result = await this.embeddingModel.embedContent(text);
      return result.embedding.values;
    } catch (error) {
      this.logger.error('Error embedding text with Gemini:', error);
      throw error;
    }
  }
}
