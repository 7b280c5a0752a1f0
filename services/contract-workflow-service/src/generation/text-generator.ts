export const TEXT_GENERATOR = Symbol('TEXT_GENERATOR');
export const EMBEDDER = Symbol('EMBEDDER');

export interface GenerationPrompt {
  system: string;
  user: string;
}

/** Opaque language-model completion; may fail with any transport error. */
export interface TextGenerator {
  readonly provider: string;
  complete(prompt: GenerationPrompt): Promise<string>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}
