export interface TextGenerationRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  apiKey: string;
}

export interface TextGenerationProvider {
  readonly name: string;
  /**
   * Single chat-style completion returning the raw text. Rejects with
   * `TextGenerationError` on transport or provider failure.
   */
  generate(request: TextGenerationRequest): Promise<string>;
}

export const TEXT_GENERATION_PROVIDER = 'TEXT_GENERATION_PROVIDER';
