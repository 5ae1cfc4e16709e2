import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import {
  TextGenerationProvider,
  TextGenerationRequest,
} from '../interfaces/text-generation-provider.interface';
import { TextGenerationError } from '../../common/errors/upstream.errors';
import { errorMessage } from '../../common/result';

/**
 * Groq chat completions through its OpenAI-compatible endpoint. A client is
 * built per call because the credential arrives with each analysis.
 */
@Injectable()
export class GroqProvider implements TextGenerationProvider {
  readonly name = 'groq';
  private readonly logger = new Logger(GroqProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async generate(request: TextGenerationRequest): Promise<string> {
    const model = this.configService.get<string>(
      'GROQ_MODEL',
      'llama-3.3-70b-versatile',
    );
    const client = new OpenAI({
      apiKey: request.apiKey,
      baseURL: this.configService.get<string>(
        'GROQ_BASE_URL',
        'https://api.groq.com/openai/v1',
      ),
      timeout: this.configService.get<number>('GENERATION_TIMEOUT_MS', 60_000),
      maxRetries: 0,
    });

    try {
      const completion = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const text = completion.choices[0]?.message?.content ?? '';
      this.logger.debug(`Groq (${model}) returned ${text.length} characters`);
      return text;
    } catch (error: unknown) {
      throw toTextGenerationError(error);
    }
  }
}

function toTextGenerationError(error: unknown): TextGenerationError {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TextGenerationError('Groq request timed out', { timedOut: true });
  }
  if (error instanceof OpenAI.APIError) {
    return new TextGenerationError(`Groq API error: ${error.message}`, {
      status: error.status,
    });
  }
  return new TextGenerationError(`Groq request failed: ${errorMessage(error)}`);
}
