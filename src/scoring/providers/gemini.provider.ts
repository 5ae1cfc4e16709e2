import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import {
  TextGenerationProvider,
  TextGenerationRequest,
} from '../interfaces/text-generation-provider.interface';
import { TextGenerationError } from '../../common/errors/upstream.errors';
import { errorMessage } from '../../common/result';

@Injectable()
export class GeminiProvider implements TextGenerationProvider {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async generate(request: TextGenerationRequest): Promise<string> {
    const modelName = this.configService.get<string>(
      'GEMINI_MODEL',
      'gemini-2.0-flash',
    );
    const timeoutMs = this.configService.get<number>(
      'GENERATION_TIMEOUT_MS',
      60_000,
    );
    const genAI = new GoogleGenerativeAI(request.apiKey);
    const model = genAI.getGenerativeModel({
      model: modelName,
      systemInstruction: request.system,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        responseMimeType: 'application/json',
      },
    });
    // SDK aborts surface as generic errors; only this signal marks a timeout.
    const signal = AbortSignal.timeout(timeoutMs);

    try {
      const result = await model.generateContent(request.user, { signal });
      const text = result.response.text();
      this.logger.debug(`Gemini (${modelName}) returned ${text.length} characters`);
      return text;
    } catch (error: unknown) {
      if (signal.aborted) {
        throw new TextGenerationError(
          `Gemini request timed out after ${timeoutMs}ms`,
          { timedOut: true },
        );
      }
      if (error instanceof GoogleGenerativeAIFetchError) {
        throw new TextGenerationError(`Gemini API error: ${error.message}`, {
          status: error.status,
        });
      }
      throw new TextGenerationError(`Gemini request failed: ${errorMessage(error)}`);
    }
  }
}
