import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import { LlmConfig } from '../config/llm.config';
import { ConfigurationError, UpstreamServiceError } from '../errors/deck-generation.errors';
import { errorMessage } from '../errors/http-exception.mapper';

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
}

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly config: LlmConfig;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<LlmConfig>('llm');
  }

  async generate(prompt: string): Promise<string> {
    const { apiKey, apiUrl, model, temperature, timeoutMs } = this.config;
    if (!apiKey || !apiKey.startsWith('sk-')) {
      throw new ConfigurationError('Invalid LLM API key, check LLM_API_KEY');
    }

    this.logger.log(`Sending prompt to ${model}: ${prompt.trim().substring(0, 80)}...`);

    let response: AxiosResponse<ChatCompletionResponse>;
    try {
      response = await firstValueFrom(
        this.httpService.post<ChatCompletionResponse>(
          apiUrl,
          {
            model,
            messages: [{ role: 'user', content: prompt }],
            temperature,
          },
          {
            headers: {
              Authorization: `Bearer ${apiKey}`,
              'Content-Type': 'application/json',
            },
            timeout: timeoutMs,
            // Non-2xx answers are reported below with their body.
            validateStatus: () => true,
          },
        ),
      );
    } catch (error) {
      this.logger.error(`LLM request failed: ${errorMessage(error)}`);
      throw new UpstreamServiceError(`LLM request failed: ${errorMessage(error)}`);
    }

    if (response.status !== 200) {
      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
      throw new UpstreamServiceError(`LLM call failed: ${response.status}, ${body}`, response.status);
    }

    const content = response.data?.choices?.[0]?.message?.content;
    if (typeof content !== 'string' || content.trim().length === 0) {
      throw new UpstreamServiceError('LLM response missing content');
    }

    return content.trim();
  }
}
