import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { GenerationRequest, TextGenerator } from './text-generator';
import { GenerationFailedError } from './generation.errors';

interface ResponsesContent {
  type?: string;
  text?: string;
}

interface ResponsesApiBody {
  output_text?: string;
  output?: Array<{ content?: ResponsesContent[] }>;
}

export function readOutputText(body: ResponsesApiBody | null | undefined): string {
  if (!body) return '';
  if (typeof body.output_text === 'string' && body.output_text.trim()) {
    return body.output_text.trim();
  }
  for (const item of body.output ?? []) {
    for (const content of item.content ?? []) {
      if (typeof content.text === 'string' && content.text.trim()) return content.text.trim();
    }
  }
  return '';
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return 'Text generation timed out';
    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const detail = typeof data === 'string' ? data : JSON.stringify(data ?? error.message);
    return status ? `Text generation failed [${status}]: ${detail}` : `Text generation failed: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class OpenAiTextGenerator extends TextGenerator {
  private readonly logger = new Logger(OpenAiTextGenerator.name);
  private readonly http: AxiosInstance;
  private readonly apiKey: string | undefined;
  private readonly defaultModel: string;

  constructor(configService: ConfigService) {
    super();
    this.apiKey = configService.get<string>('OPENAI_API_KEY');
    this.defaultModel = configService.get<string>('OPENAI_SHORT_MODEL') ?? 'gpt-4.1-mini';
    this.http = axios.create({
      baseURL: configService.get<string>('OPENAI_BASE_URL') ?? 'https://api.openai.com/v1',
      timeout: configService.get<number>('OPENAI_TIMEOUT_MS') ?? 60000,
      headers: {
        Authorization: `Bearer ${this.apiKey ?? ''}`,
        'Content-Type': 'application/json',
      },
    });

    if (!this.apiKey) {
      this.logger.error('❌ OPENAI_API_KEY is missing! Generation calls will fail.');
    }
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (!this.apiKey) {
      throw new GenerationFailedError('Text generation is not configured');
    }

    const model = request.model ?? this.defaultModel;
    const start = Date.now();

    try {
      const response = await this.http.post<ResponsesApiBody>('/responses', {
        model,
        input: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.input },
        ],
        max_output_tokens: request.maxOutputTokens,
      });

      const text = readOutputText(response.data);
      this.logger.debug(`Generated ${text.length} chars with ${model} in ${Date.now() - start}ms`);
      return text;
    } catch (error) {
      const message = describeAxiosError(error);
      this.logger.error(`⚠️ ${message}`);
      throw new GenerationFailedError(message, error);
    }
  }
}
