import {
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

type OllamaEmbedResponse = {
  model: string;
  embeddings: number[][];
};

type OllamaGenerateResponse = {
  model: string;
  response: string;
  done: boolean;
};

@Injectable()
export class OllamaService {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  readonly llmModel: string;
  readonly embedModel: string;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434';
    this.llmModel =
      this.config.get<string>('OLLAMA_LLM_MODEL') ?? 'mistral:latest';
    this.embedModel =
      this.config.get<string>('OLLAMA_EMBED_MODEL') ?? 'nomic-embed-text';
  }

  async embed(texts: string[]): Promise<number[][]> {
    const url = `${this.baseUrl}/api/embed`;
    this.logger.debug(`Calling Ollama embed: ${url} (${texts.length} inputs)`);
    const json = await this.post<OllamaEmbedResponse>(url, {
      model: this.embedModel,
      input: texts,
      truncate: true,
    });
    return json.embeddings;
  }

  async generate(prompt: string, system?: string): Promise<string> {
    const url = `${this.baseUrl}/api/generate`;
    this.logger.debug(`Calling Ollama generate: ${url}`);
    const json = await this.post<OllamaGenerateResponse>(url, {
      model: this.llmModel,
      prompt,
      system,
      stream: false,
    });
    return json.response;
  }

  private async post<T>(url: string, body: Record<string, unknown>): Promise<T> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (error) {
      this.logger.error(`Ollama unreachable at ${url}`, error);
      throw new ServiceUnavailableException('Ollama service unreachable');
    }

    if (!res.ok) {
      throw new InternalServerErrorException(
        `Ollama request failed: ${res.status} ${await res.text()}`,
      );
    }
    return (await res.json()) as T;
  }
}
