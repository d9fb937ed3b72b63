import fetch, { Response } from 'node-fetch';
import { IModelClient } from '../../core/interfaces/IModelClient.js';
import { OllamaGenerateResponse, OllamaModelTag } from '../../core/entities/Model.js';
import { TransformerError, errorMessage } from '../../core/errors/TransformerError.js';

export interface OllamaClientOptions {
  /** Upper bound for one request, response body included */
  timeoutMs: number;
  temperature: number;
}

export const DEFAULT_OLLAMA_OPTIONS: OllamaClientOptions = {
  timeoutMs: 120_000,
  temperature: 0.7,
};

/**
 * Ollama API Client implementation
 *
 * One blocking, non-streaming request per call. There is no retry: a
 * connection failure or timeout is reported as ServiceUnreachable.
 */
export class OllamaApiClient implements IModelClient {
  private apiUrl: string;
  private options: OllamaClientOptions;

  constructor(apiUrl: string, options?: Partial<OllamaClientOptions>) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.options = { ...DEFAULT_OLLAMA_OPTIONS, ...options };
  }

  async transform(systemPrompt: string, userText: string, modelName: string): Promise<string> {
    const data = await this.generate(modelName, userText, systemPrompt);
    return data.response;
  }

  async generate(
    model: string,
    prompt: string,
    systemPrompt?: string
  ): Promise<OllamaGenerateResponse> {
    const res = await this.request(`${this.apiUrl}/api/generate`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model,
        prompt,
        system: systemPrompt,
        stream: false,
        options: {
          temperature: this.options.temperature,
        },
      }),
    });

    const body = await this.readBody(res);

    if (!res.ok) {
      const detail = extractErrorDetail(body);
      if (res.status === 404 || /model .*not found/i.test(detail)) {
        throw new TransformerError(
          'ModelNotFound',
          `Model "${model}" is not available on the Ollama server. Pull it first (ollama pull ${model}).`
        );
      }
      throw new TransformerError(
        'GenerationFailed',
        `Ollama returned HTTP ${res.status}${detail ? `: ${detail}` : ''}`
      );
    }

    const data = parseJson(body);
    if (!isGenerateResponse(data)) {
      throw new TransformerError('GenerationFailed', 'Ollama response did not contain generated text');
    }

    return data;
  }

  async listModels(): Promise<string[]> {
    const res = await this.request(`${this.apiUrl}/api/tags`, {
      method: 'GET',
      headers: { 'Content-Type': 'application/json' },
    });
    const body = await this.readBody(res);

    if (!res.ok) {
      throw new TransformerError('GenerationFailed', `Ollama returned HTTP ${res.status} listing models`);
    }

    const data = parseJson(body);
    const models: unknown[] = isRecord(data) && Array.isArray(data.models) ? data.models : [];
    return models.filter(isModelTag).map((tag) => tag.name);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.request(`${this.apiUrl}/`, { method: 'GET' });
      return res.ok;
    } catch (error) {
      return false;
    }
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  private async request(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string }
  ): Promise<Response> {
    try {
      return await fetch(url, { ...init, timeout: this.options.timeoutMs });
    } catch (error) {
      throw new TransformerError(
        'ServiceUnreachable',
        `Cannot reach Ollama at ${this.apiUrl}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async readBody(res: Response): Promise<string> {
    try {
      return await res.text();
    } catch (error) {
      // node-fetch applies the same timeout while the body streams in
      throw new TransformerError(
        'ServiceUnreachable',
        `Lost connection to Ollama at ${this.apiUrl}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return isRecord(value) && typeof value.response === 'string';
}

function isModelTag(value: unknown): value is OllamaModelTag {
  return isRecord(value) && typeof value.name === 'string';
}

function extractErrorDetail(body: string): string {
  const data = parseJson(body);
  if (isRecord(data) && typeof data.error === 'string') {
    return data.error;
  }
  return body.trim().slice(0, 200);
}
