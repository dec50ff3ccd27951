import OpenAI from 'openai';
import {
  CompletionError,
  CompletionTimeoutError,
  getErrorMessage,
  logger,
  performanceLogger,
} from '@tutorbot/shared';
import type { SupportedMimeType } from './file-analysis.js';

export const DEFAULT_COMPLETION_TIMEOUT_MS = 30000;
export const DEFAULT_COMPLETION_CONCURRENCY = 4;

export interface CompletionAttachment {
  mimeType: SupportedMimeType;
  data: Uint8Array;
  filename: string;
}

export interface CompletionRequest {
  promptText: string;
  attachment?: CompletionAttachment;
  userId?: string;
}

export interface CompletionService {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenRouterOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

function toDataUrl(attachment: CompletionAttachment): string {
  return `data:${attachment.mimeType};base64,${Buffer.from(attachment.data).toString('base64')}`;
}

function attachmentPart(attachment: CompletionAttachment): ContentPart {
  if (attachment.mimeType === 'application/pdf') {
    return {
      type: 'file',
      file: { filename: attachment.filename, file_data: toDataUrl(attachment) },
    };
  }
  return { type: 'image_url', image_url: { url: toDataUrl(attachment) } };
}

/**
 * Text and vision completions through an OpenAI-compatible endpoint
 * (OpenRouter by default). The whole prompt goes in one user message.
 */
export class OpenRouterCompletionService implements CompletionService {
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(options: OpenRouterOptions) {
    if (!options.apiKey) {
      throw new CompletionError('OPENROUTER_API_KEY is required for the completion service');
    }

    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: {
        'X-Title': 'Language Tutor Bot',
      },
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1000;
    this.temperature = options.temperature ?? 0.7;

    logger.info(`Completion client initialized with model ${this.model}`);
  }

  getModel(): string {
    return this.model;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const content: string | ContentPart[] = request.attachment
      ? [{ type: 'text', text: request.promptText }, attachmentPart(request.attachment)]
      : request.promptText;

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: 'user', content }],
        max_tokens: this.maxTokens,
        temperature: this.temperature,
      },
      { signal }
    );

    const response = completion.choices[0]?.message?.content;
    if (!response) {
      throw new CompletionError('No response generated', { model: this.model });
    }

    logger.debug(`Model ${this.model} generated ${response.length} chars`, {
      userId: request.userId,
      promptTokens: completion.usage?.prompt_tokens,
      completionTokens: completion.usage?.completion_tokens,
    });

    return response;
  }
}

export interface CompletionRunnerOptions {
  concurrency?: number;
  timeoutMs?: number;
}

/**
 * Runs completions through a fixed number of slots with a per-request
 * timeout. Waiting for a slot counts against the timeout. A timed-out
 * request is aborted and rejects with CompletionTimeoutError.
 */
export class CompletionRunner {
  private active = 0;
  private waiting: Array<() => void> = [];
  readonly concurrency: number;
  readonly timeoutMs: number;

  constructor(
    private readonly service: CompletionService,
    options: CompletionRunnerOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_COMPLETION_CONCURRENCY);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async run(request: CompletionRequest): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CompletionTimeoutError(this.timeoutMs, { userId: request.userId }));
      }, this.timeoutMs);
    });

    const work = this.withSlot(() => {
      if (controller.signal.aborted) {
        throw new CompletionTimeoutError(this.timeoutMs, { userId: request.userId });
      }
      return performanceLogger.measureAsync(
        'Completion',
        () => this.service.complete(request, controller.signal),
        { userId: request.userId }
      );
    });

    // The race below reports the failure; this only keeps a late rejection observed
    void work.catch((error: unknown) => {
      logger.debug('Completion attempt ended with error', {
        userId: request.userId,
        error: getErrorMessage(error),
      });
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async withSlot<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiting.shift();
    if (next) next();
  }
}
