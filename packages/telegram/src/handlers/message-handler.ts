/**
 * Telegram Message Handler
 *
 * Maps grammY updates onto the transport-neutral pipeline:
 * - text, photo and document messages become `InboundEvent`s
 * - the largest photo size is the one analysed
 * - file bytes are fetched lazily, after the pipeline accepts the type
 * - replies go out as Telegram HTML
 */

import type { Bot, BotError, Context } from 'grammy';
import {
  AttachmentProcessingError,
  createUserLogger,
  getErrorMessage,
  logger,
  type InboundAttachment,
  type InboundEvent,
  type OutboundMessage,
  type ReplyChannel,
} from '@tutorbot/shared';
import type { MessagePipeline } from '@tutorbot/tutor';
import { isConflictError } from '../services/supervisor.js';
import type { BotTelemetry } from '../services/telemetry.js';

const TELEGRAM_FILE_BASE_URL = 'https://api.telegram.org/file';
const DEFAULT_DISPLAY_NAME = 'Student';
const PHOTO_FILENAME = 'photo.jpg';
const PHOTO_MIME_TYPE = 'image/jpeg';
const DOCUMENT_FILENAME = 'document';

export interface TelegramPhotoSize {
  file_id: string;
  width: number;
  height: number;
  file_size?: number;
}

export interface TelegramDocument {
  file_id: string;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramMessageLike {
  text?: string;
  caption?: string;
  photo?: TelegramPhotoSize[];
  document?: TelegramDocument;
}

export interface TelegramSender {
  id: number;
  first_name?: string;
}

export interface TelegramFileApi {
  getFile(fileId: string): Promise<{ file_path?: string }>;
}

export type FileDownloader = (fileId: string, filename: string) => Promise<Uint8Array>;

export function getLargestPhoto(photos: readonly TelegramPhotoSize[]): TelegramPhotoSize | null {
  let largest: TelegramPhotoSize | null = null;
  for (const photo of photos) {
    if (!largest || photo.width * photo.height >= largest.width * largest.height) {
      largest = photo;
    }
  }
  return largest;
}

/**
 * Build the pipeline event for a Telegram message. Returns null for
 * messages with no sender or nothing we handle (stickers, locations...).
 */
export function toInboundEvent(
  message: TelegramMessageLike,
  from: TelegramSender | undefined,
  download: FileDownloader
): InboundEvent | null {
  if (!from) return null;

  const base = {
    userId: String(from.id),
    displayName: from.first_name || DEFAULT_DISPLAY_NAME,
  };

  const attachment = toAttachment(message, download);
  if (attachment) {
    return { ...base, attachment };
  }

  if (message.text === undefined) return null;
  return { ...base, messageText: message.text };
}

function toAttachment(
  message: TelegramMessageLike,
  download: FileDownloader
): InboundAttachment | null {
  const caption = message.caption;

  const photo = message.photo ? getLargestPhoto(message.photo) : null;
  if (photo) {
    return {
      kind: 'image',
      filename: PHOTO_FILENAME,
      mimeType: PHOTO_MIME_TYPE,
      caption,
      download: () => download(photo.file_id, PHOTO_FILENAME),
    };
  }

  const document = message.document;
  if (document) {
    const filename = document.file_name || DOCUMENT_FILENAME;
    return {
      kind: 'document',
      filename,
      mimeType: document.mime_type,
      caption,
      download: () => download(document.file_id, filename),
    };
  }

  return null;
}

/**
 * Downloads files through the Bot API file endpoint. Every failure surfaces
 * as AttachmentProcessingError.
 */
export function createTelegramDownloader(
  api: TelegramFileApi,
  token: string,
  fetchImpl: typeof fetch = fetch
): FileDownloader {
  return async (fileId, filename) => {
    let filePath: string | undefined;
    try {
      filePath = (await api.getFile(fileId)).file_path;
    } catch (error) {
      throw new AttachmentProcessingError(`getFile failed: ${getErrorMessage(error)}`, filename, {
        fileId,
      });
    }

    if (!filePath) {
      throw new AttachmentProcessingError('Telegram returned no file path', filename, { fileId });
    }

    let response: Response;
    try {
      response = await fetchImpl(`${TELEGRAM_FILE_BASE_URL}/bot${token}/${filePath}`);
    } catch (error) {
      throw new AttachmentProcessingError(`Download failed: ${getErrorMessage(error)}`, filename, {
        fileId,
      });
    }

    if (!response.ok) {
      throw new AttachmentProcessingError(
        `Download failed with status ${response.status}`,
        filename,
        { fileId, status: response.status }
      );
    }

    return new Uint8Array(await response.arrayBuffer());
  };
}

export interface ChatReplies {
  reply(text: string, other: { parse_mode: 'HTML' }): Promise<unknown>;
  replyWithChatAction(action: 'typing'): Promise<unknown>;
}

export function createReplyChannel(chat: ChatReplies, telemetry?: BotTelemetry): ReplyChannel {
  return {
    async send(message: OutboundMessage) {
      try {
        await chat.reply(message.markupText, { parse_mode: message.markupLanguage });
      } catch (error) {
        telemetry?.incrementSendErrors();
        throw error;
      }
    },
    async sendTyping() {
      await chat.replyWithChatAction('typing');
    },
  };
}

export interface MessageHandlerDeps {
  pipeline: MessagePipeline;
  telemetry: BotTelemetry;
  download: FileDownloader;
}

export interface IncomingMessageContext extends ChatReplies {
  message: TelegramMessageLike;
  from?: TelegramSender;
  update: { update_id: number };
}

/**
 * Hands each message to the pipeline without holding up the update loop.
 * Per-user ordering comes from the pipeline's context store queue, so one
 * user's slow completion never delays another user's reply.
 */
export class MessageDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly deps: MessageHandlerDeps) {}

  get inFlight(): number {
    return this.pending.size;
  }

  dispatch(ctx: IncomingMessageContext): void {
    const task = this.process(ctx).catch((error: unknown) => {
      handleBotError({ error, ctx }, this.deps.telemetry);
    });
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  /** Resolves once every dispatched message has been answered. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private async process(ctx: IncomingMessageContext): Promise<void> {
    const { pipeline, telemetry, download } = this.deps;
    const event = toInboundEvent(ctx.message, ctx.from, download);
    if (!event) return;

    telemetry.recordMessageReceived(event.userId);
    const startTime = Date.now();
    const result = await pipeline.handle(event, createReplyChannel(ctx, telemetry));
    telemetry.recordOutcome(event.userId, result.outcome, Date.now() - startTime);
  }
}

export function setupMessageHandler(bot: Bot, deps: MessageHandlerDeps): MessageDispatcher {
  const dispatcher = new MessageDispatcher(deps);

  bot.on(['message:text', 'message:photo', 'message:document'], (ctx) => {
    dispatcher.dispatch(ctx);
  });

  bot.catch((err: BotError<Context>) => handleBotError(err, deps.telemetry));
  return dispatcher;
}

export interface UpdateError {
  error: unknown;
  ctx: {
    from?: { id: number };
    update: { update_id: number };
  };
}

/**
 * Conflicts are expected while a redeploy overlaps the old poller.
 */
export function handleBotError(err: UpdateError, telemetry: BotTelemetry): void {
  const userId = err.ctx.from?.id;
  const message = getErrorMessage(err.error);

  if (isConflictError(err.error)) {
    logger.debug(`Telegram conflict: ${message}`);
    return;
  }

  telemetry.incrementTransportErrors();
  const log = userId === undefined ? logger : createUserLogger(String(userId));
  log.error(`Error: ${message}`, { updateId: err.ctx.update.update_id });
}
