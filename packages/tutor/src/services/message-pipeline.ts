/**
 * Message Pipeline
 *
 * Single path for every inbound chat message, whatever the transport:
 * - Greeting handling (welcome for new learners, short hello otherwise)
 * - Profile heuristics, learning signals and history bookkeeping
 * - Prompt assembly and a bounded, timed completion call
 * - Uploaded file validation, analysis and file memory
 * - Formatted reply on every path, failures included
 */

import {
  CompletionTimeoutError,
  UnsupportedAttachmentError,
  createUserLogger,
  getErrorMessage,
  type InboundAttachment,
  type InboundEvent,
  type ReplyChannel,
} from '@tutorbot/shared';
import type { Logger } from 'winston';
import { TUTOR_SYSTEM_PROMPT } from '../config/prompts.js';
import {
  FAILURE_RESPONSE_TEXT,
  FILE_PROCESSING_ERROR_MESSAGE,
  HELLO_AGAIN_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  TIMEOUT_RESPONSE_TEXT,
  UNSUPPORTED_FILE_MESSAGE,
  WELCOME_MESSAGE,
  WELCOME_TURN_RESPONSE,
} from '../config/replies.js';
import { ReplyFormatter } from '../utils/reply-formatter.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';
import type { CompletionRequest, CompletionRunner } from './completion-service.js';
import { buildFileAnalysisPrompt, buildPrompt } from './context-assembler.js';
import type { ContextStore } from './context-store.js';
import {
  createFileAnalysis,
  fileTypeForMimeType,
  resolveSupportedMimeType,
  type SupportedMimeType,
} from './file-analysis.js';
import { IntentClassifier } from './intent-classifier.js';

export type PipelineOutcome =
  | 'welcome'
  | 'hello-again'
  | 'answered'
  | 'timeout'
  | 'failed'
  | 'unavailable'
  | 'rejected'
  | 'file-error'
  | 'ignored';

export interface PipelineResult {
  outcome: PipelineOutcome;
  turnId?: string;
}

export interface MessagePipelineOptions {
  store: ContextStore;
  /** Null when the backend could not be initialised; every request then gets the unavailable reply. */
  completion: CompletionRunner | null;
  classifier?: IntentClassifier;
  formatter?: ReplyFormatter;
  staticInstructions?: string;
  now?: () => Date;
}

interface MessageScope {
  event: InboundEvent;
  channel: ReplyChannel;
  log: Logger;
  shortId: string;
}

interface Generation {
  text: string;
  outcome: 'answered' | 'timeout' | 'failed';
}

export class MessagePipeline {
  private readonly store: ContextStore;
  private readonly completion: CompletionRunner | null;
  private readonly classifier: IntentClassifier;
  private readonly formatter: ReplyFormatter;
  private readonly staticInstructions: string;
  private readonly now: () => Date;

  constructor(options: MessagePipelineOptions) {
    this.store = options.store;
    this.completion = options.completion;
    this.classifier = options.classifier ?? new IntentClassifier();
    this.formatter = options.formatter ?? new ReplyFormatter(this.classifier);
    this.staticInstructions = options.staticInstructions ?? TUTOR_SYSTEM_PROMPT;
    this.now = options.now ?? (() => new Date());
  }

  get isBackendAvailable(): boolean {
    return this.completion !== null;
  }

  /**
   * Process one inbound message. Messages from the same user are handled in
   * arrival order; other users are not blocked.
   */
  async handle(event: InboundEvent, channel: ReplyChannel): Promise<PipelineResult> {
    return this.store.runExclusive(event.userId, async () => {
      const shortId = getShortCorrelationId(generateCorrelationId());
      const scope: MessageScope = { event, channel, log: createUserLogger(event.userId), shortId };

      try {
        return event.attachment
          ? await this.processAttachment(scope, event.attachment)
          : await this.processText(scope);
      } catch (error) {
        scope.log.error(`Unexpected error handling message [${shortId}]`, {
          error: getErrorMessage(error),
        });
        await this.deliver(scope, this.formatter.format(FAILURE_RESPONSE_TEXT, ''));
        return { outcome: 'failed' };
      }
    });
  }

  private async processText(scope: MessageScope): Promise<PipelineResult> {
    const { event, log, shortId } = scope;
    const text = event.messageText?.trim();
    if (!text) {
      return { outcome: 'ignored' };
    }

    log.info(`Message from ${event.displayName} [${shortId}]`, { messageLength: text.length });
    await this.sendTyping(scope);

    const isNewUser = this.store.isNewUser(event.userId);
    const requestType = this.classifier.classify(text);

    if (requestType.isGreeting) {
      if (isNewUser) {
        await this.deliver(scope, WELCOME_MESSAGE);
        const handle = this.store.recordTurn(event.userId, text, event.displayName, requestType);
        this.store.recordResponse(handle, WELCOME_TURN_RESPONSE);
        log.info(`Welcomed new learner [${shortId}]`);
        return { outcome: 'welcome', turnId: handle.turnId };
      }

      await this.deliver(scope, HELLO_AGAIN_MESSAGE);
      return { outcome: 'hello-again' };
    }

    this.store.updateProfileHeuristics(event.userId, text);
    this.store.recordLearningSignal(event.userId, text);

    if (!this.completion) {
      log.warn(`Completion backend unavailable [${shortId}]`);
      await this.deliver(scope, SERVICE_UNAVAILABLE_MESSAGE);
      return { outcome: 'unavailable' };
    }

    const profile = this.store.getOrCreate(event.userId);
    const fileReference = this.classifier.detectFileReference(text, profile);
    const handle = this.store.recordTurn(
      event.userId,
      text,
      event.displayName,
      requestType,
      fileReference.referencedFile?.filename
    );

    const promptText = buildPrompt({
      staticInstructions: this.staticInstructions,
      profile,
      requestType,
      fileReference,
      currentText: text,
      username: event.displayName,
      currentTurnId: handle.turnId,
    });

    const generation = await this.generate(scope, this.completion, {
      promptText,
      userId: event.userId,
    });
    this.store.recordResponse(handle, generation.text);

    await this.deliver(scope, this.formatter.format(generation.text, text, false));
    return { outcome: generation.outcome, turnId: handle.turnId };
  }

  private async processAttachment(
    scope: MessageScope,
    attachment: InboundAttachment
  ): Promise<PipelineResult> {
    const { event, log, shortId } = scope;
    log.info(`${attachment.kind} upload from ${event.displayName} [${shortId}]`, {
      filename: attachment.filename,
      mimeType: attachment.mimeType,
    });

    let mimeType: SupportedMimeType;
    try {
      mimeType = resolveSupportedMimeType(attachment.filename, attachment.mimeType);
    } catch (error) {
      if (!(error instanceof UnsupportedAttachmentError)) throw error;
      log.warn(`Rejected upload [${shortId}]: ${error.message}`);
      await this.deliver(scope, UNSUPPORTED_FILE_MESSAGE);
      return { outcome: 'rejected' };
    }

    if (!this.completion) {
      log.warn(`Completion backend unavailable [${shortId}]`);
      await this.deliver(scope, SERVICE_UNAVAILABLE_MESSAGE);
      return { outcome: 'unavailable' };
    }

    await this.sendTyping(scope);

    let data: Uint8Array;
    try {
      data = await attachment.download();
    } catch (error) {
      log.error(`Failed to download ${attachment.filename} [${shortId}]`, {
        error: getErrorMessage(error),
      });
      await this.deliver(scope, FILE_PROCESSING_ERROR_MESSAGE);
      return { outcome: 'file-error' };
    }

    const caption = attachment.caption?.trim() || event.messageText?.trim() || '';
    if (caption) {
      this.store.updateProfileHeuristics(event.userId, caption);
      this.store.recordLearningSignal(event.userId, caption);
    }

    const fileType = fileTypeForMimeType(mimeType);
    const profile = this.store.getOrCreate(event.userId);
    const requestType = this.classifier.classify(caption, { hasAttachment: true });
    const handle = this.store.recordTurn(
      event.userId,
      caption || `[Uploaded ${attachment.filename}]`,
      event.displayName,
      requestType,
      attachment.filename
    );

    const promptText = buildFileAnalysisPrompt({
      staticInstructions: this.staticInstructions,
      profile,
      filename: attachment.filename,
      fileType,
      caption,
    });

    const generation = await this.generate(scope, this.completion, {
      promptText,
      attachment: { mimeType, data, filename: attachment.filename },
      userId: event.userId,
    });
    this.store.recordResponse(handle, generation.text);

    if (generation.outcome === 'answered') {
      this.store.recordFileAnalysis(
        event.userId,
        createFileAnalysis(attachment.filename, fileType, caption, generation.text, this.now())
      );
    }

    await this.deliver(scope, this.formatter.format(generation.text, caption, true));
    return { outcome: generation.outcome, turnId: handle.turnId };
  }

  private async generate(
    scope: MessageScope,
    completion: CompletionRunner,
    request: CompletionRequest
  ): Promise<Generation> {
    const { log, shortId } = scope;

    try {
      const text = await completion.run(request);
      log.info(`Response generated [${shortId}]`, { responseLength: text.length });
      return { text, outcome: 'answered' };
    } catch (error) {
      if (error instanceof CompletionTimeoutError) {
        log.warn(`Timeout generating response [${shortId}]`, { timeoutMs: error.timeoutMs });
        return { text: TIMEOUT_RESPONSE_TEXT, outcome: 'timeout' };
      }

      log.error(`Error generating response [${shortId}]`, { error: getErrorMessage(error) });
      return { text: FAILURE_RESPONSE_TEXT, outcome: 'failed' };
    }
  }

  private async deliver(scope: MessageScope, markupText: string): Promise<void> {
    try {
      await scope.channel.send({ userId: scope.event.userId, markupText, markupLanguage: 'HTML' });
    } catch (error) {
      scope.log.error(`Failed to deliver reply [${scope.shortId}]`, {
        error: getErrorMessage(error),
      });
    }
  }

  private async sendTyping(scope: MessageScope): Promise<void> {
    try {
      await scope.channel.sendTyping();
    } catch (error) {
      scope.log.debug(`Typing indicator failed [${scope.shortId}]`, {
        error: getErrorMessage(error),
      });
    }
  }
}
