/**
 * Per-user Context Store
 *
 * Owns every learner profile for the lifetime of the process:
 * - Lazily created profiles keyed by chat user id
 * - Bounded conversation history (FIFO) with turn handles for responses
 * - Keyword-driven level/language heuristics and learning signals
 * - Bounded memory of previous file analyses
 * - Per-user serial task queue so one user's messages run in arrival order
 *
 * State is in memory only and is lost on restart.
 */

import { logger } from '@tutorbot/shared';
import { keywordTables, type KeywordTables, type LearningSignalKind } from '../config/keywords.js';
import type { FileAnalysis, RequestType, Turn, TurnHandle, UserProfile } from '../types/tutor.js';
import { generateCorrelationId } from '../utils/correlation.js';

export const HISTORY_LIMIT = 15;
export const FILE_MEMORY_LIMIT = 10;
export const TAG_LIMIT = 20;
export const LAST_TOPIC_LENGTH = 50;
const SIGNAL_SNIPPET_LENGTH = 40;

const LEARNING_SIGNAL_KINDS: LearningSignalKind[] = ['learningGoals', 'weakAreas', 'strengths'];

export interface ContextStoreOptions {
  historyLimit?: number;
  fileMemoryLimit?: number;
  tagLimit?: number;
  tables?: KeywordTables;
  now?: () => Date;
  generateId?: () => string;
}

export interface ContextStoreStats {
  activeUsers: number;
  totalTurns: number;
  totalFiles: number;
}

export class ContextStore {
  private profiles: Map<string, UserProfile> = new Map();
  private queues: Map<string, Promise<void>> = new Map();
  private readonly historyLimit: number;
  private readonly fileMemoryLimit: number;
  private readonly tagLimit: number;
  private readonly tables: KeywordTables;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: ContextStoreOptions = {}) {
    this.historyLimit = options.historyLimit ?? HISTORY_LIMIT;
    this.fileMemoryLimit = options.fileMemoryLimit ?? FILE_MEMORY_LIMIT;
    this.tagLimit = options.tagLimit ?? TAG_LIMIT;
    this.tables = options.tables ?? keywordTables;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateCorrelationId;
  }

  /**
   * Get the profile for a user, creating the default one on first contact
   */
  getOrCreate(userId: string): UserProfile {
    const existing = this.profiles.get(userId);
    if (existing) {
      return existing;
    }

    const profile: UserProfile = {
      userId,
      level: 'beginner',
      targetLanguage: 'English',
      lastTopic: null,
      history: [],
      learningGoals: [],
      weakAreas: [],
      strengths: [],
      fileMemory: [],
      currentFile: null,
      firstSeenAt: this.now(),
    };

    this.profiles.set(userId, profile);
    logger.debug(`Created learner profile for user ${userId}`);

    return profile;
  }

  /**
   * True when the user has never completed a turn with us
   */
  isNewUser(userId: string): boolean {
    const profile = this.profiles.get(userId);
    return !profile || profile.history.length === 0;
  }

  /**
   * Append an unanswered turn and return the handle used to answer it
   */
  recordTurn(
    userId: string,
    question: string,
    username: string,
    requestType?: RequestType,
    fileReference?: string
  ): TurnHandle {
    const profile = this.getOrCreate(userId);
    const turn: Turn = {
      id: this.generateId(),
      question,
      timestamp: this.now(),
      username,
      requestType,
      fileReference,
    };

    profile.history.push(turn);
    while (profile.history.length > this.historyLimit) {
      profile.history.shift();
    }
    profile.lastTopic = question.slice(0, LAST_TOPIC_LENGTH);

    return { userId, turnId: turn.id };
  }

  /**
   * Attach the generated reply to the turn the handle points at
   */
  recordResponse(handle: TurnHandle, responseText: string): boolean {
    const turn = this.profiles.get(handle.userId)?.history.find((t) => t.id === handle.turnId);

    if (!turn) {
      logger.warn(`Turn ${handle.turnId} no longer in history for user ${handle.userId}`);
      return false;
    }

    turn.response = responseText;
    return true;
  }

  getHistory(userId: string): readonly Turn[] {
    return this.profiles.get(userId)?.history ?? [];
  }

  getUnansweredTurns(userId: string): Turn[] {
    return this.getHistory(userId).filter((turn) => turn.response === undefined);
  }

  /**
   * Update level and target language from keywords in the message.
   * Rules are checked in table order and the first match of each group wins.
   */
  updateProfileHeuristics(userId: string, text: string): void {
    const profile = this.getOrCreate(userId);
    const lower = text.toLowerCase();

    const level = this.tables.level.find((rule) => rule.keywords.some((k) => lower.includes(k)));
    if (level && level.value !== profile.level) {
      logger.debug(`Level for user ${userId}: ${profile.level} -> ${level.value}`);
      profile.level = level.value;
    }

    const language = this.tables.language.find((rule) =>
      rule.keywords.some((k) => lower.includes(k))
    );
    if (language && language.value !== profile.targetLanguage) {
      logger.debug(`Language for user ${userId}: ${profile.targetLanguage} -> ${language.value}`);
      profile.targetLanguage = language.value;
    }
  }

  /**
   * Record learning goals, weak areas and strengths the user mentions.
   * Tags are the known topics found in the text, or else the words after
   * the trigger phrase.
   */
  recordLearningSignal(userId: string, text: string): void {
    const profile = this.getOrCreate(userId);
    const lower = text.toLowerCase();
    const topics = this.tables.learningTopics.filter((topic) => lower.includes(topic));

    for (const kind of LEARNING_SIGNAL_KINDS) {
      const trigger = this.tables.learningSignals[kind].find((phrase) => lower.includes(phrase));
      if (!trigger) continue;

      const tags = topics.length > 0 ? topics : [snippetAfter(lower, trigger)];
      for (const tag of tags) {
        if (tag) this.addTag(profile[kind], tag);
      }
    }
  }

  recordFileAnalysis(userId: string, analysis: FileAnalysis): void {
    const profile = this.getOrCreate(userId);

    profile.fileMemory.push(analysis);
    while (profile.fileMemory.length > this.fileMemoryLimit) {
      profile.fileMemory.shift();
    }
    profile.currentFile = analysis;

    logger.debug(
      `Stored analysis of ${analysis.filename} for user ${userId} (${profile.fileMemory.length} files)`
    );
  }

  /**
   * Most recent file analyses, oldest first
   */
  getRecentAnalyses(userId: string, limit: number): FileAnalysis[] {
    if (limit <= 0) return [];
    return this.profiles.get(userId)?.fileMemory.slice(-limit) ?? [];
  }

  /**
   * Run a task after every earlier task queued for the same user.
   * Tasks for different users never wait on each other.
   */
  async runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.then(task);
    // The chain only tracks completion; the caller receives run's own rejection
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(userId, tail);

    try {
      return await run;
    } finally {
      if (this.queues.get(userId) === tail) {
        this.queues.delete(userId);
      }
    }
  }

  getStats(): ContextStoreStats {
    let totalTurns = 0;
    let totalFiles = 0;

    for (const profile of this.profiles.values()) {
      totalTurns += profile.history.length;
      totalFiles += profile.fileMemory.length;
    }

    return { activeUsers: this.profiles.size, totalTurns, totalFiles };
  }

  private addTag(tags: string[], tag: string): void {
    if (tags.includes(tag)) return;
    tags.push(tag);
    while (tags.length > this.tagLimit) {
      tags.shift();
    }
  }
}

function snippetAfter(lower: string, trigger: string): string {
  const start = lower.indexOf(trigger) + trigger.length;
  return lower
    .slice(start)
    .replace(/[^\p{L}\p{N}\s'-]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, SIGNAL_SNIPPET_LENGTH)
    .trim();
}
