/**
 * Keyword-based intent classification.
 *
 * Request tags steer prompt construction; the title only labels the reply.
 * Both read the keyword tables in config/keywords.json.
 */

import { keywordTables, type KeywordTables } from '../config/keywords.js';
import type { FileReference, RequestType, UserProfile } from '../types/tutor.js';

export interface ClassifyOptions {
  hasAttachment?: boolean;
}

export class IntentClassifier {
  constructor(private readonly tables: KeywordTables = keywordTables) {}

  classify(text: string, options: ClassifyOptions = {}): RequestType {
    const lower = text.toLowerCase();
    const matches = (keywords: string[]) => keywords.some((k) => lower.includes(k));
    const { requestTypes } = this.tables;

    return {
      isEssay: matches(requestTypes.essay),
      isScript: matches(requestTypes.script),
      isGrammarCheck: matches(requestTypes.grammarCheck),
      isOutline: matches(requestTypes.outline),
      isThesis: matches(requestTypes.thesis),
      isVocabulary: matches(requestTypes.vocabulary),
      isFileAnalysis: options.hasAttachment === true || matches(requestTypes.fileAnalysis),
      isFileFollowup: matches(requestTypes.fileFollowup),
      isQuizHelp: matches(requestTypes.quizHelp),
      isHomeworkHelp: matches(requestTypes.homeworkHelp),
      isDirectAnswer: matches(requestTypes.directAnswer),
      isGreeting: this.isGreeting(text),
    };
  }

  /**
   * Exact greeting ("hi", "/start"), or a message that opens with a
   * greeting word ("hello, can you help?"). A greeting word inside another
   * word ("history") does not count.
   */
  isGreeting(text: string): boolean {
    const normalized = text.trim().toLowerCase();
    if (this.tables.greetings.exact.includes(normalized)) {
      return true;
    }

    return this.tables.greetings.prefix.some((word) => {
      if (!normalized.startsWith(word)) return false;
      const next = normalized.charAt(word.length);
      return next === '' || !/\p{L}/u.test(next);
    });
  }

  /**
   * Pick the reply title. First matching rule wins; attachments always get
   * the file title.
   */
  classifyTitle(text: string, isFileAttachment: boolean): string {
    if (isFileAttachment) {
      return this.tables.fileTitle;
    }

    const lower = text.toLowerCase();
    const words = new Set(lower.split(/[^\p{L}\p{N}/]+/u).filter(Boolean));

    const rule = this.tables.titles.find((candidate) =>
      candidate.keywords.some((k) => (candidate.wholeWord ? words.has(k) : lower.includes(k)))
    );

    return rule ? rule.title : this.tables.defaultTitle;
  }

  /**
   * Does the message refer back to an earlier upload? Only the most recent
   * file is offered as the referenced one.
   */
  detectFileReference(text: string, profile: UserProfile): FileReference {
    const totalFiles = profile.fileMemory.length;
    if (totalFiles === 0) {
      return { isReferencingFile: false, referencedFile: null, totalFiles };
    }

    const lower = text.toLowerCase();
    const { fileAnalysis, fileFollowup } = this.tables.requestTypes;
    const isReferencingFile = [...fileAnalysis, ...fileFollowup].some((k) => lower.includes(k));

    return {
      isReferencingFile,
      referencedFile: isReferencingFile ? profile.fileMemory[totalFiles - 1] : null,
      totalFiles,
    };
  }
}
