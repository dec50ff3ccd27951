import type { LANGUAGES, LEVELS } from '../config/keywords.js';

export type ProficiencyLevel = (typeof LEVELS)[number];
export type TargetLanguage = (typeof LANGUAGES)[number];

export type FileType = 'pdf' | 'jpg' | 'png';

/**
 * Independent request tags. Several may be true for one message; prompt
 * construction picks the instruction by a fixed priority.
 */
export interface RequestType {
  isEssay: boolean;
  isScript: boolean;
  isGrammarCheck: boolean;
  isOutline: boolean;
  isThesis: boolean;
  isVocabulary: boolean;
  isFileAnalysis: boolean;
  isFileFollowup: boolean;
  isQuizHelp: boolean;
  isHomeworkHelp: boolean;
  isDirectAnswer: boolean;
  isGreeting: boolean;
}

export interface Turn {
  id: string;
  question: string;
  timestamp: Date;
  username: string;
  /** Unset until the completion for this turn arrives. */
  response?: string;
  requestType?: RequestType;
  /** Filename of the upload this turn analysed or referred to. */
  fileReference?: string;
}

export interface FileAnalysis {
  readonly filename: string;
  readonly fileType: FileType;
  readonly timestamp: Date;
  readonly userMessage: string;
  readonly analysisText: string;
  readonly summary: string;
}

export interface UserProfile {
  userId: string;
  level: ProficiencyLevel;
  targetLanguage: TargetLanguage;
  lastTopic: string | null;
  history: Turn[];
  learningGoals: string[];
  weakAreas: string[];
  strengths: string[];
  fileMemory: FileAnalysis[];
  currentFile: FileAnalysis | null;
  firstSeenAt: Date;
}

export interface TurnHandle {
  userId: string;
  turnId: string;
}

export interface FileReference {
  isReferencingFile: boolean;
  referencedFile: FileAnalysis | null;
  totalFiles: number;
}
