/**
 * Builds the prompt sent to the completion backend from static
 * instructions, the learner profile, recent turns and earlier file analyses.
 *
 * The result is not length-capped; history and file excerpts are bounded
 * individually instead.
 */

import {
  CLOSING_INSTRUCTION,
  DEFAULT_FILE_REQUEST,
  FILE_ANALYSIS_INSTRUCTION,
  REQUEST_INSTRUCTIONS,
  type InstructionKey,
} from '../config/prompts.js';
import type { FileReference, FileType, RequestType, Turn, UserProfile } from '../types/tutor.js';

export const PROMPT_HISTORY_TURNS = 6;
export const PROMPT_FILE_LIMIT = 3;
export const FILE_EXCERPT_LENGTH = 500;

export interface PromptInput {
  staticInstructions: string;
  profile: UserProfile;
  requestType: RequestType;
  fileReference: FileReference;
  currentText: string;
  username: string;
  /** The just-recorded turn, left out of the history section. */
  currentTurnId?: string;
}

export interface FilePromptInput {
  staticInstructions: string;
  profile: UserProfile;
  filename: string;
  fileType: FileType;
  caption?: string;
}

// Highest priority first
const INSTRUCTION_PRIORITY: Array<[InstructionKey, (type: RequestType) => boolean]> = [
  ['essay', (t) => t.isEssay],
  ['script', (t) => t.isScript],
  ['grammarCheck', (t) => t.isGrammarCheck],
  ['outline', (t) => t.isOutline],
  ['thesis', (t) => t.isThesis],
  ['vocabulary', (t) => t.isVocabulary],
  ['file', (t) => t.isFileAnalysis || t.isFileFollowup],
  ['practice', (t) => t.isQuizHelp || t.isHomeworkHelp || t.isDirectAnswer],
];

function section(title: string, body: string): string {
  return `=== ${title} ===\n${body}`;
}

export function renderProfileSummary(profile: UserProfile): string {
  const parts = [`Level: ${profile.level}`, `Target language: ${profile.targetLanguage}`];

  if (profile.lastTopic) parts.push(`Last topic: ${profile.lastTopic}`);
  if (profile.learningGoals.length > 0) parts.push(`Goals: ${profile.learningGoals.join(', ')}`);
  if (profile.weakAreas.length > 0) parts.push(`Weak areas: ${profile.weakAreas.join(', ')}`);
  if (profile.strengths.length > 0) parts.push(`Strengths: ${profile.strengths.join(', ')}`);

  return parts.join(' | ');
}

export function selectInstruction(requestType: RequestType): InstructionKey {
  const match = INSTRUCTION_PRIORITY.find(([, applies]) => applies(requestType));
  return match ? match[0] : 'general';
}

export function renderHistory(history: readonly Turn[], currentTurnId?: string): string {
  const answered = history
    .filter((turn) => turn.id !== currentTurnId && turn.response !== undefined)
    .slice(-PROMPT_HISTORY_TURNS);

  if (answered.length === 0) {
    return '(no previous messages)';
  }

  return answered.map((turn) => `Student: ${turn.question}\nTutor: ${turn.response}`).join('\n');
}

function formatFileTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function renderFileMemory(profile: UserProfile): string {
  return profile.fileMemory
    .slice(-PROMPT_FILE_LIMIT)
    .map((file, index) => {
      const excerpt =
        file.analysisText.length > FILE_EXCERPT_LENGTH
          ? `${file.analysisText.slice(0, FILE_EXCERPT_LENGTH)}...`
          : file.analysisText;
      return `[${index + 1}] ${file.filename} (${formatFileTimestamp(file.timestamp)}, ${file.fileType})\n${excerpt}`;
    })
    .join('\n\n');
}

export function buildPrompt(input: PromptInput): string {
  const { profile, requestType, fileReference } = input;
  const sections = [
    input.staticInstructions.trim(),
    section('STUDENT PROFILE', renderProfileSummary(profile)),
    section('REQUEST FOCUS', REQUEST_INSTRUCTIONS[selectInstruction(requestType)]),
  ];

  if (fileReference.isReferencingFile) {
    sections.push(section('RECENT FILE UPLOADS', renderFileMemory(profile)));
  }

  sections.push(
    section('CONVERSATION HISTORY', renderHistory(profile.history, input.currentTurnId)),
    section('CURRENT MESSAGE', `${input.username}: ${input.currentText}`),
    CLOSING_INSTRUCTION
  );

  return sections.join('\n\n');
}

/**
 * Prompt sent together with an uploaded file
 */
export function buildFileAnalysisPrompt(input: FilePromptInput): string {
  const request = input.caption?.trim() || DEFAULT_FILE_REQUEST;

  return [
    input.staticInstructions.trim(),
    section('STUDENT PROFILE', renderProfileSummary(input.profile)),
    section('REQUEST FOCUS', FILE_ANALYSIS_INSTRUCTION),
    section('UPLOADED FILE', `${input.filename} (${input.fileType})`),
    section('CURRENT MESSAGE', request),
    CLOSING_INSTRUCTION,
  ].join('\n\n');
}
