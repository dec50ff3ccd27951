import { readFileSync } from 'fs';
import { z } from 'zod';
import { logger } from '@tutorbot/shared';

export const LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export const LANGUAGES = ['English', 'Khmer', 'French'] as const;

// Keywords are compared against lower-cased message text
const keywordList = z
  .array(
    z
      .string()
      .min(1)
      .transform((keyword) => keyword.toLowerCase())
  )
  .min(1);

const keywordTablesSchema = z.object({
  level: z.array(z.object({ value: z.enum(LEVELS), keywords: keywordList })),
  language: z.array(z.object({ value: z.enum(LANGUAGES), keywords: keywordList })),
  greetings: z.object({
    exact: keywordList,
    prefix: keywordList,
  }),
  requestTypes: z.object({
    essay: keywordList,
    script: keywordList,
    grammarCheck: keywordList,
    outline: keywordList,
    thesis: keywordList,
    vocabulary: keywordList,
    fileAnalysis: keywordList,
    fileFollowup: keywordList,
    quizHelp: keywordList,
    homeworkHelp: keywordList,
    directAnswer: keywordList,
  }),
  titles: z.array(
    z.object({
      title: z.string().min(1),
      keywords: keywordList,
      wholeWord: z.boolean().default(false),
    })
  ),
  defaultTitle: z.string().min(1),
  fileTitle: z.string().min(1),
  learningSignals: z.object({
    learningGoals: keywordList,
    weakAreas: keywordList,
    strengths: keywordList,
  }),
  learningTopics: keywordList,
});

export type KeywordTables = z.infer<typeof keywordTablesSchema>;
export type RequestTypeKey = keyof KeywordTables['requestTypes'];
export type LearningSignalKind = keyof KeywordTables['learningSignals'];

export function parseKeywordTables(raw: unknown): KeywordTables {
  return keywordTablesSchema.parse(raw);
}

function loadKeywordTables(): KeywordTables {
  const file = new URL('./keywords.json', import.meta.url);
  try {
    return parseKeywordTables(JSON.parse(readFileSync(file, 'utf-8')));
  } catch (error) {
    logger.error('Failed to load keyword tables:', { file: file.pathname, error });
    throw error;
  }
}

export const keywordTables: KeywordTables = loadKeywordTables();
