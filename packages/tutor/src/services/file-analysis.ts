/**
 * Uploaded-file helpers: which files we accept, and the records kept in each
 * learner's file memory (see ContextStore.recordFileAnalysis).
 */

import { UnsupportedAttachmentError } from '@tutorbot/shared';
import type { FileAnalysis, FileType } from '../types/tutor.js';

export const SUMMARY_LENGTH = 200;

// Reported for files the sender's client could not identify
const GENERIC_MIME_TYPE = 'application/octet-stream';

const MIME_FILE_TYPES = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'application/pdf': 'pdf',
} as const satisfies Record<string, FileType>;

export type SupportedMimeType = keyof typeof MIME_FILE_TYPES;

export const SUPPORTED_MIME_TYPES: readonly SupportedMimeType[] = [
  'image/jpeg',
  'image/png',
  'application/pdf',
];

const EXTENSION_MIME_TYPES = new Map<string, SupportedMimeType>([
  ['jpg', 'image/jpeg'],
  ['jpeg', 'image/jpeg'],
  ['png', 'image/png'],
  ['pdf', 'application/pdf'],
]);

function isSupportedMimeType(mimeType: string): mimeType is SupportedMimeType {
  return SUPPORTED_MIME_TYPES.some((supported) => supported === mimeType);
}

export function getFileExtension(filename: string): string | null {
  const normalized = filename.trim();
  const dotIndex = normalized.lastIndexOf('.');
  if (dotIndex < 0 || dotIndex === normalized.length - 1) return null;
  return normalized.slice(dotIndex + 1).toLowerCase();
}

/**
 * Resolve the MIME type of an upload, falling back to the file extension
 * when the transport did not report one. Anything outside JPEG, PNG and
 * PDF is rejected.
 */
export function resolveSupportedMimeType(
  filename: string,
  reportedMimeType?: string
): SupportedMimeType {
  const reported = reportedMimeType?.trim().toLowerCase();
  if (reported && reported !== GENERIC_MIME_TYPE) {
    if (isSupportedMimeType(reported)) return reported;
    throw new UnsupportedAttachmentError(`Unsupported file type: ${reported}`, reported, {
      filename,
    });
  }

  const extension = getFileExtension(filename);
  const inferred = extension ? EXTENSION_MIME_TYPES.get(extension) : undefined;
  if (inferred) return inferred;

  throw new UnsupportedAttachmentError(
    `Unsupported file extension: ${extension ?? '(none)'}`,
    undefined,
    { filename }
  );
}

export function fileTypeForMimeType(mimeType: SupportedMimeType): FileType {
  return MIME_FILE_TYPES[mimeType];
}

export function createFileAnalysis(
  filename: string,
  fileType: FileType,
  userMessage: string,
  analysisText: string,
  timestamp: Date = new Date()
): FileAnalysis {
  const trimmed = analysisText.trim();
  const summary =
    trimmed.length > SUMMARY_LENGTH ? `${trimmed.slice(0, SUMMARY_LENGTH)}...` : trimmed;

  return Object.freeze({ filename, fileType, timestamp, userMessage, analysisText, summary });
}
