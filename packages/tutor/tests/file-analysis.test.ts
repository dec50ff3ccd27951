import { describe, it, expect } from 'vitest';
import { UnsupportedAttachmentError } from '@tutorbot/shared';
import {
  createFileAnalysis,
  fileTypeForMimeType,
  getFileExtension,
  resolveSupportedMimeType,
} from '../src/services/file-analysis.js';

describe('file analysis helpers', () => {
  describe('getFileExtension', () => {
    it('returns the lower-cased last extension', () => {
      expect(getFileExtension('Scan.PDF')).toBe('pdf');
      expect(getFileExtension('archive.tar.gz')).toBe('gz');
    });

    it('returns null without an extension', () => {
      expect(getFileExtension('notes')).toBeNull();
      expect(getFileExtension('trailing.')).toBeNull();
    });
  });

  describe('resolveSupportedMimeType', () => {
    it('accepts supported reported types', () => {
      expect(resolveSupportedMimeType('a.pdf', 'application/pdf')).toBe('application/pdf');
      expect(resolveSupportedMimeType('a', 'IMAGE/PNG')).toBe('image/png');
    });

    it('infers the type from the extension when none is reported', () => {
      expect(resolveSupportedMimeType('photo.JPG')).toBe('image/jpeg');
      expect(resolveSupportedMimeType('scan.jpeg')).toBe('image/jpeg');
      expect(resolveSupportedMimeType('page.png', 'application/octet-stream')).toBe('image/png');
    });

    it('rejects other reported types', () => {
      const docx = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

      expect(() => resolveSupportedMimeType('essay.docx', docx)).toThrow(UnsupportedAttachmentError);
      try {
        resolveSupportedMimeType('essay.docx', docx);
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedAttachmentError);
        expect(error).toMatchObject({ mimeType: docx, context: { filename: 'essay.docx' } });
      }
    });

    it('rejects unknown or missing extensions', () => {
      expect(() => resolveSupportedMimeType('animation.gif')).toThrow(
        'Unsupported file extension: gif'
      );
      expect(() => resolveSupportedMimeType('notes')).toThrow(
        'Unsupported file extension: (none)'
      );
    });
  });

  it('maps MIME types to file types', () => {
    expect(fileTypeForMimeType('image/jpeg')).toBe('jpg');
    expect(fileTypeForMimeType('image/png')).toBe('png');
    expect(fileTypeForMimeType('application/pdf')).toBe('pdf');
  });

  describe('createFileAnalysis', () => {
    const at = new Date('2024-03-01T09:30:00Z');

    it('summarises long analyses to 200 characters', () => {
      const analysis = createFileAnalysis('long.pdf', 'pdf', 'summarise', 'a'.repeat(250), at);

      expect(analysis.summary).toBe(`${'a'.repeat(200)}...`);
      expect(analysis.analysisText).toHaveLength(250);
    });

    it('keeps short analyses whole and freezes the record', () => {
      const analysis = createFileAnalysis('short.png', 'png', '', '  just a sign  ', at);

      expect(analysis).toEqual({
        filename: 'short.png',
        fileType: 'png',
        timestamp: at,
        userMessage: '',
        analysisText: '  just a sign  ',
        summary: 'just a sign',
      });
      expect(Object.isFrozen(analysis)).toBe(true);
    });
  });
});
