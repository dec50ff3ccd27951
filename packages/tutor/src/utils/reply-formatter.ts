import { EMPTY_RESPONSE_TEXT, TOO_LONG_NOTICE } from '../config/replies.js';
import { IntentClassifier } from '../services/intent-classifier.js';

/**
 * Telegram HTML reply formatting
 * Turns raw model output into a titled, escaped message that fits in one
 * Telegram message.
 */

export const MAX_MESSAGE_LENGTH = 4000;
export const TRUNCATE_AT = 3900;

export class ReplyFormatter {
  constructor(private readonly classifier: IntentClassifier = new IntentClassifier()) {}

  /**
   * Escape text for Telegram's HTML parse mode
   */
  static escape(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;');
  }

  static bold(text: string): string {
    return `<b>${text}</b>`;
  }

  static italic(text: string): string {
    return `<i>${text}</i>`;
  }

  /**
   * Remove markdown the model was asked not to produce and normalise
   * whitespace. Paragraphs stay separated by exactly one blank line.
   */
  static cleanText(raw: string): string {
    return raw
      .replace(/```[\s\S]*?```/g, '') // fenced code blocks
      .replace(/^[ \t]*\|.*\|[ \t]*$/gm, '') // table rows
      .replace(/^[ \t]*#{1,6}[ \t]*/gm, '') // heading markers
      .replace(/[*_`#]/g, '') // emphasis
      .replace(/\n\s*\n/g, '\n\n')
      .replace(/ +/g, ' ')
      .trim();
  }

  format(rawText: string | null | undefined, userText: string, isFileAttachment = false): string {
    const source = rawText && rawText.trim() ? rawText : EMPTY_RESPONSE_TEXT;
    const body = ReplyFormatter.cleanText(source) || EMPTY_RESPONSE_TEXT;

    const paragraphs = body
      .split('\n\n')
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0)
      .map((paragraph) => ReplyFormatter.escape(paragraph));

    const title = this.classifier.classifyTitle(userText, isFileAttachment);
    const final = `${ReplyFormatter.bold(ReplyFormatter.escape(title))}\n\n${paragraphs.join('\n\n')}`;

    if (final.length <= MAX_MESSAGE_LENGTH) {
      return final;
    }

    // Cut back to a paragraph boundary so no tag or entity is split
    let truncated = final.slice(0, TRUNCATE_AT);
    const boundary = truncated.lastIndexOf('\n\n');
    if (boundary > 0) {
      truncated = truncated.slice(0, boundary);
    }

    return `${truncated}\n\n${TOO_LONG_NOTICE}`;
  }
}
