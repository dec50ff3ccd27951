// Fixed replies. Strings sent as-is are already Telegram HTML; the
// completion fallbacks are plain text and go through the reply formatter.

export const WELCOME_MESSAGE = `<b>👋 Welcome to your Language Tutor!</b>

I'm here to help you learn English, Khmer and French. I can help with:

• 📝 Grammar corrections
• 🌐 Translations
• 📚 Grammar explanations
• 📖 Vocabulary building
• 🎯 Practice exercises and quizzes
• 📎 Questions about your documents and photos (PDF, JPG, PNG)

Just send me a message in any language and I'll help you!

<i>Try asking: "Can you help me with English tenses?" or "Translate 'hello' to Khmer"</i>`;

export const WELCOME_TURN_RESPONSE = 'Welcome message sent';

export const HELLO_AGAIN_MESSAGE =
  '👋 Hello again! How can I help you with your language learning today?';

export const SERVICE_UNAVAILABLE_MESSAGE = `<b>⚠️ Service Update</b>

I'm having temporary technical issues.
Please try again in a few minutes!`;

export const UNSUPPORTED_FILE_MESSAGE = `<b>⚠️ Unsupported file type</b>

I can only read JPG and PNG images and PDF documents. Please send your file in one of those formats.`;

export const FILE_PROCESSING_ERROR_MESSAGE = `<b>⚠️ File error</b>

I had trouble processing your file. Please try uploading it again!`;

export const EMPTY_RESPONSE_TEXT =
  "I couldn't generate a response. Please try again with a different question!";

export const TIMEOUT_RESPONSE_TEXT =
  "I'm taking a bit longer than usual to respond. Please try again with a simpler question or wait a moment!";

export const FAILURE_RESPONSE_TEXT =
  'I encountered an issue while processing your request. Please try again with a different question!';

export const TOO_LONG_NOTICE = '💡 <i>Message too long - feel free to ask follow-up questions!</i>';
