/**
 * Response normalization - turns raw model text into something the persona would say
 */

/**
 * Replies are cut to this many sentences
 */
export const MAX_SENTENCES = 3;

const STAGE_DIRECTION = /\*[^*]+\*/g;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const TERMINAL_PUNCTUATION = new Set(['.', '!', '?']);

/**
 * Splits text into sentences on terminal punctuation followed by whitespace
 */
export function splitSentences(text: string): string[] {
  if (!text) {
    return [];
  }
  return text.split(SENTENCE_BOUNDARY);
}

/**
 * Cleans a generated reply before it is shown or spoken
 *
 * Steps run in order: stage directions in asterisk pairs are dropped, then stray
 * asterisks, then every ellipsis. Whitespace collapses to single spaces, only the
 * first three sentences survive, and a period is appended when the text does not
 * already end in terminal punctuation.
 *
 * @param raw - Text as returned by the backend
 * @returns Normalized reply; empty input stays empty
 */
export function normalizeResponse(raw: string): string {
  let text = raw.replace(STAGE_DIRECTION, '');
  text = text.replaceAll('*', '');
  text = text.replaceAll('...', '');
  text = text.replace(/\s+/g, ' ').trim();

  const sentences = splitSentences(text);
  if (sentences.length > MAX_SENTENCES) {
    text = sentences.slice(0, MAX_SENTENCES).join(' ');
  }

  if (text && !TERMINAL_PUNCTUATION.has(text[text.length - 1])) {
    text += '.';
  }

  return text;
}
