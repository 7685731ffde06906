import type { CleanText } from '../types/index.js';
import { collapseWhitespace, countTokens } from '../utils/text.js';

const HTML_ENTITY_RE = /&(?:#\d+|#x[0-9a-f]+|\w+);/gi;
const HTML_TAG_RE = /<[^<>]*>/g;
const MARKDOWN_RE = /[*_~`>{}[\]]+/g;
const HASHTAG_RE = /#+(\w+)/g;
const MENTION_RE = /(?<!\w)@\w+/g;
const APOSTROPHE_RE = /[\u2018\u2019\u02BC]/g;
const WORD_CHAR_RE = /[\p{L}\p{N}]/u;
const URL_RE = /https?:\/\/\S+|www\.\S+/gi;
const BOILERPLATE_RE = /verified\s+purchase/gi;
const RETWEET_RE = /^RT\s+/i;

// Each step removes text or swaps a character for a plainer one, so repeating the pass terminates.
function stripOnce(text: string): string {
  const stripped = text
    .normalize('NFKC')
    .replace(APOSTROPHE_RE, "'")
    .replace(HTML_ENTITY_RE, ' ')
    .replace(HTML_TAG_RE, ' ')
    .replace(MARKDOWN_RE, '')
    .replace(HASHTAG_RE, '$1')
    .replace(MENTION_RE, '')
    .replace(URL_RE, '')
    .replace(BOILERPLATE_RE, ' ');
  return collapseWhitespace(stripped).replace(RETWEET_RE, '');
}

/**
 * Cleans raw text for both scorers. The pass is applied until the text stops changing, so the
 * `normalized` output is a fixed point: cleaning it again returns it unchanged. Text without a
 * single letter or digit cleans to the empty string.
 */
export function clean(text: string): CleanText {
  let current = text;
  for (;;) {
    const next = stripOnce(current);
    if (next === current) {
      break;
    }
    current = next;
  }
  if (!WORD_CHAR_RE.test(current)) {
    current = '';
  }

  return {
    original: text,
    normalized: current,
    folded: current.toLowerCase(),
    length: countTokens(current),
  };
}
