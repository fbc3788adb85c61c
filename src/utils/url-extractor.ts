const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

/**
 * Pulls http(s) links out of free text, in order of first appearance.
 * Sentence punctuation directly after a link is not part of it.
 */
export function extractUrls(text: string): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, '');
    if (url.length === 0 || seen.has(url)) {
      continue;
    }
    seen.add(url);
    urls.push(url);
  }

  return urls;
}
