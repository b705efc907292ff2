/**
 * Cleanup of raw web page text before it is used as model context.
 *
 * Search results carry page chrome: markup, cookie banners, consent
 * prompts, decorative separators and image placeholders. This strips what
 * can be recognized without a model and clips the rest.
 */

const BOILERPLATE_LINE =
  /\b(cookies?|cookie (?:policy|settings)|consent|accept all|allow all|reject all|manage (?:cookies|preferences)|privacy (?:policy|notice|statement)|gdpr|ccpa|all rights reserved|skip to (?:main )?content)\b/i;

const DECORATIVE_LINE = /^[\s#=*\-_~|•·>]+$/;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

function stripMarkup(text: string): string {
  return text
    .replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6]|tr|section|article)>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? entity);
}

/**
 * Clean a raw page or snippet and clip it to `maxChars`. Returns '' when
 * nothing useful is left.
 */
export function cleanSnippet(raw: string, maxChars = 2000): string {
  const lines = stripMarkup(raw)
    // image placeholders: ![alt](src)
    .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')
    .split(/\r?\n/)
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .filter((line) => !DECORATIVE_LINE.test(line))
    .filter((line) => !BOILERPLATE_LINE.test(line));

  const deduped = lines.filter((line, i) => i === 0 || line !== lines[i - 1]);
  const text = deduped.join('\n');

  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars).trimEnd();
}
