import * as cheerio from 'cheerio';

/** Elements that never carry article text */
const NOISE_SELECTOR = 'script, style, noscript, head, meta, link, nav, footer, form, iframe, svg';

/** Elements that end a line of text */
const BLOCK_SELECTOR =
  'p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article, blockquote, pre, header, main, aside, figcaption, dd, dt';

export interface ExtractedHtml {
  title?: string;
  text: string;
}

/**
 * Extract the page title and readable text from HTML, one block element per line
 */
export function extractHtml(html: string): ExtractedHtml {
  const $ = cheerio.load(html);

  const title = $('title').first().text().trim() || $('h1').first().text().trim() || undefined;

  $(NOISE_SELECTOR).remove();
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).append('\n');
  });

  const text = $('body')
    .text()
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .join('\n');

  return { title, text };
}
