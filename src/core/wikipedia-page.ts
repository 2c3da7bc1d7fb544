/**
 * Wikipedia Page helpers
 *
 * Reads a saved Wikipedia article: spots disambiguation pages, finds the
 * article title and renders the biography as line-oriented text for the
 * FieldExtractor ("- Label: value" lines for the infobox, one "- sentence"
 * line per sentence of prose).
 */

import * as cheerio from 'cheerio';

// The "(age N)" span of a birth date is marked noprint too; it stays
const NOISE_SELECTORS =
  'script, style, noscript, sup.reference, .mw-editsection, .noprint:not(.ForceAgeToShow), .mw-empty-elt';

function cleanText(value: string): string {
  return value
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.;:])/g, '$1')
    .replace(/(,\s*)+,/g, ',')
    .replace(/^[\s,]+|[\s,]+$/g, '');
}

/**
 * True when a hatnote or a category link mentions disambiguation
 */
export function isDisambiguationPage(html: string): boolean {
  const $ = cheerio.load(html);
  const mentions = (selector: string) =>
    $(selector)
      .toArray()
      .some((el) => $(el).text().trim().toLowerCase().includes('disambiguation'));

  return mentions('.hatnote') || mentions('#mw-normal-catlinks ul li a');
}

/**
 * The article heading, or the fallback when the page has none
 */
export function getPageTitle(html: string, fallback: string): string {
  const $ = cheerio.load(html);
  const heading = cleanText($('h1#firstHeading').text());
  return heading || fallback;
}

function infoboxLines($: cheerio.CheerioAPI): string[] {
  const lines: string[] = [];

  $('table.infobox tr').each((_, row) => {
    const $row = $(row);
    const label = cleanText($row.children('th').first().text());
    const $value = $row.children('td').first();
    if (!label || $value.length === 0) return;

    $value.find('br').replaceWith(', ');
    $value.find('li').each((_, item) => {
      $(item).append(', ');
    });
    const value = cleanText($value.text());
    if (value) {
      lines.push(`- ${label}: ${value}`);
    }
  });

  return lines;
}

/**
 * Split prose into sentences at ". " followed by a capital letter
 */
export function splitSentences(paragraph: string): string[] {
  return paragraph
    .split(/(?<=[.!?])\s+(?=[A-Z])/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function proseLines($: cheerio.CheerioAPI): string[] {
  const lines: string[] = [];
  const $content = $('#mw-content-text .mw-parser-output').first();
  const $root = $content.length > 0 ? $content : $('body');

  $root.children('p, ul').each((_, block) => {
    const $block = $(block);
    const texts = block.tagName === 'ul'
      ? $block.children('li').toArray().map((item) => $(item).text())
      : [$block.text()];

    for (const text of texts) {
      for (const sentence of splitSentences(cleanText(text))) {
        lines.push(`- ${sentence}`);
      }
    }
  });

  return lines;
}

/**
 * Render a saved article as biography text
 */
export function extractBiographyText(html: string, fallbackTitle = ''): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();

  const title = getPageTitle(html, fallbackTitle);
  const lines = [title, ...infoboxLines($), ...proseLines($)].filter((line) => line.length > 0);
  return lines.join('\n') + '\n';
}
