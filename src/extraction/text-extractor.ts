import * as cheerio from 'cheerio';
import type { PageText } from '../types/probe.js';

const MAX_TITLE_LENGTH = 200;
const MAX_TEXT_LENGTH = 5000;

export class TextExtractor {
  extract(body: string, contentType: string | null): PageText {
    const type = (contentType ?? '').toLowerCase();

    // Servers that omit the header still tend to send HTML
    if (!type || type.includes('html')) {
      return this.extractFromHtml(body);
    }

    if (type.startsWith('text/')) {
      return { title: null, text: this.collapse(body).substring(0, MAX_TEXT_LENGTH) };
    }

    return { title: null, text: '' };
  }

  extractFromHtml(html: string): PageText {
    const $ = cheerio.load(html);

    const rawTitle = $('title').first().text().trim();
    const title = rawTitle ? this.collapse(rawTitle).substring(0, MAX_TITLE_LENGTH) : null;

    return {
      title,
      text: this.extractCleanText($),
    };
  }

  extractCleanText($: cheerio.CheerioAPI): string {
    $('script, style, noscript, template, head').remove();

    // Block-level elements butt up against each other in .text(); pad them so words stay apart
    $('p, div, li, h1, h2, h3, h4, h5, h6, td, th, section, article, header, footer').each((_, element) => {
      $(element).prepend(' ').append(' ');
    });

    const raw = $('body').length > 0 ? $('body').text() : $.root().text();
    return this.collapse(raw).substring(0, MAX_TEXT_LENGTH);
  }

  private collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}
