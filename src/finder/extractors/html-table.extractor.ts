import * as cheerio from 'cheerio';

import { extractFromText } from './text.extractor';
import { parseCandidate, ProxyCandidate } from '../../candidates';

const IPV4_CELL_PATTERN = /^(?:\d{1,3}\.){3}\d{1,3}$/;
const PORT_CELL_PATTERN = /^\d{1,5}$/;

/**
 * Reads `<tr><td>ip</td><td>port</td>...` rows. Pages without such rows
 * fall back to scanning the document text.
 */
export function extractFromHtmlTable(content: string): ProxyCandidate[] {
  const $ = cheerio.load(content);
  const candidates: ProxyCandidate[] = [];

  $('table tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < 2) {
      return;
    }

    const host = cells.eq(0).text().trim();
    const port = cells.eq(1).text().trim();
    if (!IPV4_CELL_PATTERN.test(host) || !PORT_CELL_PATTERN.test(port)) {
      return;
    }

    const candidate = parseCandidate(`${host}:${port}`);
    if (candidate) {
      candidates.push(candidate);
    }
  });

  if (candidates.length > 0) {
    return candidates;
  }

  return extractFromText($.root().text());
}
