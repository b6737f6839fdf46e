import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { TableSpec } from '@tablesweep/shared';

/**
 * Locate the table element selected by spec.selector at spec.tableIndex.
 *
 * Markup is parsed with cheerio's HTML5 parser, so unclosed or misnested tags are
 * repaired the way browsers repair them before the selector runs.
 */
export function locateTable(html: string, spec: TableSpec): Cheerio<Element> | null {
  try {
    const $ = cheerio.load(html);
    const matches = $<Element, string>(spec.selector);

    if (matches.length === 0 || spec.tableIndex >= matches.length) {
      return null;
    }

    return matches.eq(spec.tableIndex);
  } catch {
    // Invalid selector syntax
    return null;
  }
}
