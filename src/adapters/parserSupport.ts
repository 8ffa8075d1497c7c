import { load } from 'cheerio';
import { FieldRule, ParseResult, ParsedRecord, ParserCollaborator, RecordField, SourceSchema } from '../core/collaborators';
import { log } from '../utils/logger';

const RECORD_FIELDS: readonly RecordField[] = ['url', 'title', 'snippet', 'name', 'location'];

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

/**
 * Schema-driven cheerio parser. Items missing a required field are skipped
 * one by one; the rest of the page still parses.
 */
export class CheerioParser implements ParserCollaborator {
  parse(markup: string, schema: SourceSchema): ParseResult {
    const $ = load(markup);
    const container = $(schema.container).first();
    if (container.length === 0) return { hits: [], containerFound: false, skipped: 0 };

    const hits: ParsedRecord[] = [];
    let skipped = 0;
    container.find(schema.item).each((_, element) => {
      const $item = $(element);
      const readRule = (rule: FieldRule): string | undefined => {
        const target = rule.selector ? $item.find(rule.selector).first() : $item;
        if (target.length === 0) return undefined;
        const raw = rule.attribute ? target.attr(rule.attribute) : target.text();
        return raw ? collapseWhitespace(raw) || undefined : undefined;
      };

      const record: ParsedRecord = {};
      for (const field of RECORD_FIELDS) {
        for (const rule of schema.fields[field] ?? []) {
          const value = readRule(rule);
          if (value) {
            record[field] = value;
            break;
          }
        }
      }
      if (schema.required.some((field) => !record[field])) {
        skipped += 1;
        return;
      }
      hits.push(record);
    });

    if (skipped > 0) log('DEBUG', 'skipped malformed results', { container: schema.container, skipped });
    return { hits, containerFound: true, skipped };
  }
}

export const cheerioParser = new CheerioParser();
