import { isRecord, isStringArray, isStringListRecord } from '../utils/guards';
import { DataFileError, readDataFile } from './dataFiles';

export interface ExpansionTables {
  roleHierarchy: Record<string, string[]>;
  cLevel: string[];
  titlePrefixes: string[];
  titleSuffixes: string[];
  industrySynonyms: Record<string, string[]>;
  locationFamilies: string[][];
}

export interface QueryVariants {
  titles: string[];
  industries: string[];
  locations: string[];
}

const EXPANSION_FILE = 'query-expansion.json';

const parseTables = (raw: unknown): ExpansionTables => {
  if (!isRecord(raw)) throw new DataFileError(EXPANSION_FILE, 'expected an object');
  const { roleHierarchy, cLevel, titlePrefixes, titleSuffixes, industrySynonyms, locationFamilies } = raw;
  if (!isStringListRecord(roleHierarchy)) throw new DataFileError(EXPANSION_FILE, 'roleHierarchy must map names to string lists');
  if (!isStringListRecord(industrySynonyms)) throw new DataFileError(EXPANSION_FILE, 'industrySynonyms must map names to string lists');
  if (!isStringArray(cLevel) || !isStringArray(titlePrefixes) || !isStringArray(titleSuffixes)) {
    throw new DataFileError(EXPANSION_FILE, 'cLevel, titlePrefixes and titleSuffixes must be string lists');
  }
  if (!Array.isArray(locationFamilies) || !locationFamilies.every(isStringArray)) {
    throw new DataFileError(EXPANSION_FILE, 'locationFamilies must be a list of string lists');
  }
  return { roleHierarchy, cLevel, titlePrefixes, titleSuffixes, industrySynonyms, locationFamilies };
};

let cachedTables: ExpansionTables | null = null;

export const loadExpansionTables = (): ExpansionTables => {
  if (!cachedTables) cachedTables = parseTables(readDataFile(EXPANSION_FILE));
  return cachedTables;
};

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const containsWholeWord = (text: string, term: string): boolean => {
  if (!term) return false;
  const pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegex(term.toLowerCase())}($|[^\\p{L}\\p{N}])`, 'u');
  return pattern.test(text.toLowerCase());
};

/** Drops blanks and case-insensitive repeats, keeping the first spelling seen. */
export const uniqueCaseInsensitive = (values: Iterable<string>): string[] => {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    unique.push(trimmed);
  }
  return unique;
};

const byLengthThenLexical = (a: string, b: string): number => {
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

const rank = (values: Iterable<string>, depth: number): string[] =>
  uniqueCaseInsensitive(values).sort(byLengthThenLexical).slice(0, Math.max(0, depth));

const spacingForms = (value: string): string[] =>
  /\s/.test(value) ? [value.replace(/\s+/g, '-'), value.replace(/\s+/g, '')] : [];

export const expandTitles = (jobTitle: string, tables: ExpansionTables = loadExpansionTables()): string[] => {
  const title = jobTitle.trim().toLowerCase();
  if (!title) return [];
  const expanded = [title, ...spacingForms(title)];

  for (const variants of Object.values(tables.roleHierarchy)) {
    if (!variants.some((variant) => title.includes(variant))) continue;
    expanded.push(...variants);
    expanded.push(...variants.map((variant) => `senior ${variant}`));
    expanded.push(...variants.filter((variant) => !tables.cLevel.includes(variant)).map((variant) => `chief ${variant}`));
  }

  const words = title.split(/\s+/);
  const headNoun = words[words.length - 1];
  expanded.push(...tables.titlePrefixes.map((prefix) => `${prefix} ${headNoun}`));
  expanded.push(...tables.titleSuffixes.map((suffix) => `${headNoun} ${suffix}`));
  return expanded;
};

export const expandIndustries = (industry: string, tables: ExpansionTables = loadExpansionTables()): string[] => {
  const normalized = industry.trim().toLowerCase();
  if (!normalized) return [];
  const expanded = [normalized, ...spacingForms(normalized)];
  if (normalized.includes('&')) expanded.push(normalized.replace(/\s*&\s*/g, ' and '));
  if (/\sand\s/.test(normalized)) expanded.push(normalized.replace(/\s+and\s+/g, ' & '));

  for (const [key, synonyms] of Object.entries(tables.industrySynonyms)) {
    if (![key, ...synonyms].some((term) => normalized.includes(term.toLowerCase()))) continue;
    expanded.push(key.toLowerCase(), ...synonyms.map((synonym) => synonym.toLowerCase()));
  }
  return expanded;
};

export const expandLocations = (location: string, tables: ExpansionTables = loadExpansionTables()): string[] => {
  const trimmed = location.trim();
  if (!trimmed) return [];
  const expanded = [trimmed];

  const comma = trimmed.indexOf(',');
  if (comma > 0) {
    const city = trimmed.slice(0, comma).trim();
    const country = trimmed.slice(comma + 1).trim();
    if (city && country) expanded.push(city, country, `${city} ${country}`);
  }

  for (const family of tables.locationFamilies) {
    if (family.some((member) => containsWholeWord(trimmed, member))) expanded.push(...family);
  }

  const words = trimmed.split(/\s+/);
  if (words.length > 1) expanded.push(words.map((word) => word[0]).join(''));
  return expanded;
};

/**
 * Expands one (title, industry, location) triple into ranked variant lists.
 * Every list is deduplicated case-insensitively, ordered by (length, lexical)
 * and cut to `depth` entries.
 */
export const expandQuery = (
  jobTitle: string,
  industry: string,
  location: string,
  depth: number,
  tables: ExpansionTables = loadExpansionTables(),
): QueryVariants => ({
  titles: rank(expandTitles(jobTitle, tables), depth),
  industries: rank(expandIndustries(industry, tables), depth),
  locations: rank(expandLocations(location, tables), depth),
});
