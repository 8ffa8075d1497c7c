import { isRecord, isStringArray, isStringRecord, readStringField } from '../utils/guards';
import { DataFileError, readDataFile } from './dataFiles';

export interface LanguageProfile {
  code: string;
  name: string;
  titles: Record<string, string>;
  googleDomain: string;
  linkedinDomain: string;
}

export const DEFAULT_LANGUAGE = 'en';
export const GLOBAL_REGION = 'Global';

const LANGUAGES_FILE = 'languages.json';
const REGIONS_FILE = 'regions.json';

const parseLanguages = (raw: unknown): Map<string, LanguageProfile> => {
  if (!isRecord(raw)) throw new DataFileError(LANGUAGES_FILE, 'expected an object keyed by language code');
  const languages = new Map<string, LanguageProfile>();
  for (const [code, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || !isStringRecord(entry.titles)) {
      throw new DataFileError(LANGUAGES_FILE, `language "${code}" is malformed`);
    }
    const name = readStringField(entry, 'name');
    const googleDomain = readStringField(entry, 'googleDomain');
    const linkedinDomain = readStringField(entry, 'linkedinDomain');
    if (!name || !googleDomain || !linkedinDomain) {
      throw new DataFileError(LANGUAGES_FILE, `language "${code}" needs name, googleDomain and linkedinDomain`);
    }
    languages.set(code.toLowerCase(), { code: code.toLowerCase(), name, titles: entry.titles, googleDomain, linkedinDomain });
  }
  if (!languages.has(DEFAULT_LANGUAGE)) throw new DataFileError(LANGUAGES_FILE, `missing default language "${DEFAULT_LANGUAGE}"`);
  return languages;
};

const parseRegions = (raw: unknown): Map<string, string[]> => {
  if (!isRecord(raw)) throw new DataFileError(REGIONS_FILE, 'expected an object keyed by continent');
  const regions = new Map<string, string[]>();
  for (const [name, codes] of Object.entries(raw)) {
    if (!isStringArray(codes)) throw new DataFileError(REGIONS_FILE, `region "${name}" must list country codes`);
    regions.set(name.toLowerCase(), codes.map((code) => code.toUpperCase()));
  }
  return regions;
};

let languages: Map<string, LanguageProfile> | null = null;
let regions: Map<string, string[]> | null = null;

const languageTable = (): Map<string, LanguageProfile> => {
  if (!languages) languages = parseLanguages(readDataFile(LANGUAGES_FILE));
  return languages;
};

const regionTable = (): Map<string, string[]> => {
  if (!regions) regions = parseRegions(readDataFile(REGIONS_FILE));
  return regions;
};

export const isSupportedLanguage = (code: string): boolean => languageTable().has(code.trim().toLowerCase());

export const getLanguage = (code: string = DEFAULT_LANGUAGE): LanguageProfile => {
  const table = languageTable();
  const profile = table.get(code.trim().toLowerCase()) ?? table.get(DEFAULT_LANGUAGE);
  if (!profile) throw new DataFileError(LANGUAGES_FILE, `missing default language "${DEFAULT_LANGUAGE}"`);
  return profile;
};

// Only whole titles with a table entry are translated; anything else passes through.
export const localizeTitle = (title: string, language: LanguageProfile): string => {
  const wanted = title.trim().toLowerCase();
  const match = Object.entries(language.titles).find(([key]) => key.toLowerCase() === wanted);
  return match ? match[1] : title;
};

export const isKnownRegion = (region: string): boolean =>
  region.trim().toLowerCase() === GLOBAL_REGION.toLowerCase() || regionTable().has(region.trim().toLowerCase());

export const isCountryCode = (code: string): boolean => /^[A-Za-z]{2}$/.test(code.trim());

/** Country codes for a continent; empty for the global region or an unknown name. */
export const regionCountries = (region?: string): string[] => {
  if (!region) return [];
  return [...(regionTable().get(region.trim().toLowerCase()) ?? [])];
};
