import { isRecord } from '../utils/guards';
import { RequestValidationError } from './errors';
import { DEFAULT_LANGUAGE, GLOBAL_REGION, getLanguage, isCountryCode, isKnownRegion, isSupportedLanguage, localizeTitle, regionCountries } from './localization';
import { Query } from './types';

const SUPPORTED_KEYS = new Set(['jobTitle', 'industry', 'location', 'language', 'region', 'regions']);
const MAX_FIELD_LENGTH = 200;

export interface NormalizedLeadRequest {
  query: Query;
  /** Country codes to search one by one; empty means a single global pass. */
  regions: string[];
  regionLabel: string;
}

const validateRequiredString = (value: unknown, key: string): string => {
  if (typeof value !== 'string' || !value.trim()) {
    throw new RequestValidationError(`${key} must be a non-empty string`);
  }
  if (value.trim().length > MAX_FIELD_LENGTH) {
    throw new RequestValidationError(`${key} must be at most ${MAX_FIELD_LENGTH} characters`);
  }
  return value.trim();
};

const validateOptionalString = (value: unknown, key: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  return validateRequiredString(value, key);
};

const validateCountryCodes = (value: unknown): string[] | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new RequestValidationError('regions must be an array of country codes');
  const codes: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || !isCountryCode(item)) {
      throw new RequestValidationError(`regions contains an invalid country code: ${String(item)}`);
    }
    const code = item.trim().toUpperCase();
    if (!codes.includes(code)) codes.push(code);
  }
  return codes;
};

export const normalizeLeadRequest = (raw: unknown): NormalizedLeadRequest => {
  if (!isRecord(raw)) throw new RequestValidationError('Body must be a JSON object');

  for (const key of Object.keys(raw)) {
    if (!SUPPORTED_KEYS.has(key)) throw new RequestValidationError(`${key} is not supported`);
  }

  const jobTitle = validateRequiredString(raw.jobTitle, 'jobTitle');
  const industry = validateRequiredString(raw.industry, 'industry');
  const location = validateRequiredString(raw.location, 'location');

  const language = validateOptionalString(raw.language, 'language')?.toLowerCase() ?? DEFAULT_LANGUAGE;
  if (!isSupportedLanguage(language)) throw new RequestValidationError(`language ${language} is not supported`);

  const region = validateOptionalString(raw.region, 'region');
  if (region !== undefined && !isKnownRegion(region)) throw new RequestValidationError(`region ${region} is not supported`);

  const explicit = validateCountryCodes(raw.regions);
  const profile = getLanguage(language);
  const query: Query = Object.freeze({
    jobTitle: localizeTitle(jobTitle, profile),
    industry,
    location,
    languageCode: profile.code,
  });

  if (explicit && explicit.length > 0) {
    return { query, regions: explicit, regionLabel: explicit.join(',') };
  }
  return { query, regions: regionCountries(region), regionLabel: region ?? GLOBAL_REGION };
};
