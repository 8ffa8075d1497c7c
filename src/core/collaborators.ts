export interface FetchOptions {
  proxy?: string;
  renderJs: boolean;
  waitSelector?: string;
  premiumProxy?: boolean;
  languageCode?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Returns page markup or rejects with a FetchError. */
export interface FetchCollaborator {
  fetch(url: string, options: FetchOptions): Promise<string>;
}

export interface HumanPacingProfile {
  navigationDelayMs: readonly [number, number];
  settleDelayMs: readonly [number, number];
  scrollRounds: readonly [number, number];
  scrollDistancePx: readonly [number, number];
  scrollPauseMs: readonly [number, number];
}

export const DEFAULT_PACING: HumanPacingProfile = {
  navigationDelayMs: [1500, 4500],
  settleDelayMs: [1000, 3000],
  scrollRounds: [2, 5],
  scrollDistancePx: [200, 800],
  scrollPauseMs: [500, 1500],
};

export interface BrowserCollaborator {
  navigate(url: string, timeoutMs: number): Promise<void>;
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  pageSource(): Promise<string>;
  detectMarker(selectorOrText: string): Promise<boolean>;
  /** Types into the field one key at a time. */
  fill(selector: string, value: string): Promise<void>;
  click(selector: string, timeoutMs: number): Promise<void>;
  simulateHumanActivity(profile: HumanPacingProfile): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserSessionOptions {
  proxy?: string;
  languageCode: string;
  signal?: AbortSignal;
}

export interface BrowserFactory {
  /** Opens a session, runs `fn` with it and always closes the session afterwards. */
  withSession<T>(options: BrowserSessionOptions, fn: (session: BrowserCollaborator) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export type RecordField = 'url' | 'title' | 'snippet' | 'name' | 'location';

export interface FieldRule {
  /** Relative to the result item; omitted means the item element itself. */
  selector?: string;
  /** Attribute to read; omitted means the element text. */
  attribute?: string;
}

export interface SourceSchema {
  container: string;
  item: string;
  fields: Partial<Record<RecordField, FieldRule[]>>;
  required: RecordField[];
}

export type ParsedRecord = Partial<Record<RecordField, string>>;

export interface ParseResult {
  hits: ParsedRecord[];
  containerFound: boolean;
  skipped: number;
}

export interface ParserCollaborator {
  parse(markup: string, schema: SourceSchema): ParseResult;
}
