/**
 * Settings Store
 *
 * Run settings persisted as JSON and editable from the dashboard. Secrets stay
 * in the environment; only behaviour lives here. Every write is validated with
 * zod before it reaches disk.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { config } from './index.js';
import { logger } from '../utils/logger.js';
import { SettingsError } from '../utils/errors.js';
import type { SyncConfig } from '../types/index.js';

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const searchSchema = z.object({
  keywords: z.array(z.string().trim().min(1)).min(1, 'At least one search keyword is required'),
  maxArticles: z.number().int().min(1).max(50),
  recentDays: z.number().int().min(1).max(365),
  languagePreference: z.enum(['en', 'pt', 'both']),
});

const contentSchema = z.object({
  translate: z.boolean(),
  targetLanguage: z.string().trim().min(2),
  addAuthorCredit: z.boolean(),
  addSourceLink: z.boolean(),
});

const wordpressSchema = z.object({
  postStatus: z.enum(['draft', 'publish', 'pending']),
  category: z.string().trim().min(1),
});

const scheduleSchema = z.object({
  enabled: z.boolean(),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  timezone: z.string().refine(isValidTimeZone, 'Unknown time zone'),
});

const settingsSchema = z.object({
  search: searchSchema,
  content: contentSchema,
  wordpress: wordpressSchema,
  schedule: scheduleSchema,
});

/** Imported files may omit sections or fields; the current values fill the gaps */
const importSchema = z.object({
  search: searchSchema.partial().optional(),
  content: contentSchema.partial().optional(),
  wordpress: wordpressSchema.partial().optional(),
  schedule: scheduleSchema.partial().optional(),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsSection = keyof Settings;

export interface SettingsValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Which external credentials are configured (from the environment)
 */
export interface CredentialStatus {
  medium: boolean;
  wordpress: boolean;
  openai: boolean;
}

export interface SettingsStoreOptions {
  path?: string;
  defaults?: Settings;
  credentials?: CredentialStatus;
}

export function defaultSettings(): Settings {
  const defaults = config.defaults;
  return {
    search: {
      keywords: [...defaults.keywords],
      maxArticles: defaults.maxArticles,
      recentDays: defaults.recentDays,
      languagePreference: defaults.languagePreference,
    },
    content: {
      translate: defaults.translate,
      targetLanguage: defaults.targetLanguage,
      addAuthorCredit: true,
      addSourceLink: true,
    },
    wordpress: {
      postStatus: defaults.postStatus,
      category: defaults.category,
    },
    schedule: {
      enabled: true,
      hour: defaults.scheduleHour,
      minute: defaults.scheduleMinute,
      timezone: defaults.timezone,
    },
  };
}

export function credentialStatus(): CredentialStatus {
  return {
    medium: Boolean(config.medium.apiKey),
    wordpress: Boolean(config.wordpress.url && config.wordpress.username && config.wordpress.password),
    openai: Boolean(config.openai.apiKey),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`);
}

export class SettingsStore {
  private readonly path: string;
  private readonly defaults: Settings;
  private readonly credentials: CredentialStatus;
  private settings: Settings;

  constructor(options: SettingsStoreOptions = {}) {
    this.path = options.path ?? config.settings.path;
    this.defaults = options.defaults ?? defaultSettings();
    this.credentials = options.credentials ?? credentialStatus();
    this.settings = structuredClone(this.defaults);
  }

  /**
   * Read the settings file; defaults when it is missing or unreadable
   */
  load(): Settings {
    if (!existsSync(this.path)) {
      logger.info({ path: this.path }, 'No settings file, using defaults');
      this.settings = structuredClone(this.defaults);
      return this.getAll();
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, 'utf-8'));
      this.settings = this.merge(this.defaults, raw);
      logger.info({ path: this.path }, 'Settings loaded');
    } catch (error) {
      logger.error({ error, path: this.path }, 'Could not load settings file, using defaults');
      this.settings = structuredClone(this.defaults);
    }

    return this.getAll();
  }

  getAll(): Settings {
    return structuredClone(this.settings);
  }

  update<S extends SettingsSection>(section: S, patch: Partial<Settings[S]>): Settings {
    const next = settingsSchema.safeParse({
      ...this.settings,
      [section]: { ...this.settings[section], ...patch },
    });
    if (!next.success) {
      throw new SettingsError(`Invalid ${section} settings`, formatIssues(next.error));
    }

    this.save(next.data);
    return this.getAll();
  }

  /**
   * Replace settings with an imported object; missing fields keep current values
   */
  replace(input: unknown): Settings {
    const next = this.merge(this.settings, input);
    this.save(next);
    return this.getAll();
  }

  import(json: string): Settings {
    let input: unknown;
    try {
      input = JSON.parse(json);
    } catch (error) {
      throw new SettingsError(`Settings import is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.replace(input);
  }

  export(): string {
    return JSON.stringify(this.settings, null, 2);
  }

  reset(): Settings {
    this.save(structuredClone(this.defaults));
    logger.info('Settings reset to defaults');
    return this.getAll();
  }

  /**
   * Errors block a sync; warnings do not
   */
  validate(): SettingsValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!this.credentials.medium) {
      errors.push('RapidAPI key is missing');
    }
    if (!this.credentials.wordpress) {
      errors.push('WordPress URL, username or application password is missing');
    }

    const parsed = settingsSchema.safeParse(this.settings);
    if (!parsed.success) {
      errors.push(...formatIssues(parsed.error));
    }

    if (this.settings.content.translate && !this.credentials.openai) {
      warnings.push('Translation enabled but OpenAI API key is missing');
    }
    if (this.settings.search.maxArticles > 10) {
      warnings.push('More than 10 articles per run uses the monthly API quota quickly');
    }
    if (!this.settings.schedule.enabled) {
      warnings.push('Daily automation is disabled');
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Frozen snapshot handed to one pipeline run
   */
  toSyncConfig(): SyncConfig {
    const { search, content, wordpress } = this.settings;
    return Object.freeze({
      keywords: Object.freeze([...search.keywords]),
      maxArticles: search.maxArticles,
      recentDays: search.recentDays,
      languagePreference: search.languagePreference,
      translate: content.translate,
      targetLanguage: content.targetLanguage,
      postStatus: wordpress.postStatus,
      category: wordpress.category,
      addAuthorCredit: content.addAuthorCredit,
      addSourceLink: content.addSourceLink,
    });
  }

  private merge(base: Settings, input: unknown): Settings {
    const partial = importSchema.safeParse(input);
    if (!partial.success) {
      throw new SettingsError('Invalid settings', formatIssues(partial.error));
    }

    const next = settingsSchema.safeParse({
      search: { ...base.search, ...partial.data.search },
      content: { ...base.content, ...partial.data.content },
      wordpress: { ...base.wordpress, ...partial.data.wordpress },
      schedule: { ...base.schedule, ...partial.data.schedule },
    });
    if (!next.success) {
      throw new SettingsError('Invalid settings', formatIssues(next.error));
    }
    return next.data;
  }

  private save(settings: Settings): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(settings, null, 2)}\n`, 'utf-8');
    this.settings = settings;
    logger.info({ path: this.path }, 'Settings saved');
  }
}
