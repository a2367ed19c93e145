/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'medium-wordpress-sync',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  medium: {
    apiKey: env.RAPIDAPI_KEY,
    apiHost: env.RAPIDAPI_HOST,
    monthlyLimit: env.RAPIDAPI_MONTHLY_LIMIT,
    timeout: 10000,
    requestsPerSecond: 2,
  },

  wordpress: {
    url: env.WORDPRESS_URL,
    username: env.WORDPRESS_USERNAME,
    password: env.WORDPRESS_PASSWORD,
    timeout: 30000,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
  },

  database: {
    path: env.DB_PATH,
  },

  settings: {
    path: env.SETTINGS_PATH,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  dashboard: {
    port: env.DASHBOARD_PORT,
    token: env.DASHBOARD_TOKEN,
  },

  defaults: {
    keywords: env.SEARCH_KEYWORDS.split(',')
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0),
    maxArticles: env.MAX_ARTICLES_PER_RUN,
    recentDays: env.RECENT_DAYS,
    languagePreference: env.LANGUAGE_PREFERENCE,
    translate: env.AUTO_TRANSLATE,
    targetLanguage: env.TARGET_LANGUAGE,
    postStatus: env.POST_STATUS,
    category: env.CATEGORY_NAME,
    scheduleHour: env.SCHEDULE_HOUR,
    scheduleMinute: env.SCHEDULE_MINUTE,
    timezone: env.TZ,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { BLOCKED_KEYWORDS } from './keywords.js';
