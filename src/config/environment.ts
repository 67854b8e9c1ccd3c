import dotenv from 'dotenv';
import Joi from 'joi';
import path from 'path';

dotenv.config();

export const SUPPORTED_LANGUAGES = ['en', 'de'] as const;

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'warn',
  logFile: process.env.LOG_FILE || '',

  // Storage
  dataDir: process.env.SPELLING_DATA_DIR || 'data',

  // UI
  language: process.env.SPELLING_LANGUAGE || 'en',
  i18nFile: process.env.SPELLING_I18N_FILE || path.resolve(__dirname, '../../locales.csv'),
};

export type AppConfig = typeof config;

const configSchema = Joi.object({
  nodeEnv: Joi.string().required(),
  logLevel: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').required(),
  logFile: Joi.string().allow(''),
  dataDir: Joi.string().required(),
  language: Joi.string().valid(...SUPPORTED_LANGUAGES).required(),
  i18nFile: Joi.string().required(),
});

// Validation
export function validateConfig(candidate: AppConfig = config): void {
  const { error } = configSchema.validate(candidate, { abortEarly: false });

  if (error) {
    const invalid = error.details.map(detail => detail.path.join('.'));
    throw new Error(`Invalid configuration: ${invalid.join(', ')} (${error.message})`);
  }
}
