/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Batch inputs and outputs
  RS_INPUT_DIR: Type.String({ minLength: 1, default: 'data/normalized' }),
  RS_OUTPUT_DIR: Type.String({ minLength: 1, default: 'data/processed' }),
  RS_DICTIONARY_PATH: Type.String({ minLength: 1, default: 'data/hyphen-to-longvowel.tsv' }),
  RS_MINISTRY_MASTER_PATH: Type.String({ minLength: 1, default: 'data/ministries.json' }),
  RS_WRITE_PROFILES: Type.Boolean({ default: true }),
});

export type Env = Static<typeof EnvSchema>;

const parseBooleanFlag = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value === undefined || value === '') return fallback;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true' || lowered === '1' || lowered === 'yes') return true;
  if (lowered === 'false' || lowered === '0' || lowered === 'no') return false;
  // Left as a string so schema validation reports it
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    RS_INPUT_DIR: env['RS_INPUT_DIR'] ?? 'data/normalized',
    RS_OUTPUT_DIR: env['RS_OUTPUT_DIR'] ?? 'data/processed',
    RS_DICTIONARY_PATH: env['RS_DICTIONARY_PATH'] ?? 'data/hyphen-to-longvowel.tsv',
    RS_MINISTRY_MASTER_PATH: env['RS_MINISTRY_MASTER_PATH'] ?? 'data/ministries.json',
    RS_WRITE_PROFILES: parseBooleanFlag(env['RS_WRITE_PROFILES'], true),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  paths: {
    /** Directory holding `year_<YYYY>/*.csv` decoded review sheets */
    inputDir: env.RS_INPUT_DIR,
    /** Directory receiving `year_<YYYY>/` RS tables and `schemas/` */
    outputDir: env.RS_OUTPUT_DIR,
    dictionary: env.RS_DICTIONARY_PATH,
    ministryMaster: env.RS_MINISTRY_MASTER_PATH,
  },
  output: {
    writeProfiles: env.RS_WRITE_PROFILES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
