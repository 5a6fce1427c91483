/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.RS_INPUT_DIR).toBe('data/normalized');
      expect(env.RS_OUTPUT_DIR).toBe('data/processed');
      expect(env.RS_DICTIONARY_PATH).toBe('data/hyphen-to-longvowel.tsv');
      expect(env.RS_MINISTRY_MASTER_PATH).toBe('data/ministries.json');
      expect(env.RS_WRITE_PROFILES).toBe(true);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('reads directory overrides', () => {
      const env = parseEnv({ RS_INPUT_DIR: '/srv/rs/in', RS_OUTPUT_DIR: '/srv/rs/out' });

      expect(env.RS_INPUT_DIR).toBe('/srv/rs/in');
      expect(env.RS_OUTPUT_DIR).toBe('/srv/rs/out');
    });

    it('parses RS_WRITE_PROFILES flags', () => {
      expect(parseEnv({ RS_WRITE_PROFILES: 'false' }).RS_WRITE_PROFILES).toBe(false);
      expect(parseEnv({ RS_WRITE_PROFILES: '0' }).RS_WRITE_PROFILES).toBe(false);
      expect(parseEnv({ RS_WRITE_PROFILES: 'YES' }).RS_WRITE_PROFILES).toBe(true);
      expect(parseEnv({ RS_WRITE_PROFILES: '' }).RS_WRITE_PROFILES).toBe(true);
    });

    it('throws on an unreadable RS_WRITE_PROFILES value', () => {
      expect(() => parseEnv({ RS_WRITE_PROFILES: 'sometimes' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on invalid NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow('Invalid environment configuration');
    });

    it('throws on an empty input directory', () => {
      expect(() => parseEnv({ RS_INPUT_DIR: '' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('disables pretty logs in production', () => {
      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }));
      expect(prodConfig.logger).toEqual({ level: 'warn', pretty: false });

      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.logger.pretty).toBe(true);
    });

    it('groups paths and output settings', () => {
      const config = createConfig(
        parseEnv({ RS_DICTIONARY_PATH: 'dict.tsv', RS_WRITE_PROFILES: 'no' })
      );

      expect(config.paths.dictionary).toBe('dict.tsv');
      expect(config.paths.ministryMaster).toBe('data/ministries.json');
      expect(config.output.writeProfiles).toBe(false);
    });
  });
});
