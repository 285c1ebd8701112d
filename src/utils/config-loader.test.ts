import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConverterConfig, loadPercentageConfig, parseList } from './config-loader.js';
import { ConfigError } from '../types/errors.js';

describe('config-loader', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.XCRESULT_LCOV_DEBUG;
    delete process.env.XCRESULT_LCOV_TARGET_SUFFIX;
    delete process.env.XCRESULT_LCOV_ALWAYS_COVERED;
    delete process.env.XCRESULT_LCOV_XCRUN;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('parseList', () => {
    it('should split and trim comma-separated values', () => {
      expect(parseList(' FileWatcher.swift, ,PatternMatcher.swift ')).toEqual(['FileWatcher.swift', 'PatternMatcher.swift']);
    });
  });

  describe('loadConverterConfig', () => {
    it('should apply defaults', () => {
      const config = loadConverterConfig({ xcresultPath: 'Test.xcresult', outputPath: 'coverage.lcov' });

      expect(config).toEqual({
        xcresultPath: 'Test.xcresult',
        outputPath: 'coverage.lcov',
        repoRoot: process.cwd(),
        appTargetSuffix: '.app',
        alwaysCoveredFiles: ['FileWatcher.swift', 'PatternMatcher.swift'],
        xcrunPath: 'xcrun',
        debug: false,
      });
    });

    it('should read settings from the environment', () => {
      process.env.XCRESULT_LCOV_TARGET_SUFFIX = '.framework';
      process.env.XCRESULT_LCOV_ALWAYS_COVERED = 'Clock.swift';
      process.env.XCRESULT_LCOV_XCRUN = '/opt/xcrun';
      process.env.XCRESULT_LCOV_DEBUG = 'true';

      const config = loadConverterConfig({ xcresultPath: 'a', outputPath: 'b' });

      expect(config.appTargetSuffix).toBe('.framework');
      expect(config.alwaysCoveredFiles).toEqual(['Clock.swift']);
      expect(config.xcrunPath).toBe('/opt/xcrun');
      expect(config.debug).toBe(true);
    });

    it('should allow disabling the always-covered list from the environment', () => {
      process.env.XCRESULT_LCOV_ALWAYS_COVERED = '';

      expect(loadConverterConfig({ xcresultPath: 'a', outputPath: 'b' }).alwaysCoveredFiles).toEqual([]);
    });

    it('should prefer explicit values over the environment', () => {
      process.env.XCRESULT_LCOV_TARGET_SUFFIX = '.framework';
      process.env.XCRESULT_LCOV_DEBUG = 'true';

      const config = loadConverterConfig({
        xcresultPath: 'a',
        outputPath: 'b',
        appTargetSuffix: '.appex',
        debug: false,
      });

      expect(config.appTargetSuffix).toBe('.appex');
      expect(config.debug).toBe(false);
    });

    it('should ignore explicit undefined values', () => {
      process.env.XCRESULT_LCOV_XCRUN = '/opt/xcrun';

      const config = loadConverterConfig({ xcresultPath: 'a', outputPath: 'b', xcrunPath: undefined });

      expect(config.xcrunPath).toBe('/opt/xcrun');
    });

    it('should throw ConfigError for invalid values', () => {
      expect(() => loadConverterConfig({ xcresultPath: '', outputPath: 'b' })).toThrow(ConfigError);
      expect(() => loadConverterConfig({ xcresultPath: '', outputPath: 'b' })).toThrow(/^Invalid configuration: xcresultPath: /);
    });
  });

  describe('loadPercentageConfig', () => {
    it('should validate the report path and target', () => {
      expect(loadPercentageConfig({ lcovPath: 'coverage.lcov', targetFile: 'App.swift' })).toEqual({
        lcovPath: 'coverage.lcov',
        targetFile: 'App.swift',
        debug: false,
      });
    });

    it('should take debug from the environment', () => {
      process.env.XCRESULT_LCOV_DEBUG = 'true';
      expect(loadPercentageConfig({ lcovPath: 'a', targetFile: 'b' }).debug).toBe(true);
    });
  });
});
