import { describe, it, expect } from 'vitest';
import { ConverterConfigSchema, PercentageConfigSchema } from './config.js';

describe('ConverterConfigSchema', () => {
  it('should validate minimal required config', () => {
    const result = ConverterConfigSchema.parse({
      xcresultPath: 'build/Test.xcresult',
      outputPath: 'coverage/coverage.lcov',
      repoRoot: '/repo',
    });

    expect(result.appTargetSuffix).toBe('.app'); // default
    expect(result.alwaysCoveredFiles).toEqual(['FileWatcher.swift', 'PatternMatcher.swift']); // default
    expect(result.xcrunPath).toBe('xcrun'); // default
    expect(result.debug).toBe(false); // default
  });

  it('should validate full config', () => {
    const config = {
      xcresultPath: 'Test.xcresult',
      outputPath: 'coverage.lcov',
      repoRoot: '/repo',
      appTargetSuffix: '.appex',
      alwaysCoveredFiles: [],
      xcrunPath: '/usr/bin/xcrun',
      debug: true,
    };

    expect(ConverterConfigSchema.parse(config)).toEqual(config);
  });

  it('should reject an empty target suffix', () => {
    expect(() =>
      ConverterConfigSchema.parse({ xcresultPath: 'a', outputPath: 'b', repoRoot: '/repo', appTargetSuffix: '' })
    ).toThrow();
  });

  it('should require the archive and output paths', () => {
    expect(() => ConverterConfigSchema.parse({ repoRoot: '/repo' })).toThrow();
  });
});

describe('PercentageConfigSchema', () => {
  it('should require both paths', () => {
    expect(() => PercentageConfigSchema.parse({ lcovPath: 'coverage.lcov' })).toThrow();
    expect(PercentageConfigSchema.parse({ lcovPath: 'coverage.lcov', targetFile: 'a.swift' }).debug).toBe(false);
  });
});
