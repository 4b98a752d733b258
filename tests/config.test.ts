import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      BLENDPACK_CONCURRENCY: '8',
      BLENDPACK_ZIP_LEVEL: '6',
      BLENDPACK_ZIP_STORE_BIG_FILES_MB: '1.5',
      BLENDPACK_ZIP_NO_COMPRESS: 'yes',
      BLENDPACK_LOG_LEVEL: 'debug',
      UNRELATED: 'ignored',
    });

    expect(config).toEqual({
      concurrency: 8,
      zip: { level: 6, storeBigFilesBytes: 1572864, noCompress: true },
      logLevel: 'debug',
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ BLENDPACK_CONCURRENCY: '', BLENDPACK_LOG_LEVEL: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects values out of range', () => {
    expect(() => loadConfig({ BLENDPACK_CONCURRENCY: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ BLENDPACK_CONCURRENCY: '0' })).toThrow(/^Invalid configuration: BLENDPACK_CONCURRENCY: /);
    expect(() => loadConfig({ BLENDPACK_ZIP_LEVEL: '12' })).toThrow(/^Invalid configuration: BLENDPACK_ZIP_LEVEL: /);
    expect(() => loadConfig({ BLENDPACK_ZIP_NO_COMPRESS: 'maybe' })).toThrow(/^Invalid configuration: BLENDPACK_ZIP_NO_COMPRESS: /);
  });
});
