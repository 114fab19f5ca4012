import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config/env.js';
import { ValidationError } from '../errors/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({}, '/work');

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      ffmpegPath: undefined,
      outputDir: '/work/outputs',
      assetsDir: undefined,
      previewDurationSeconds: 10,
    });
  });

  it('coerces and resolves values', () => {
    const config = loadConfig(
      {
        NODE_ENV: 'production',
        FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
        YTP_ASSETS_DIR: 'assets',
        YTP_OUTPUT_DIR: '/tmp/renders',
        YTP_PREVIEW_DURATION: '25',
      },
      '/work'
    );

    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.assetsDir).toBe('/work/assets');
    expect(config.outputDir).toBe('/tmp/renders');
    expect(config.previewDurationSeconds).toBe(25);
  });

  it('rejects an invalid preview duration', () => {
    expect(() => loadConfig({ YTP_PREVIEW_DURATION: 'soon' }, '/work')).toThrow(ValidationError);
  });

  it('names the offending variable', () => {
    try {
      loadConfig({ LOG_LEVEL: 'chatty' }, '/work');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).details?.['field']).toBe('LOG_LEVEL');
    }
  });
});
