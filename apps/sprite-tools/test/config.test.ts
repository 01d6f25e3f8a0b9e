import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      frameWidth: 24,
      frameHeight: 24,
      outputDir: '.',
      sentryDsn: undefined,
      environment: 'development',
    });
  });

  test('reads overrides and treats empty strings as unset', () => {
    const config = loadConfig({ SPRITE_FRAME_WIDTH: '32', SPRITE_FRAME_HEIGHT: '', SENTRY_DSN: '', NODE_ENV: 'test' });
    expect(config.frameWidth).toBe(32);
    expect(config.frameHeight).toBe(24);
    expect(config.sentryDsn).toBeUndefined();
    expect(config.environment).toBe('test');
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ SPRITE_FRAME_WIDTH: 'wide' })).toThrow('Invalid environment');
    expect(() => loadConfig({ SENTRY_DSN: 'not a url' })).toThrow('Invalid environment');
  });
});
