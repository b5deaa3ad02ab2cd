import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: 'development',
      HOST: '0.0.0.0',
      PORT: 8000,
      LOG_LEVEL: 'info',
      DATABASE_URL: 'file:./data/ioc-registry',
      DATABASE_POOL_MAX: 10,
      DATABASE_CONNECT_TIMEOUT: 10,
      CORS_ALLOWED_ORIGINS: ['*'],
    });
  });

  it('should coerce numbers and split origin lists', () => {
    const config = loadConfig({
      PORT: '9090',
      DATABASE_POOL_MAX: '4',
      CORS_ALLOWED_ORIGINS: 'https://soc.example.com, https://dash.example.com,',
    });

    expect(config.PORT).toBe(9090);
    expect(config.DATABASE_POOL_MAX).toBe(4);
    expect(config.CORS_ALLOWED_ORIGINS).toEqual(['https://soc.example.com', 'https://dash.example.com']);
  });

  it('should name every invalid key', () => {
    expect(() => loadConfig({ PORT: 'eighty', LOG_LEVEL: 'loud' })).toThrow(
      /Invalid configuration: .*PORT.*LOG_LEVEL/,
    );
  });
});
