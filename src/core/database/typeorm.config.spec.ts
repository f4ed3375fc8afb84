import { ConfigService } from '@nestjs/config';
import { createDataSourceOptions, ENTITIES } from './typeorm.config';
import { Tweet } from '../../modules/tweets/entities/tweet.entity';
import { TweetPhoto } from '../../modules/tweets/entities/tweet-photo.entity';
import { Like } from '../../modules/likes/entities/like.entity';
import { User } from '../../modules/accounts/entities/user.entity';

// ConfigService reads process.env before its own internal values
const ENV_KEYS = [
  'NODE_ENV',
  'DATABASE_URL',
  'POSTGRES_HOST',
  'POSTGRES_PORT',
  'POSTGRES_USER',
  'POSTGRES_DB',
  'DATABASE_RUN_MIGRATIONS',
  'DATABASE_SSL_REJECT_UNAUTHORIZED',
];

describe('createDataSourceOptions', () => {
  const originalEnv = { ...process.env };

  const useEnv = (values: Record<string, string>) => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    Object.assign(process.env, values);
  };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should register every entity', () => {
    expect(ENTITIES).toEqual([User, Tweet, TweetPhoto, Like]);
  });

  it('should build development options from the configuration', () => {
    useEnv({
      NODE_ENV: 'development',
      POSTGRES_HOST: 'localhost',
      POSTGRES_PORT: '6543',
      POSTGRES_USER: 'tweets',
      POSTGRES_DB: 'tweets_dev',
    });

    const options = createDataSourceOptions(new ConfigService());

    expect(options.type).toBe('postgres');
    expect(options.host).toBe('localhost');
    expect(options.port).toBe(6543);
    expect(options.username).toBe('tweets');
    expect(options.database).toBe('tweets_dev');
    expect(options.synchronize).toBe(true);
    expect(options.migrationsRun).toBe(false);
    expect(options.ssl).toBe(false);
    expect(options.extra).toEqual(
      expect.objectContaining({ options: '-c timezone=UTC' }),
    );
  });

  it('should enable TLS and disable synchronisation in production', () => {
    useEnv({
      NODE_ENV: 'production',
      DATABASE_SSL_REJECT_UNAUTHORIZED: 'false',
      DATABASE_RUN_MIGRATIONS: 'true',
    });

    const options = createDataSourceOptions(new ConfigService());

    expect(options.synchronize).toBe(false);
    expect(options.migrationsRun).toBe(true);
    expect(options.port).toBe(5432);
    expect(options.ssl).toEqual({ rejectUnauthorized: false });
    expect(options.logging).toEqual(['error', 'warn', 'migration']);
  });
});
