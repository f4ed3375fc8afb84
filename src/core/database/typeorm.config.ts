import { ConfigService } from '@nestjs/config';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { User } from '../../modules/accounts/entities/user.entity';
import { Like } from '../../modules/likes/entities/like.entity';
import { Tweet } from '../../modules/tweets/entities/tweet.entity';
import { TweetPhoto } from '../../modules/tweets/entities/tweet-photo.entity';

export const ENTITIES = [User, Tweet, TweetPhoto, Like];

/**
 * Connection options shared by the application and the TypeORM CLI.
 */
export function createDataSourceOptions(
  configService: ConfigService,
): PostgresConnectionOptions {
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  return {
    type: 'postgres',
    url: configService.get<string>('DATABASE_URL'),
    host: configService.get<string>('POSTGRES_HOST'),
    port: parseInt(configService.get('POSTGRES_PORT', '5432'), 10),
    username: configService.get<string>('POSTGRES_USER'),
    password: configService.get<string>('POSTGRES_PASSWORD'),
    database: configService.get<string>('POSTGRES_DB'),

    entities: ENTITIES,
    migrations: [`${__dirname}/../../database/migrations/*{.ts,.js}`],
    migrationsTableName: 'typeorm_migrations',
    migrationsRun: configService.get('DATABASE_RUN_MIGRATIONS') === 'true',
    synchronize: nodeEnv === 'development',

    logging: nodeEnv === 'development' ? true : ['error', 'warn', 'migration'],
    poolSize: parseInt(configService.get('DATABASE_POOL_SIZE', '20'), 10),

    ssl:
      nodeEnv === 'production'
        ? {
            rejectUnauthorized:
              configService.get('DATABASE_SSL_REJECT_UNAUTHORIZED') !== 'false',
          }
        : false,

    extra: {
      // Session time zone for every pooled connection
      options: '-c timezone=UTC',
      application_name: 'tweets-service',
    },
  };
}
