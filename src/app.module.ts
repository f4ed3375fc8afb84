import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import {
  ConfigModule as NestConfigModule,
  ConfigService,
} from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from './core/config/config.module';
import { createDataSourceOptions } from './core/database/typeorm.config';
import { LoggerModule, CorrelationIdMiddleware } from './core/logger';
import { AccountsModule } from './modules/accounts/accounts.module';
import { LikesModule } from './modules/likes/likes.module';
import { TweetsModule } from './modules/tweets/tweets.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    ConfigModule,
    LoggerModule,
    TypeOrmModule.forRootAsync({
      imports: [NestConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...createDataSourceOptions(configService),
        retryAttempts: parseInt(
          configService.get('DATABASE_RETRY_ATTEMPTS', '10'),
          10,
        ),
        retryDelay: parseInt(
          configService.get('DATABASE_RETRY_DELAY', '3000'),
          10,
        ),
      }),
    }),
    AccountsModule,
    LikesModule,
    TweetsModule,
    HealthModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
