import { Module, MiddlewareConsumer, RequestMethod } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

// Middleware
import { HttpLoggerMiddleware } from './common/middleware/http-logger.middleware';
import { validate } from './config/env.validation';

// Modules
import { GenerationModule } from './modules/generation/generation.module';
import { UsersModule } from './modules/users/users.module';
import { AuthModule } from './modules/auth/auth.module';
import { PurchasesModule } from './modules/purchases/purchases.module';
import { AnalysisModule } from './modules/analysis/analysis.module';
import { CompatibilityModule } from './modules/compatibility/compatibility.module';
import { HealthModule } from './modules/health/health.module';

import { ENTITIES } from './database/entities';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.local'],
      validate,
    }),
    ThrottlerModule.forRoot([{
      ttl: 60000,
      limit: 100,
    }]),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        url: configService.get<string>('DATABASE_URL'),
        entities: ENTITIES,
        synchronize: configService.get<boolean>('DB_SYNCHRONIZE') ?? true,
        ssl: configService.get<boolean>('DATABASE_SSL') ? { rejectUnauthorized: false } : false,
        extra: {
          max: 5,
          connectionTimeoutMillis: 10000,
        },
      }),
    }),
    GenerationModule,
    UsersModule,
    AuthModule,
    PurchasesModule,
    AnalysisModule,
    CompatibilityModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(HttpLoggerMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
