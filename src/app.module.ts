import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AnalysisModule } from './analysis/analysis.module';
import { validateEnv } from './config/env.validation';

const environment = process.env.NODE_ENV ?? 'development';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        level:
          process.env.LOG_LEVEL ?? (environment === 'test' ? 'silent' : 'info'),
        transport:
          environment !== 'production' && environment !== 'test'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
        redact: [
          'req.headers.authorization',
          '*.credentials',
          '*.apiKey',
        ],
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    AnalysisModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
