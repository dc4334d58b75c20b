import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';

import { BridgeModule } from './bridge/bridge.module';
import { buildConfiguration, CliOverrides } from './config/configuration';
import { validateEnvironment } from './config/environment.validation';

@Module({})
export class AppModule {
  static forRoot(overrides: CliOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          cache: true,
          load: [() => buildConfiguration(process.env, overrides)],
          validate: validateEnvironment,
          expandVariables: true,
        }),
        LoggerModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) => {
            const env = configService.get<string>('env', 'development');
            const level = configService.get<string>('logging.level', 'info');
            const structured = configService.get<boolean>('logging.structured', true);
            const pretty = env !== 'production' || !structured;

            return {
              pinoHttp: {
                level,
                transport: pretty
                  ? {
                      target: 'pino-pretty',
                      options: {
                        colorize: true,
                        singleLine: true,
                        translateTime: 'SYS:standard',
                      },
                    }
                  : undefined,
                base: undefined,
              },
            };
          },
        }),
        BridgeModule,
      ],
    };
  }
}
