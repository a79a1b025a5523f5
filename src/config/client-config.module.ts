import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import envConfig from './env.config';
import { CLIENT_OPTIONS, ClientModuleOptions, resolveClientOptions } from './client-options';

@Global()
@Module({})
export class ClientConfigModule {
  static forRoot(overrides: ClientModuleOptions = {}): DynamicModule {
    return {
      module: ClientConfigModule,
      imports: [ConfigModule.forRoot({ isGlobal: true, load: [envConfig] })],
      providers: [
        {
          provide: CLIENT_OPTIONS,
          inject: [envConfig.KEY],
          useFactory: (env: ConfigType<typeof envConfig>) => resolveClientOptions(env, overrides),
        },
      ],
      exports: [CLIENT_OPTIONS],
    };
  }
}
