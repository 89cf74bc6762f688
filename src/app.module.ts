import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration, { CliOverrides } from './config/configuration';
import { TransferModule } from './transfer/transfer.module';

@Module({})
export class AppModule {
  static forRoot(overrides: CliOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [configuration(overrides)],
        }),
        TransferModule,
      ],
    };
  }
}
