import { DynamicModule, Module } from '@nestjs/common';
import { BriefingModule } from '../briefing/briefing.module';
import { AppConfig } from '../config/app-config';
import { ConfigModule } from '../config/config.module';
import { CommandRunner } from './command-runner';

@Module({})
export class CliModule {
  static register(config: AppConfig): DynamicModule {
    return {
      module: CliModule,
      imports: [ConfigModule.forRoot(config), BriefingModule],
      providers: [CommandRunner],
    };
  }
}
