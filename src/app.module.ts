import { DynamicModule, Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { BriefingModule } from './briefing/briefing.module';
import { AppConfig } from './config/app-config';
import { ConfigModule } from './config/config.module';

@Module({})
export class AppModule {
  static register(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), BriefingModule],
      controllers: [AppController],
      providers: [AppService],
    };
  }
}
