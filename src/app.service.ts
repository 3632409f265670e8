import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from './config/app-config';
import { SERVICE_NAME, SERVICE_VERSION } from './briefing/config/briefing.constants';

export interface ServiceInfo {
  service: string;
  version: string;
  defaultLanguage: string;
  sources: number;
  llmProvider: string;
}

@Injectable()
export class AppService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  getInfo(): ServiceInfo {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      defaultLanguage: this.config.defaultLanguage,
      sources: this.config.sources.length,
      llmProvider: this.config.llm.provider,
    };
  }
}
