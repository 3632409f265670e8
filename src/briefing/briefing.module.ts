import { Module } from '@nestjs/common';
import { BriefingController } from './briefing.controller';
import {
  COMPLETION_BACKEND,
  EMBEDDING_BACKEND,
  RECORD_STORE,
  SOURCE_COLLECTOR,
  VECTOR_INDEX,
} from './config/briefing.constants';
import { ArticleSummarizerService } from './services/article-summarizer.service';
import { ChatService } from './services/chat.service';
import { LlmClientService } from './services/llm-client.service';
import { PipelineRunStoreService } from './services/pipeline-run-store.service';
import { PipelineRunnerService } from './services/pipeline-runner.service';
import { RecordStoreService } from './services/record-store.service';
import { ReportGeneratorService } from './services/report-generator.service';
import { RssFeedService } from './services/rss-feed.service';
import { SourceCollectorService } from './services/source-collector.service';
import { StatsFeedService } from './services/stats-feed.service';
import { StatsLookupService } from './services/stats-lookup.service';
import { VectorIndexService } from './services/vector-index.service';

@Module({
  controllers: [BriefingController],
  providers: [
    LlmClientService,
    { provide: COMPLETION_BACKEND, useExisting: LlmClientService },
    { provide: EMBEDDING_BACKEND, useExisting: LlmClientService },
    RssFeedService,
    StatsFeedService,
    { provide: SOURCE_COLLECTOR, useClass: SourceCollectorService },
    { provide: VECTOR_INDEX, useClass: VectorIndexService },
    { provide: RECORD_STORE, useClass: RecordStoreService },
    PipelineRunStoreService,
    ReportGeneratorService,
    ArticleSummarizerService,
    StatsLookupService,
    ChatService,
    PipelineRunnerService,
  ],
  exports: [
    PipelineRunnerService,
    ReportGeneratorService,
    ArticleSummarizerService,
    ChatService,
    VECTOR_INDEX,
    RECORD_STORE,
    EMBEDDING_BACKEND,
  ],
})
export class BriefingModule {}
