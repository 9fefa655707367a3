import { Module } from '@nestjs/common';
import { NotionModule } from '../notion/notion.module';
import { VectorstoreModule } from '../vectorstore/vectorstore.module';
import { SyncJobRegistry } from './sync-job.registry';
import { SyncTaskRunner } from './sync-task.runner';
import { SyncService } from './sync.service';

@Module({
  imports: [NotionModule, VectorstoreModule],
  providers: [SyncService, SyncTaskRunner, SyncJobRegistry],
  exports: [SyncService, SyncTaskRunner, SyncJobRegistry],
})
export class SyncModule {}
