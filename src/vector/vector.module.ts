import { Module } from '@nestjs/common';
import { RagModule } from '../rag/rag.module';
import { SyncModule } from '../sync/sync.module';
import { VectorstoreModule } from '../vectorstore/vectorstore.module';
import { VectorIndexInitializer } from './vector-index.initializer';
import { VectorController } from './vector.controller';

@Module({
  imports: [VectorstoreModule, RagModule, SyncModule],
  controllers: [VectorController],
  providers: [VectorIndexInitializer],
})
export class VectorModule {}
