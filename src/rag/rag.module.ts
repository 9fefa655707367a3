import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { VectorstoreModule } from '../vectorstore/vectorstore.module';
import { RagService } from './rag.service';

@Module({
  imports: [OllamaModule, VectorstoreModule],
  providers: [RagService],
  exports: [RagService],
})
export class RagModule {}
