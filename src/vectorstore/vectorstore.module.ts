import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { OllamaModule } from '../ollama/ollama.module';
import { NotionModule } from '../notion/notion.module';
import { VectorstoreService } from './vectorstore.service';
import { QDRANT_CLIENT } from './vectorstore.types';

@Module({
  imports: [OllamaModule, NotionModule],
  providers: [
    {
      provide: QDRANT_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new QdrantClient({
          url: config.get<string>('QDRANT_URL') ?? 'http://localhost:6333',
          apiKey: config.get<string>('QDRANT_API_KEY') || undefined,
        }),
    },
    VectorstoreService,
  ],
  exports: [VectorstoreService],
})
export class VectorstoreModule {}
