import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { VectorstoreService } from '../vectorstore/vectorstore.service';

/** Makes sure the Qdrant collection exists before requests are served. */
@Injectable()
export class VectorIndexInitializer implements OnApplicationBootstrap {
  private readonly logger = new Logger(VectorIndexInitializer.name);

  constructor(private readonly vs: VectorstoreService) {}

  async onApplicationBootstrap(): Promise<void> {
    try {
      await this.vs.ensureVectorIndex();
      this.logger.log('Vector database initialized successfully');
    } catch (error) {
      // The API still starts; stats and health will report the problem
      this.logger.error(
        `Error initializing vector database: ${errorMessage(error)}`,
      );
    }
  }
}
