import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import { ApiSecurity, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../common/api-key.guard';
import { errorMessage } from '../common/errors';
import { RagService } from '../rag/rag.service';
import { SyncJobRegistry } from '../sync/sync-job.registry';
import { SyncService } from '../sync/sync.service';
import type { SyncJob } from '../sync/sync.types';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import type { VectorStats } from '../vectorstore/vectorstore.types';
import { ChatQueryDto, SyncRequestDto } from './vector.dto';
import type {
  ChatResponse,
  SyncStartedResponse,
  VectorHealth,
} from './vector.types';

@ApiTags('vector')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('vector')
export class VectorController {
  private readonly logger = new Logger(VectorController.name);

  constructor(
    private readonly vs: VectorstoreService,
    private readonly rag: RagService,
    private readonly sync: SyncService,
    private readonly jobs: SyncJobRegistry,
  ) {}

  @Get('stats')
  async stats(): Promise<VectorStats> {
    try {
      return await this.vs.getStats();
    } catch (error) {
      this.logger.error(`Error getting stats: ${errorMessage(error)}`);
      throw new InternalServerErrorException(errorMessage(error));
    }
  }

  @Post('sync')
  @HttpCode(HttpStatus.OK)
  startSync(@Body() dto: SyncRequestDto): SyncStartedResponse {
    try {
      const jobIds = this.sync.startSync(dto.force_update, dto.page_limit);
      return {
        status: 'started',
        message: `Notion sync started for ${jobIds.length} database(s)`,
        force_update: dto.force_update,
        job_ids: jobIds,
      };
    } catch (error) {
      this.logger.error(`Error starting database sync: ${errorMessage(error)}`);
      throw new InternalServerErrorException(errorMessage(error));
    }
  }

  @Get('sync/jobs')
  listJobs(): SyncJob[] {
    return this.jobs.list();
  }

  @Get('sync/jobs/:id')
  getJob(@Param('id') id: string): SyncJob {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundException(`Sync job ${id} not found`);
    return job;
  }

  @Get('health')
  async health(): Promise<VectorHealth> {
    try {
      const stats = await this.vs.getStats();
      const sample = await this.vs.generateEmbedding('test');

      return {
        status: 'healthy',
        vector_db: 'connected',
        embedding_model: this.vs.embeddingModelName,
        embedding_dimension: sample.length,
        google_ai_model: this.rag.modelName,
        total_chunks: stats.total_chunks,
        unique_pages: stats.unique_pages,
      };
    } catch (error) {
      this.logger.error(`Vector health check failed: ${errorMessage(error)}`);
      throw new ServiceUnavailableException(
        `Service unavailable: ${errorMessage(error)}`,
      );
    }
  }

  @Post('chat')
  @HttpCode(HttpStatus.OK)
  async chat(@Query() query: ChatQueryDto): Promise<ChatResponse> {
    const { question } = query;
    try {
      const answer = await this.rag.answerQuestion(question);
      const response: ChatResponse = {
        question,
        answer: answer.answer,
        context_used: answer.context_used,
        sources_count: answer.sources.length,
        model: answer.model_used,
      };

      const sourceUrls = answer.sources
        .map((source) => source.page_url)
        .filter((url) => url.length > 0);
      if (sourceUrls.length > 0) response.source_urls = sourceUrls;

      return response;
    } catch (error) {
      this.logger.error(`Error in chat: ${errorMessage(error)}`);
      throw new InternalServerErrorException(errorMessage(error));
    }
  }
}
