import { Module } from '@nestjs/common';
import { NotionClientSource } from './notion-client.source';
import { NotionContentService } from './notion-content.service';
import { NOTION_SOURCE } from './notion.types';

@Module({
  providers: [
    NotionContentService,
    { provide: NOTION_SOURCE, useClass: NotionClientSource },
  ],
  exports: [NotionContentService, NOTION_SOURCE],
})
export class NotionModule {}
