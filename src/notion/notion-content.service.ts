import { Injectable } from '@nestjs/common';
import type { NotionBlock, NotionPageObject } from './notion.types';

const MEDIA_TYPES = new Set(['image', 'video', 'audio', 'file', 'pdf']);
const LINK_TYPES = new Set(['bookmark', 'embed', 'link_preview']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, key: string): string {
  if (!isRecord(value)) return '';
  const field = value[key];
  return typeof field === 'string' ? field : '';
}

/** Concatenates the `plain_text` of a Notion rich text array. */
export function plainText(richText: unknown): string {
  if (!Array.isArray(richText)) return '';
  return richText
    .map((item: unknown) => stringField(item, 'plain_text'))
    .join('');
}

function prefixed(marker: string, text: string): string {
  return text ? `${marker}${text}` : '';
}

@Injectable()
export class NotionContentService {
  /**
   * Converts one block into a line of markdown-flavoured text.
   * Block types without textual content yield an empty string.
   */
  extractBlockContent(block: NotionBlock): string {
    const payload = block[block.type];
    const text = isRecord(payload) ? plainText(payload.rich_text) : '';

    switch (block.type) {
      case 'paragraph':
      case 'toggle':
        return text;
      case 'heading_1':
        return prefixed('# ', text);
      case 'heading_2':
        return prefixed('## ', text);
      case 'heading_3':
        return prefixed('### ', text);
      case 'bulleted_list_item':
        return prefixed('- ', text);
      case 'numbered_list_item':
        return prefixed('1. ', text);
      case 'quote':
        return prefixed('> ', text);
      case 'to_do': {
        const checked = isRecord(payload) && payload.checked === true;
        return prefixed(checked ? '[x] ' : '[ ] ', text);
      }
      case 'callout': {
        const emoji = isRecord(payload) ? stringField(payload.icon, 'emoji') : '';
        return emoji && text ? `${emoji} ${text}` : text;
      }
      case 'code': {
        if (!text) return '';
        const language = stringField(payload, 'language');
        return `\`\`\`${language}\n${text}\n\`\`\``;
      }
      case 'divider':
        return '---';
      case 'child_page':
      case 'child_database':
        return stringField(payload, 'title');
      case 'equation':
        return stringField(payload, 'expression');
      case 'table_row': {
        const cells = isRecord(payload) ? payload.cells : undefined;
        if (!Array.isArray(cells)) return '';
        return cells.map((cell: unknown) => plainText(cell)).join(' | ');
      }
      default:
        if (LINK_TYPES.has(block.type)) return stringField(payload, 'url');
        if (MEDIA_TYPES.has(block.type)) return this.mediaText(payload);
        return '';
    }
  }

  pageTitle(page: NotionPageObject): string {
    const titleProperty = Object.values(page.properties).find(
      (property) => property.type === 'title',
    );
    const title = titleProperty ? plainText(titleProperty.title).trim() : '';
    return title || 'Untitled';
  }

  private mediaText(payload: unknown): string {
    if (!isRecord(payload)) return '';
    const caption = plainText(payload.caption);
    if (caption) return caption;
    // Hosted files and external links keep the URL under different keys
    return stringField(payload.file, 'url') || stringField(payload.external, 'url');
  }
}
