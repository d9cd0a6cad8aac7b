import matter from 'gray-matter';
import type { DocumentEvent } from '../../domain/entities/DocumentEvent.js';
import type { DocumentSourcePort } from '../../domain/ports/DocumentSourcePort.js';
import { SourceFormatError, errorMessage } from '../../domain/errors/DomainErrors.js';
import { readSourceText } from './readSourceText.js';

const HEADING_RE = /^(#{1,6})\s+(.*?)\s*#*\s*$/;

/**
 * Markdown 文件來源
 *
 * front matter 以 gray-matter 去除；ATX heading 為章節標題，
 * 空行分隔的文字區塊為段落。code block 內的內容不視為文件內文。
 */
export class MarkdownSource implements DocumentSourcePort {
  readonly format = 'markdown' as const;
  private readonly headingLevels: Set<number>;

  constructor(headingLevels: number[] = [1, 2, 3]) {
    this.headingLevels = new Set(headingLevels);
  }

  async read(filePath: string): Promise<DocumentEvent[]> {
    return this.parse(await readSourceText(filePath), filePath);
  }

  parse(raw: string, sourcePath: string = '<inline>'): DocumentEvent[] {
    let body: string;
    try {
      body = matter(raw).content;
    } catch (err) {
      throw new SourceFormatError(`Invalid front matter in ${sourcePath}: ${errorMessage(err)}`, sourcePath, { cause: err });
    }

    const events: DocumentEvent[] = [];
    let block: string[] = [];
    let inCodeBlock = false;

    const flush = (): void => {
      if (block.length > 0) {
        events.push({ type: 'paragraph', text: block.join(' ') });
        block = [];
      }
    };

    for (const line of body.split('\n')) {
      if (line.trimStart().startsWith('```')) {
        flush();
        inCodeBlock = !inCodeBlock;
        continue;
      }
      if (inCodeBlock) continue;

      const match = HEADING_RE.exec(line);
      if (match) {
        flush();
        if (this.headingLevels.has(match[1].length)) {
          events.push({ type: 'heading', text: match[2] });
        }
        continue;
      }

      if (!line.trim()) {
        flush();
      } else {
        block.push(line.trim());
      }
    }
    flush();

    return events;
  }
}
