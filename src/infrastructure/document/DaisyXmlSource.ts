import * as cheerio from 'cheerio';
import { XMLValidator } from 'fast-xml-parser';
import type { DocumentEvent } from '../../domain/entities/DocumentEvent.js';
import type { DocumentSourcePort } from '../../domain/ports/DocumentSourcePort.js';
import { SourceFormatError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { readSourceText } from './readSourceText.js';

/** 去掉 namespace prefix 後的小寫元素名稱（dtb:p → p） */
function localName(name: string): string {
  const idx = name.lastIndexOf(':');
  return (idx === -1 ? name : name.slice(idx + 1)).toLowerCase();
}

/**
 * DAISY / DTBook XML 文件來源
 *
 * 依文件順序走訪所有元素：h1 ~ h6（限 headingLevels）視為章節標題，
 * p 視為段落。其他元素（level、list、note 等）只是容器，直接略過。
 */
export class DaisyXmlSource implements DocumentSourcePort {
  readonly format = 'daisy-xml' as const;
  private readonly headingNames: Set<string>;
  private readonly logger = new Logger('DaisyXmlSource');

  constructor(headingLevels: number[] = [1, 2, 3]) {
    this.headingNames = new Set(headingLevels.map((level) => `h${level}`));
  }

  async read(filePath: string): Promise<DocumentEvent[]> {
    const xml = await readSourceText(filePath);
    const events = this.parse(xml, filePath);
    this.logger.info('Source parsed', {
      filePath,
      headings: events.filter((e) => e.type === 'heading').length,
      paragraphs: events.filter((e) => e.type === 'paragraph').length,
    });
    return events;
  }

  /** 解析 XML 字串；sourcePath 只用於錯誤訊息 */
  parse(xml: string, sourcePath: string = '<inline>'): DocumentEvent[] {
    if (!xml.trim().startsWith('<')) {
      throw new SourceFormatError(`Source is not XML: ${sourcePath}`, sourcePath);
    }

    // cheerio 會容忍截斷與錯置的標籤，先做 well-formedness 檢查
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new SourceFormatError(
        `Source is not well-formed XML (line ${line}, column ${col}): ${msg}: ${sourcePath}`,
        sourcePath,
      );
    }

    const $ = cheerio.load(xml, { xml: true });
    if ($.root().children().length === 0) {
      throw new SourceFormatError(`Source has no root element: ${sourcePath}`, sourcePath);
    }

    const events: DocumentEvent[] = [];
    $('*').each((_, el) => {
      const name = localName(el.name);
      if (this.headingNames.has(name)) {
        events.push({ type: 'heading', text: $(el).text() });
      } else if (name === 'p') {
        events.push({ type: 'paragraph', text: $(el).text() });
      }
    });

    if (!events.some((e) => e.type === 'paragraph')) {
      throw new SourceFormatError(`Source contains no paragraph elements: ${sourcePath}`, sourcePath);
    }
    return events;
  }
}
