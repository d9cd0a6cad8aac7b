import type { DocumentSourcePort, SourceFormat } from '../../domain/ports/DocumentSourcePort.js';
import { DaisyXmlSource } from './DaisyXmlSource.js';
import { MarkdownSource } from './MarkdownSource.js';

export function createDocumentSource(format: SourceFormat, headingLevels: number[]): DocumentSourcePort {
  switch (format) {
    case 'daisy-xml':
      return new DaisyXmlSource(headingLevels);
    case 'markdown':
      return new MarkdownSource(headingLevels);
  }
}
