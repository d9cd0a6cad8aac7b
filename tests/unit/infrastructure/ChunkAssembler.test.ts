import { describe, it, expect } from 'vitest';
import { ChunkAssembler, normalizeWhitespace } from '../../../src/infrastructure/chunking/ChunkAssembler.js';
import { heading, paragraph } from '../../../src/domain/entities/DocumentEvent.js';

/**
 * Feature: Chunk 組裝
 *
 * 作為匯入流程，我需要把段落串流依字元上限合併為 chunks，
 * 並為每個 chunk 標記所屬章節。
 */
describe('ChunkAssembler', () => {
  /**
   * Scenario: 兩個短段落合併
   * Given maxChars = 100，段落 "Alpha." 與 "Beta."
   * When 組裝
   * Then 產生單一 chunk "Alpha.\nBeta."
   */
  it('joins short paragraphs with a newline', () => {
    const chunks = new ChunkAssembler(100).assemble([paragraph('Alpha.'), paragraph('Beta.')]);

    expect(chunks).toEqual([
      { chunkId: 1, section: 'Introduction', content: 'Alpha.\nBeta.', charCount: 12 },
    ]);
  });

  /**
   * Scenario: 單一段落超過上限
   * Given maxChars = 1000，一段 1500 字元的段落夾在兩個短段落之間
   * When 組裝
   * Then 長段落自成一個 chunk，不截斷
   */
  it('keeps an oversized paragraph whole in its own chunk', () => {
    const long = 'x'.repeat(1500);
    const chunks = new ChunkAssembler(1000).assemble([
      paragraph('before'),
      paragraph(long),
      paragraph('after'),
    ]);

    expect(chunks.map((c) => c.content)).toEqual(['before', long, 'after']);
    expect(chunks[1].charCount).toBe(1500);
  });

  it('never exceeds maxChars when merging', () => {
    const paras = Array.from({ length: 40 }, (_, i) => paragraph(`Paragraph number ${i} ends here.`));
    const chunks = new ChunkAssembler(120).assemble(paras);

    for (const chunk of chunks) {
      expect(chunk.charCount).toBeLessThanOrEqual(120);
      expect(chunk.charCount).toBe(chunk.content.length);
    }
  });

  it('covers every non-empty paragraph exactly once, in order', () => {
    const texts = ['one', 'two', '   ', 'three', 'four', '', 'five'];
    const chunks = new ChunkAssembler(10).assemble(texts.map((t) => paragraph(t)));

    const recovered = chunks.flatMap((c) => c.content.split('\n'));
    expect(recovered).toEqual(['one', 'two', 'three', 'four', 'five']);
  });

  it('numbers chunks consecutively from startId', () => {
    const chunks = new ChunkAssembler(5).assemble(
      [paragraph('aaaa'), paragraph('bbbb'), paragraph('cccc')],
      41,
    );
    expect(chunks.map((c) => c.chunkId)).toEqual([41, 42, 43]);
  });

  it('collapses whitespace inside paragraphs and headings', () => {
    const chunks = new ChunkAssembler(100).assemble([
      heading('  Book \n One '),
      paragraph('  spread\n\tout   text  '),
    ]);
    expect(chunks).toEqual([
      { chunkId: 1, section: 'Book One', content: 'spread out text', charCount: 15 },
    ]);
  });

  it('ignores empty headings', () => {
    const chunks = new ChunkAssembler(100).assemble([heading('Canto 1'), heading('   '), paragraph('verse')]);
    expect(chunks[0].section).toBe('Canto 1');
  });

  /**
   * Scenario: 章節取封存當下的值
   * Given 第一章的段落尚在緩衝區，接著出現第二章標題
   * When 第二章的第一段使緩衝區超過上限
   * Then 被封存的 chunk 標記為第二章
   */
  it('labels a chunk with the section active when it is sealed', () => {
    const chunks = new ChunkAssembler(12).assemble([
      heading('First'),
      paragraph('aaaaaaaaaa'),
      heading('Second'),
      paragraph('bbbbbbbbbb'),
    ]);

    expect(chunks).toEqual([
      { chunkId: 1, section: 'Second', content: 'aaaaaaaaaa', charCount: 10 },
      { chunkId: 2, section: 'Second', content: 'bbbbbbbbbb', charCount: 10 },
    ]);
  });

  it('does not flush on a heading alone', () => {
    const chunks = new ChunkAssembler(100).assemble([
      paragraph('first'),
      heading('Next'),
      paragraph('second'),
    ]);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].content).toBe('first\nsecond');
  });

  it('uses the configured default section before any heading', () => {
    const chunks = new ChunkAssembler(100, 'Preface').assemble([paragraph('opening words')]);
    expect(chunks[0].section).toBe('Preface');
  });

  it('returns no chunks for an empty stream', () => {
    expect(new ChunkAssembler(100).assemble([])).toEqual([]);
  });

  it('rejects a non-positive maxChars', () => {
    expect(() => new ChunkAssembler(0)).toThrow(RangeError);
  });

  it('normalizeWhitespace trims and collapses runs', () => {
    expect(normalizeWhitespace('  a \n\n b\tc ')).toBe('a b c');
  });
});
