export interface SentenceSplitterOptions {
  /** 句末標記字元（例如 । ॥ 與換行） */
  markers: string[];
  /** 片段累積長度需超過此值才會在標記處切開 */
  minFragmentChars: number;
  /** 修剪後短於此值的片段直接丟棄 */
  minKeepChars: number;
}

export const DEFAULT_SPLITTER_OPTIONS: SentenceSplitterOptions = {
  markers: ['।', '॥', '\n'],
  minFragmentChars: 100,
  minKeepChars: 3,
};

/**
 * 超長文字的斷句器：逐字掃描，在句末標記後切開。
 * 回傳 generator，只能走訪一次。
 */
export class SentenceSplitter {
  private readonly markers: Set<string>;

  constructor(private readonly options: SentenceSplitterOptions = DEFAULT_SPLITTER_OPTIONS) {
    this.markers = new Set(options.markers);
  }

  *split(text: string): Generator<string, void, undefined> {
    let current = '';

    for (const char of text) {
      current += char;
      if (this.markers.has(char) && current.length > this.options.minFragmentChars) {
        const fragment = current.trim();
        current = '';
        if (fragment.length >= this.options.minKeepChars) yield fragment;
      }
    }

    const tail = current.trim();
    if (tail.length >= this.options.minKeepChars) yield tail;
  }
}
