/** 文件來源依閱讀順序產生的結構事件 */
export type DocumentEvent =
  | { type: 'heading'; text: string }
  | { type: 'paragraph'; text: string };

export function heading(text: string): DocumentEvent {
  return { type: 'heading', text };
}

export function paragraph(text: string): DocumentEvent {
  return { type: 'paragraph', text };
}
