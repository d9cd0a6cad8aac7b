const displayNames = new Intl.DisplayNames(['en'], { type: 'language' });

/** 語言代碼轉英文名稱（sa → Sanskrit），無法辨識時回傳原代碼 */
export function languageName(code: string): string {
  try {
    return displayNames.of(code) ?? code;
  } catch {
    return code;
  }
}
