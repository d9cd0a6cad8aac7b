import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { SourceFormatError, errorMessage } from '../../domain/errors/DomainErrors.js';

/** 讀取來源檔；不存在、不是檔案或無法讀取皆視為 SourceFormatError */
export async function readSourceText(filePath: string): Promise<string> {
  let stat: Stats;
  try {
    stat = await fs.stat(filePath);
  } catch (err) {
    throw new SourceFormatError(`Source file not found: ${filePath}`, filePath, { cause: err });
  }
  if (!stat.isFile()) {
    throw new SourceFormatError(`Source path is not a file: ${filePath}`, filePath);
  }

  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new SourceFormatError(`Cannot read source file ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
}
