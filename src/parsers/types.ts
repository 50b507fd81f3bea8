import type { GameRecord } from '../types.js';

export type SignatureFormat = 'dat' | 'json';

/**
 * Extracts catalog records from the raw content of one signature file
 */
export interface SignatureParser {
  readonly format: SignatureFormat;

  /**
   * @param content - File content, as text or raw UTF-8 bytes
   * @param platformHint - Platform derived from the file name, used when the
   *   content does not declare one
   * @param sourceName - Path of the signature file, for formats that derive
   *   fields from it
   */
  parse(content: string | Uint8Array, platformHint: string, sourceName?: string): GameRecord[];
}

export function decodeContent(content: string | Uint8Array): string {
  if (typeof content === 'string') {
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  }
  // TextDecoder drops a leading BOM
  return new TextDecoder('utf-8').decode(content);
}
