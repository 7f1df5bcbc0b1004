/**
 * Output Writer
 *
 * Two plain-text files read by the display tool: the metadata ("title") file
 * and the verse file. Each write replaces the whole file in place; there is no
 * temp-file-and-rename, so a reader can observe a file mid-write.
 */

import { writeFile } from 'fs/promises';
import { WriteError, errorMessage } from '../../lib/errors/bridge-errors.js';
import type { SlideFields } from '../slides/slide.types.js';

export interface OutputFiles {
  titleFile: string;
  verseFile: string;
}

/**
 * `"Title" - Author A, Author B` with `CCLI Song #<n>` on a second line
 */
export function formatMetadata(fields: SlideFields): string {
  let text = fields.title ? `"${fields.title}"` : '';
  if (fields.authors.length > 0) {
    text += ` - ${fields.authors.join(', ')}`;
  }
  if (fields.ccli) {
    text += `\nCCLI Song #${fields.ccli}`;
  }
  return text;
}

export function formatVerses(verses: string[][]): string {
  return verses.flat().join('\n');
}

export class OutputWriter {
  constructor(private readonly files: OutputFiles) {}

  async write(fields: SlideFields): Promise<void> {
    await this.writeBoth(formatMetadata(fields), formatVerses(fields.verses));
  }

  /** Blank both files, e.g. at startup before any slide is shown */
  async clear(): Promise<void> {
    await this.writeBoth('', '');
  }

  private async writeBoth(metadata: string, verses: string): Promise<void> {
    // Both writes settle before returning so no write outlives the cycle
    const results = await Promise.allSettled([
      this.writeOne(this.files.titleFile, metadata),
      this.writeOne(this.files.verseFile, verses),
    ]);

    for (const result of results) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
    }
  }

  private async writeOne(path: string, data: string): Promise<void> {
    try {
      await writeFile(path, data, 'utf8');
    } catch (err) {
      throw new WriteError(`Cannot write ${path}: ${errorMessage(err)}`, path, { cause: err });
    }
  }
}
