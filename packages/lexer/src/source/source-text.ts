import * as fs from 'node:fs';

export interface ReadSourceOptions {
  /** Display name; defaults to the path as given */
  name?: string;
  encoding?: BufferEncoding;
}

/**
 * Source text together with the name diagnostics show for it
 *
 * Offsets everywhere in the library index into `text` as JavaScript string
 * offsets (UTF-16 code units).
 */
export class SourceText {
  readonly name: string;
  readonly text: string;

  private constructor(name: string, text: string) {
    this.name = name;
    this.text = text;
  }

  static fromString(name: string, text: string): SourceText {
    return new SourceText(name, text);
  }

  /**
   * Read source text from disk
   *
   * @throws The underlying I/O error when the file cannot be read
   */
  static fromFile(filePath: string, options: ReadSourceOptions = {}): SourceText {
    const text = fs.readFileSync(filePath, options.encoding ?? 'utf-8');
    return new SourceText(options.name ?? filePath, text);
  }

  get length(): number {
    return this.text.length;
  }
}
