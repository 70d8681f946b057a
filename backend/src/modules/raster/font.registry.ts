/**
 * FONT REGISTRY
 * =============
 *
 * Font name → file mapping for the rasterizer. Files are looked up under
 * FONTS_PATH on first use; the result is memoised for the process.
 */

import { access } from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError } from '../../common/errors.js';
import { noopLogger, type Logger } from '../../common/logger.js';

export const DEFAULT_FONTS: Readonly<Record<string, string>> = {
  'Noto Sans': 'notosans.ttf',
};

export const DEFAULT_FONT_FAMILY = 'Noto Sans';

export interface ResolvedFonts {
  /** Absolute paths of the font files that exist. */
  files: string[];
  /** Names whose file is missing. */
  missing: string[];
}

export class FontRegistry {
  private resolved?: Promise<ResolvedFonts>;

  constructor(
    readonly fontsPath: string,
    private fonts: Readonly<Record<string, string>> = DEFAULT_FONTS,
    private logger: Logger = noopLogger,
  ) {}

  get names(): string[] {
    return Object.keys(this.fonts);
  }

  /**
   * Path of a registered font. Does not check that the file exists.
   */
  fileFor(name: string): string {
    const file = this.fonts[name];
    if (file === undefined) {
      throw new NotFoundError(`Font ${name} not available`);
    }
    return path.join(this.fontsPath, file);
  }

  resolve(): Promise<ResolvedFonts> {
    if (!this.resolved) {
      this.resolved = this.scan();
    }
    return this.resolved;
  }

  private async scan(): Promise<ResolvedFonts> {
    const files: string[] = [];
    const missing: string[] = [];

    for (const name of this.names) {
      const file = this.fileFor(name);
      try {
        await access(file);
        files.push(file);
      } catch {
        missing.push(name);
      }
    }

    if (missing.length > 0) {
      this.logger.warn({ fontsPath: this.fontsPath, missing }, '[FontRegistry] Missing font files');
    }
    return { files, missing };
  }
}
