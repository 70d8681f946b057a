/**
 * RASTERIZER
 * ==========
 *
 * SVG → PNG through resvg. renderAsync runs on the libuv thread pool, so a
 * large badge never blocks the event loop.
 */

import { renderAsync } from '@resvg/resvg-js';
import { DEFAULT_FONT_FAMILY, type FontRegistry } from './font.registry.js';

export class Rasterizer {
  constructor(
    private fonts: FontRegistry,
    private defaultFontFamily: string = DEFAULT_FONT_FAMILY,
  ) {}

  async toPng(svg: string | Buffer): Promise<Buffer> {
    const { files } = await this.fonts.resolve();

    const rendered = await renderAsync(svg, {
      background: 'rgba(0, 0, 0, 0)',
      fitTo: { mode: 'original' },
      font: {
        fontFiles: files,
        // Fall back to whatever the host has when no bundled font is present.
        loadSystemFonts: files.length === 0,
        defaultFontFamily: this.defaultFontFamily,
      },
    });
    return rendered.asPng();
  }
}
