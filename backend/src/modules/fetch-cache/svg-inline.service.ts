/**
 * SVG IMAGE INLINING
 * ==================
 *
 * Rasterizers cannot fetch external images themselves, so every remote
 * <image> reference is downloaded through the fetch cache and rewritten as
 * a base64 data URI before the SVG is converted.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { fileTypeFromBuffer } from 'file-type';
import { FetchError, errorMessage } from '../../common/errors.js';
import { noopLogger, type Logger } from '../../common/logger.js';

const XLINK_NS = 'http://www.w3.org/1999/xlink';

export interface ImageSource {
  get(url: string): Promise<Buffer>;
}

interface ImageRef {
  element: Element;
  href: string;
  xlink: boolean;
}

export function isRemoteHref(href: string): boolean {
  return href.startsWith('https://') || href.startsWith('http://') || href.startsWith('//');
}

/** Protocol-relative references are fetched over https. */
export function resolveRemoteHref(href: string): string {
  return href.startsWith('//') ? `https:${href}` : href;
}

export async function toDataUri(data: Buffer): Promise<string> {
  const b64 = data.toString('base64');
  const type = await fileTypeFromBuffer(data);
  if (type && type.mime.startsWith('image/')) {
    return `data:${type.mime};base64,${b64}`;
  }
  return `data:base64,${b64}`;
}

function parseSvg(source: Buffer): Document {
  const problems: string[] = [];
  const report = (msg: unknown) => { problems.push(String(msg)); };
  // Unclosed and mismatched tags arrive as warnings; the parser would repair them.
  const parser = new DOMParser({
    errorHandler: { warning: report, error: report, fatalError: report },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(source.toString('utf8'), 'image/svg+xml');
  } catch (err) {
    throw new Error(`Malformed SVG: ${errorMessage(err)}`, { cause: err });
  }
  if (problems.length > 0 || !doc.documentElement) {
    throw new Error(`Malformed SVG: ${problems[0] ?? 'no root element'}`);
  }
  return doc;
}

function findRemoteImages(doc: Document): ImageRef[] {
  const refs: ImageRef[] = [];

  for (const element of Array.from(doc.getElementsByTagName('*'))) {
    if (element.localName !== 'image') continue;

    const plain = element.getAttribute('href');
    if (plain && isRemoteHref(plain)) {
      refs.push({ element, href: plain, xlink: false });
      continue;
    }

    const xlink = element.getAttributeNS(XLINK_NS, 'href');
    if (xlink && isRemoteHref(xlink)) {
      refs.push({ element, href: xlink, xlink: true });
    }
  }

  return refs;
}

/**
 * Inline remote images. An image that fails to download keeps its
 * original reference. Markup without remote images is returned as is.
 */
export async function inlineRemoteImages(
  source: Buffer,
  images: ImageSource,
  logger: Logger = noopLogger,
): Promise<Buffer> {
  const doc = parseSvg(source);
  const refs = findRemoteImages(doc);

  if (refs.length === 0) {
    return source;
  }

  const distinct = Array.from(new Set(refs.map((r) => r.href)));
  const settled = await Promise.allSettled(
    distinct.map(async (href) => toDataUri(await images.get(resolveRemoteHref(href)))),
  );

  const uris = new Map<string, string>();
  settled.forEach((result, i) => {
    const href = distinct[i];
    if (result.status === 'fulfilled') {
      uris.set(href, result.value);
      return;
    }
    const reason = result.reason;
    logger.warn(
      { url: reason instanceof FetchError ? reason.url : href, err: errorMessage(reason) },
      '[SvgInline] Image left as remote reference',
    );
  });

  for (const ref of refs) {
    const uri = uris.get(ref.href);
    if (!uri) continue;
    if (ref.xlink) {
      ref.element.setAttributeNS(XLINK_NS, 'xlink:href', uri);
    } else {
      ref.element.setAttribute('href', uri);
    }
  }

  return Buffer.from(new XMLSerializer().serializeToString(doc), 'utf8');
}
