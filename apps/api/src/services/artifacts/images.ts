import type { ImageReference } from '@radar/shared';
import { errorMessage, log } from '../logging';
import { USER_AGENT } from '../search/http';

/** Formats vision-capable chat models accept inline. */
const SUPPORTED_MIME_TYPES = new Set(['image/png', 'image/jpeg', 'image/gif', 'image/webp']);

/**
 * Download an image and inline it as a data URL.
 * Returns null for non-OK responses and unsupported formats (SVG badges, HTML error pages).
 */
export async function fetchImageAsDataUrl(url: string, timeoutMs = 15000): Promise<ImageReference | null> {
  const response = await fetch(url, {
    headers: { 'User-Agent': USER_AGENT },
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) return null;

  const mimeType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
  if (!SUPPORTED_MIME_TYPES.has(mimeType)) return null;

  const bytes = Buffer.from(await response.arrayBuffer());
  return { url: `data:${mimeType};base64,${bytes.toString('base64')}` };
}

/** Sequentially download until `maxImages` succeed; individual failures are skipped. */
export async function collectImages(urls: readonly string[], maxImages: number, timeoutMs?: number): Promise<ImageReference[]> {
  const images: ImageReference[] = [];
  for (const url of urls) {
    if (images.length >= maxImages) break;
    try {
      const image = await fetchImageAsDataUrl(url, timeoutMs);
      if (image) images.push(image);
    } catch (error) {
      log({ level: 'debug', component: 'Images', message: `Skipping ${url}: ${errorMessage(error)}` });
    }
  }
  return images;
}
