import type { StoredImage } from './persistence';

const IMAGE_EXT = /\.(jpg|jpeg|png|gif|webp|bmp|avif)$/i;
const JSON_EXT = /\.json$/i;

export function isImageFile(file: File): boolean {
  return file.type.startsWith('image/') || IMAGE_EXT.test(file.name);
}

export function isProjectFile(file: File): boolean {
  return file.type === 'application/json' || JSON_EXT.test(file.name);
}

export async function toStoredImage(file: File): Promise<StoredImage> {
  return { name: file.name, type: file.type || 'application/octet-stream', bytes: await file.arrayBuffer() };
}

/** Natural pixel size of an image; marks are placed in these coordinates. */
export function imageSize(url: string): Promise<{ width: number; height: number }> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve({ width: img.naturalWidth, height: img.naturalHeight });
    img.onerror = () => reject(new Error(`Could not decode image ${url}`));
    img.src = url;
  });
}

export function objectUrlFor(image: StoredImage): string {
  return URL.createObjectURL(new Blob([image.bytes], { type: image.type }));
}

export function downloadBytes(fileName: string, bytes: Uint8Array | string, type: string): void {
  const part = typeof bytes === 'string' ? bytes : bytes.slice();
  const url = URL.createObjectURL(new Blob([part], { type }));
  const a = document.createElement('a');
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}
