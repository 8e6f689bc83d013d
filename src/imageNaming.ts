import type { RemoteImageSet } from './types.js';

const PRODUCT_DIR_REGEX = /^\d+$/;
const RESERVED_CHARS_REGEX = /[\\/*?:"<>|]/g;

export function normalizeBasePath(basePath: string): string {
  const trimmed = basePath.trim();
  if (trimmed === '') {
    return '/';
  }
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

export function isProductDirectoryName(name: string): boolean {
  return PRODUCT_DIR_REGEX.test(name);
}

/**
 * PrestaShop stores product images one digit per directory level:
 * product 123 lives in `<base>/1/2/3/`.
 */
export function getProductImageDir(basePath: string, productId: string | number): string {
  const id = String(productId).trim();
  if (!isProductDirectoryName(id)) {
    throw new Error(`Product id must be a decimal number, got "${id}"`);
  }
  return `${normalizeBasePath(basePath)}${id.split('').join('/')}/`;
}

export function classifyProductImages(productId: string | number, fileNames: string[]): RemoteImageSet {
  const id = String(productId).trim();
  const mainName = `${id}.jpg`;
  const additionalRegex = new RegExp(`^${id}-(\\d+)\\.jpg$`);

  let mainImage: string | null = null;
  const additional: { name: string; position: number }[] = [];

  for (const fileName of fileNames) {
    if (!fileName.endsWith('.jpg')) {
      continue;
    }
    if (fileName === mainName) {
      mainImage = fileName;
      continue;
    }
    const match = fileName.match(additionalRegex);
    if (!match) {
      continue;
    }
    const position = Number.parseInt(match[1], 10);
    if (position > 0) {
      additional.push({ name: fileName, position });
    }
  }

  additional.sort((a, b) => a.position - b.position || a.name.localeCompare(b.name));

  return {
    mainImage,
    additionalImages: additional.map(item => item.name)
  };
}

/** Main image first, then the additional images in their numeric order. */
export function orderedImageNames(images: RemoteImageSet): string[] {
  return images.mainImage ? [images.mainImage, ...images.additionalImages] : [...images.additionalImages];
}

export function sanitizeProductName(name: string): string {
  return name.replace(RESERVED_CHARS_REGEX, '');
}

export function getStagedImageName(productName: string, index: number): string {
  return `${productName}-${index}.jpg`;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function parseStagedImageIndex(productName: string, fileName: string): number | null {
  const match = fileName.match(new RegExp(`^${escapeRegex(productName)}-(\\d+)\\.jpg$`));
  if (!match) {
    return null;
  }
  const index = Number.parseInt(match[1], 10);
  return index > 0 ? index : null;
}
