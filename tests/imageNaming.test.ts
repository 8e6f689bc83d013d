import { describe, expect, it } from 'vitest';
import {
  classifyProductImages,
  getProductImageDir,
  getStagedImageName,
  isProductDirectoryName,
  normalizeBasePath,
  orderedImageNames,
  parseStagedImageIndex,
  sanitizeProductName
} from '../src/imageNaming.js';

describe('imageNaming', () => {
  it('splits the product id into one directory per digit', () => {
    expect(getProductImageDir('/img/p/', 123)).toBe('/img/p/1/2/3/');
    expect(getProductImageDir('/img/p', '7')).toBe('/img/p/7/');
    expect(getProductImageDir('/shop/img/p/', '40')).toBe('/shop/img/p/4/0/');
  });

  it('rejects product ids that are not decimal numbers', () => {
    expect(() => getProductImageDir('/img/p/', '12a')).toThrow('Product id must be a decimal number, got "12a"');
  });

  it('normalizes the base path to end with a slash', () => {
    expect(normalizeBasePath('/img/p')).toBe('/img/p/');
    expect(normalizeBasePath('/img/p/')).toBe('/img/p/');
    expect(normalizeBasePath('  ')).toBe('/');
  });

  it('classifies main and additional images with a numeric sort', () => {
    const images = classifyProductImages('5', ['5.jpg', '5-2.jpg', '5-1.jpg', '6.jpg']);
    expect(images).toEqual({ mainImage: '5.jpg', additionalImages: ['5-1.jpg', '5-2.jpg'] });
  });

  it('sorts image 10 after image 2', () => {
    const images = classifyProductImages(8, ['8-10.jpg', '8-2.jpg', '8-1.jpg']);
    expect(images.mainImage).toBeNull();
    expect(images.additionalImages).toEqual(['8-1.jpg', '8-2.jpg', '8-10.jpg']);
  });

  it('ignores other products, thumbnails, zero suffixes and non-jpg files', () => {
    const images = classifyProductImages('12', [
      '12.png',
      '12-home_default.jpg',
      '12-0.jpg',
      '120.jpg',
      '1-12.jpg',
      '12.JPG',
      'index.php',
      '12-3.jpg'
    ]);
    expect(images).toEqual({ mainImage: null, additionalImages: ['12-3.jpg'] });
  });

  it('orders the main image first', () => {
    expect(orderedImageNames({ mainImage: '5.jpg', additionalImages: ['5-1.jpg', '5-2.jpg'] })).toEqual([
      '5.jpg',
      '5-1.jpg',
      '5-2.jpg'
    ]);
    expect(orderedImageNames({ mainImage: null, additionalImages: ['5-1.jpg'] })).toEqual(['5-1.jpg']);
  });

  it('recognizes product directories', () => {
    expect(isProductDirectoryName('42')).toBe(true);
    expect(isProductDirectoryName('index.php')).toBe(false);
    expect(isProductDirectoryName('4a')).toBe(false);
    expect(isProductDirectoryName('')).toBe(false);
  });

  it('removes filesystem-reserved characters from names', () => {
    expect(sanitizeProductName('Chair: "Deluxe" <Oak/Walnut> | 50% off?*\\')).toBe('Chair Deluxe OakWalnut  50% off');
  });

  it('sanitizes idempotently', () => {
    for (const name of ['a/b\\c', 'Lamp <Big>?', 'plain name', '::||']) {
      const once = sanitizeProductName(name);
      expect(sanitizeProductName(once)).toBe(once);
    }
  });

  it('builds and parses staged image names', () => {
    expect(getStagedImageName('Lamp (Big)', 3)).toBe('Lamp (Big)-3.jpg');
    expect(parseStagedImageIndex('Lamp (Big)', 'Lamp (Big)-3.jpg')).toBe(3);
    expect(parseStagedImageIndex('Lamp (Big)', 'Lamp (Big)-x.jpg')).toBeNull();
    expect(parseStagedImageIndex('Lamp', 'Lamp (Big)-3.jpg')).toBeNull();
    expect(parseStagedImageIndex('Lamp', 'Lamp-0.jpg')).toBeNull();
  });
});
