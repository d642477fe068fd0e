/**
 * Unit tests for the Extractor Module
 */

import { describe, test, expect } from '@jest/globals';
import { DEFAULT_MARKERS } from '../../src/config/index.js';
import {
  MISSING_TITLE,
  PRODUCT_FIELD_ACCESSORS,
  downloadAssets,
  extractImageSources,
  extractProductFields,
  extractSpecifications,
  extractTitle,
} from '../../src/extractor/index.js';
import { parseHtml } from '../../src/fetcher/index.js';
import { MemoryAssetStore } from '../../src/storage/index.js';
import {
  createMockLogger,
  createMockMetrics,
  FakeDocumentFetcher,
  productPageHtml,
} from '../helpers/fakes.js';

const BASE_URL = 'https://shop.example';
const markers = DEFAULT_MARKERS.product;

const target = {
  category: { mainCategory: 'Men', subCategory: 'Shirts', nestedCategory: 'Casual' },
  itemIdentity: 'P1',
};

describe('Extractor Module', () => {
  describe('extractProductFields()', () => {
    test('should extract every field of a complete page', () => {
      const document = parseHtml(
        productPageHtml({
          title: '  Linen Shirt ',
          subtitle: 'Linen Shirt EN',
          price: '1,290,000',
          oldPrice: '1,590,000',
          discount: '19%',
          description: 'Breathable linen.',
          additionalDetails: 'Machine wash cold.',
          specs: [
            ['Material', ['Linen']],
            ['Colors', ['White', 'Blue']],
          ],
        })
      );

      expect(extractProductFields(document, markers)).toEqual({
        title: 'Linen Shirt',
        subtitle: 'Linen Shirt EN',
        price: '1,290,000',
        oldPrice: '1,590,000',
        discountPercent: '19%',
        description: 'Breathable linen.',
        additionalDetails: 'Machine wash cold.',
        specifications: new Map([
          ['Material', 'Linen'],
          ['Colors', 'White, Blue'],
        ]),
      });
    });

    test('should yield the sentinel title and nulls for a page missing every field', () => {
      const document = parseHtml(productPageHtml());

      expect(extractProductFields(document, markers)).toEqual({
        title: MISSING_TITLE,
        subtitle: null,
        price: null,
        oldPrice: null,
        discountPercent: null,
        description: null,
        additionalDetails: null,
        specifications: new Map(),
      });
    });

    test('should treat an empty title as missing', () => {
      const document = parseHtml(productPageHtml({ title: '   ' }));

      expect(extractTitle(document, markers)).toBe('No Title Found');
    });

    test('should expose one accessor per optional field', () => {
      const document = parseHtml(productPageHtml({ price: '99' }));

      expect(Object.keys(PRODUCT_FIELD_ACCESSORS)).toEqual([
        'subtitle',
        'price',
        'oldPrice',
        'discountPercent',
        'description',
        'additionalDetails',
      ]);
      expect(PRODUCT_FIELD_ACCESSORS.price(document, markers)).toBe('99');
      expect(PRODUCT_FIELD_ACCESSORS.description(document, markers)).toBeNull();
    });
  });

  describe('extractSpecifications()', () => {
    test('should keep document order and join multiple values', () => {
      const document = parseHtml(
        productPageHtml({
          specs: [
            ['Size', ['S', 'M', 'L']],
            ['Fit', ['Regular']],
          ],
        })
      );

      const specifications = extractSpecifications(document, markers);

      expect(Array.from(specifications)).toEqual([
        ['Size', 'S, M, L'],
        ['Fit', 'Regular'],
      ]);
    });

    test('should skip items without a label', () => {
      const document = parseHtml(
        productPageHtml({
          specs: [
            [null, ['orphan']],
            ['Fit', ['Slim']],
          ],
        })
      );

      expect(Array.from(extractSpecifications(document, markers))).toEqual([['Fit', 'Slim']]);
    });

    test('should keep a label with no values as an empty string', () => {
      const document = parseHtml(productPageHtml({ specs: [['Care', []]] }));

      expect(Array.from(extractSpecifications(document, markers))).toEqual([['Care', '']]);
    });

    test('should let a repeated label take the later values', () => {
      const document = parseHtml(
        productPageHtml({
          specs: [
            ['Color', ['Red']],
            ['Fit', ['Slim']],
            ['Color', ['Blue']],
          ],
        })
      );

      expect(Array.from(extractSpecifications(document, markers))).toEqual([
        ['Color', 'Blue'],
        ['Fit', 'Slim'],
      ]);
    });

    test('should keep integer-like and reserved labels in document order', () => {
      const document = parseHtml(
        productPageHtml({
          specs: [
            ['Size', ['M']],
            ['2024', ['yes']],
            ['__proto__', ['x']],
          ],
        })
      );

      expect(Array.from(extractSpecifications(document, markers).keys())).toEqual([
        'Size',
        '2024',
        '__proto__',
      ]);
    });
  });

  describe('extractImageSources()', () => {
    test('should resolve sources in order with 1-based positions', () => {
      const document = parseHtml(
        productPageHtml({ images: ['/img/1.jpg', null, 'https://cdn.example/3.jpg'] })
      );

      expect(extractImageSources(document, markers, BASE_URL)).toEqual([
        { position: 1, url: 'https://shop.example/img/1.jpg' },
        { position: 2, url: null },
        { position: 3, url: 'https://cdn.example/3.jpg' },
      ]);
    });
  });

  describe('downloadAssets()', () => {
    test('should save every image under positional names', async () => {
      const fetcher = new FakeDocumentFetcher(
        {},
        {
          'https://shop.example/img/1.jpg': Buffer.from('one'),
          'https://shop.example/img/2.jpg': Buffer.from('two'),
        }
      );
      const assets = new MemoryAssetStore();

      const saved = await downloadAssets(
        [
          { position: 1, url: 'https://shop.example/img/1.jpg' },
          { position: 2, url: 'https://shop.example/img/2.jpg' },
        ],
        target,
        fetcher,
        assets,
        createMockLogger()
      );

      expect(saved).toEqual([
        'assets/Men/Shirts/Casual/P1/P1_image_1.jpg',
        'assets/Men/Shirts/Casual/P1/P1_image_2.jpg',
      ]);
      expect(assets.read('assets/Men/Shirts/Casual/P1/P1_image_2.jpg')).toEqual(Buffer.from('two'));
    });

    test('should skip a failed image and keep the others in order', async () => {
      const fetcher = new FakeDocumentFetcher(
        {},
        {
          'https://shop.example/img/1.jpg': Buffer.from('one'),
          'https://shop.example/img/3.jpg': Buffer.from('three'),
        }
      );
      const assets = new MemoryAssetStore();
      const logger = createMockLogger();
      const metrics = createMockMetrics();

      const saved = await downloadAssets(
        [
          { position: 1, url: 'https://shop.example/img/1.jpg' },
          { position: 2, url: 'https://shop.example/img/2.jpg' },
          { position: 3, url: 'https://shop.example/img/3.jpg' },
        ],
        target,
        fetcher,
        assets,
        logger,
        metrics
      );

      expect(saved).toEqual([
        'assets/Men/Shirts/Casual/P1/P1_image_1.jpg',
        'assets/Men/Shirts/Casual/P1/P1_image_3.jpg',
      ]);
      expect(assets.size()).toBe(2);
      expect(logger.calls.warn).toHaveLength(1);
      expect(logger.calls.warn[0]?.[0]).toBe('Failed to download image');
      expect(logger.calls.warn[0]?.[1]?.url).toBe('https://shop.example/img/2.jpg');
      expect(metrics.counters['extractor.assets.saved']).toBe(2);
      expect(metrics.counters['extractor.assets.failed']).toBe(1);
    });

    test('should skip images without a source without fetching', async () => {
      const fetcher = new FakeDocumentFetcher();

      const saved = await downloadAssets(
        [{ position: 1, url: null }],
        target,
        fetcher,
        new MemoryAssetStore(),
        createMockLogger()
      );

      expect(saved).toEqual([]);
      expect(fetcher.requested).toEqual([]);
    });
  });
});
