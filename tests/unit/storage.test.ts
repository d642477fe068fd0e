/**
 * Unit tests for the Storage Module
 * Tests catalog stores (SQLite in memory and Map-backed) and asset stores
 */

import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileSystemAssetStore,
  MemoryAssetStore,
  MemoryCatalogStore,
  S3AssetStore,
  SqliteCatalogStore,
  createAssetStore,
  serializeProductDocument,
  type CatalogStore,
} from '../../src/storage/index.js';
import type { LeafCategory, ProductRecord } from '../../src/types/index.js';

const leaf: LeafCategory = {
  mainCategory: 'Men',
  subCategory: 'Shirts',
  nestedCategory: 'Casual',
  sourceURL: 'https://x/casual',
};

const createRecord = (overrides: Partial<ProductRecord> = {}): ProductRecord => ({
  mainCategory: 'Men',
  subCategory: 'Shirts',
  nestedCategory: 'Casual',
  itemIdentity: 'P1',
  title: 'Linen Shirt',
  subtitle: null,
  price: '1,290,000',
  oldPrice: null,
  discountPercent: null,
  description: 'Breathable linen.',
  additionalDetails: null,
  specifications: new Map([
    ['Material', 'Linen'],
    ['Colors', 'White, Blue'],
  ]),
  assetPaths: ['assets/Men/Shirts/Casual/P1/P1_image_1.jpg'],
  documentPath: 'assets/Men/Shirts/Casual/P1/P1.json',
  ...overrides,
});

const catalogStores: Array<[string, () => CatalogStore]> = [
  ['SqliteCatalogStore', () => new SqliteCatalogStore(':memory:')],
  ['MemoryCatalogStore', () => new MemoryCatalogStore()],
];

describe('Storage Module', () => {
  describe.each(catalogStores)('%s', (_name, createStore) => {
    let store: CatalogStore;

    beforeEach(async () => {
      store = createStore();
      await store.initialize();
    });

    afterEach(async () => {
      await store.close();
    });

    test('should insert a product once and ignore the duplicate', async () => {
      expect(await store.insertProduct(createRecord())).toBe(true);
      expect(await store.insertProduct(createRecord({ title: 'Changed' }))).toBe(false);

      expect(await store.countProducts()).toBe(1);
      const stored = await store.findProduct(createRecord());
      expect(stored?.title).toBe('Linen Shirt');
    });

    test('should round-trip every product field', async () => {
      const record = createRecord();
      await store.insertProduct(record);

      expect(await store.findProduct(record)).toEqual(record);
    });

    test('should read specifications back in insertion order', async () => {
      const record = createRecord({
        specifications: new Map([
          ['Size', 'M'],
          ['2024', 'yes'],
        ]),
      });
      await store.insertProduct(record);

      const stored = await store.findProduct(record);
      expect(Array.from(stored?.specifications ?? [])).toEqual([
        ['Size', 'M'],
        ['2024', 'yes'],
      ]);
    });

    test('should treat the same item under another leaf as a new product', async () => {
      await store.insertProduct(createRecord());
      const inserted = await store.insertProduct(createRecord({ nestedCategory: 'Formal' }));

      expect(inserted).toBe(true);
      expect(await store.countProducts()).toBe(2);
    });

    test('should return null for an unknown product', async () => {
      expect(await store.findProduct({ ...leaf, itemIdentity: 'missing' })).toBeNull();
    });

    test('should keep the first URL of leaves sharing a main and sub category', async () => {
      expect(await store.insertCategory(leaf)).toBe(true);
      expect(
        await store.insertCategory({ ...leaf, nestedCategory: 'Formal', sourceURL: 'https://x/formal' })
      ).toBe(false);

      expect(await store.countCategories()).toBe(1);
      expect(await store.findCategoryUrl('Men', 'Shirts')).toBe('https://x/casual');
    });

    test('should drop products but keep categories when reset', async () => {
      await store.insertCategory(leaf);
      await store.insertProduct(createRecord());

      await store.initialize({ resetProducts: true });

      expect(await store.countProducts()).toBe(0);
      expect(await store.countCategories()).toBe(1);
    });

    test('should keep products when initialized without reset', async () => {
      await store.insertProduct(createRecord());

      await store.initialize({ resetProducts: false });

      expect(await store.countProducts()).toBe(1);
    });
  });

  describe('SqliteCatalogStore', () => {
    test('should store an empty specification map and no images', async () => {
      const store = new SqliteCatalogStore(':memory:');
      await store.initialize();
      const record = createRecord({ specifications: new Map(), assetPaths: [], title: 'No Title Found' });

      await store.insertProduct(record);

      expect(await store.findProduct(record)).toEqual(record);
      await store.close();
    });

    test('should not create the database file until first used', async () => {
      const root = await mkdtemp(join(tmpdir(), 'crawler-db-'));
      const filename = join(root, 'products.db');
      try {
        const store = new SqliteCatalogStore(filename);
        await store.close();
        expect(await readdir(root)).toEqual([]);

        const opened = new SqliteCatalogStore(filename);
        await opened.initialize();
        await opened.close();
        expect(await readdir(root)).toEqual(['products.db']);
      } finally {
        await rm(root, { recursive: true, force: true });
      }
    });

    test('should allow close to be called twice', async () => {
      const store = new SqliteCatalogStore(':memory:');
      await store.close();
      await expect(store.close()).resolves.toBeUndefined();
    });
  });

  describe('MemoryAssetStore', () => {
    test('should overwrite a document written twice', async () => {
      const assets = new MemoryAssetStore();

      await assets.writeDocument('Men/P1/P1.json', '{"v":1}');
      const location = await assets.writeDocument('Men/P1/P1.json', '{"v":2}');

      expect(location).toBe('assets/Men/P1/P1.json');
      expect(assets.size()).toBe(1);
      expect(assets.read(location)).toBe('{"v":2}');
    });
  });

  describe('FileSystemAssetStore', () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'crawler-assets-'));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    test('should create the directory chain and overwrite documents', async () => {
      const assets = new FileSystemAssetStore(root);

      await assets.writeDocument('Men/Shirts/Casual/P1/P1.json', 'first');
      const location = await assets.writeDocument('Men/Shirts/Casual/P1/P1.json', 'second');

      expect(location).toBe(join(root, 'Men/Shirts/Casual/P1/P1.json'));
      expect(await readFile(location, 'utf-8')).toBe('second');
    });

    test('should write binary assets unchanged', async () => {
      const assets = new FileSystemAssetStore(root);
      const bytes = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

      const location = await assets.writeAsset('Men/P1/P1_image_1.jpg', bytes);

      expect(await readFile(location)).toEqual(bytes);
    });
  });

  describe('S3AssetStore', () => {
    test('should put objects under the prefix and return their URI', async () => {
      const sent: PutObjectCommand[] = [];
      const client = {
        send: jest.fn(async (command: PutObjectCommand) => {
          sent.push(command);
          return {};
        }),
      };
      const assets = new S3AssetStore({ bucket: 'test-bucket', prefix: 'catalog' }, client);

      const location = await assets.writeDocument('Men/P1/P1.json', '{}');

      expect(location).toBe('s3://test-bucket/catalog/Men/P1/P1.json');
      expect(client.send).toHaveBeenCalledTimes(1);
      expect(sent[0]).toBeInstanceOf(PutObjectCommand);
      expect(sent[0]?.input.Bucket).toBe('test-bucket');
      expect(sent[0]?.input.Key).toBe('catalog/Men/P1/P1.json');
      expect(sent[0]?.input.ContentType).toBe('application/json; charset=utf-8');
      expect(sent[0]?.input.Metadata?.checksum).toBe('99914b932bd37a50b983c5e7c90ae93b');
    });

    test('should default the prefix to assets', () => {
      const assets = new S3AssetStore({ bucket: 'test-bucket' }, new S3Client({ region: 'us-east-1' }));

      expect(assets.getKey('Men/P1/P1_image_1.jpg')).toBe('assets/Men/P1/P1_image_1.jpg');
    });
  });

  describe('createAssetStore()', () => {
    test('should create the configured store', () => {
      expect(createAssetStore({ type: 'memory' })).toBeInstanceOf(MemoryAssetStore);
      expect(createAssetStore({ type: 'filesystem', root: 'assets' })).toBeInstanceOf(FileSystemAssetStore);
      expect(createAssetStore({ type: 's3', bucket: 'test-bucket' })).toBeInstanceOf(S3AssetStore);
    });
  });

  describe('serializeProductDocument()', () => {
    test('should write snake_case keys with four-space indentation', () => {
      const json = serializeProductDocument(createRecord({ title: 'پیراهن' }));

      expect(JSON.parse(json)).toEqual({
        product_id: 'P1',
        main_category: 'Men',
        sub_category: 'Shirts',
        nested_category: 'Casual',
        title: 'پیراهن',
        subtitle: null,
        price: '1,290,000',
        old_price: null,
        discount: null,
        description: 'Breathable linen.',
        specifications: [
          { label: 'Material', value: 'Linen' },
          { label: 'Colors', value: 'White, Blue' },
        ],
        additional_details: null,
        images: ['assets/Men/Shirts/Casual/P1/P1_image_1.jpg'],
      });
      expect(json.split('\n')[1]).toBe('    "product_id": "P1",');
      expect(json).toContain('"title": "پیراهن"');
    });
  });
});
