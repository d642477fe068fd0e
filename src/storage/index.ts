/**
 * Storage Module
 *
 * Responsibilities:
 * - Define CatalogStore (structured store) and AssetStore (documents + images)
 * - Implement SqliteCatalogStore using better-sqlite3
 * - Implement FileSystemAssetStore and S3AssetStore using AWS SDK v3
 * - Implement memory stores for testing
 *
 * Write policies:
 * - CatalogStore inserts ignore conflicts: the first row for a key wins
 * - AssetStore writes overwrite: the last document for a path wins
 *
 * The `categories` table is unique on (main_category, sub_category) only, so
 * several leaf categories under the same sub-category share one row and the
 * URL of the first one inserted is kept.
 *
 * Asset paths use sanitized item identities, so identities that differ only
 * in replaced characters (`B/1` and `B_1`) share one folder: the store keeps
 * a row for each while the last document written replaces the other.
 */

import {
  S3Client,
  PutObjectCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import Database from 'better-sqlite3';
import { createHash } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, posix } from 'path';
import { z } from 'zod';
import { productKey } from '../normalizer/index.js';
import type { LeafCategory, ProductKey, ProductRecord } from '../types/index.js';

// ============================================================================
// Catalog Store
// ============================================================================

/**
 * Options applied when the store is opened for a run
 */
export interface StoreInitOptions {
  /** Drop and recreate the products table (default: true) */
  resetProducts?: boolean;
}

/**
 * Structured store handle. Owned by the process and passed to every
 * persistence call; all writes come from a single sequential caller.
 */
export interface CatalogStore {
  initialize(options?: StoreInitOptions): Promise<void>;
  /** @returns true when a new row was inserted */
  insertCategory(category: LeafCategory): Promise<boolean>;
  /** @returns true when a new row was inserted */
  insertProduct(record: ProductRecord): Promise<boolean>;
  findProduct(key: ProductKey): Promise<ProductRecord | null>;
  findCategoryUrl(mainCategory: string, subCategory: string): Promise<string | null>;
  countProducts(): Promise<number>;
  countCategories(): Promise<number>;
  close(): Promise<void>;
}

const CREATE_CATEGORIES_SQL = `
  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    main_category TEXT NOT NULL,
    sub_category TEXT NOT NULL,
    url TEXT,
    UNIQUE (main_category, sub_category)
  );`;

const DROP_PRODUCTS_SQL = 'DROP TABLE IF EXISTS products;';

const CREATE_PRODUCTS_SQL = `
  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    main_category TEXT NOT NULL,
    sub_category TEXT NOT NULL,
    nested_category TEXT NOT NULL,
    product_id TEXT NOT NULL,
    title TEXT,
    subtitle TEXT,
    price TEXT,
    old_price TEXT,
    discount TEXT,
    description TEXT,
    additional_details TEXT,
    specs TEXT,
    images TEXT,
    document_path TEXT,
    UNIQUE (main_category, sub_category, nested_category, product_id)
  );`;

const INSERT_CATEGORY_SQL = `
  INSERT OR IGNORE INTO categories (main_category, sub_category, url)
  VALUES (@mainCategory, @subCategory, @url);`;

const INSERT_PRODUCT_SQL = `
  INSERT OR IGNORE INTO products (
    main_category, sub_category, nested_category, product_id, title, subtitle,
    price, old_price, discount, description, additional_details, specs, images,
    document_path
  ) VALUES (
    @mainCategory, @subCategory, @nestedCategory, @itemIdentity, @title, @subtitle,
    @price, @oldPrice, @discountPercent, @description, @additionalDetails, @specs, @images,
    @documentPath
  );`;

const SELECT_PRODUCT_SQL = `
  SELECT * FROM products
  WHERE main_category = ? AND sub_category = ? AND nested_category = ? AND product_id = ?;`;

/**
 * Shape of a products row as read back from SQLite
 */
const ProductRowSchema = z.object({
  main_category: z.string(),
  sub_category: z.string(),
  nested_category: z.string(),
  product_id: z.string(),
  title: z.string().nullable(),
  subtitle: z.string().nullable(),
  price: z.string().nullable(),
  old_price: z.string().nullable(),
  discount: z.string().nullable(),
  description: z.string().nullable(),
  additional_details: z.string().nullable(),
  specs: z.string().nullable(),
  images: z.string().nullable(),
  document_path: z.string().nullable(),
});

/** Specifications are stored as [label, value] pairs to keep their order */
const SpecsSchema = z.array(z.tuple([z.string(), z.string()]));
const ImagesSchema = z.array(z.string());
const CountSchema = z.object({ total: z.number() });
const UrlSchema = z.object({ url: z.string().nullable() });

function rowToRecord(row: z.infer<typeof ProductRowSchema>): ProductRecord {
  return {
    mainCategory: row.main_category,
    subCategory: row.sub_category,
    nestedCategory: row.nested_category,
    itemIdentity: row.product_id,
    title: row.title ?? '',
    subtitle: row.subtitle,
    price: row.price,
    oldPrice: row.old_price,
    discountPercent: row.discount,
    description: row.description,
    additionalDetails: row.additional_details,
    specifications: new Map(row.specs ? SpecsSchema.parse(JSON.parse(row.specs)) : []),
    assetPaths: row.images ? ImagesSchema.parse(JSON.parse(row.images)) : [],
    documentPath: row.document_path ?? '',
  };
}

/**
 * SQLite implementation of CatalogStore using better-sqlite3
 */
export class SqliteCatalogStore implements CatalogStore {
  private db: Database.Database | null = null;

  /**
   * The database file is not created until the store is first used.
   *
   * @param filename - Database file, or ':memory:'
   */
  constructor(private readonly filename: string) {}

  private connection(): Database.Database {
    if (this.db === null) {
      this.db = new Database(this.filename);
    }
    return this.db;
  }

  /**
   * Create `categories` if absent; rebuild `products` when resetProducts is set
   */
  async initialize(options: StoreInitOptions = {}): Promise<void> {
    const resetProducts = options.resetProducts ?? true;
    const db = this.connection();
    const migrate = db.transaction(() => {
      db.exec(CREATE_CATEGORIES_SQL);
      if (resetProducts) {
        db.exec(DROP_PRODUCTS_SQL);
      }
      db.exec(CREATE_PRODUCTS_SQL);
    });
    migrate();
  }

  async insertCategory(category: LeafCategory): Promise<boolean> {
    const result = this.connection().prepare(INSERT_CATEGORY_SQL).run({
      mainCategory: category.mainCategory,
      subCategory: category.subCategory,
      url: category.sourceURL,
    });
    return result.changes > 0;
  }

  async insertProduct(record: ProductRecord): Promise<boolean> {
    const result = this.connection().prepare(INSERT_PRODUCT_SQL).run({
      mainCategory: record.mainCategory,
      subCategory: record.subCategory,
      nestedCategory: record.nestedCategory,
      itemIdentity: record.itemIdentity,
      title: record.title,
      subtitle: record.subtitle,
      price: record.price,
      oldPrice: record.oldPrice,
      discountPercent: record.discountPercent,
      description: record.description,
      additionalDetails: record.additionalDetails,
      specs: JSON.stringify(Array.from(record.specifications)),
      images: JSON.stringify(record.assetPaths),
      documentPath: record.documentPath,
    });
    return result.changes > 0;
  }

  async findProduct(key: ProductKey): Promise<ProductRecord | null> {
    const row: unknown = this.connection()
      .prepare(SELECT_PRODUCT_SQL)
      .get(key.mainCategory, key.subCategory, key.nestedCategory, key.itemIdentity);
    if (row === undefined) {
      return null;
    }
    return rowToRecord(ProductRowSchema.parse(row));
  }

  async findCategoryUrl(mainCategory: string, subCategory: string): Promise<string | null> {
    const row: unknown = this.connection()
      .prepare('SELECT url FROM categories WHERE main_category = ? AND sub_category = ?;')
      .get(mainCategory, subCategory);
    if (row === undefined) {
      return null;
    }
    return UrlSchema.parse(row).url;
  }

  async countProducts(): Promise<number> {
    return this.count('products');
  }

  async countCategories(): Promise<number> {
    return this.count('categories');
  }

  async close(): Promise<void> {
    if (this.db?.open) {
      this.db.close();
    }
    this.db = null;
  }

  private count(table: 'products' | 'categories'): number {
    const row: unknown = this.connection().prepare(`SELECT COUNT(*) AS total FROM ${table};`).get();
    return CountSchema.parse(row).total;
  }
}

/**
 * In-memory catalog store for testing and development
 *
 * Same insert-or-ignore semantics as SqliteCatalogStore.
 */
export class MemoryCatalogStore implements CatalogStore {
  private categories: Map<string, string> = new Map();
  private products: Map<string, ProductRecord> = new Map();

  async initialize(options: StoreInitOptions = {}): Promise<void> {
    if (options.resetProducts ?? true) {
      this.products.clear();
    }
  }

  async insertCategory(category: LeafCategory): Promise<boolean> {
    const key = JSON.stringify([category.mainCategory, category.subCategory]);
    if (this.categories.has(key)) {
      return false;
    }
    this.categories.set(key, category.sourceURL);
    return true;
  }

  async insertProduct(record: ProductRecord): Promise<boolean> {
    const key = productKey(record);
    if (this.products.has(key)) {
      return false;
    }
    this.products.set(key, record);
    return true;
  }

  async findProduct(key: ProductKey): Promise<ProductRecord | null> {
    return this.products.get(productKey(key)) ?? null;
  }

  async findCategoryUrl(mainCategory: string, subCategory: string): Promise<string | null> {
    return this.categories.get(JSON.stringify([mainCategory, subCategory])) ?? null;
  }

  async countProducts(): Promise<number> {
    return this.products.size;
  }

  async countCategories(): Promise<number> {
    return this.categories.size;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  /**
   * All stored products, in insertion order (useful for testing)
   */
  listProducts(): ProductRecord[] {
    return Array.from(this.products.values());
  }
}

// ============================================================================
// Asset Store
// ============================================================================

/**
 * Sink for per-item documents and downloaded images.
 * Paths are relative, POSIX-separated; writes overwrite.
 */
export interface AssetStore {
  /** @returns Location of the stored document */
  writeDocument(relativePath: string, content: string): Promise<string>;
  /** @returns Location of the stored asset */
  writeAsset(relativePath: string, content: Buffer): Promise<string>;
}

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

/**
 * Local filesystem asset store rooted at `assetsRoot`
 */
export class FileSystemAssetStore implements AssetStore {
  constructor(private readonly root: string) {}

  async writeDocument(relativePath: string, content: string): Promise<string> {
    return this.write(relativePath, content);
  }

  async writeAsset(relativePath: string, content: Buffer): Promise<string> {
    return this.write(relativePath, content);
  }

  private async write(relativePath: string, content: string | Buffer): Promise<string> {
    const target = join(this.root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    if (typeof content === 'string') {
      await writeFile(target, content, 'utf-8');
    } else {
      await writeFile(target, content);
    }
    return target;
  }
}

/**
 * S3 configuration for the asset store
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'assets') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

/**
 * The part of S3Client the asset store uses
 */
export interface ObjectPutClient {
  send(command: PutObjectCommand): Promise<unknown>;
}

/**
 * S3 implementation of AssetStore using AWS SDK v3
 *
 * Object keys mirror the filesystem layout under `prefix`.
 */
export class S3AssetStore implements AssetStore {
  private client: ObjectPutClient;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, client?: ObjectPutClient) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'assets';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = client ?? new S3Client(clientConfig);
  }

  /**
   * Object key for a relative path
   */
  getKey(relativePath: string): string {
    return posix.join(this.prefix, relativePath);
  }

  async writeDocument(relativePath: string, content: string): Promise<string> {
    return this.put(relativePath, content, 'application/json; charset=utf-8');
  }

  async writeAsset(relativePath: string, content: Buffer): Promise<string> {
    return this.put(relativePath, content, 'image/jpeg');
  }

  private async put(relativePath: string, content: string | Buffer, contentType: string): Promise<string> {
    const key = this.getKey(relativePath);

    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: content,
      ContentType: contentType,
      Metadata: {
        checksum: calculateChecksum(content),
        'created-at': new Date().toISOString(),
      },
    });

    await this.client.send(command);

    return `s3://${this.bucket}/${key}`;
  }
}

/**
 * In-memory asset store for testing and development
 */
export class MemoryAssetStore implements AssetStore {
  private store: Map<string, string | Buffer> = new Map();

  constructor(private readonly root: string = 'assets') {}

  async writeDocument(relativePath: string, content: string): Promise<string> {
    return this.write(relativePath, content);
  }

  async writeAsset(relativePath: string, content: Buffer): Promise<string> {
    return this.write(relativePath, content);
  }

  private write(relativePath: string, content: string | Buffer): string {
    const location = posix.join(this.root, relativePath);
    this.store.set(location, content);
    return location;
  }

  /**
   * Read a stored entry by location (useful for testing)
   */
  read(location: string): string | Buffer | undefined {
    return this.store.get(location);
  }

  /**
   * Get the number of stored entries (useful for testing)
   */
  size(): number {
    return this.store.size;
  }

  /**
   * Get all stored locations (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }

  /**
   * Clear all stored entries (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }
}

/**
 * Asset store selection, as found in the crawler configuration
 */
export type AssetStoreConfig =
  | { type: 'filesystem'; root: string }
  | ({ type: 's3' } & S3Config)
  | { type: 'memory'; root?: string };

/**
 * Factory function to create the configured asset store
 */
export function createAssetStore(config: AssetStoreConfig): AssetStore {
  switch (config.type) {
    case 'memory':
      return new MemoryAssetStore(config.root);
    case 's3':
      return new S3AssetStore(config);
    case 'filesystem':
      return new FileSystemAssetStore(config.root);
  }
}

// ============================================================================
// Canonical Document
// ============================================================================

/**
 * Serialize a record as the canonical per-item JSON document.
 * Non-ASCII text is written as-is.
 */
export function serializeProductDocument(record: Omit<ProductRecord, 'documentPath'>): string {
  const document = {
    product_id: record.itemIdentity,
    main_category: record.mainCategory,
    sub_category: record.subCategory,
    nested_category: record.nestedCategory,
    title: record.title,
    subtitle: record.subtitle,
    price: record.price,
    old_price: record.oldPrice,
    discount: record.discountPercent,
    description: record.description,
    specifications: Array.from(record.specifications, ([label, value]) => ({ label, value })),
    additional_details: record.additionalDetails,
    images: record.assetPaths,
  };
  return JSON.stringify(document, null, 4);
}
