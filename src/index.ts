/**
 * Catalog Crawler - Main Entry Point
 *
 * Crawls a retail catalog: discovers the category tree from the navigation
 * menu, enumerates the items of every leaf category on its infinite-scroll
 * listing, extracts each item's detail page and persists the result to a
 * SQLite store, a per-item JSON document and image files.
 *
 * Architecture:
 * - Each module is usable on its own; the CLI wires them together
 * - Network, browser and storage sit behind interfaces so tests run in-process
 * - Structured writes insert-or-ignore; document writes overwrite
 */

// Core Types
export type * from './types/index.js';

// Errors
export {
  CrawlerError,
  RetrievalError,
  SessionError,
  ConfigurationError,
  RunStateError,
  getErrorMessage,
  type CrawlerErrorCode,
} from './errors/index.js';

// Observability
export {
  createConsoleLogger,
  defaultLogger,
  defaultMetrics,
  type LogLevel,
} from './observability/index.js';

// Configuration
export {
  DEFAULT_MARKERS,
  DEFAULT_CONFIG_PATH,
  CrawlerConfigSchema,
  resolveConfig,
  loadConfig,
  type CrawlerConfig,
  type StorageConfig,
} from './config/index.js';

// Normalizer Module - names, URLs and storage paths
export {
  sanitizeName,
  trimString,
  resolveUrl,
  leafKey,
  productKey,
  buildItemFolder,
  buildDocumentPath,
  buildAssetFileName,
  buildAssetPath,
} from './normalizer/index.js';

// Fetcher Module - static pages and binaries
export {
  CheerioDocument,
  HttpDocumentFetcher,
  parseHtml,
  type DocumentNode,
  type ParsedDocument,
  type DocumentFetcher,
  type HttpFetcherConfig,
} from './fetcher/index.js';

// Browser Module - scripted sessions for infinite-scroll listings
export {
  PlaywrightBrowserDriver,
  type SessionElement,
  type BrowserSession,
  type BrowserDriver,
  type PlaywrightDriverConfig,
} from './browser/index.js';

// Discovery Module
export {
  parseCategories,
  flattenCategories,
  countCategories,
  categoryTreeFromObject,
  discoverCategories,
  type CategoryCounts,
} from './discovery/index.js';

// Enumerator Module
export {
  enumerateItems,
  collectItems,
  type EnumerateOptions,
  type EnumerationStopReason,
} from './enumerator/index.js';

// Extractor Module
export {
  MISSING_TITLE,
  SPEC_VALUE_DELIMITER,
  PRODUCT_FIELD_ACCESSORS,
  extractTitle,
  extractSpecifications,
  extractImageSources,
  extractProductFields,
  downloadAssets,
  type TextField,
  type FieldAccessor,
  type ImageSource,
  type AssetTarget,
} from './extractor/index.js';

// Storage Module - catalog rows, documents and assets
export {
  SqliteCatalogStore,
  MemoryCatalogStore,
  FileSystemAssetStore,
  S3AssetStore,
  MemoryAssetStore,
  createAssetStore,
  serializeProductDocument,
  type StoreInitOptions,
  type CatalogStore,
  type AssetStore,
  type S3Config,
  type AssetStoreConfig,
} from './storage/index.js';

// Pipeline Module
export {
  processItem,
  crawlCategory,
  crawlCatalog,
  type PipelineDeps,
  type ItemResult,
} from './pipeline/index.js';

// Run Manager Module - confirmation-gated run lifecycle
export {
  CrawlRun,
  isAffirmative,
  type RunStatus,
  type CrawlRunDeps,
} from './run-manager/index.js';

// Renderers Module
export { renderCategoryTree, renderRunSummary } from './renderers/index.js';

/**
 * Module Boundaries:
 *
 * 1. discovery - navigation menu -> CategoryTree (pure parse + one fetch)
 * 2. enumerator - leaf category -> distinct ItemRefs (scripted session)
 * 3. extractor - detail page -> ProductFields + downloaded images
 * 4. storage - CatalogStore rows, AssetStore documents and images
 * 5. pipeline - sequential crawl with per-item and per-category containment
 * 6. run-manager - discover -> confirm -> execute
 * 7. renderers - operator console output
 */
