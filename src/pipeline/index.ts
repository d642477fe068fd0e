/**
 * Pipeline Module
 *
 * Drives one crawl, sequentially:
 * for each leaf category -> enumerate items -> for each item: fetch the
 * detail page, extract fields, download images, write the canonical
 * document, insert the product row.
 *
 * Failures are contained at the smallest unit: one image, one item, one
 * category. Nothing raised while processing an item stops the enumeration of
 * the remaining items or categories.
 */

import type { BrowserDriver } from '../browser/index.js';
import { enumerateItems } from '../enumerator/index.js';
import { getErrorMessage } from '../errors/index.js';
import {
  downloadAssets,
  extractImageSources,
  extractProductFields,
} from '../extractor/index.js';
import type { DocumentFetcher } from '../fetcher/index.js';
import { buildDocumentPath } from '../normalizer/index.js';
import { defaultLogger, defaultMetrics } from '../observability/index.js';
import {
  serializeProductDocument,
  type AssetStore,
  type CatalogStore,
} from '../storage/index.js';
import type {
  CategoryCrawlResult,
  CategoryPhase,
  CrawlSummary,
  ItemRef,
  LeafCategory,
  Logger,
  Metrics,
  ProductRecord,
  SiteMarkers,
} from '../types/index.js';

/**
 * Collaborators and settings of a crawl
 */
export interface PipelineDeps {
  fetcher: DocumentFetcher;
  browser: BrowserDriver;
  store: CatalogStore;
  assets: AssetStore;
  markers: SiteMarkers;
  baseURL: string;
  productsPerSubcategory: number;
  settleDelayMs?: number;
  maxScrollIterations?: number;
  /** Injectable pause, used by tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called on every per-category phase change */
  onPhaseChange?: (category: LeafCategory, phase: CategoryPhase) => void;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Outcome of processing one item
 */
export interface ItemResult {
  record: ProductRecord;
  inserted: boolean;
}

/**
 * Fetch, extract and persist one item
 *
 * @throws RetrievalError when the detail page cannot be fetched
 */
export async function processItem(
  category: LeafCategory,
  item: ItemRef,
  deps: PipelineDeps
): Promise<ItemResult> {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;

  const document = await deps.fetcher.fetchDocument(item.detailURL);
  const fields = extractProductFields(document, deps.markers.product);
  const images = extractImageSources(document, deps.markers.product, deps.baseURL);

  const assetPaths = await downloadAssets(
    images,
    { category, itemIdentity: item.itemIdentity },
    deps.fetcher,
    deps.assets,
    logger,
    metrics
  );

  const relativeDocumentPath = buildDocumentPath(category, item.itemIdentity);

  const content: Omit<ProductRecord, 'documentPath'> = {
    mainCategory: category.mainCategory,
    subCategory: category.subCategory,
    nestedCategory: category.nestedCategory,
    itemIdentity: item.itemIdentity,
    ...fields,
    assetPaths,
  };

  const documentPath = await deps.assets.writeDocument(
    relativeDocumentPath,
    serializeProductDocument(content)
  );
  const record: ProductRecord = { ...content, documentPath };

  const inserted = await deps.store.insertProduct(record);

  logger.info('Product extracted', {
    itemIdentity: item.itemIdentity,
    title: record.title,
    images: assetPaths.length,
    inserted,
  });

  return { record, inserted };
}

/**
 * Crawl one leaf category: pending -> enumerating -> extracting* -> done
 */
export async function crawlCategory(
  category: LeafCategory,
  deps: PipelineDeps
): Promise<CategoryCrawlResult> {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const setPhase = (phase: CategoryPhase): void => deps.onPhaseChange?.(category, phase);
  const startTime = Date.now();
  const tags = { category: category.nestedCategory };

  const result: CategoryCrawlResult = {
    category,
    enumerated: 0,
    extracted: 0,
    inserted: 0,
    failed: 0,
    durationMs: 0,
  };

  setPhase('pending');

  logger.info('Crawling category', {
    mainCategory: category.mainCategory,
    subCategory: category.subCategory,
    nestedCategory: category.nestedCategory,
    url: category.sourceURL,
  });

  try {
    await deps.store.insertCategory(category);

    setPhase('enumerating');

    const items = enumerateItems(deps.browser, category, {
      limit: deps.productsPerSubcategory,
      markers: deps.markers.listing,
      baseURL: deps.baseURL,
      settleDelayMs: deps.settleDelayMs,
      maxScrollIterations: deps.maxScrollIterations,
      sleep: deps.sleep,
      logger,
      metrics,
    });

    for await (const item of items) {
      result.enumerated++;
      setPhase('extracting');

      try {
        const { inserted } = await processItem(category, item, deps);
        result.extracted++;
        if (inserted) {
          result.inserted++;
        }
        metrics.increment('pipeline.items.extracted', tags);
      } catch (error) {
        result.failed++;
        metrics.increment('pipeline.items.failed', tags);
        logger.error('Error processing product', {
          itemIdentity: item.itemIdentity,
          url: item.detailURL,
          error: getErrorMessage(error),
        });
      }

      setPhase('enumerating');
    }
  } catch (error) {
    result.error = getErrorMessage(error);
    metrics.increment('pipeline.categories.failed', tags);
    logger.error('Category crawl failed', {
      nestedCategory: category.nestedCategory,
      url: category.sourceURL,
      error: result.error,
    });
  }

  result.durationMs = Date.now() - startTime;
  setPhase('done');

  metrics.timing('pipeline.category.duration', result.durationMs, tags);
  logger.info('Finished crawling category', {
    nestedCategory: category.nestedCategory,
    extracted: result.extracted,
    failed: result.failed,
  });

  return result;
}

/**
 * Crawl every leaf category, one after another
 */
export async function crawlCatalog(
  categories: LeafCategory[],
  deps: PipelineDeps
): Promise<CrawlSummary> {
  const startedAt = new Date().toISOString();
  const results: CategoryCrawlResult[] = [];

  for (const category of categories) {
    results.push(await crawlCategory(category, deps));
  }

  const totals = results.reduce(
    (acc, result) => ({
      enumerated: acc.enumerated + result.enumerated,
      extracted: acc.extracted + result.extracted,
      inserted: acc.inserted + result.inserted,
      failed: acc.failed + result.failed,
    }),
    { enumerated: 0, extracted: 0, inserted: 0, failed: 0 }
  );

  return {
    startedAt,
    completedAt: new Date().toISOString(),
    categories: results,
    totals,
  };
}
