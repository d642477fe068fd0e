#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * 1. Load configuration (invalid configuration exits before any request)
 * 2. Discover and print the category tree
 * 3. Ask the operator for confirmation
 * 4. Crawl every leaf category and print the summary
 */

import inquirer from 'inquirer';
import { PlaywrightBrowserDriver } from './browser/index.js';
import { loadConfig, type CrawlerConfig } from './config/index.js';
import { ConfigurationError, getErrorMessage } from './errors/index.js';
import { HttpDocumentFetcher } from './fetcher/index.js';
import { createConsoleLogger } from './observability/index.js';
import { renderCategoryTree, renderRunSummary } from './renderers/index.js';
import { CrawlRun } from './run-manager/index.js';
import {
  SqliteCatalogStore,
  createAssetStore,
  type AssetStoreConfig,
} from './storage/index.js';

const logger = createConsoleLogger('cli');

function assetStoreConfig(config: CrawlerConfig): AssetStoreConfig {
  if (config.storage.type === 's3') {
    return config.storage;
  }
  return { type: 'filesystem', root: config.assetsRoot };
}

async function askConfirmation(): Promise<string> {
  const { answer } = await inquirer.prompt<{ answer: string }>({
    name: 'answer',
    type: 'input',
    message: 'Do you want to start crawling these categories? (yes/no)',
  });
  return answer;
}

async function main(): Promise<number> {
  let config: CrawlerConfig;
  try {
    config = await loadConfig(process.argv[2]);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Configuration error', { error: error.message });
      return 2;
    }
    throw error;
  }

  const fetcher = new HttpDocumentFetcher({ timeout: config.requestTimeoutMs });
  const browser = new PlaywrightBrowserDriver({ headless: config.headless }, logger);
  const store = new SqliteCatalogStore(config.databasePath);
  const assets = createAssetStore(assetStoreConfig(config));

  const run = new CrawlRun({
    fetcher,
    browser,
    store,
    assets,
    markers: config.markers,
    baseURL: config.baseURL,
    productsPerSubcategory: config.productsPerSubcategory,
    settleDelayMs: config.settleDelayMs,
    maxScrollIterations: config.maxScrollIterations,
    resetProductsOnStart: config.resetProductsOnStart,
    logger,
  });

  try {
    const tree = await run.discover();
    console.log(renderCategoryTree(tree));
    console.log();

    if (!run.confirm(await askConfirmation())) {
      console.log('Aborting crawler.');
      return 0;
    }

    const summary = await run.execute();
    console.log();
    console.log(renderRunSummary(summary));
    return 0;
  } finally {
    await browser.close();
    await store.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Crawler failed', { error: getErrorMessage(error) });
    process.exitCode = 1;
  });
