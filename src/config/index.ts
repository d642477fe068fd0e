/**
 * Config Module
 *
 * Loads the crawler configuration from a JSON file and validates it with zod.
 * Only `baseURL` and `productsPerSubcategory` are required; everything else
 * has a default. Any problem raises ConfigurationError before the crawler
 * touches the network.
 *
 * Usage:
 * ```typescript
 * const config = await loadConfig('config.json');
 * ```
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import type { SiteMarkers } from '../types/index.js';

/**
 * Markers of the reference storefront layout
 */
export const DEFAULT_MARKERS: SiteMarkers = {
  navigation: {
    mainItem: 'li.c-header__supercat',
    mainLink: 'a.c-header__supercat-link',
    subItem: 'li.c-mega-menu__tab',
    subTitle: 'div.c-mega-menu__tab-title',
    leafLink: 'a.c-mega-menu__link',
  },
  listing: {
    card: '.cp-card--product-card',
    cardIdentityAttribute: 'data-product-id',
    cardLink: '.c-product-card__image-container',
    cardLinkAttribute: 'href',
  },
  product: {
    title: 'h3.c-product-page__features-subtitle',
    subtitle: '.c-product__title-en',
    price: 'div.c-product-page__selling-price.js-selling-price',
    oldPrice: 'del.c-product-page__rrp-price.js-rrp-price',
    discountPercent: 'span.js-discount-percent-value',
    description: 'div.c-product-page__features-description',
    additionalDetails: 'div.c-product-page__features-content',
    specTable: 'ul.c-product__specs-table',
    specItem: 'li.c-product__specs-table-item',
    specLabel: 'div.c-product__specs-table-item-title',
    specValue: 'div.c-product__specs-table-value',
    galleryImage: 'img.c-product-page__gallery-image',
    imageSourceAttribute: 'src',
  },
};

const MarkersSchema = z
  .object({
    navigation: z
      .object({
        mainItem: z.string().min(1),
        mainLink: z.string().min(1),
        subItem: z.string().min(1),
        subTitle: z.string().min(1),
        leafLink: z.string().min(1),
      })
      .partial()
      .default({}),
    listing: z
      .object({
        card: z.string().min(1),
        cardIdentityAttribute: z.string().min(1),
        cardLink: z.string().min(1),
        cardLinkAttribute: z.string().min(1),
      })
      .partial()
      .default({}),
    product: z
      .object({
        title: z.string().min(1),
        subtitle: z.string().min(1),
        price: z.string().min(1),
        oldPrice: z.string().min(1),
        discountPercent: z.string().min(1),
        description: z.string().min(1),
        additionalDetails: z.string().min(1),
        specTable: z.string().min(1),
        specItem: z.string().min(1),
        specLabel: z.string().min(1),
        specValue: z.string().min(1),
        galleryImage: z.string().min(1),
        imageSourceAttribute: z.string().min(1),
      })
      .partial()
      .default({}),
  })
  .default({});

const StorageSchema = z
  .discriminatedUnion('type', [
    z.object({
      type: z.literal('filesystem'),
    }),
    z.object({
      type: z.literal('s3'),
      bucket: z.string().min(1),
      region: z.string().optional(),
      prefix: z.string().optional(),
      endpoint: z.string().url().optional(),
      forcePathStyle: z.boolean().optional(),
    }),
  ])
  .default({ type: 'filesystem' });

/**
 * Zod schema for the configuration file
 */
export const CrawlerConfigSchema = z.object({
  baseURL: z.string().url(),
  productsPerSubcategory: z.number().int().positive(),
  databasePath: z.string().min(1).default('products.db'),
  assetsRoot: z.string().min(1).default('assets'),
  settleDelayMs: z.number().int().nonnegative().default(3000),
  maxScrollIterations: z.number().int().positive().default(200),
  requestTimeoutMs: z.number().int().positive().default(30000),
  resetProductsOnStart: z.boolean().default(true),
  headless: z.boolean().default(true),
  storage: StorageSchema,
  markers: MarkersSchema,
});

export type StorageConfig = z.infer<typeof StorageSchema>;

/**
 * Resolved configuration with all defaults applied
 */
export interface CrawlerConfig extends Omit<z.infer<typeof CrawlerConfigSchema>, 'markers'> {
  markers: SiteMarkers;
}

/**
 * Default configuration file location
 */
export const DEFAULT_CONFIG_PATH = 'config.json';

/**
 * Validate a raw configuration object and apply defaults
 *
 * @throws ConfigurationError listing every invalid or missing key
 */
export function resolveConfig(raw: unknown): CrawlerConfig {
  const parsed = CrawlerConfigSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const { markers, ...rest } = parsed.data;

  return {
    ...rest,
    markers: {
      navigation: { ...DEFAULT_MARKERS.navigation, ...markers.navigation },
      listing: { ...DEFAULT_MARKERS.listing, ...markers.listing },
      product: { ...DEFAULT_MARKERS.product, ...markers.product },
    },
  };
}

/**
 * Load and validate the configuration file
 *
 * @param path - JSON file path (defaults to CRAWLER_CONFIG or config.json)
 */
export async function loadConfig(
  path: string = process.env.CRAWLER_CONFIG || DEFAULT_CONFIG_PATH
): Promise<CrawlerConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${path}`, [getErrorMessage(error)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON`, [
      getErrorMessage(error),
    ]);
  }

  return resolveConfig(raw);
}
