/**
 * Extractor Module
 *
 * Turns a parsed product detail page into normalized product fields and
 * retrieves the gallery images.
 *
 * Every field is a named accessor over the parsed document that returns an
 * optional value. A missing marker never aborts extraction: the title falls
 * back to a sentinel and every other field becomes null, so partial records
 * are still produced.
 */

import type { DocumentFetcher, ParsedDocument } from '../fetcher/index.js';
import { getErrorMessage } from '../errors/index.js';
import { buildAssetPath, resolveUrl, trimString } from '../normalizer/index.js';
import { defaultLogger, defaultMetrics } from '../observability/index.js';
import type { AssetStore } from '../storage/index.js';
import type {
  LeafCategory,
  Logger,
  Metrics,
  ProductFields,
  ProductMarkers,
  SpecificationMap,
} from '../types/index.js';

/**
 * Title used when the title marker is absent
 */
export const MISSING_TITLE = 'No Title Found';

/**
 * Delimiter between multiple values of one specification label
 */
export const SPEC_VALUE_DELIMITER = ', ';

/**
 * Optional text fields of a product page
 */
export type TextField =
  | 'subtitle'
  | 'price'
  | 'oldPrice'
  | 'discountPercent'
  | 'description'
  | 'additionalDetails';

/**
 * Reads one field from a parsed document
 */
export type FieldAccessor = (document: ParsedDocument, markers: ProductMarkers) => string | null;

/**
 * Accessor reading the trimmed text of the first element matching a marker
 */
function textOf(selectMarker: (markers: ProductMarkers) => string): FieldAccessor {
  return (document, markers) => trimString(document.find(selectMarker(markers))?.text());
}

/**
 * Declarative field table: one accessor per optional text field
 */
export const PRODUCT_FIELD_ACCESSORS: Readonly<Record<TextField, FieldAccessor>> = {
  subtitle: textOf((markers) => markers.subtitle),
  price: textOf((markers) => markers.price),
  oldPrice: textOf((markers) => markers.oldPrice),
  discountPercent: textOf((markers) => markers.discountPercent),
  description: textOf((markers) => markers.description),
  additionalDetails: textOf((markers) => markers.additionalDetails),
};

/**
 * Title accessor with sentinel fallback
 */
export function extractTitle(document: ParsedDocument, markers: ProductMarkers): string {
  return trimString(document.find(markers.title)?.text()) ?? MISSING_TITLE;
}

/**
 * Build the specification map from label/value marker pairs in document order.
 * Items without a label are skipped; a repeated label keeps its first
 * position and takes the later values.
 */
export function extractSpecifications(
  document: ParsedDocument,
  markers: ProductMarkers
): SpecificationMap {
  const specifications = new Map<string, string>();
  const table = document.find(markers.specTable);
  if (!table) {
    return specifications;
  }

  for (const item of table.findAll(markers.specItem)) {
    const label = item.find(markers.specLabel);
    if (!label) {
      continue;
    }
    const values = item.findAll(markers.specValue).map((value) => value.text());
    specifications.set(label.text(), values.join(SPEC_VALUE_DELIMITER));
  }

  return specifications;
}

/**
 * Gallery image found on the page. Position is 1-based over every image
 * marker, including those without a usable source.
 */
export interface ImageSource {
  position: number;
  url: string | null;
}

/**
 * List gallery images in document order with resolved absolute URLs
 */
export function extractImageSources(
  document: ParsedDocument,
  markers: ProductMarkers,
  baseURL: string
): ImageSource[] {
  return document.findAll(markers.galleryImage).map((image, index) => ({
    position: index + 1,
    url: resolveUrl(image.attr(markers.imageSourceAttribute), baseURL),
  }));
}

/**
 * Extract every product field from a parsed detail page
 */
export function extractProductFields(
  document: ParsedDocument,
  markers: ProductMarkers
): ProductFields {
  const field = (name: TextField): string | null => PRODUCT_FIELD_ACCESSORS[name](document, markers);

  return {
    title: extractTitle(document, markers),
    subtitle: field('subtitle'),
    price: field('price'),
    oldPrice: field('oldPrice'),
    discountPercent: field('discountPercent'),
    description: field('description'),
    additionalDetails: field('additionalDetails'),
    specifications: extractSpecifications(document, markers),
  };
}

/**
 * Owner of downloaded assets
 */
export interface AssetTarget {
  category: Pick<LeafCategory, 'mainCategory' | 'subCategory' | 'nestedCategory'>;
  itemIdentity: string;
}

/**
 * Download gallery images and store them under the item folder.
 * A failed image is logged and skipped; the others keep their order.
 *
 * @returns Stored asset locations, in gallery order
 */
export async function downloadAssets(
  images: ImageSource[],
  target: AssetTarget,
  fetcher: DocumentFetcher,
  assetStore: AssetStore,
  logger: Logger = defaultLogger,
  metrics: Metrics = defaultMetrics
): Promise<string[]> {
  const saved: string[] = [];

  for (const image of images) {
    if (!image.url) {
      logger.debug('Skipping gallery image without a source', {
        itemIdentity: target.itemIdentity,
        position: image.position,
      });
      continue;
    }

    try {
      const bytes = await fetcher.fetchBinary(image.url);
      const location = await assetStore.writeAsset(
        buildAssetPath(target.category, target.itemIdentity, image.position),
        bytes
      );
      saved.push(location);
      metrics.increment('extractor.assets.saved');
      logger.debug('Image saved', { location });
    } catch (error) {
      metrics.increment('extractor.assets.failed');
      logger.warn('Failed to download image', {
        itemIdentity: target.itemIdentity,
        url: image.url,
        error: getErrorMessage(error),
      });
    }
  }

  return saved;
}
