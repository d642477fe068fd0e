/**
 * Core type definitions for the catalog crawler
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Category Tree
// ============================================================================

/**
 * A node of the navigation tree.
 * `nestedCategory` and `sourceURL` are only present on leaf nodes.
 */
export interface CategoryNode {
  readonly mainCategory: string;
  readonly subCategory: string;
  readonly nestedCategory?: string;
  readonly sourceURL?: string;
}

/**
 * Third-level category, the unit the enumerator works on
 */
export interface LeafCategory extends CategoryNode {
  readonly nestedCategory: string;
  readonly sourceURL: string;
}

/**
 * Leaf link as found under a sub-category in the navigation menu
 */
export interface LeafLink {
  readonly name: string;
  readonly url: string;
}

/**
 * Ordered mapping main -> sub -> leaf links, in navigation order
 */
export type CategoryTree = Map<string, Map<string, LeafLink[]>>;

// ============================================================================
// Items and Records
// ============================================================================

/**
 * Site-assigned identity of one catalog entry plus its detail page
 */
export interface ItemRef {
  readonly itemIdentity: string;
  readonly detailURL: string;
}

/**
 * Label -> joined value text, in document order. Any label is kept as-is,
 * including integer-like ones.
 */
export type SpecificationMap = ReadonlyMap<string, string>;

/**
 * Fields read from a product detail page.
 * Absent markers resolve to null; title falls back to a sentinel.
 */
export interface ProductFields {
  readonly title: string;
  readonly subtitle: string | null;
  readonly price: string | null;
  readonly oldPrice: string | null;
  readonly discountPercent: string | null;
  readonly description: string | null;
  readonly additionalDetails: string | null;
  readonly specifications: SpecificationMap;
}

/**
 * Normalized product record.
 * (mainCategory, subCategory, nestedCategory, itemIdentity) is the idempotency key.
 */
export interface ProductRecord extends ProductFields {
  readonly mainCategory: string;
  readonly subCategory: string;
  readonly nestedCategory: string;
  readonly itemIdentity: string;
  readonly assetPaths: readonly string[];
  readonly documentPath: string;
}

/**
 * Identity tuple of a product row
 */
export type ProductKey = Pick<
  ProductRecord,
  'mainCategory' | 'subCategory' | 'nestedCategory' | 'itemIdentity'
>;

// ============================================================================
// Site Markers
// ============================================================================

/**
 * Structural markers of the navigation menu
 */
export interface NavigationMarkers {
  mainItem: string;
  mainLink: string;
  subItem: string;
  subTitle: string;
  leafLink: string;
}

/**
 * Structural markers of a category listing page
 */
export interface ListingMarkers {
  card: string;
  cardIdentityAttribute: string;
  cardLink: string;
  cardLinkAttribute: string;
}

/**
 * Structural markers of a product detail page
 */
export interface ProductMarkers {
  title: string;
  subtitle: string;
  price: string;
  oldPrice: string;
  discountPercent: string;
  description: string;
  additionalDetails: string;
  specTable: string;
  specItem: string;
  specLabel: string;
  specValue: string;
  galleryImage: string;
  imageSourceAttribute: string;
}

export interface SiteMarkers {
  navigation: NavigationMarkers;
  listing: ListingMarkers;
  product: ProductMarkers;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// ============================================================================
// Crawl Results
// ============================================================================

/**
 * Per-category lifecycle
 */
export type CategoryPhase = 'pending' | 'enumerating' | 'extracting' | 'done';

/**
 * Outcome of crawling one leaf category
 */
export interface CategoryCrawlResult {
  category: LeafCategory;
  enumerated: number;
  extracted: number;
  inserted: number;
  failed: number;
  durationMs: number;
  error?: string;
}

/**
 * Outcome of a whole run
 */
export interface CrawlSummary {
  startedAt: string;
  completedAt: string;
  categories: CategoryCrawlResult[];
  totals: {
    enumerated: number;
    extracted: number;
    inserted: number;
    failed: number;
  };
}
