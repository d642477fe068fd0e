/**
 * Normalizer Module
 *
 * Identity and normalization helpers shared by discovery, extraction and
 * persistence:
 * - Filesystem-safe names for category and item path segments
 * - Deterministic storage paths for per-item documents and assets
 * - Text trimming and relative URL resolution
 *
 * Storage layout (POSIX separators, relative to the asset root):
 * - <root>/<main>/<sub>/<nested>/<item>/<item>.json
 * - <root>/<main>/<sub>/<nested>/<item>/<item>_image_<n>.jpg
 */

import { posix } from 'path';
import type { LeafCategory, ProductKey } from '../types/index.js';

/**
 * Characters allowed in a path segment: word characters, hyphen, underscore,
 * the Arabic block and a plain space. Everything else becomes `_`.
 */
const UNSAFE_NAME_CHARS = /[^\w\-_\u0600-\u06FF ]/g;

/**
 * Replacement for every unsafe character
 */
const SAFE_REPLACEMENT = '_';

/**
 * Map a raw name to a filesystem-safe segment.
 * Total over any string and idempotent.
 */
export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_NAME_CHARS, SAFE_REPLACEMENT);
}

/**
 * Trim whitespace from string value, null when nothing is left
 */
export function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Resolve a possibly relative href against the base URL
 *
 * @returns Absolute URL, or null when the href cannot be resolved
 */
export function resolveUrl(href: string | null | undefined, baseURL: string): string | null {
  const trimmed = trimString(href);
  if (!trimmed) {
    return null;
  }
  try {
    return new URL(trimmed, baseURL).toString();
  } catch {
    return null;
  }
}

/**
 * Stable key of a leaf category triple
 */
export function leafKey(leaf: Pick<LeafCategory, 'mainCategory' | 'subCategory' | 'nestedCategory'>): string {
  return JSON.stringify([leaf.mainCategory, leaf.subCategory, leaf.nestedCategory]);
}

/**
 * Stable key of a product identity tuple
 */
export function productKey(key: ProductKey): string {
  return JSON.stringify([key.mainCategory, key.subCategory, key.nestedCategory, key.itemIdentity]);
}

/**
 * Relative folder of one item: <main>/<sub>/<nested>/<item>, each segment sanitized
 */
export function buildItemFolder(
  leaf: Pick<LeafCategory, 'mainCategory' | 'subCategory' | 'nestedCategory'>,
  itemIdentity: string
): string {
  return posix.join(
    sanitizeName(leaf.mainCategory),
    sanitizeName(leaf.subCategory),
    sanitizeName(leaf.nestedCategory),
    sanitizeName(itemIdentity)
  );
}

/**
 * Relative path of the canonical per-item document
 */
export function buildDocumentPath(
  leaf: Pick<LeafCategory, 'mainCategory' | 'subCategory' | 'nestedCategory'>,
  itemIdentity: string
): string {
  return posix.join(buildItemFolder(leaf, itemIdentity), `${sanitizeName(itemIdentity)}.json`);
}

/**
 * File name of the n-th gallery image (1-based)
 */
export function buildAssetFileName(itemIdentity: string, position: number): string {
  return `${sanitizeName(itemIdentity)}_image_${position}.jpg`;
}

/**
 * Relative path of the n-th gallery image (1-based)
 */
export function buildAssetPath(
  leaf: Pick<LeafCategory, 'mainCategory' | 'subCategory' | 'nestedCategory'>,
  itemIdentity: string,
  position: number
): string {
  return posix.join(buildItemFolder(leaf, itemIdentity), buildAssetFileName(itemIdentity, position));
}
