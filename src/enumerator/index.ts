/**
 * Enumerator Module
 *
 * Incremental, duplicate-aware discovery of the items of one leaf category on
 * an infinite-scroll listing page.
 *
 * Loop (bounded):
 * 1. Open one browsing session and navigate to the category
 * 2. Record the initial content extent
 * 3. Scroll to the bottom, wait for the settle delay, re-scan the cards
 * 4. Yield every card whose identity is non-empty and unseen
 * 5. Stop when the cap is reached, the extent did not change after a scroll,
 *    or the iteration ceiling is hit
 *
 * Items are yielded one at a time so the caller can process each item fully
 * before the next card is inspected. The session is always closed, including
 * when the consumer stops early; a failed close is logged, not thrown.
 */

import type { BrowserDriver, BrowserSession, SessionElement } from '../browser/index.js';
import { getErrorMessage } from '../errors/index.js';
import { resolveUrl, trimString } from '../normalizer/index.js';
import { defaultLogger, defaultMetrics } from '../observability/index.js';
import type { ItemRef, LeafCategory, ListingMarkers, Logger, Metrics } from '../types/index.js';

/**
 * Options for one enumeration
 */
export interface EnumerateOptions {
  /** Per-category cap (productsPerSubcategory) */
  limit: number;
  /** Listing page markers */
  markers: ListingMarkers;
  /** Base URL relative card links are resolved against */
  baseURL: string;
  /** Pause after each scroll in milliseconds (default: 3000) */
  settleDelayMs?: number;
  /** Hard ceiling on scroll iterations (default: 200) */
  maxScrollIterations?: number;
  /** Injectable pause, used by tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Why an enumeration loop stopped
 */
export type EnumerationStopReason = 'limit_reached' | 'no_new_content' | 'iteration_ceiling';

const DEFAULT_SETTLE_DELAY_MS = 3000;
const DEFAULT_MAX_SCROLL_ITERATIONS = 200;

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read identity and link of one card.
 * Returns null for cards without an identity or already seen.
 *
 * @throws SessionError when the card cannot be inspected
 */
async function inspectCard(
  card: SessionElement,
  seen: ReadonlySet<string>,
  markers: ListingMarkers,
  baseURL: string
): Promise<ItemRef | null> {
  const itemIdentity = trimString(await card.getAttribute(markers.cardIdentityAttribute));
  if (!itemIdentity || seen.has(itemIdentity)) {
    return null;
  }

  const link = await card.findElement(markers.cardLink);
  const detailURL = resolveUrl(await link.getAttribute(markers.cardLinkAttribute), baseURL);
  if (!detailURL) {
    return null;
  }

  return { itemIdentity, detailURL };
}

/**
 * Enumerate up to `limit` distinct items of a leaf category
 *
 * @param driver - Browser driver; one session is opened and closed per call
 * @param category - Leaf category to enumerate
 * @param options - Cap, markers and pacing
 */
export async function* enumerateItems(
  driver: BrowserDriver,
  category: LeafCategory,
  options: EnumerateOptions
): AsyncGenerator<ItemRef, EnumerationStopReason, undefined> {
  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const pause = options.sleep ?? sleep;
  const settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
  const maxIterations = options.maxScrollIterations ?? DEFAULT_MAX_SCROLL_ITERATIONS;
  const tags = { category: category.nestedCategory };

  const seen = new Set<string>();
  let count = 0;
  let stopReason: EnumerationStopReason = 'iteration_ceiling';

  if (options.limit <= 0) {
    return 'limit_reached';
  }

  const session: BrowserSession = await driver.openSession();

  try {
    await session.navigate(category.sourceURL);
    let lastExtent = await session.currentContentExtent();

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      logger.debug('Scroll iteration', {
        mainCategory: category.mainCategory,
        subCategory: category.subCategory,
        nestedCategory: category.nestedCategory,
        iteration,
      });

      await session.scrollToBottom();
      await pause(settleDelayMs);

      const cards = await session.findElements(options.markers.card);
      logger.debug('Cards rendered', { count: cards.length, iteration });
      metrics.gauge('enumerator.cards.rendered', cards.length, tags);

      for (const card of cards) {
        if (count >= options.limit) {
          break;
        }

        let item: ItemRef | null;
        try {
          item = await inspectCard(card, seen, options.markers, options.baseURL);
        } catch (error) {
          logger.warn('Skipping card that could not be inspected', {
            nestedCategory: category.nestedCategory,
            error: getErrorMessage(error),
          });
          metrics.increment('enumerator.cards.failed', tags);
          continue;
        }

        if (!item) {
          continue;
        }

        seen.add(item.itemIdentity);
        count++;
        metrics.increment('enumerator.items.discovered', tags);
        yield item;
      }

      if (count >= options.limit) {
        stopReason = 'limit_reached';
        break;
      }

      const extent = await session.currentContentExtent();
      if (extent === lastExtent) {
        logger.info('No more products to load', {
          nestedCategory: category.nestedCategory,
          discovered: count,
        });
        stopReason = 'no_new_content';
        break;
      }
      lastExtent = extent;
    }

    if (stopReason === 'iteration_ceiling') {
      logger.warn('Scroll iteration ceiling reached', {
        nestedCategory: category.nestedCategory,
        maxIterations,
        discovered: count,
      });
    }

    return stopReason;
  } finally {
    try {
      await session.close();
    } catch (error) {
      logger.warn('Failed to close browsing session', {
        nestedCategory: category.nestedCategory,
        error: getErrorMessage(error),
      });
    }
  }
}

/**
 * Drain an enumeration into an array
 */
export async function collectItems(
  driver: BrowserDriver,
  category: LeafCategory,
  options: EnumerateOptions
): Promise<ItemRef[]> {
  const items: ItemRef[] = [];
  for await (const item of enumerateItems(driver, category, options)) {
    items.push(item);
  }
  return items;
}
