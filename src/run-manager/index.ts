/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Own the lifecycle of one crawl run as an explicit state machine
 * - Gate every write behind operator confirmation
 * - Track the phase of each leaf category while the crawl runs
 *
 * Transitions:
 *   idle -> discovering -> awaiting_confirmation -> running -> completed
 *                                                \-> aborted
 *
 * Discovery only reads the root page. Nothing is written to the catalog store
 * or the asset store before `confirm()` accepted an affirmative answer and
 * `execute()` was called, so an aborted run leaves no trace.
 *
 * Usage:
 * ```typescript
 * const run = new CrawlRun(deps);
 * const tree = await run.discover();
 * if (run.confirm(answer)) {
 *   const summary = await run.execute();
 * }
 * ```
 */

import { discoverCategories, flattenCategories } from '../discovery/index.js';
import { RunStateError } from '../errors/index.js';
import { defaultLogger } from '../observability/index.js';
import { crawlCatalog, type PipelineDeps } from '../pipeline/index.js';
import { leafKey } from '../normalizer/index.js';
import type {
  CategoryPhase,
  CategoryTree,
  CrawlSummary,
  LeafCategory,
  NavigationMarkers,
} from '../types/index.js';

/**
 * Lifecycle of a run
 */
export type RunStatus =
  | 'idle'
  | 'discovering'
  | 'awaiting_confirmation'
  | 'running'
  | 'completed'
  | 'aborted'
  | 'failed';

/**
 * Collaborators of a run: everything the pipeline needs plus discovery
 * settings and the store reset policy
 */
export interface CrawlRunDeps extends Omit<PipelineDeps, 'onPhaseChange'> {
  navigationMarkers?: NavigationMarkers;
  /** Drop the products table when the run starts (default: true) */
  resetProductsOnStart?: boolean;
}

/**
 * True for the trimmed, case-insensitive answer "yes"
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}

/**
 * One crawl run
 */
export class CrawlRun {
  private currentStatus: RunStatus = 'idle';
  private tree: CategoryTree | null = null;
  private leaves: LeafCategory[] = [];
  private readonly phases = new Map<string, CategoryPhase>();

  constructor(private readonly deps: CrawlRunDeps) {}

  get status(): RunStatus {
    return this.currentStatus;
  }

  /**
   * Discovered tree, once discovery has completed
   */
  get categoryTree(): CategoryTree | null {
    return this.tree;
  }

  /**
   * Leaf categories in crawl order
   */
  get categories(): readonly LeafCategory[] {
    return this.leaves;
  }

  /**
   * Phase of each leaf category, keyed by leafKey()
   */
  get categoryPhases(): ReadonlyMap<string, CategoryPhase> {
    return this.phases;
  }

  /**
   * Fetch and parse the navigation menu; moves to awaiting_confirmation
   *
   * @throws RunStateError when called outside idle
   * @throws RetrievalError when the root page cannot be fetched
   */
  async discover(): Promise<CategoryTree> {
    this.assertStatus('idle', 'discover');
    this.currentStatus = 'discovering';

    const logger = this.deps.logger ?? defaultLogger;
    const markers = this.deps.navigationMarkers ?? this.deps.markers.navigation;

    try {
      const tree = await discoverCategories(this.deps.fetcher, this.deps.baseURL, markers, logger);
      this.tree = tree;
      this.leaves = flattenCategories(tree);
      for (const leaf of this.leaves) {
        this.phases.set(leafKey(leaf), 'pending');
      }
      this.currentStatus = 'awaiting_confirmation';
      return tree;
    } catch (error) {
      this.currentStatus = 'failed';
      throw error;
    }
  }

  /**
   * Apply the operator's answer. Anything but "yes" aborts the run.
   *
   * @returns true when the run may be executed
   * @throws RunStateError when no discovery is awaiting confirmation
   */
  confirm(answer: string): boolean {
    this.assertStatus('awaiting_confirmation', 'confirm');
    const logger = this.deps.logger ?? defaultLogger;

    if (!isAffirmative(answer)) {
      this.currentStatus = 'aborted';
      logger.info('Crawling aborted by operator');
      return false;
    }

    this.currentStatus = 'running';
    logger.info('Crawling confirmed', { categories: this.leaves.length });
    return true;
  }

  /**
   * Prepare the store and crawl every discovered leaf category
   *
   * @throws RunStateError unless the run was confirmed
   */
  async execute(): Promise<CrawlSummary> {
    this.assertStatus('running', 'execute');
    const logger = this.deps.logger ?? defaultLogger;

    try {
      await this.deps.store.initialize({
        resetProducts: this.deps.resetProductsOnStart ?? true,
      });

      const summary = await crawlCatalog(this.leaves, {
        ...this.deps,
        onPhaseChange: (category, phase) => {
          this.phases.set(leafKey(category), phase);
        },
      });

      this.currentStatus = 'completed';
      logger.info('Crawl completed', { ...summary.totals });
      return summary;
    } catch (error) {
      this.currentStatus = 'failed';
      throw error;
    }
  }

  private assertStatus(expected: RunStatus, operation: string): void {
    if (this.currentStatus !== expected) {
      throw new RunStateError(
        `Cannot ${operation} while run is ${this.currentStatus} (expected ${expected})`
      );
    }
  }
}
