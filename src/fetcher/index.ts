/**
 * Fetcher Module
 *
 * HTTP fetch-and-parse capability used by category discovery and product
 * extraction. Pages are fetched with axios and parsed with cheerio behind a
 * small parser-neutral interface, so extraction logic only sees
 * `ParsedDocument` / `DocumentNode` and can run against any parser.
 *
 * Every network or non-2xx failure surfaces as a RetrievalError.
 */

import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import type { CheerioAPI, Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { RetrievalError, getErrorMessage } from '../errors/index.js';

// ============================================================================
// Parsed Document Capability
// ============================================================================

/**
 * One element of a parsed document
 */
export interface DocumentNode {
  /** First descendant matching the marker, or null */
  find(marker: string): DocumentNode | null;
  /** All descendants matching the marker, in document order */
  findAll(marker: string): DocumentNode[];
  /** Trimmed text content */
  text(): string;
  /** Attribute value, or null when absent */
  attr(name: string): string | null;
}

/**
 * A parsed document; searches start at the document root
 */
export interface ParsedDocument {
  find(marker: string): DocumentNode | null;
  findAll(marker: string): DocumentNode[];
}

/**
 * Fetch-and-parse capability
 */
export interface DocumentFetcher {
  fetchDocument(url: string): Promise<ParsedDocument>;
  fetchBinary(url: string): Promise<Buffer>;
}

class CheerioNode implements DocumentNode {
  constructor(
    private readonly $: CheerioAPI,
    private readonly selection: Cheerio<Element>
  ) {}

  find(marker: string): DocumentNode | null {
    const found = this.selection.find(marker).first();
    return found.length > 0 ? new CheerioNode(this.$, found) : null;
  }

  findAll(marker: string): DocumentNode[] {
    return this.selection
      .find(marker)
      .toArray()
      .map((element) => new CheerioNode(this.$, this.$(element)));
  }

  text(): string {
    return this.selection.text().trim();
  }

  attr(name: string): string | null {
    return this.selection.attr(name) ?? null;
  }
}

/**
 * ParsedDocument backed by cheerio
 */
export class CheerioDocument implements ParsedDocument {
  private readonly $: CheerioAPI;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  find(marker: string): DocumentNode | null {
    const found = this.$.root().find(marker).first();
    return found.length > 0 ? new CheerioNode(this.$, found) : null;
  }

  findAll(marker: string): DocumentNode[] {
    return this.$.root()
      .find(marker)
      .toArray()
      .map((element) => new CheerioNode(this.$, this.$(element)));
  }
}

/**
 * Parse an HTML string
 */
export function parseHtml(html: string): ParsedDocument {
  return new CheerioDocument(html);
}

// ============================================================================
// HTTP Fetcher
// ============================================================================

/**
 * Configuration for the HTTP fetcher
 */
export interface HttpFetcherConfig {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** User-Agent header */
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Convert any axios failure into a RetrievalError
 */
function toRetrievalError(url: string, error: unknown): RetrievalError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const message = status !== null ? `HTTP ${status}` : error.message;
    return new RetrievalError(url, message, status, error);
  }
  return new RetrievalError(url, getErrorMessage(error), null, error);
}

/**
 * DocumentFetcher over axios + cheerio
 */
export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly client: AxiosInstance;

  constructor(config: HttpFetcherConfig = {}, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        timeout: config.timeout ?? 30000,
        headers: {
          'User-Agent': config.userAgent ?? DEFAULT_USER_AGENT,
        },
      });
  }

  /**
   * Fetch a page as UTF-8 text and parse it
   *
   * @throws RetrievalError on network failure or non-2xx status
   */
  async fetchDocument(url: string): Promise<ParsedDocument> {
    try {
      const response = await this.client.get<string>(url, {
        responseType: 'text',
        responseEncoding: 'utf8',
      });
      return parseHtml(response.data);
    } catch (error) {
      throw toRetrievalError(url, error);
    }
  }

  /**
   * Fetch raw bytes (images)
   *
   * @throws RetrievalError on network failure or non-2xx status
   */
  async fetchBinary(url: string): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
      });
      return Buffer.from(response.data);
    } catch (error) {
      throw toRetrievalError(url, error);
    }
  }
}
