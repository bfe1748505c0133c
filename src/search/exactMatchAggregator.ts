import { API_CONFIG } from '../config';
import type { PagedFetchClient } from '../client/searchClient';
import { RemoteApiError, ValidationError } from '../errors';
import { containsExactQuery } from '../text/normalizer';
import type {
  AggregationStopReason,
  BlogSort,
  PageRequest,
  PageResult,
  PagedEndpoint,
  SearchItemByEndpoint
} from '../types';

export interface ExactMatchRequest extends PageRequest {
  query: string;
  sort: BlogSort;
}

export interface ExactMatchAggregatorOptions {
  /** Raw items fetched per call; also the largest page size accepted. */
  blockSize?: number;
  /** Highest raw offset the backend accepts. */
  startMax?: number;
}

function assertPositiveInteger(field: string, value: number, max?: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(field, `${field} must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw new ValidationError(field, `${field} must be at most ${max}`);
  }
}

/**
 * Serves pages of items whose markup-free title or description contains the
 * query verbatim, on top of a backend that only paginates unfiltered results.
 *
 * Each call probes raw blocks from offset 1 until it holds one match more than
 * the requested page needs (so `hasNext` is known), the backend runs dry, or the
 * offset cap is reached. Nothing is kept between calls; repeated blocks are
 * absorbed by the fetch client's cache.
 */
export class ExactMatchAggregator {
  private readonly client: PagedFetchClient;
  private readonly blockSize: number;
  private readonly startMax: number;

  constructor(client: PagedFetchClient, options: ExactMatchAggregatorOptions = {}) {
    this.client = client;
    this.blockSize = options.blockSize ?? API_CONFIG.blockSize;
    this.startMax = options.startMax ?? API_CONFIG.startMax;
  }

  async aggregate<E extends PagedEndpoint>(
    endpoint: E,
    request: ExactMatchRequest
  ): Promise<PageResult<SearchItemByEndpoint[E]>> {
    const { query, sort, pageSize, pageIndex } = request;
    assertPositiveInteger('pageSize', pageSize, this.blockSize);
    assertPositiveInteger('pageIndex', pageIndex);

    const neededMatches = pageIndex * pageSize + 1;
    const matched: Array<SearchItemByEndpoint[E]> = [];
    let stopReason: AggregationStopReason = 'cap-reached';

    for (let start = 1; start <= this.startMax; start += this.blockSize) {
      let items: Array<SearchItemByEndpoint[E]>;
      try {
        const response = await this.client.search(endpoint, { query, start, display: this.blockSize, sort });
        items = response.items;
      } catch (error) {
        if (!(error instanceof RemoteApiError)) throw error;
        console.warn(
          { endpoint, start, statusCode: error.statusCode, matched: matched.length },
          'Exact-match probe cut short by a remote failure'
        );
        stopReason = 'remote-error';
        break;
      }

      if (items.length === 0) {
        stopReason = 'exhausted';
        break;
      }

      for (const item of items) {
        if (!containsExactQuery(query, item)) continue;
        matched.push(item);
        if (matched.length >= neededMatches) break;
      }

      if (matched.length >= neededMatches) {
        stopReason = 'enough-matches';
        break;
      }
      if (items.length < this.blockSize) {
        stopReason = 'exhausted';
        break;
      }
    }

    const pageStart = (pageIndex - 1) * pageSize;
    const pageEnd = pageIndex * pageSize;

    return {
      items: matched.slice(pageStart, pageEnd),
      hasNext: matched.length > pageEnd,
      matchedCount: matched.length,
      truncated: stopReason === 'remote-error',
      stopReason
    };
  }
}
