import Bottleneck from 'bottleneck';
import type { Logger } from 'pino';
import type { PageMetadata, PageMetadataInput } from '../types/index.js';
import { basicMetadata, pageMetadataSchema } from '../types/index.js';
import { FetchTimeoutError, describeError } from '../errors.js';

/** Content-fetch collaborator: fetches a page and reports what it found. */
export interface MetadataSource {
  fetch(url: string): Promise<Omit<PageMetadataInput, 'url'>>;
}

export interface FetcherOptions {
  timeoutMs: number;
  maxConcurrent: number;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  timeoutMs: 2000,
  maxConcurrent: 3
};

/**
 * Caps concurrent fetches and bounds how long a caller waits, queue time included. On
 * timeout, overflow or source failure the caller gets neutral metadata for the URL.
 */
export class BoundedMetadataFetcher {
  private limiter: Bottleneck;

  constructor(
    private readonly source: MetadataSource | undefined,
    private readonly options: FetcherOptions,
    private readonly logger: Logger
  ) {
    this.limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrent,
      highWater: options.maxConcurrent * 10,
      strategy: Bottleneck.strategy.OVERFLOW
    });
  }

  get enabled(): boolean {
    return this.source !== undefined;
  }

  async fetch(url: string): Promise<PageMetadata> {
    const source = this.source;
    if (!source) return basicMetadata(url);

    const job = this.limiter.schedule({ expiration: this.options.timeoutMs }, () => source.fetch(url));

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new FetchTimeoutError(url, this.options.timeoutMs)), this.options.timeoutMs);
    });

    try {
      const found = await Promise.race([job, deadline]);
      return pageMetadataSchema.parse({ ...found, url });
    } catch (err) {
      this.logger.warn({ url, err: describeError(err) }, 'Metadata fetch degraded to basic metadata');
      return basicMetadata(url);
    } finally {
      clearTimeout(timer);
    }
  }

  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}
