import { AxiosInstance } from 'axios';
import { RetryPolicy } from '../../config/audit.config';
import { logger } from '../../utils/logger';
import { ProgressReporter, silentReporter } from '../../utils/console-reporter';
import { PageBody, pageBodySchema, getNextLink } from '../../validation/audit-payload.schemas';
import {
  MalformedPayloadError,
  PageFetchError,
  RateLimitError,
  toError
} from '../base/errors';
import {
  AttemptOutcome,
  FetchAttemptState,
  classifyFailure,
  initialAttemptState,
  nextAttemptState,
  resumeAfterWait
} from './retry-policy';

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface PageRequest {
  resource: string;                          // label used in progress and diagnostics
  path: string;                              // relative to the client's baseURL
  params?: Record<string, string | number>;  // first request only
  headers?: Record<string, string>;          // every request
}

export interface PaginationSummary {
  resource: string;
  pageCount: number;
  itemCount: number;
  complete: boolean;
  failure?: PageFetchError;
}

export interface PaginatedFetcherOptions {
  retry: RetryPolicy;
  pageDelayMs: number;
  sleeper?: Sleeper;
  reporter?: ProgressReporter;
  now?: () => Date;
}

export class PaginatedFetcher {
  private readonly logger = logger.child({ service: 'PaginatedFetcher' });
  private readonly sleeper: Sleeper;
  private readonly reporter: ProgressReporter;
  private readonly now: () => Date;

  constructor(
    private readonly client: AxiosInstance,
    private readonly options: PaginatedFetcherOptions
  ) {
    this.sleeper = options.sleeper ?? sleep;
    this.reporter = options.reporter ?? silentReporter;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Lazily walk the page chain until a page carries no next link.
   * Throws PageFetchError when a page cannot be fetched.
   */
  async *pages(request: PageRequest): AsyncGenerator<PageBody, void, undefined> {
    let url: string | undefined = request.path;
    let params = request.params;

    while (url) {
      const page = await this.fetchPage(request, url, params);
      const nextLink = getNextLink(page);
      yield page;

      url = nextLink;
      params = undefined;
      if (url && this.options.pageDelayMs > 0) {
        await this.sleeper(this.options.pageDelayMs);
      }
    }
  }

  /**
   * Hand every page to `handlePage`. A failure part-way through ends the walk;
   * pages already handled stay handled and the summary is marked incomplete.
   */
  async forEachPage(
    request: PageRequest,
    handlePage: (page: PageBody) => void
  ): Promise<PaginationSummary> {
    const summary: PaginationSummary = {
      resource: request.resource,
      pageCount: 0,
      itemCount: 0,
      complete: true
    };

    try {
      for await (const page of this.pages(request)) {
        summary.pageCount++;
        summary.itemCount += page.items.length;
        handlePage(page);
      }
    } catch (error) {
      if (!(error instanceof PageFetchError)) {
        throw error;
      }
      summary.complete = false;
      summary.failure = error;
      this.logger.error(`Fetching ${request.resource} stopped after ${summary.pageCount} page(s)`, {
        url: error.url,
        status: error.status,
        attempts: error.attempts,
        code: error.code,
        cause: error.cause?.message
      });
    }

    this.reporter.count(`Total ${request.resource} retrieved`, summary.itemCount);
    return summary;
  }

  /**
   * Fetch a single page, driving the retry state machine
   */
  private async fetchPage(
    request: PageRequest,
    url: string,
    params?: Record<string, string | number>
  ): Promise<PageBody> {
    let state: FetchAttemptState = initialAttemptState;

    for (;;) {
      switch (state.kind) {
        case 'attempting': {
          const attempt = state.attempt;
          let outcome: AttemptOutcome;
          let body: unknown;
          try {
            const response = await this.client.get<unknown>(url, {
              params,
              headers: request.headers
            });
            body = response.data;
            outcome = { kind: 'success' };
          } catch (error) {
            outcome = classifyFailure(error, this.now());
          }

          state = nextAttemptState(this.options.retry, attempt, outcome);
          if (state.kind === 'succeeded') {
            return this.decodePage(request, url, body, attempt);
          }
          break;
        }

        case 'waiting':
          this.logger.warn(
            `Request for ${request.resource} failed (${state.reason}), retrying in ${state.delayMs / 1000} seconds... Error: ${state.error.message}`,
            { url, attempt: state.attempt }
          );
          await this.sleeper(state.delayMs);
          state = resumeAfterWait(state);
          break;

        case 'failed':
          throw this.toFetchError(request, url, state);

        case 'succeeded':
          // Handled when the attempt completes
          throw new Error('Unreachable retry state');
      }
    }
  }

  private decodePage(request: PageRequest, url: string, body: unknown, attempt: number): PageBody {
    const parsed = pageBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new PageFetchError(
        `Malformed page body from ${request.resource}`,
        { resource: request.resource, url, attempts: attempt },
        new MalformedPayloadError('Page body is not an object with an items array', parsed.error)
      );
    }
    return parsed.data;
  }

  private toFetchError(
    request: PageRequest,
    url: string,
    state: Extract<FetchAttemptState, { kind: 'failed' }>
  ): PageFetchError {
    const details = {
      resource: request.resource,
      url,
      attempts: state.attempt,
      status: state.status
    };

    if (state.rateLimited) {
      return new RateLimitError(
        `Rate limit persisted for ${request.resource} after ${state.attempt} attempts`,
        details,
        state.error
      );
    }

    const message = state.exhausted
      ? `Request for ${request.resource} failed after ${state.attempt} attempts`
      : `Request for ${request.resource} failed with a non-retryable error`;
    return new PageFetchError(message, details, toError(state.error));
  }
}
