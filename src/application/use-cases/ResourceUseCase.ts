import type { PageOptions } from '../../domain/entities/Pagination.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { QueryValue } from '../../infrastructure/http/RequestBuilder.js';
import type { RestClient } from '../../infrastructure/http/RestClient.js';

/**
 * Query parameters shared by every paged list operation
 */
export function pageQuery(options: PageOptions): Record<string, QueryValue> {
  return {
    page_limit: options.pageLimit,
    include_count: options.includeCount,
    sort: options.sort,
    cursor: options.cursor,
  };
}

/**
 * Common plumbing of the use cases: every call is logged, and failures are
 * logged before being rethrown to the caller.
 */
export abstract class ResourceUseCase {
  constructor(
    protected readonly rest: RestClient,
    protected readonly logger: ILogger
  ) {}

  protected async run<T>(operation: string, data: Record<string, unknown>, call: () => Promise<T>): Promise<T> {
    this.logger.info(`Executing ${operation}`, data);

    try {
      return await call();
    } catch (error) {
      this.logger.error(`Error in ${operation}`, error, data);
      throw error;
    }
  }
}
