import type { MessageRequest, MessageResponse } from './Message.js';
import type { LogPagination } from './Pagination.js';

/**
 * One logged message exchange
 */
export interface LogExport {
  readonly logId: string;
  readonly request: MessageRequest;
  readonly response: MessageResponse;
  readonly requestTimestamp: string;
  readonly responseTimestamp: string;
  readonly workspaceId: string;
  readonly language: string;
}

export interface LogCollection {
  readonly logs: LogExport[];
  readonly pagination: LogPagination;
}

export interface ListLogsOptions {
  sort?: string;
  /** Filter expression, for example `response_timestamp>=2017-05-01` */
  filter?: string;
  pageLimit?: number;
  cursor?: string;
}
