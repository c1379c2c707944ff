import type { LogPagination, Pagination } from '../../domain/entities/Pagination.js';
import { integer, string } from '../codec/fields.js';
import { defineRecord, optional, required } from '../codec/RecordCodec.js';

export const paginationSchema = defineRecord<Pagination>('Pagination', {
  refreshUrl: required('refresh_url', string()),
  nextUrl: optional('next_url', string()),
  total: optional('total', integer()),
  matched: optional('matched', integer()),
  refreshCursor: optional('refresh_cursor', string()),
  nextCursor: optional('next_cursor', string()),
});

export const logPaginationSchema = defineRecord<LogPagination>('LogPagination', {
  nextUrl: optional('next_url', string()),
  matched: optional('matched', integer()),
  nextCursor: optional('next_cursor', string()),
});
