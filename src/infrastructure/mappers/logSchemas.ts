import type { LogCollection, LogExport } from '../../domain/entities/Log.js';
import { array, string } from '../codec/fields.js';
import { defineRecord, record, required } from '../codec/RecordCodec.js';
import { messageRequestSchema, messageResponseSchema } from './messageSchemas.js';
import { logPaginationSchema } from './paginationSchemas.js';

export const logExportSchema = defineRecord<LogExport>('LogExport', {
  logId: required('log_id', string()),
  request: required('request', record(messageRequestSchema)),
  response: required('response', record(messageResponseSchema)),
  requestTimestamp: required('request_timestamp', string()),
  responseTimestamp: required('response_timestamp', string()),
  workspaceId: required('workspace_id', string()),
  language: required('language', string()),
});

export const logCollectionSchema = defineRecord<LogCollection>('LogCollection', {
  logs: required('logs', array(record(logExportSchema))),
  pagination: required('pagination', record(logPaginationSchema)),
});
