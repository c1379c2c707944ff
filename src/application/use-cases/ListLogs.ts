import type { ListLogsOptions, LogCollection } from '../../domain/entities/Log.js';
import { logCollectionSchema } from '../../infrastructure/mappers/index.js';
import { ResourceUseCase } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const LOGS_PATH = '/v1/workspaces/{workspace_id}/logs';

export type ListLogsInput = WorkspaceInput & ListLogsOptions;

/**
 * Use case for reading the message log of a workspace
 */
export class ListLogs extends ResourceUseCase {
  async execute(input: ListLogsInput): Promise<LogCollection> {
    return this.run('listLogs', { workspaceId: input.workspaceId, filter: input.filter }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: LOGS_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: {
            sort: input.sort,
            filter: input.filter,
            page_limit: input.pageLimit,
            cursor: input.cursor,
          },
        },
        logCollectionSchema
      )
    );
  }
}
