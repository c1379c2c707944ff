import type { PageOptions } from '../../domain/entities/Pagination.js';
import type {
  CreateWorkspace,
  UpdateWorkspace,
  Workspace,
  WorkspaceCollection,
} from '../../domain/entities/Workspace.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createWorkspaceSchema,
  workspaceCollectionSchema,
  workspaceSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';

const WORKSPACES_PATH = '/v1/workspaces';
const WORKSPACE_PATH = '/v1/workspaces/{workspace_id}';

export type ListWorkspacesInput = PageOptions;

export interface WorkspaceInput {
  workspaceId: string;
}

export interface GetWorkspaceInput extends WorkspaceInput {
  /** Include intents, entities, counterexamples and dialog nodes */
  export?: boolean;
}

export interface UpdateWorkspaceInput extends WorkspaceInput {
  changes: UpdateWorkspace;
}

/**
 * Use case for listing, creating, reading, updating and deleting workspaces
 */
export class ManageWorkspaces extends ResourceUseCase {
  async list(input: ListWorkspacesInput = {}): Promise<WorkspaceCollection> {
    return this.run('listWorkspaces', {}, () =>
      this.rest.requestObject(
        { method: 'GET', path: WORKSPACES_PATH, query: pageQuery(input) },
        workspaceCollectionSchema
      )
    );
  }

  async create(input: CreateWorkspace = {}): Promise<Workspace> {
    return this.run('createWorkspace', { name: input.name }, () =>
      this.rest.requestObject(
        { method: 'POST', path: WORKSPACES_PATH, body: jsonBody(input, createWorkspaceSchema) },
        workspaceSchema
      )
    );
  }

  async get(input: GetWorkspaceInput): Promise<Workspace> {
    return this.run('getWorkspace', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: WORKSPACE_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: { export: input.export },
        },
        workspaceSchema
      )
    );
  }

  async update(input: UpdateWorkspaceInput): Promise<Workspace> {
    return this.run('updateWorkspace', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: WORKSPACE_PATH,
          pathParams: { workspace_id: input.workspaceId },
          body: jsonBody(input.changes, createWorkspaceSchema),
        },
        workspaceSchema
      )
    );
  }

  async delete(input: WorkspaceInput): Promise<void> {
    return this.run('deleteWorkspace', { workspaceId: input.workspaceId }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: WORKSPACE_PATH,
        pathParams: { workspace_id: input.workspaceId },
      })
    );
  }
}
