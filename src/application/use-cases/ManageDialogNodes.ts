import type {
  CreateDialogNode,
  DialogNode,
  DialogNodeCollection,
  UpdateDialogNode,
} from '../../domain/entities/DialogNode.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createDialogNodeSchema,
  dialogNodeCollectionSchema,
  dialogNodeSchema,
  updateDialogNodeSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const DIALOG_NODES_PATH = '/v1/workspaces/{workspace_id}/dialog_nodes';
const DIALOG_NODE_PATH = '/v1/workspaces/{workspace_id}/dialog_nodes/{dialog_node}';

export type ListDialogNodesInput = WorkspaceInput & PageOptions;

export type CreateDialogNodeInput = WorkspaceInput & CreateDialogNode;

export interface DialogNodeInput extends WorkspaceInput {
  dialogNode: string;
}

export interface UpdateDialogNodeInput extends DialogNodeInput {
  changes: UpdateDialogNode;
}

/**
 * Use case for the nodes of a workspace dialog
 */
export class ManageDialogNodes extends ResourceUseCase {
  async list(input: ListDialogNodesInput): Promise<DialogNodeCollection> {
    return this.run('listDialogNodes', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: DIALOG_NODES_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: pageQuery(input),
        },
        dialogNodeCollectionSchema
      )
    );
  }

  async create(input: CreateDialogNodeInput): Promise<DialogNode> {
    const { workspaceId, ...node } = input;

    return this.run('createDialogNode', { workspaceId, dialogNode: node.dialogNode }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: DIALOG_NODES_PATH,
          pathParams: { workspace_id: workspaceId },
          body: jsonBody(node, createDialogNodeSchema),
        },
        dialogNodeSchema
      )
    );
  }

  async get(input: DialogNodeInput): Promise<DialogNode> {
    return this.run('getDialogNode', { workspaceId: input.workspaceId, dialogNode: input.dialogNode }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: DIALOG_NODE_PATH,
          pathParams: { workspace_id: input.workspaceId, dialog_node: input.dialogNode },
        },
        dialogNodeSchema
      )
    );
  }

  async update(input: UpdateDialogNodeInput): Promise<DialogNode> {
    return this.run('updateDialogNode', { workspaceId: input.workspaceId, dialogNode: input.dialogNode }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: DIALOG_NODE_PATH,
          pathParams: { workspace_id: input.workspaceId, dialog_node: input.dialogNode },
          body: jsonBody(input.changes, updateDialogNodeSchema),
        },
        dialogNodeSchema
      )
    );
  }

  async delete(input: DialogNodeInput): Promise<void> {
    return this.run('deleteDialogNode', { workspaceId: input.workspaceId, dialogNode: input.dialogNode }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: DIALOG_NODE_PATH,
        pathParams: { workspace_id: input.workspaceId, dialog_node: input.dialogNode },
      })
    );
  }
}
