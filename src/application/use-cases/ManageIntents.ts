import type { CreateIntent, Intent, IntentCollection, UpdateIntent } from '../../domain/entities/Intent.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createIntentSchema,
  intentCollectionSchema,
  intentSchema,
  updateIntentSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const INTENTS_PATH = '/v1/workspaces/{workspace_id}/intents';
const INTENT_PATH = '/v1/workspaces/{workspace_id}/intents/{intent}';

export interface ListIntentsInput extends WorkspaceInput, PageOptions {
  /** Include the examples of every intent */
  export?: boolean;
}

export type CreateIntentInput = WorkspaceInput & CreateIntent;

export interface IntentInput extends WorkspaceInput {
  intent: string;
}

export interface GetIntentInput extends IntentInput {
  export?: boolean;
}

export interface UpdateIntentInput extends IntentInput {
  changes: UpdateIntent;
}

/**
 * Use case for the intents of a workspace
 */
export class ManageIntents extends ResourceUseCase {
  async list(input: ListIntentsInput): Promise<IntentCollection> {
    return this.run('listIntents', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: INTENTS_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: { export: input.export, ...pageQuery(input) },
        },
        intentCollectionSchema
      )
    );
  }

  async create(input: CreateIntentInput): Promise<Intent> {
    const { workspaceId, ...intent } = input;

    return this.run('createIntent', { workspaceId, intent: intent.intent }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: INTENTS_PATH,
          pathParams: { workspace_id: workspaceId },
          body: jsonBody(intent, createIntentSchema),
        },
        intentSchema
      )
    );
  }

  async get(input: GetIntentInput): Promise<Intent> {
    return this.run('getIntent', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: INTENT_PATH,
          pathParams: { workspace_id: input.workspaceId, intent: input.intent },
          query: { export: input.export },
        },
        intentSchema
      )
    );
  }

  async update(input: UpdateIntentInput): Promise<Intent> {
    return this.run('updateIntent', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: INTENT_PATH,
          pathParams: { workspace_id: input.workspaceId, intent: input.intent },
          body: jsonBody(input.changes, updateIntentSchema),
        },
        intentSchema
      )
    );
  }

  async delete(input: IntentInput): Promise<void> {
    return this.run('deleteIntent', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: INTENT_PATH,
        pathParams: { workspace_id: input.workspaceId, intent: input.intent },
      })
    );
  }
}
