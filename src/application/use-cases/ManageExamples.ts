import type { CreateExample, Example, ExampleCollection, UpdateExample } from '../../domain/entities/Intent.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createExampleSchema,
  exampleCollectionSchema,
  exampleSchema,
  updateExampleSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { IntentInput } from './ManageIntents.js';

const EXAMPLES_PATH = '/v1/workspaces/{workspace_id}/intents/{intent}/examples';
const EXAMPLE_PATH = '/v1/workspaces/{workspace_id}/intents/{intent}/examples/{text}';

export type ListExamplesInput = IntentInput & PageOptions;

export type CreateExampleInput = IntentInput & CreateExample;

export interface ExampleInput extends IntentInput {
  /** Current text of the example, used as its identifier */
  text: string;
}

export interface UpdateExampleInput extends ExampleInput {
  changes: UpdateExample;
}

/**
 * Use case for the user-input examples of an intent
 */
export class ManageExamples extends ResourceUseCase {
  async list(input: ListExamplesInput): Promise<ExampleCollection> {
    return this.run('listExamples', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: EXAMPLES_PATH,
          pathParams: { workspace_id: input.workspaceId, intent: input.intent },
          query: pageQuery(input),
        },
        exampleCollectionSchema
      )
    );
  }

  async create(input: CreateExampleInput): Promise<Example> {
    const { workspaceId, intent, ...example } = input;

    return this.run('createExample', { workspaceId, intent }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: EXAMPLES_PATH,
          pathParams: { workspace_id: workspaceId, intent },
          body: jsonBody(example, createExampleSchema),
        },
        exampleSchema
      )
    );
  }

  async get(input: ExampleInput): Promise<Example> {
    return this.run('getExample', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: EXAMPLE_PATH,
          pathParams: { workspace_id: input.workspaceId, intent: input.intent, text: input.text },
        },
        exampleSchema
      )
    );
  }

  async update(input: UpdateExampleInput): Promise<Example> {
    return this.run('updateExample', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: EXAMPLE_PATH,
          pathParams: { workspace_id: input.workspaceId, intent: input.intent, text: input.text },
          body: jsonBody(input.changes, updateExampleSchema),
        },
        exampleSchema
      )
    );
  }

  async delete(input: ExampleInput): Promise<void> {
    return this.run('deleteExample', { workspaceId: input.workspaceId, intent: input.intent }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: EXAMPLE_PATH,
        pathParams: { workspace_id: input.workspaceId, intent: input.intent, text: input.text },
      })
    );
  }
}
