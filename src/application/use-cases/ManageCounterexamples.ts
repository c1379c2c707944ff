import type {
  CreateCounterexample,
  Counterexample,
  CounterexampleCollection,
  UpdateCounterexample,
} from '../../domain/entities/Counterexample.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  counterexampleCollectionSchema,
  counterexampleSchema,
  createCounterexampleSchema,
  updateCounterexampleSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const COUNTEREXAMPLES_PATH = '/v1/workspaces/{workspace_id}/counterexamples';
const COUNTEREXAMPLE_PATH = '/v1/workspaces/{workspace_id}/counterexamples/{text}';

export type ListCounterexamplesInput = WorkspaceInput & PageOptions;

export type CreateCounterexampleInput = WorkspaceInput & CreateCounterexample;

export interface CounterexampleInput extends WorkspaceInput {
  text: string;
}

export interface UpdateCounterexampleInput extends CounterexampleInput {
  changes: UpdateCounterexample;
}

/**
 * Use case for counterexamples: inputs that must not match any intent
 */
export class ManageCounterexamples extends ResourceUseCase {
  async list(input: ListCounterexamplesInput): Promise<CounterexampleCollection> {
    return this.run('listCounterexamples', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: COUNTEREXAMPLES_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: pageQuery(input),
        },
        counterexampleCollectionSchema
      )
    );
  }

  async create(input: CreateCounterexampleInput): Promise<Counterexample> {
    const { workspaceId, ...counterexample } = input;

    return this.run('createCounterexample', { workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: COUNTEREXAMPLES_PATH,
          pathParams: { workspace_id: workspaceId },
          body: jsonBody(counterexample, createCounterexampleSchema),
        },
        counterexampleSchema
      )
    );
  }

  async get(input: CounterexampleInput): Promise<Counterexample> {
    return this.run('getCounterexample', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: COUNTEREXAMPLE_PATH,
          pathParams: { workspace_id: input.workspaceId, text: input.text },
        },
        counterexampleSchema
      )
    );
  }

  async update(input: UpdateCounterexampleInput): Promise<Counterexample> {
    return this.run('updateCounterexample', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: COUNTEREXAMPLE_PATH,
          pathParams: { workspace_id: input.workspaceId, text: input.text },
          body: jsonBody(input.changes, updateCounterexampleSchema),
        },
        counterexampleSchema
      )
    );
  }

  async delete(input: CounterexampleInput): Promise<void> {
    return this.run('deleteCounterexample', { workspaceId: input.workspaceId }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: COUNTEREXAMPLE_PATH,
        pathParams: { workspace_id: input.workspaceId, text: input.text },
      })
    );
  }
}
