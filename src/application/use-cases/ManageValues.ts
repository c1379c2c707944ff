import type { CreateValue, UpdateValue, Value, ValueCollection } from '../../domain/entities/Entity.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createValueSchema,
  updateValueSchema,
  valueCollectionSchema,
  valueSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { EntityInput } from './ManageEntities.js';

const VALUES_PATH = '/v1/workspaces/{workspace_id}/entities/{entity}/values';
const VALUE_PATH = '/v1/workspaces/{workspace_id}/entities/{entity}/values/{value}';

export interface ListValuesInput extends EntityInput, PageOptions {
  /** Include the synonyms of every value */
  export?: boolean;
}

export type CreateValueInput = EntityInput & CreateValue;

export interface ValueInput extends EntityInput {
  value: string;
}

export interface GetValueInput extends ValueInput {
  export?: boolean;
}

export interface UpdateValueInput extends ValueInput {
  changes: UpdateValue;
}

function valuePathParams(input: ValueInput): Record<string, string> {
  return { workspace_id: input.workspaceId, entity: input.entity, value: input.value };
}

/**
 * Use case for the values of an entity
 */
export class ManageValues extends ResourceUseCase {
  async list(input: ListValuesInput): Promise<ValueCollection> {
    return this.run('listValues', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: VALUES_PATH,
          pathParams: { workspace_id: input.workspaceId, entity: input.entity },
          query: { export: input.export, ...pageQuery(input) },
        },
        valueCollectionSchema
      )
    );
  }

  async create(input: CreateValueInput): Promise<Value> {
    const { workspaceId, entity, ...value } = input;

    return this.run('createValue', { workspaceId, entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: VALUES_PATH,
          pathParams: { workspace_id: workspaceId, entity },
          body: jsonBody(value, createValueSchema),
        },
        valueSchema
      )
    );
  }

  async get(input: GetValueInput): Promise<Value> {
    return this.run('getValue', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: VALUE_PATH,
          pathParams: valuePathParams(input),
          query: { export: input.export },
        },
        valueSchema
      )
    );
  }

  async update(input: UpdateValueInput): Promise<Value> {
    return this.run('updateValue', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: VALUE_PATH,
          pathParams: valuePathParams(input),
          body: jsonBody(input.changes, updateValueSchema),
        },
        valueSchema
      )
    );
  }

  async delete(input: ValueInput): Promise<void> {
    return this.run('deleteValue', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: VALUE_PATH,
        pathParams: valuePathParams(input),
      })
    );
  }
}
