import type { CreateEntity, Entity, EntityCollection, UpdateEntity } from '../../domain/entities/Entity.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createEntitySchema,
  entityCollectionSchema,
  entitySchema,
  updateEntitySchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const ENTITIES_PATH = '/v1/workspaces/{workspace_id}/entities';
const ENTITY_PATH = '/v1/workspaces/{workspace_id}/entities/{entity}';

export interface ListEntitiesInput extends WorkspaceInput, PageOptions {
  /** Include the values of every entity */
  export?: boolean;
}

export type CreateEntityInput = WorkspaceInput & CreateEntity;

export interface EntityInput extends WorkspaceInput {
  entity: string;
}

export interface GetEntityInput extends EntityInput {
  export?: boolean;
}

export interface UpdateEntityInput extends EntityInput {
  changes: UpdateEntity;
}

/**
 * Use case for the entities of a workspace
 */
export class ManageEntities extends ResourceUseCase {
  async list(input: ListEntitiesInput): Promise<EntityCollection> {
    return this.run('listEntities', { workspaceId: input.workspaceId }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: ENTITIES_PATH,
          pathParams: { workspace_id: input.workspaceId },
          query: { export: input.export, ...pageQuery(input) },
        },
        entityCollectionSchema
      )
    );
  }

  async create(input: CreateEntityInput): Promise<Entity> {
    const { workspaceId, ...entity } = input;

    return this.run('createEntity', { workspaceId, entity: entity.entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: ENTITIES_PATH,
          pathParams: { workspace_id: workspaceId },
          body: jsonBody(entity, createEntitySchema),
        },
        entitySchema
      )
    );
  }

  async get(input: GetEntityInput): Promise<Entity> {
    return this.run('getEntity', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: ENTITY_PATH,
          pathParams: { workspace_id: input.workspaceId, entity: input.entity },
          query: { export: input.export },
        },
        entitySchema
      )
    );
  }

  async update(input: UpdateEntityInput): Promise<Entity> {
    return this.run('updateEntity', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: ENTITY_PATH,
          pathParams: { workspace_id: input.workspaceId, entity: input.entity },
          body: jsonBody(input.changes, updateEntitySchema),
        },
        entitySchema
      )
    );
  }

  async delete(input: EntityInput): Promise<void> {
    return this.run('deleteEntity', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: ENTITY_PATH,
        pathParams: { workspace_id: input.workspaceId, entity: input.entity },
      })
    );
  }
}
