import type { CreateSynonym, Synonym, SynonymCollection, UpdateSynonym } from '../../domain/entities/Entity.js';
import type { PageOptions } from '../../domain/entities/Pagination.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import {
  createSynonymSchema,
  synonymCollectionSchema,
  synonymSchema,
  updateSynonymSchema,
} from '../../infrastructure/mappers/index.js';
import { ResourceUseCase, pageQuery } from './ResourceUseCase.js';
import type { ValueInput } from './ManageValues.js';

const SYNONYMS_PATH = '/v1/workspaces/{workspace_id}/entities/{entity}/values/{value}/synonyms';
const SYNONYM_PATH = '/v1/workspaces/{workspace_id}/entities/{entity}/values/{value}/synonyms/{synonym}';

export type ListSynonymsInput = ValueInput & PageOptions;

export type CreateSynonymInput = ValueInput & CreateSynonym;

export interface SynonymInput extends ValueInput {
  synonym: string;
}

export interface UpdateSynonymInput extends SynonymInput {
  changes: UpdateSynonym;
}

/**
 * Use case for the synonyms of an entity value
 */
export class ManageSynonyms extends ResourceUseCase {
  async list(input: ListSynonymsInput): Promise<SynonymCollection> {
    return this.run('listSynonyms', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: SYNONYMS_PATH,
          pathParams: { workspace_id: input.workspaceId, entity: input.entity, value: input.value },
          query: pageQuery(input),
        },
        synonymCollectionSchema
      )
    );
  }

  async create(input: CreateSynonymInput): Promise<Synonym> {
    const { workspaceId, entity, value, ...synonym } = input;

    return this.run('createSynonym', { workspaceId, entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: SYNONYMS_PATH,
          pathParams: { workspace_id: workspaceId, entity, value },
          body: jsonBody(synonym, createSynonymSchema),
        },
        synonymSchema
      )
    );
  }

  async get(input: SynonymInput): Promise<Synonym> {
    return this.run('getSynonym', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'GET',
          path: SYNONYM_PATH,
          pathParams: synonymPathParams(input),
        },
        synonymSchema
      )
    );
  }

  async update(input: UpdateSynonymInput): Promise<Synonym> {
    return this.run('updateSynonym', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestObject(
        {
          method: 'POST',
          path: SYNONYM_PATH,
          pathParams: synonymPathParams(input),
          body: jsonBody(input.changes, updateSynonymSchema),
        },
        synonymSchema
      )
    );
  }

  async delete(input: SynonymInput): Promise<void> {
    return this.run('deleteSynonym', { workspaceId: input.workspaceId, entity: input.entity }, () =>
      this.rest.requestVoid({
        method: 'DELETE',
        path: SYNONYM_PATH,
        pathParams: synonymPathParams(input),
      })
    );
  }
}

function synonymPathParams(input: SynonymInput): Record<string, string> {
  return {
    workspace_id: input.workspaceId,
    entity: input.entity,
    value: input.value,
    synonym: input.synonym,
  };
}
