import type { JsonObject } from './JsonValue.js';
import type { Pagination } from './Pagination.js';
import type { CreateIntent, Intent } from './Intent.js';
import type { CreateEntity, Entity } from './Entity.js';
import type { CreateDialogNode, DialogNode } from './DialogNode.js';
import type { Counterexample, CreateCounterexample } from './Counterexample.js';

/**
 * Training status reported for a workspace
 */
export type WorkspaceStatus = 'Non Existent' | 'Training' | 'Failed' | 'Available' | 'Unavailable' | string;

/**
 * Container for the intents, entities, dialog and counterexamples of one application
 */
export interface Workspace {
  readonly workspaceId: string;
  readonly name: string;
  readonly language: string;
  readonly description?: string;
  readonly created?: string;
  readonly updated?: string;
  readonly metadata?: JsonObject;
  readonly learningOptOut?: boolean;
  readonly status?: WorkspaceStatus;
  /** The four collections below are only returned on export */
  readonly intents?: Intent[];
  readonly entities?: Entity[];
  readonly counterexamples?: Counterexample[];
  readonly dialogNodes?: DialogNode[];
}

export interface WorkspaceCollection {
  readonly workspaces: Workspace[];
  readonly pagination: Pagination;
}

/**
 * Body of workspace create and update requests
 */
export interface CreateWorkspace {
  readonly name?: string;
  readonly description?: string;
  readonly language?: string;
  readonly intents?: CreateIntent[];
  readonly entities?: CreateEntity[];
  readonly dialogNodes?: CreateDialogNode[];
  readonly counterexamples?: CreateCounterexample[];
  readonly metadata?: JsonObject;
  readonly learningOptOut?: boolean;
}

export type UpdateWorkspace = CreateWorkspace;
