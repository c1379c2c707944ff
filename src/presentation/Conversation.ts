import type { ILogger } from "../domain/ports/ILogger.js";
import type {
  Counterexample,
  CounterexampleCollection,
  DialogNode,
  DialogNodeCollection,
  Entity,
  EntityCollection,
  Example,
  ExampleCollection,
  Intent,
  IntentCollection,
  LogCollection,
  MessageResponse,
  Synonym,
  SynonymCollection,
  Value,
  ValueCollection,
  Workspace,
  WorkspaceCollection,
  CreateWorkspace,
} from "../domain/index.js";
import {
  ManageWorkspaces,
  ManageIntents,
  ManageExamples,
  ManageCounterexamples,
  ManageEntities,
  ManageValues,
  ManageSynonyms,
  ManageDialogNodes,
  ListLogs,
  SendMessage,
  type ListWorkspacesInput,
  type WorkspaceInput,
  type GetWorkspaceInput,
  type UpdateWorkspaceInput,
  type ListIntentsInput,
  type CreateIntentInput,
  type IntentInput,
  type GetIntentInput,
  type UpdateIntentInput,
  type ListExamplesInput,
  type CreateExampleInput,
  type ExampleInput,
  type UpdateExampleInput,
  type ListCounterexamplesInput,
  type CreateCounterexampleInput,
  type CounterexampleInput,
  type UpdateCounterexampleInput,
  type ListEntitiesInput,
  type CreateEntityInput,
  type EntityInput,
  type GetEntityInput,
  type UpdateEntityInput,
  type ListValuesInput,
  type CreateValueInput,
  type ValueInput,
  type GetValueInput,
  type UpdateValueInput,
  type ListSynonymsInput,
  type CreateSynonymInput,
  type SynonymInput,
  type UpdateSynonymInput,
  type ListDialogNodesInput,
  type CreateDialogNodeInput,
  type DialogNodeInput,
  type UpdateDialogNodeInput,
  type ListLogsInput,
  type SendMessageInput,
} from "../application/index.js";
import type { RestClient } from "../infrastructure/http/RestClient.js";

/**
 * Client of the conversation service. Each method maps to one endpoint and
 * resolves with the decoded record, or rejects with a `ConversationError`.
 */
export class Conversation {
  private readonly workspaces: ManageWorkspaces;
  private readonly intents: ManageIntents;
  private readonly examples: ManageExamples;
  private readonly counterexamples: ManageCounterexamples;
  private readonly entities: ManageEntities;
  private readonly values: ManageValues;
  private readonly synonyms: ManageSynonyms;
  private readonly dialogNodes: ManageDialogNodes;
  private readonly logs: ListLogs;
  private readonly messages: SendMessage;

  constructor(rest: RestClient, logger: ILogger) {
    this.workspaces = new ManageWorkspaces(rest, logger);
    this.intents = new ManageIntents(rest, logger);
    this.examples = new ManageExamples(rest, logger);
    this.counterexamples = new ManageCounterexamples(rest, logger);
    this.entities = new ManageEntities(rest, logger);
    this.values = new ManageValues(rest, logger);
    this.synonyms = new ManageSynonyms(rest, logger);
    this.dialogNodes = new ManageDialogNodes(rest, logger);
    this.logs = new ListLogs(rest, logger);
    this.messages = new SendMessage(rest, logger);
  }

  // ==================== Workspaces ====================

  async listWorkspaces(input: ListWorkspacesInput = {}): Promise<WorkspaceCollection> {
    return this.workspaces.list(input);
  }

  async createWorkspace(input: CreateWorkspace = {}): Promise<Workspace> {
    return this.workspaces.create(input);
  }

  /**
   * Get a workspace. With `export: true` the response carries all of its
   * intents, entities, counterexamples and dialog nodes.
   */
  async getWorkspace(input: GetWorkspaceInput): Promise<Workspace> {
    return this.workspaces.get(input);
  }

  /**
   * Update a workspace. Collections supplied in `changes` replace the
   * existing ones.
   */
  async updateWorkspace(input: UpdateWorkspaceInput): Promise<Workspace> {
    return this.workspaces.update(input);
  }

  async deleteWorkspace(input: WorkspaceInput): Promise<void> {
    return this.workspaces.delete(input);
  }

  // ==================== Intents ====================

  async listIntents(input: ListIntentsInput): Promise<IntentCollection> {
    return this.intents.list(input);
  }

  async createIntent(input: CreateIntentInput): Promise<Intent> {
    return this.intents.create(input);
  }

  async getIntent(input: GetIntentInput): Promise<Intent> {
    return this.intents.get(input);
  }

  async updateIntent(input: UpdateIntentInput): Promise<Intent> {
    return this.intents.update(input);
  }

  async deleteIntent(input: IntentInput): Promise<void> {
    return this.intents.delete(input);
  }

  // ==================== Examples ====================

  async listExamples(input: ListExamplesInput): Promise<ExampleCollection> {
    return this.examples.list(input);
  }

  async createExample(input: CreateExampleInput): Promise<Example> {
    return this.examples.create(input);
  }

  async getExample(input: ExampleInput): Promise<Example> {
    return this.examples.get(input);
  }

  async updateExample(input: UpdateExampleInput): Promise<Example> {
    return this.examples.update(input);
  }

  async deleteExample(input: ExampleInput): Promise<void> {
    return this.examples.delete(input);
  }

  // ==================== Counterexamples ====================

  async listCounterexamples(input: ListCounterexamplesInput): Promise<CounterexampleCollection> {
    return this.counterexamples.list(input);
  }

  async createCounterexample(input: CreateCounterexampleInput): Promise<Counterexample> {
    return this.counterexamples.create(input);
  }

  async getCounterexample(input: CounterexampleInput): Promise<Counterexample> {
    return this.counterexamples.get(input);
  }

  async updateCounterexample(input: UpdateCounterexampleInput): Promise<Counterexample> {
    return this.counterexamples.update(input);
  }

  async deleteCounterexample(input: CounterexampleInput): Promise<void> {
    return this.counterexamples.delete(input);
  }

  // ==================== Entities ====================

  async listEntities(input: ListEntitiesInput): Promise<EntityCollection> {
    return this.entities.list(input);
  }

  async createEntity(input: CreateEntityInput): Promise<Entity> {
    return this.entities.create(input);
  }

  async getEntity(input: GetEntityInput): Promise<Entity> {
    return this.entities.get(input);
  }

  async updateEntity(input: UpdateEntityInput): Promise<Entity> {
    return this.entities.update(input);
  }

  async deleteEntity(input: EntityInput): Promise<void> {
    return this.entities.delete(input);
  }

  // ==================== Entity values ====================

  async listValues(input: ListValuesInput): Promise<ValueCollection> {
    return this.values.list(input);
  }

  async createValue(input: CreateValueInput): Promise<Value> {
    return this.values.create(input);
  }

  async getValue(input: GetValueInput): Promise<Value> {
    return this.values.get(input);
  }

  async updateValue(input: UpdateValueInput): Promise<Value> {
    return this.values.update(input);
  }

  async deleteValue(input: ValueInput): Promise<void> {
    return this.values.delete(input);
  }

  // ==================== Synonyms ====================

  async listSynonyms(input: ListSynonymsInput): Promise<SynonymCollection> {
    return this.synonyms.list(input);
  }

  async createSynonym(input: CreateSynonymInput): Promise<Synonym> {
    return this.synonyms.create(input);
  }

  async getSynonym(input: SynonymInput): Promise<Synonym> {
    return this.synonyms.get(input);
  }

  async updateSynonym(input: UpdateSynonymInput): Promise<Synonym> {
    return this.synonyms.update(input);
  }

  async deleteSynonym(input: SynonymInput): Promise<void> {
    return this.synonyms.delete(input);
  }

  // ==================== Dialog nodes ====================

  async listDialogNodes(input: ListDialogNodesInput): Promise<DialogNodeCollection> {
    return this.dialogNodes.list(input);
  }

  async createDialogNode(input: CreateDialogNodeInput): Promise<DialogNode> {
    return this.dialogNodes.create(input);
  }

  async getDialogNode(input: DialogNodeInput): Promise<DialogNode> {
    return this.dialogNodes.get(input);
  }

  async updateDialogNode(input: UpdateDialogNodeInput): Promise<DialogNode> {
    return this.dialogNodes.update(input);
  }

  async deleteDialogNode(input: DialogNodeInput): Promise<void> {
    return this.dialogNodes.delete(input);
  }

  // ==================== Logs & messages ====================

  async listLogs(input: ListLogsInput): Promise<LogCollection> {
    return this.logs.execute(input);
  }

  /**
   * Send one user turn. Pass `response.context` of the previous turn as
   * `context` to stay in the same conversation.
   */
  async message(input: SendMessageInput): Promise<MessageResponse> {
    return this.messages.execute(input);
  }
}
