export * from './use-cases/ResourceUseCase.js';
export * from './use-cases/ManageWorkspaces.js';
export * from './use-cases/ManageIntents.js';
export * from './use-cases/ManageExamples.js';
export * from './use-cases/ManageCounterexamples.js';
export * from './use-cases/ManageEntities.js';
export * from './use-cases/ManageValues.js';
export * from './use-cases/ManageSynonyms.js';
export * from './use-cases/ManageDialogNodes.js';
export * from './use-cases/ListLogs.js';
export * from './use-cases/SendMessage.js';
