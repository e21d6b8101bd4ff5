export { QueueStoreError, type QueueStore } from './queue-store.js';
export { SheetsQueueStore, columnLetter, quoteSheetTitle, type SheetsQueueStoreOptions } from './sheets-store.js';
export { Workspace, workspaceLayout, type WorkspaceLayout } from './workspace.js';
export { QueueRunner, type QueueRunnerOptions, type RowStages, type RunOptions } from './runner.js';
export { buildPipeline, buildUploadStrategies, type Pipeline } from './pipeline.js';
export { parseLimit, renderQueueTable, renderSummaryTable, renderOutcomeTable } from './report.js';
