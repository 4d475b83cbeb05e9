export { SheetQA } from './SheetQA.js';
export type { SheetQAOptions, AskResult } from './SheetQA.js';
export { ColumnResolver } from './resolver/column-resolver.js';
export type { ColumnMatch, ColumnResolverOptions } from './resolver/column-resolver.js';
export { DEFAULT_SYNONYMS } from './resolver/synonyms.js';
export type { SynonymTable } from './resolver/synonyms.js';
export { classifyIntent } from './parser/intent.js';
export { extractFilters } from './parser/filters.js';
export { planQuestion } from './parser/question.js';
export { applyFilters, executePlan } from './executor/query-executor.js';
export { renderAnswer } from './explain/answer.js';
export { explainPlan } from './explain/explainer.js';
export { normalizeText, prepareNormalizedColumns } from './normalize/normalizer.js';
export { SpreadsheetProcessor, buildTable, tableFromRecords } from './file-processing/spreadsheet-processor.js';
export { SessionStore } from './session/session-store.js';
export { createApp, startServer } from './server/app.js';
export * from './ir/types.js';
