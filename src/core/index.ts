export { AssistantCore } from './assistant-core.js';
export type { AssistantCoreOptions, ProcessOptions, TaskOutcome, UtteranceOutcome } from './assistant-core.js';
