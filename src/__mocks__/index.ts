export { InMemoryAssistantsService } from './assistants-service.mock.js';
export type { InMemoryOptions, RunScriptStep } from './assistants-service.mock.js';

export { RecordingLogger } from './logger.mock.js';
export type { LogEntry } from './logger.mock.js';

export { createTestContext } from './context.mock.js';
export type { TestContext } from './context.mock.js';

export { createFetchMock } from './fetch.mock.js';
export type { FetchMock } from './fetch.mock.js';
