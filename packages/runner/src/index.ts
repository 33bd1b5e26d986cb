export * from './config.js';
export * from './crossValidator.js';
export * from './judgePrompt.js';
export * from './judges/backend.js';
export * from './judges/judgeClient.js';
export * from './judges/mockBackend.js';
export * from './judges/providers.js';
export * from './judges/registry.js';
export * from './patternMatcher.js';
export * from './report.js';
export * from './runner.js';
export * from './scenarioRunner.js';
export * from './types.js';
