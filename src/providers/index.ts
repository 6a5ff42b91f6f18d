export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ICompletionProvider, CompletionRequest } from './ICompletionProvider.js';
export { OpenAICompletionProvider } from './OpenAICompletionProvider.js';
