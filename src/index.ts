export * from './types';
export { AppConfig, loadConfig } from './config';
export * from './utils/errors';
export { KeyedLock } from './utils/keyedLock';
export { IntentClassifier, ClassifierOptions, IntentScore, confidenceLevelFor } from './nlu/classifier';
export { PatternLibrary, loadPatternLibrary, parsePattern, parsePatternLibrary } from './nlu/patterns';
export { ReplyGenerator, ReplyRequest, createReplyGenerator } from './nlu/openai';
export * from './memory/contextManager';
export * from './memory/historyTracker';
export * from './routing/registry';
export * from './routing/router';
export * from './routing/fallback';
export * from './routing/service';
export { defaultRoutes, registerDefaultRoutes } from './logic/routes';
export { createApp, AppOptions } from './app';
