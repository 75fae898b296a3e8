export { SessionStore, sessionStore } from './sessionStore';
export type { NewSession } from './sessionStore';
export { KeyedMutex, sessionLocks } from './sessionLock';
export * from './types';
