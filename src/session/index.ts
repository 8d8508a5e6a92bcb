export { SessionManager } from './session-manager.js';
export type { SessionManagerOptions } from './session-manager.js';
export { Session } from './session.js';
export type { SessionServices, SessionInit } from './session.js';
export { SessionStateSchema } from './types.js';
export type { SessionState, SessionInfo, StartSessionOptions, SessionCloseReport } from './types.js';
