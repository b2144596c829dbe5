export type { SessionState, SessionRegistry, GetOrCreateOptions } from './account-context.js';
export {
  ACCOUNT_CONTEXT_KEY_PREFIX,
  AccountContext,
  AccountContextCache,
  InMemorySessionRegistry,
} from './account-context.js';
