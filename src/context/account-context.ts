/**
 * Account contexts and their session-scoped cache.
 */

import type { StorageAccountClient } from '../client/client.js';
import type { ReadOptions } from '../client/config.js';

/** Registry key prefix for account contexts */
export const ACCOUNT_CONTEXT_KEY_PREFIX = 'azure_storage_context:';

/**
 * State kept in a session registry. `onSessionEnd` fires once when the host
 * ends the logical session.
 */
export interface SessionState {
  onSessionEnd(): void;
}

/**
 * Per-session registry keyed by arbitrary strings, owned by the host.
 */
export interface SessionRegistry {
  get(key: string): SessionState | undefined;
  set(key: string, state: SessionState): void;
}

/**
 * Authenticated client plus read configuration for one account. `valid` goes
 * from true to false once and never back; holders keep using an invalidated
 * context, only new lookups replace it.
 */
export class AccountContext implements SessionState {
  readonly client: StorageAccountClient;
  readonly readOptions: ReadOptions;
  private valid = true;

  constructor(client: StorageAccountClient, readOptions: ReadOptions) {
    this.client = client;
    this.readOptions = readOptions;
  }

  isValid(): boolean {
    return this.valid;
  }

  invalidate(): void {
    this.valid = false;
  }

  onSessionEnd(): void {
    this.invalidate();
  }
}

/**
 * In-memory session registry. `endSession()` notifies every state once and
 * starts a new session with the same entries.
 */
export class InMemorySessionRegistry implements SessionRegistry {
  private readonly states = new Map<string, SessionState>();

  get(key: string): SessionState | undefined {
    return this.states.get(key);
  }

  set(key: string, state: SessionState): void {
    this.states.set(key, state);
  }

  keys(): string[] {
    return [...this.states.keys()];
  }

  endSession(): void {
    for (const state of new Set(this.states.values())) {
      state.onSessionEnd();
    }
  }
}

/** Lookup options */
export interface GetOrCreateOptions {
  /** `azure_context_caching`; false always creates a fresh context */
  enabled: boolean;
}

/**
 * Account context cache over a session registry. Without a registry every
 * lookup creates a fresh context.
 */
export class AccountContextCache {
  private readonly knownKeys = new Set<string>();

  constructor(private readonly registry?: SessionRegistry) {}

  /**
   * Return the valid context for `accountKey`, creating (and caching) one when
   * none exists or the cached one was invalidated. `''` is a valid key.
   */
  async getOrCreate(
    accountKey: string,
    create: () => Promise<AccountContext>,
    options: GetOrCreateOptions = { enabled: true }
  ): Promise<AccountContext> {
    if (!options.enabled || !this.registry) {
      return create();
    }

    const key = ACCOUNT_CONTEXT_KEY_PREFIX + accountKey;
    const existing = this.registry.get(key);
    if (existing instanceof AccountContext && existing.isValid()) {
      return existing;
    }

    const context = await create();
    this.registry.set(key, context);
    this.knownKeys.add(accountKey);
    return context;
  }

  /**
   * Mark the cached context for `accountKey` invalid without evicting it
   */
  invalidate(accountKey: string): void {
    const existing = this.registry?.get(ACCOUNT_CONTEXT_KEY_PREFIX + accountKey);
    if (existing instanceof AccountContext) {
      existing.invalidate();
    }
  }

  /**
   * Mark every context this cache created invalid
   */
  invalidateAll(): void {
    for (const accountKey of this.knownKeys) {
      this.invalidate(accountKey);
    }
  }
}
