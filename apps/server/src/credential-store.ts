import { CredentialExpiredError, NotAuthenticatedError, UpstreamUnavailableError } from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";
import { SyncStore } from "./store.js";
import { Credential, StudentIdentity } from "./types.js";
import { Clock, systemClock } from "./utils.js";

/**
 * OAuth token issuer. Implemented by GoogleOAuthService.
 */
export interface IdentityProvider {
  exchangeCode(code: string): Promise<Credential>;
  refresh(refreshToken: string): Promise<Credential>;
}

export interface CredentialStoreOptions {
  /** Treat credentials as expired this long before their real expiry. */
  refreshSkewMs?: number;
  now?: Clock;
}

export class CredentialStore {
  private readonly store: SyncStore;
  private readonly identityProvider: IdentityProvider;
  private readonly lock = new KeyedLock();
  private readonly refreshSkewMs: number;
  private readonly now: Clock;

  constructor(store: SyncStore, identityProvider: IdentityProvider, options: CredentialStoreOptions = {}) {
    this.store = store;
    this.identityProvider = identityProvider;
    this.refreshSkewMs = Math.max(0, options.refreshSkewMs ?? 60_000);
    this.now = options.now ?? systemClock;
  }

  get(student: StudentIdentity): Credential | null {
    return this.store.getCredential(student);
  }

  async put(student: StudentIdentity, credential: Credential): Promise<void> {
    await this.lock.runExclusive(student, async () => {
      this.store.setCredential(student, credential);
    });
  }

  listStudents(): StudentIdentity[] {
    return this.store.listStudents();
  }

  isExpired(credential: Credential): boolean {
    if (credential.expiresAt === null) {
      return false;
    }
    return credential.expiresAt - this.refreshSkewMs <= this.now();
  }

  /**
   * Completes an OAuth authorization for a student and stores the result.
   */
  async connect(student: StudentIdentity, code: string): Promise<Credential> {
    const credential = await this.identityProvider.exchangeCode(code);
    await this.put(student, credential);
    return credential;
  }

  /**
   * Returns a usable credential, refreshing it first when it has expired.
   */
  async ensureValid(student: StudentIdentity): Promise<Credential> {
    return this.lock.runExclusive(student, async () => {
      const credential = this.store.getCredential(student);
      if (!credential) {
        throw new NotAuthenticatedError(student);
      }

      if (!this.isExpired(credential)) {
        return credential;
      }

      if (!credential.refreshToken) {
        throw new CredentialExpiredError(student);
      }

      let renewed: Credential;
      try {
        renewed = await this.identityProvider.refresh(credential.refreshToken);
      } catch (error) {
        if (error instanceof UpstreamUnavailableError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : "unknown error";
        throw new CredentialExpiredError(student, `refresh rejected (${message})`, error);
      }

      const next: Credential = {
        ...renewed,
        refreshToken: renewed.refreshToken ?? credential.refreshToken,
        scope: renewed.scope ?? credential.scope
      };
      this.store.setCredential(student, next);
      return next;
    });
  }
}
