/**
 * IdentityProvider — the authentication capability the core depends on.
 *
 * Implementations:
 *   - SupabaseIdentityProvider  (production — Supabase Auth)
 *   - MemoryIdentityProvider    (tests / offline runs)
 */

export type IdentityListener = (userId: string | null) => void;

export interface IdentityProvider {
  /** Authenticated user id, or null when signed out. */
  currentIdentity(): string | null;

  /**
   * Register a listener fired whenever the user id changes.
   * @returns a function that removes the listener
   */
  onIdentityChange(listener: IdentityListener): () => void;

  signIn(email: string, password: string): Promise<string>;
  signUp(email: string, password: string): Promise<string>;
  signOut(): Promise<void>;
  resetPassword(email: string): Promise<void>;
}

export const MIN_PASSWORD_LENGTH = 6;
const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

export function validateEmail(email: string): void {
  if (!EMAIL_REGEX.test(email.trim())) {
    throw new CredentialsError('Enter a valid email address.');
  }
}

export function validateCredentials(email: string, password: string): void {
  validateEmail(email);
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new CredentialsError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters.`);
  }
}

/** Fan a change out to every listener; one failing listener does not starve the rest. */
export function notifyListeners(listeners: Iterable<IdentityListener>, userId: string | null): void {
  for (const listener of [...listeners]) {
    try {
      listener(userId);
    } catch (e) {
      console.error('[Auth] Identity listener threw:', e);
    }
  }
}
