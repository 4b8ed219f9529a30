/**
 * MemoryIdentityProvider — in-process accounts for tests and offline runs.
 */
import {
  notifyListeners,
  validateCredentials,
  validateEmail,
  type IdentityListener,
  type IdentityProvider,
} from './IdentityProvider';

interface Account {
  userId: string;
  password: string;
}

export class MemoryIdentityProvider implements IdentityProvider {
  private userId: string | null;
  private readonly listeners = new Set<IdentityListener>();
  private readonly accounts = new Map<string, Account>();
  private nextId = 1;

  constructor(initialUserId: string | null = null) {
    this.userId = initialUserId;
  }

  currentIdentity(): string | null {
    return this.userId;
  }

  onIdentityChange(listener: IdentityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Switch identity directly, as an auth event from the provider would. */
  setIdentity(userId: string | null): void {
    if (userId === this.userId) return;
    this.userId = userId;
    notifyListeners(this.listeners, userId);
  }

  async signUp(email: string, password: string): Promise<string> {
    validateCredentials(email, password);
    const key = email.trim().toLowerCase();
    if (this.accounts.has(key)) {
      throw new Error('User already registered');
    }
    const userId = `user-${this.nextId++}`;
    this.accounts.set(key, { userId, password });
    this.setIdentity(userId);
    return userId;
  }

  async signIn(email: string, password: string): Promise<string> {
    validateCredentials(email, password);
    const account = this.accounts.get(email.trim().toLowerCase());
    if (!account || account.password !== password) {
      throw new Error('Invalid login credentials');
    }
    this.setIdentity(account.userId);
    return account.userId;
  }

  async signOut(): Promise<void> {
    this.setIdentity(null);
  }

  async resetPassword(email: string): Promise<void> {
    validateEmail(email);
  }
}
