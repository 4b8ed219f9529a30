/**
 * Supabase Auth behind the IdentityProvider capability.
 *
 * The current user id is cached from onAuthStateChange so reads stay
 * synchronous. Token refreshes fire auth events too; listeners only hear
 * about an actual change of user.
 */
import type { SupabaseClient } from '@supabase/supabase-js';
import { __DEV__ } from '../../config/env';
import {
  notifyListeners,
  validateCredentials,
  validateEmail,
  type IdentityListener,
  type IdentityProvider,
} from './IdentityProvider';

export class SupabaseIdentityProvider implements IdentityProvider {
  private userId: string | null = null;
  private readonly listeners = new Set<IdentityListener>();
  private authSubscription: { unsubscribe: () => void } | null = null;

  constructor(private readonly client: SupabaseClient) {}

  /** Start tracking auth state and seed the identity from the persisted session. */
  async init(): Promise<string | null> {
    if (!this.authSubscription) {
      const { data } = this.client.auth.onAuthStateChange((_event, session) => {
        this.setIdentity(session?.user.id ?? null);
      });
      this.authSubscription = data.subscription;
    }

    const { data, error } = await this.client.auth.getSession();
    if (error) {
      console.warn('[Auth] getSession failed:', error.message);
      return this.userId;
    }
    this.setIdentity(data.session?.user.id ?? null);
    return this.userId;
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

  async signIn(email: string, password: string): Promise<string> {
    validateCredentials(email, password);
    const { data, error } = await this.client.auth.signInWithPassword({ email: email.trim(), password });
    if (error) {
      console.error('[Auth] Sign in failed:', error.message);
      throw error;
    }
    const userId = data.user?.id;
    if (!userId) {
      throw new Error('Sign-in succeeded but no user was returned');
    }
    this.setIdentity(userId);
    return userId;
  }

  async signUp(email: string, password: string): Promise<string> {
    validateCredentials(email, password);
    const { data, error } = await this.client.auth.signUp({ email: email.trim(), password });
    if (error) {
      console.error('[Auth] Sign up failed:', error.message);
      throw error;
    }
    const userId = data.user?.id;
    if (!userId) {
      throw new Error('Sign-up succeeded but no user was returned');
    }
    // Without a session the project requires email confirmation first.
    if (data.session) this.setIdentity(userId);
    return userId;
  }

  async signOut(): Promise<void> {
    const { error } = await this.client.auth.signOut();
    if (error) {
      console.error('[Auth] Sign out failed:', error.message);
      throw error;
    }
    this.setIdentity(null);
  }

  async resetPassword(email: string): Promise<void> {
    validateEmail(email);
    const { error } = await this.client.auth.resetPasswordForEmail(email.trim());
    if (error) throw error;
  }

  dispose(): void {
    this.authSubscription?.unsubscribe();
    this.authSubscription = null;
    this.listeners.clear();
  }

  private setIdentity(next: string | null): void {
    if (next === this.userId) return;
    this.userId = next;
    if (__DEV__) console.log(next ? `[Auth] Signed in: ${next}` : '[Auth] Signed out');
    notifyListeners(this.listeners, next);
  }
}
