export {
  type IdentityProvider,
  type IdentityListener,
  CredentialsError,
  MIN_PASSWORD_LENGTH,
  validateCredentials,
  validateEmail,
} from './IdentityProvider';
export { SupabaseIdentityProvider } from './SupabaseIdentityProvider';
export { MemoryIdentityProvider } from './MemoryIdentityProvider';
