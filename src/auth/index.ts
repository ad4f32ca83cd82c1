export type { AuthManager, AuthConfig } from './auth-manager.js';
export { BearerAuthManager } from './auth-manager.js';
