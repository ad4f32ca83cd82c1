import { AuthenticationError } from '../errors/categories.js';

/** Produces the headers that identify the caller on every request. */
export interface AuthManager {
  headers(): Record<string, string>;
  /** A form of the credentials safe to log. */
  describe(): string;
}

export interface AuthConfig {
  apiKey: string;
  organizationId?: string;
  projectId?: string;
}

export class BearerAuthManager implements AuthManager {
  private readonly apiKey: string;

  constructor(private readonly config: AuthConfig) {
    this.apiKey = config.apiKey.trim();
    if (this.apiKey === '') {
      throw new AuthenticationError('API key is required');
    }
    if (/\s/.test(this.apiKey)) {
      throw new AuthenticationError('API key must not contain whitespace');
    }
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (this.config.organizationId) headers['OpenAI-Organization'] = this.config.organizationId;
    if (this.config.projectId) headers['OpenAI-Project'] = this.config.projectId;
    return headers;
  }

  describe(): string {
    const visible = this.apiKey.length > 8 ? this.apiKey.slice(-4) : '';
    const scope = [this.config.organizationId, this.config.projectId].filter(Boolean).join('/');
    return `Bearer ***${visible}${scope ? ` (${scope})` : ''}`;
  }
}
