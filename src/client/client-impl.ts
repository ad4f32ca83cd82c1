import type { AssistantsClient } from './index.js';
import type { AssistantsConfig, NormalizedConfig } from './config.js';
import type { AssistantsService } from '../services/assistants/index.js';
import type { FilesService } from '../services/files/index.js';
import type { ConversationContext } from '../conversation/context.js';
import type { Logger } from '../observability/logging.js';
import { AssistantsServiceImpl } from '../services/assistants/index.js';
import { FilesServiceImpl } from '../services/files/index.js';
import { FetchHttpTransport, type HttpTransport } from '../transport/http-transport.js';
import { DefaultResilienceOrchestrator, DEFAULT_RESILIENCE_CONFIG } from '../resilience/orchestrator.js';
import { LoggingHooks } from '../resilience/hooks.js';
import { BearerAuthManager } from '../auth/auth-manager.js';
import { createLogger } from '../observability/logging.js';
import { normalizeConfig } from './config.js';

export class AssistantsClientImpl implements AssistantsClient {
  public readonly assistants: AssistantsService;
  public readonly files: FilesService;
  public readonly logger: Logger;

  private readonly config: NormalizedConfig;
  private readonly orchestrator: DefaultResilienceOrchestrator;

  /** `transport` replaces the fetch transport, mainly for tests. */
  constructor(config: AssistantsConfig, transport?: HttpTransport) {
    this.config = normalizeConfig(config);
    this.logger = config.logger ?? createLogger({ level: this.config.logLevel });

    const auth = new BearerAuthManager({
      apiKey: this.config.apiKey,
      organizationId: this.config.organizationId,
      projectId: this.config.projectId,
    });
    const defaultHeaders = { 'Content-Type': 'application/json', ...auth.headers() };

    this.orchestrator = new DefaultResilienceOrchestrator(
      transport ?? new FetchHttpTransport(this.config.baseUrl, defaultHeaders, this.config.timeout),
      {
        ...DEFAULT_RESILIENCE_CONFIG,
        maxRetries: this.config.maxRetries,
        initialDelayMs: this.config.retryDelay,
      }
    );
    this.orchestrator.addHooks(new LoggingHooks(this.logger));
    this.logger.debug('Client configured', { baseUrl: this.config.baseUrl, auth: auth.describe() });

    this.assistants = new AssistantsServiceImpl(this.orchestrator);
    this.files = new FilesServiceImpl(this.orchestrator);
  }

  getConfig(): Readonly<NormalizedConfig> {
    return { ...this.config };
  }

  context(): ConversationContext {
    const polling: ConversationContext['polling'] = { pollIntervalMs: this.config.pollIntervalMs };
    if (this.config.maxWaitMs !== undefined) polling.maxWaitMs = this.config.maxWaitMs;
    return { assistants: this.assistants, logger: this.logger, polling };
  }
}
