/**
 * Generation service - picks the backend once at startup and answers every turn with text
 */
import type { AIProvider, BackendKind, GenerationRequest } from '../types/index';
import type { AppConfig } from '../config/index';
import { LoggerService } from './logger';
import { FALLBACK_TEXT, classifyFailure, resolveFallback } from './fallback-policy';
import { createProvider, modelNameFor } from '../providers/index';

/**
 * Anything that can turn a request into reply text without throwing
 */
export interface ReplyGenerator {
  readonly backendKind: BackendKind;
  generate(request: GenerationRequest): Promise<string>;
}

export interface GenerationServiceOptions {
  /**
   * Always-available canned backend, used for downgrades and Anthropic failures
   */
  demo: AIProvider;
  /**
   * Overrides the provider built from config; used by tests
   */
  provider?: AIProvider;
}

/**
 * Dispatches generation requests to the configured backend
 * A backend without credentials, or one that fails its startup probe, is replaced by
 * the demo backend for the rest of the process; there is no later retry.
 */
export class GenerationService implements ReplyGenerator {
  private kind: BackendKind;
  private provider: AIProvider;
  private readonly demo: AIProvider;
  private readonly maxRetries: number;
  private readonly logger: LoggerService;

  constructor(llm: AppConfig['llm'], logger: LoggerService, options: GenerationServiceOptions) {
    this.logger = logger;
    this.demo = options.demo;
    this.maxRetries = llm.maxRetries;
    this.kind = llm.backend;

    if (this.kind === 'demo') {
      this.provider = this.demo;
      this.logger.info('Running in DEMO mode - using pre-written persona responses');
      return;
    }

    this.provider = options.provider ?? createProvider(this.kind, llm, logger);
    if (!this.provider.isConfigured) {
      this.downgrade(`${this.provider.name} is not configured (missing API key)`);
      return;
    }

    this.logger.info(`Generation backend: ${this.provider.name} (model: ${modelNameFor(this.kind, llm)})`);
  }

  /**
   * Effective backend after any downgrade
   */
  get backendKind(): BackendKind {
    return this.kind;
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Runs the startup health probe, downgrading to demo if it fails
   * @returns Effective backend after the probe
   */
  async verify(): Promise<BackendKind> {
    if (this.kind === 'demo') {
      return this.kind;
    }

    const healthy = await this.provider.health().catch((error: unknown) => {
      this.logger.debug(`${this.provider.name} health probe threw`, error);
      return false;
    });
    if (!healthy) {
      this.downgrade(`${this.provider.name} is not reachable`);
    }
    return this.kind;
  }

  /**
   * Produces reply text for one turn; never rejects
   */
  async generate(request: GenerationRequest): Promise<string> {
    const attempts = this.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await this.provider.generate(request);
        return response.content;
      } catch (error) {
        lastError = error;
        this.logger.warn(
          `${this.provider.name} request failed (attempt ${attempt}/${attempts})`,
          error
        );
      }
    }

    const action = resolveFallback(this.kind, classifyFailure(lastError));
    if (action.type === 'text') {
      return action.text;
    }

    this.logger.warn('Falling back to demo mode for this response');
    try {
      const response = await this.demo.generate(request);
      return response.content;
    } catch (error) {
      this.logger.error('Demo fallback failed', error);
      return FALLBACK_TEXT.silent;
    }
  }

  private downgrade(reason: string): void {
    this.logger.warn(`${reason}. Falling back to demo mode.`);
    this.kind = 'demo';
    this.provider = this.demo;
  }
}
