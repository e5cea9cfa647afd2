import type { StreamTransport, TransportLogger } from '../types/plugin.js';
import { GenAIError } from '../errors/GenAIError.js';
import { HttpTransport } from '../transport/HttpTransport.js';
import { GenerativeModel, type ModelParams } from './GenerativeModel.js';

const DEFAULT_LOCATION = 'us-central1';
const DEFAULT_API_VERSION = 'v1';

export interface GenAIClientConfig {
  projectId: string;
  location: string;
  /** Base URL of the service (default: `https://{location}-aiplatform.googleapis.com`). */
  apiEndpoint?: string;
  /** Version segment of every method path (default: 'v1'). */
  apiVersion?: string;
  /** Transport for all calls (default: an HttpTransport sharing this client's logger). */
  transport?: StreamTransport;
  /** Idle timeout per call in milliseconds. Falls back to the transport's own default. */
  timeout?: number;
  /** Optional logger for diagnostic events. */
  logger?: TransportLogger;
}

/**
 * Entry point of the library. Holds the project, location and transport shared
 * by every model created from it. Safe to use for any number of concurrent calls.
 */
export class GenAIClient {
  readonly projectId: string;
  readonly location: string;
  readonly apiEndpoint: string;
  readonly apiVersion: string;
  readonly transport: StreamTransport;
  readonly timeout?: number;
  readonly logger?: TransportLogger;

  constructor(config: GenAIClientConfig) {
    if (!config.projectId) throw GenAIError.invalidArgument('projectId is required');
    if (!config.location) throw GenAIError.invalidArgument('location is required');

    this.projectId = config.projectId;
    this.location = config.location;
    this.apiEndpoint = (config.apiEndpoint ?? `https://${config.location}-aiplatform.googleapis.com`).replace(/\/+$/, '');
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.logger = config.logger;
    this.timeout = config.timeout;
    this.transport = config.transport ?? new HttpTransport({ logger: config.logger });
  }

  /**
   * Create a client from `GCP_PROJECT_ID`, `GCP_LOCATION` (default: us-central1)
   * and `GENAI_API_ENDPOINT`. Explicit overrides win over the environment.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides?: Partial<GenAIClientConfig>,
  ): GenAIClient {
    const projectId = overrides?.projectId ?? env.GCP_PROJECT_ID;
    if (!projectId) {
      throw GenAIError.invalidArgument('GCP_PROJECT_ID is not set');
    }
    return new GenAIClient({
      ...overrides,
      projectId,
      location: overrides?.location ?? env.GCP_LOCATION ?? DEFAULT_LOCATION,
      apiEndpoint: overrides?.apiEndpoint ?? env.GENAI_API_ENDPOINT,
    });
  }

  /** Create a model handle. Models are cheap; create one per configuration. */
  generativeModel(name: string, params?: ModelParams): GenerativeModel {
    if (!name) throw GenAIError.invalidArgument('model name is required');
    return new GenerativeModel(this, name, params);
  }

  /** Full resource name of a publisher model in this client's project and location. */
  modelResourceName(name: string): string {
    return `projects/${this.projectId}/locations/${this.location}/publishers/google/models/${name}`;
  }

  /** URL of an RPC method on a model resource. */
  methodUrl(resourceName: string, method: 'streamGenerateContent' | 'countTokens'): string {
    return `${this.apiEndpoint}/${this.apiVersion}/${resourceName}:${method}`;
  }

  /** Release the transport. */
  async close(): Promise<void> {
    if (this.transport.close) {
      await this.transport.close();
    }
  }
}
