import { describe, it, expect } from 'vitest';
import { GenAIClient } from '../../src/client/GenAIClient.js';
import { GenerativeModel } from '../../src/client/GenerativeModel.js';
import { HttpTransport } from '../../src/transport/HttpTransport.js';
import { GenAIError } from '../../src/errors/GenAIError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import { FakeTransport } from '../helpers/fakeTransport.js';

describe('GenAIClient', () => {
  describe('constructor', () => {
    it('derives the endpoint from the location', () => {
      const client = new GenAIClient({ projectId: 'test-project', location: 'europe-west4' });
      expect(client.apiEndpoint).toBe('https://europe-west4-aiplatform.googleapis.com');
      expect(client.apiVersion).toBe('v1');
      expect(client.transport).toBeInstanceOf(HttpTransport);
      expect(client.timeout).toBeUndefined();
    });

    it('trims trailing slashes from an explicit endpoint', () => {
      const client = new GenAIClient({ projectId: 'p', location: 'l', apiEndpoint: 'http://localhost:8080//' });
      expect(client.apiEndpoint).toBe('http://localhost:8080');
    });

    it.each([
      [{ projectId: '', location: 'us-central1' }, 'projectId is required'],
      [{ projectId: 'p', location: '' }, 'location is required'],
    ])('rejects %o', (config, message) => {
      expect(() => new GenAIClient(config)).toThrow(message);
    });
  });

  describe('fromEnv', () => {
    it('reads project, location and endpoint', () => {
      const client = GenAIClient.fromEnv({
        GCP_PROJECT_ID: 'env-project',
        GCP_LOCATION: 'asia-northeast1',
        GENAI_API_ENDPOINT: 'http://127.0.0.1:9999',
      });
      expect(client.projectId).toBe('env-project');
      expect(client.location).toBe('asia-northeast1');
      expect(client.apiEndpoint).toBe('http://127.0.0.1:9999');
    });

    it('defaults the location to us-central1', () => {
      const client = GenAIClient.fromEnv({ GCP_PROJECT_ID: 'env-project' });
      expect(client.location).toBe('us-central1');
      expect(client.apiEndpoint).toBe('https://us-central1-aiplatform.googleapis.com');
    });

    it('lets overrides win over the environment', () => {
      const transport = new FakeTransport();
      const client = GenAIClient.fromEnv(
        { GCP_PROJECT_ID: 'env-project', GCP_LOCATION: 'env-location' },
        { location: 'override-location', transport, timeout: 500 },
      );
      expect(client.projectId).toBe('env-project');
      expect(client.location).toBe('override-location');
      expect(client.transport).toBe(transport);
      expect(client.timeout).toBe(500);
    });

    it('requires a project id', () => {
      try {
        GenAIClient.fromEnv({});
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(GenAIError);
        expect(err).toMatchObject({ code: ErrorCodes.INVALID_ARGUMENT, message: 'GCP_PROJECT_ID is not set' });
      }
    });
  });

  describe('model resources', () => {
    const client = new GenAIClient({ projectId: 'test-project', location: 'us-central1', transport: new FakeTransport() });

    it('builds the full model resource name', () => {
      expect(client.modelResourceName('gemini-pro')).toBe(
        'projects/test-project/locations/us-central1/publishers/google/models/gemini-pro',
      );
    });

    it('builds method URLs', () => {
      expect(client.methodUrl('projects/p/models/m', 'countTokens')).toBe(
        'https://us-central1-aiplatform.googleapis.com/v1/projects/p/models/m:countTokens',
      );
    });

    it('creates models', () => {
      const model = client.generativeModel('gemini-pro');
      expect(model).toBeInstanceOf(GenerativeModel);
      expect(model.name).toBe('gemini-pro');
      expect(model.resourceName).toBe(client.modelResourceName('gemini-pro'));
    });

    it('rejects an empty model name', () => {
      expect(() => client.generativeModel('')).toThrow('model name is required');
    });
  });

  it('closes the transport', async () => {
    const transport = new FakeTransport();
    const client = new GenAIClient({ projectId: 'p', location: 'l', transport });
    await client.close();
    expect(transport.closed).toBe(true);
  });
});
