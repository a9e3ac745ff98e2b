import { z } from 'zod';
import type { BackendConfig } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { DEFAULT_TIMEOUT_MS } from '../utils/deadline.js';

export type GatewayConfig = {
  readonly defaultTimeoutMs: number;
  /** Backends in the order they were declared. */
  readonly models: ReadonlyArray<BackendConfig>;
};

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Adds `https://` to an endpoint without a scheme and drops trailing slashes.
 */
export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return withScheme.replace(/\/+$/, '');
}

const backendSchema = z
  .object({
    vendor: z.enum(['openai-compatible', 'anthropic']).default('openai-compatible'),
    endpoint: z.string().min(1, 'endpoint is required'),
    model: z.string().min(1, 'model is required'),
    credential: z.string().min(1).optional(),
    credentialEnv: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    maxTokens: z.number().int().positive().optional(),
  })
  .strict();

const gatewaySchema = z.object({
  defaultTimeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  models: z.record(z.string().min(1, 'model identifier must not be empty'), backendSchema),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a raw configuration object (as read from whatever file format the
 * host uses) and resolves credentials. A backend's `credentialEnv` variable,
 * when set and non-empty, takes precedence over its inline `credential`.
 */
export function loadGatewayConfig(raw: unknown, env: Environment = process.env): GatewayConfig {
  const result = gatewaySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`invalid gateway configuration: ${formatIssues(result.error)}`);
  }

  const problems: Array<string> = [];
  const models: Array<BackendConfig> = [];

  for (const [id, backend] of Object.entries(result.data.models)) {
    const fromEnv = backend.credentialEnv ? env[backend.credentialEnv] : undefined;
    const credential = fromEnv || backend.credential;

    if (!credential) {
      problems.push(
        backend.credentialEnv
          ? `models.${id}: no credential (set ${backend.credentialEnv} or credential)`
          : `models.${id}: no credential`,
      );
      continue;
    }

    models.push({
      id,
      vendor: backend.vendor,
      endpoint: normalizeEndpoint(backend.endpoint),
      credential,
      model: backend.model,
      ...(backend.timeoutMs !== undefined ? { timeoutMs: backend.timeoutMs } : {}),
      ...(backend.maxTokens !== undefined ? { maxTokens: backend.maxTokens } : {}),
    });
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`invalid gateway configuration: ${problems.join('; ')}`);
  }

  return {
    defaultTimeoutMs: result.data.defaultTimeoutMs,
    models,
  };
}
