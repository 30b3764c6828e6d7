// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.

export interface ScorerConfig {
  /** Invocation URL of the hosted model endpoint */
  endpointUrl: string;
  timeoutMs: number;
  /** Sent as a bearer token when non-empty */
  authToken: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  scorer: ScorerConfig;
}

export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '4000', 10),

  scorer: {
    endpointUrl:
      process.env.SCORER_ENDPOINT_URL ?? 'http://localhost:8080/invocations',
    timeoutMs: parseInt(process.env.SCORER_TIMEOUT_MS ?? '5000', 10),
    authToken: process.env.SCORER_AUTH_TOKEN ?? '',
  },
});
