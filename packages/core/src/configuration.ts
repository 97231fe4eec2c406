import { z } from "zod";
import { ConfigurationError } from "./models/network-service-error";
import { CompletionQueues, type CompletionQueue } from "./utils/completion-queue";
import { silentLogger, type Logger } from "./utils/logger";

/**
 * Settings shared by every call of a {@link NetworkService}.
 */
export interface NetworkServiceConfiguration {
  /** Used by requests that do not specify their own host */
  host?: string;
  /** Sent with every request; request headers take precedence */
  headers?: Record<string, string>;
  logger?: Logger;
  /** Default queue for calls and batch completions */
  queue?: CompletionQueue;
}

/**
 * Configuration with defaults applied.
 */
export interface ResolvedConfiguration {
  readonly host?: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly logger: Logger;
  readonly queue: CompletionQueue;
}

const configurationSchema = z.object({
  host: z.string().url().optional(),
  headers: z.record(z.string()).optional(),
});

/**
 * Validates a configuration and fills in defaults.
 *
 * @throws {ConfigurationError} If `host` is not an absolute URL or a header value is not a string
 */
export function resolveConfiguration(
  configuration: NetworkServiceConfiguration = {}
): ResolvedConfiguration {
  const result = configurationSchema.safeParse({
    host: configuration.host,
    headers: configuration.headers,
  });
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join(", ")}`);
  }

  return {
    host: result.data.host,
    headers: result.data.headers ?? {},
    logger: configuration.logger ?? silentLogger,
    queue: configuration.queue ?? CompletionQueues.immediate,
  };
}
