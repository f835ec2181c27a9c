import { BootstrapError, ConfigError, HttpServerError } from './errors';

export const EXIT_CODES = {
  CONFIG_LOAD_FAILED: 10,
  BOOTSTRAP_FAILED: 11,
  HTTP_SERVER_FAILED: 12,
  UNKNOWN_FAILURE: 1,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_LOAD_FAILED;
  if (error instanceof BootstrapError) return EXIT_CODES.BOOTSTRAP_FAILED;
  if (error instanceof HttpServerError) return EXIT_CODES.HTTP_SERVER_FAILED;
  return EXIT_CODES.UNKNOWN_FAILURE;
}
