import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { AppConfig, FileSystem } from './types';
import { BootstrapService } from './services/BootstrapService';
import { Logger } from './services/Logger';
import { createUpstreamBehaviors } from './services/UpstreamKinds';
import { UpstreamRegistry } from './services/UpstreamRegistry';
import { UpstreamService } from './services/UpstreamService';
import { DefaultRoutingStrategy } from './strategy/RoutingStrategy';
import { startServer } from './server';

export interface Gateway {
  address: string;
  config: AppConfig;
  registry: UpstreamRegistry;
  shutdown: () => Promise<void>;
}

/**
 * Loads the configuration named by `args[1]`, bootstraps every upstream and
 * starts serving. Rejects with ConfigError, BootstrapError or HttpServerError;
 * after a rejection nothing is listening.
 */
export async function init(fileSystem: FileSystem, args: readonly string[]): Promise<Gateway> {
  const configPath = args[1] ?? DEFAULT_CONFIG_PATH;
  const config = loadConfig(fileSystem, configPath);
  const logger = new Logger({ level: config.logLevel });
  logger.info(`✅ Configuration loaded from ${configPath}`);

  const upstreamService = new UpstreamService(logger);
  const behaviors = createUpstreamBehaviors(upstreamService);

  const bootstrapper = new BootstrapService(behaviors, logger, {
    probeTimeoutMs: config.timeouts.chainIdProbeTimeoutMs,
    probeRetries: config.bootstrap.probeRetries,
  });
  const bootstrap = await bootstrapper.bootstrap(config.projects);
  if (!bootstrap.success) {
    throw bootstrap.error;
  }

  const projectResponseTimeouts = new Map<string, number>();
  for (const project of config.projects) {
    if (project.responseTimeoutMs !== undefined) {
      projectResponseTimeouts.set(project.id, project.responseTimeoutMs);
    }
  }

  const strategy = new DefaultRoutingStrategy(bootstrap.registry, behaviors, logger, {
    defaultResponseTimeoutMs: config.timeouts.defaultResponseTimeoutMs,
    projectResponseTimeouts,
  });

  const running = await startServer(config.server, strategy, logger);

  return {
    address: running.address,
    config,
    registry: bootstrap.registry,
    shutdown: running.shutdown,
  };
}
