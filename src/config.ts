import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError, errorMessage } from './errors';
import { AppConfig, FileSystem, LogLevel } from './types';

export const DEFAULT_CONFIG_PATH = './gateway.yaml';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'disabled'];

// Unrecognised levels fall back to the most verbose one instead of failing startup
const logLevelSchema = z
  .unknown()
  .transform((value): LogLevel => {
    if (value === undefined || value === null) return 'info';
    const normalized = String(value).trim().toLowerCase();
    return LOG_LEVELS.find(level => level === normalized) ?? 'debug';
  });

const timeoutMsSchema = z.coerce.number().int().positive();

const upstreamSchema = z.object({
  id: z.string().min(1, 'Upstream id is required'),
  type: z.literal('evm').default('evm'),
  endpoint: z.string().url('Upstream endpoint must be an absolute URL'),
  metadata: z
    .object({
      evmChainId: z.number().int().positive().safe().optional()
    })
    .passthrough()
    .default({})
});

const projectSchema = z
  .object({
    id: z.string().min(1, 'Project id is required'),
    description: z.string().optional(),
    responseTimeoutMs: timeoutMsSchema.optional(),
    upstreams: z.array(upstreamSchema).default([])
  })
  .superRefine((project, ctx) => {
    const seen = new Set<string>();
    project.upstreams.forEach((upstream, index) => {
      if (seen.has(upstream.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate upstream id "${upstream.id}" in project "${project.id}"`,
          path: ['upstreams', index, 'id']
        });
      }
      seen.add(upstream.id);
    });
  });

export const appConfigSchema = z
  .object({
    logLevel: logLevelSchema,
    server: z
      .object({
        httpHost: z.string().min(1).default('0.0.0.0'),
        // Range is checked by the listener, so a bad port is a bind failure
        httpPort: z.coerce.number().int().default(4000),
        shutdownGraceMs: timeoutMsSchema.default(10000)
      })
      .default({}),
    timeouts: z
      .object({
        defaultResponseTimeoutMs: timeoutMsSchema.default(30000),
        chainIdProbeTimeoutMs: timeoutMsSchema.default(5000)
      })
      .default({}),
    bootstrap: z
      .object({
        probeRetries: z.coerce.number().int().min(0).default(0)
      })
      .default({}),
    projects: z.array(projectSchema).default([])
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.projects.forEach((project, index) => {
      if (seen.has(project.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate project id "${project.id}"`,
          path: ['projects', index, 'id']
        });
      }
      seen.add(project.id);
    });
  });

export const nodeFileSystem: FileSystem = {
  existsSync: (path) => fs.existsSync(path),
  readFileSync: (path, encoding) => fs.readFileSync(path, encoding)
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parses and validates a configuration document. An empty document yields the
 * defaults.
 */
export function parseConfig(source: string): AppConfig {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    throw new ConfigError(`failed to load configuration: ${errorMessage(error)}`, error);
  }

  const result = appConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`failed to load configuration: ${formatIssues(result.error)}`, result.error);
  }

  return result.data;
}

export function loadConfig(fileSystem: FileSystem, configPath: string): AppConfig {
  if (!fileSystem.existsSync(configPath)) {
    throw new ConfigError(`config file ${configPath} does not exist`);
  }

  let source: string;
  try {
    source = fileSystem.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`failed to load configuration: cannot read ${configPath}`, error);
  }

  return parseConfig(source);
}
