#!/usr/bin/env node
/**
 * kube-preflight CLI
 * Boots the MCP server on stdio, or inspects tools and toolchain and exits
 */

import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { exit, argv, env } from 'node:process';
import { z } from 'zod';
import { createApp, APP_NAME, type TransportConfig } from '@/app';
import { loadConfig, type AppConfig } from '@/config/index';
import { ENV_VARS } from '@/config/constants';
import { createLogger, type Logger } from '@/lib/logger';
import { OUTPUTFORMAT, type OutputFormat } from '@/mcp/mcp-server';
import type { DependencyStatus } from '@/infra/health/checks';
import {
  logStartup,
  logStartupSuccess,
  logStartupFailure,
  installShutdownHandlers,
} from '@/lib/runtime-logging';

// src/cli and dist/cli both sit two levels below the package root
const packageJsonSchema = z.object({ version: z.string() });
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')),
);

const outputFormats: readonly string[] = Object.values(OUTPUTFORMAT);

function isOutputFormat(value: string): value is OutputFormat {
  return outputFormats.includes(value);
}

program
  .name(APP_NAME)
  .description('MCP server that validates Kubernetes manifests, overlays and charts before commit')
  .version(packageJson.version)
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error (default: info)')
  .option('--dev', 'enable development mode with debug logging')
  .option('--output-format <format>', `tool response format: ${outputFormats.join(', ')}`)
  .option('--validate', 'validate configuration and exit')
  .option('--list-tools', 'list all registered MCP tools and exit')
  .option('--health-check', 'check kubectl, helm, flux and kubeconform availability and exit')
  .addHelpText(
    'after',
    `

Examples:
  $ ${APP_NAME}                          Start server with stdio transport
  $ ${APP_NAME} --dev                    Start with debug logging
  $ ${APP_NAME} --list-tools             Show all available MCP tools
  $ ${APP_NAME} --health-check           Check external tool availability

Environment Variables:
  ${ENV_VARS.LOG_LEVEL}                              Logging level
  ${ENV_VARS.KUBECTL_TIMEOUT}    kubectl timeout in seconds (default 60)
  ${ENV_VARS.HELM_TIMEOUT}       helm timeout in seconds (default 60)
  ${ENV_VARS.FLUX_TIMEOUT}       flux timeout in seconds (default 60)
  ${ENV_VARS.KUBECONFORM_TIMEOUT}  kubeconform timeout in seconds (default 120)
  ${ENV_VARS.KILL_GRACE}         seconds between SIGTERM and SIGKILL (default 5)
  ${ENV_VARS.SCHEMA_LOCATIONS}   comma-separated extra kubeconform schema locations
  ${ENV_VARS.OUTPUT_FORMAT}      default tool response format
`,
  );

program.parse(argv);

interface CliOptions {
  logLevel?: string;
  dev?: boolean;
  outputFormat?: string;
  validate?: boolean;
  listTools?: boolean;
  healthCheck?: boolean;
}

const options = program.opts<CliOptions>();

function describeDependency(name: string, status: DependencyStatus): string {
  if (status.available) {
    return `  [ok]      ${name}: ${status.version ?? 'available'}`;
  }
  return `  [missing] ${name}: ${status.error ?? 'unavailable'}`;
}

function printConfig(config: AppConfig): void {
  console.error('Configuration:');
  console.error(`  Log level: ${config.logLevel}`);
  console.error(`  Output format: ${config.outputFormat}`);
  console.error(
    `  Timeouts (ms): kubectl=${config.timeouts.kubectl} helm=${config.timeouts.helm} ` +
      `flux=${config.timeouts.flux} kubeconform=${config.timeouts.kubeconform}`,
  );
  console.error(`  Kill grace (ms): ${config.killGracePeriodMs}`);
  console.error(
    `  Schema locations: ${config.schemaLocations.length > 0 ? config.schemaLocations.join(', ') : '(default)'}`,
  );
}

async function main(): Promise<void> {
  if (options.dev) env.LOG_LEVEL = 'debug';
  if (options.logLevel) env.LOG_LEVEL = options.logLevel;

  if (options.outputFormat !== undefined && !isOutputFormat(options.outputFormat)) {
    console.error(`Invalid --output-format: ${options.outputFormat}`);
    console.error(`Expected one of: ${outputFormats.join(', ')}`);
    exit(1);
  }

  const configResult = loadConfig(env);
  if (!configResult.ok) {
    console.error(configResult.error);
    if (configResult.guidance?.resolution) {
      console.error(configResult.guidance.resolution);
    }
    exit(1);
  }
  const appConfig = configResult.value;

  const logger: Logger = createLogger({ name: 'cli', level: appConfig.logLevel });
  const quiet = Boolean(env.MCP_QUIET);

  try {
    if (options.validate) {
      printConfig(appConfig);
      console.error('\nConfiguration is valid.');
      exit(0);
    }

    const outputFormat =
      options.outputFormat !== undefined && isOutputFormat(options.outputFormat)
        ? options.outputFormat
        : appConfig.outputFormat;

    const app = createApp({ logger, appConfig, outputFormat });

    if (options.listTools) {
      logger.info('Listing available tools');
      const tools = app.listTools();

      console.error('\nAvailable MCP Tools:');
      console.error('='.repeat(60));
      for (const tool of tools) {
        const marker = tool.requiresContext ? ' [needs context]' : '';
        console.error(`  ${tool.name.padEnd(20)} ${tool.description}${marker}`);
      }
      console.error(`\nTotal tools: ${tools.length}`);
      exit(0);
    }

    if (options.healthCheck) {
      logger.info('Performing health check');
      const health = await app.healthCheck();

      console.error('Health Check Results');
      console.error('='.repeat(40));
      console.error(`Status: ${health.status}`);
      console.error(`Tools loaded: ${health.tools}`);
      console.error('\nDependencies:');
      for (const [name, status] of Object.entries(health.dependencies)) {
        console.error(describeDependency(name, status));
      }
      exit(health.status === 'healthy' ? 0 : 1);
    }

    const transportConfig: TransportConfig = { transport: 'stdio' };

    logStartup(
      {
        appName: APP_NAME,
        version: packageJson.version,
        logLevel: appConfig.logLevel,
        transport: transportConfig,
        devMode: options.dev,
        toolCount: app.listTools().length,
      },
      logger,
      quiet,
    );

    await app.startServer(transportConfig);
    logStartupSuccess(transportConfig, logger, quiet);

    installShutdownHandlers(app, logger, quiet);
  } catch (error) {
    logStartupFailure(error, logger, quiet);
    exit(1);
  }
}

void main();
