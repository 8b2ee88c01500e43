import { arch, hostname, platform } from 'node:os';
import type { Command } from 'commander';
import { type Config, describeConfigError, resolveConfig } from '../../config.js';
import { ConfigLifecycle, type LifecycleState } from '../../lifecycle.js';
import { type CliDependencies, maskSecret, printJson } from './shared.js';

export type DiagnoseReport = {
  agent: { version: string };
  runtime: { node: string; platform: string; arch: string };
  host: { hostname: string };
  config: {
    active: boolean;
    valid: boolean;
    values: Record<string, unknown> | null;
    issues: string[];
  };
  backend: { transport: Config['transport'] | null; state: LifecycleState };
};

const HEALTHY_STATES: ReadonlySet<LifecycleState> = new Set(['active', 'disabled']);

/**
 * Resolve the configuration and start the backend once, reporting what happened
 */
export async function collectDiagnostics(
  version: string,
  dependencies: CliDependencies = {}
): Promise<DiagnoseReport> {
  const resolution = resolveConfig(dependencies.config);
  const config = resolution.result.success ? resolution.result.config : null;

  const lifecycle = new ConfigLifecycle({
    config: dependencies.config,
    backend: dependencies.backend,
  });
  const state = await lifecycle.initialize();
  await lifecycle.stop();

  return {
    agent: { version },
    runtime: { node: process.version, platform: platform(), arch: arch() },
    host: { hostname: config?.hostname ?? hostname() },
    config: {
      active: resolution.active,
      valid: resolution.result.success,
      values: config ? { ...config, pushApiKey: maskSecret(config.pushApiKey) } : null,
      issues: resolution.result.success ? [] : describeConfigError(resolution.result.error),
    },
    backend: { transport: config?.transport ?? null, state },
  };
}

export function isHealthy(report: DiagnoseReport): boolean {
  return HEALTHY_STATES.has(report.backend.state);
}

export function formatReport(report: DiagnoseReport): string[] {
  const lines = [
    'Agent',
    `  version: ${report.agent.version}`,
    `  node: ${report.runtime.node}`,
    `  platform: ${report.runtime.platform} (${report.runtime.arch})`,
    `  hostname: ${report.host.hostname}`,
    'Configuration',
    `  active: ${report.config.active}`,
    `  valid: ${report.config.valid}`,
  ];

  if (report.config.values) {
    for (const [key, value] of Object.entries(report.config.values)) {
      if (key === 'retryOnStatusCodes') {
        continue;
      }
      lines.push(`  ${key}: ${Array.isArray(value) ? value.join(', ') : String(value)}`);
    }
  }
  for (const issue of report.config.issues) {
    lines.push(`  invalid ${issue}`);
  }

  lines.push(
    'Backend',
    `  transport: ${report.backend.transport ?? 'none'}`,
    `  state: ${report.backend.state}`
  );
  return lines;
}

export function registerDiagnoseCommand(
  program: Command,
  version: string,
  dependencies: CliDependencies
): void {
  program
    .command('diagnose')
    .description('Check the agent configuration and backend startup')
    .option('--json', 'Print the report as JSON')
    .action(async (options: { json?: boolean }) => {
      const report = await collectDiagnostics(version, dependencies);

      if (options.json) {
        printJson(report);
      } else {
        for (const line of formatReport(report)) {
          console.log(line);
        }
      }

      if (!isHealthy(report)) {
        process.exitCode = 1;
      }
    });
}
