import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createCli } from '../../src/cli/cli.js';
import {
  collectDiagnostics,
  type DiagnoseReport,
  formatReport,
  isHealthy,
} from '../../src/cli/commands/diagnose.js';
import { loadVersion, maskSecret } from '../../src/cli/commands/shared.js';
import { isolateEnv, MockBackend, testConfig } from '../helpers/mock-backend.js';

function parseReport(output: unknown): DiagnoseReport {
  if (typeof output !== 'string') {
    throw new Error('expected JSON output');
  }
  const parsed: DiagnoseReport = JSON.parse(output);
  return parsed;
}

describe('vigil CLI', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateEnv();
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    restoreEnv();
  });

  test('registers diagnose and version commands', () => {
    const cli = createCli('1.2.3');

    expect(cli.name()).toBe('vigil');
    expect(cli.commands.map((command) => command.name())).toEqual(['diagnose', 'version']);
  });

  test('version prints the agent version', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createCli('1.2.3').parseAsync(['node', 'vigil', 'version']);

    expect(logSpy).toHaveBeenCalledWith('1.2.3');
  });

  test('diagnose --json reports an active agent with a masked key', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const cli = createCli('1.2.3', { config: testConfig, backend: new MockBackend() });

    await cli.parseAsync(['node', 'vigil', 'diagnose', '--json']);

    const report = parseReport(logSpy.mock.calls[0]?.[0]);
    expect(report.agent.version).toBe('1.2.3');
    expect(report.host.hostname).toBe('test-host');
    expect(report.config.active).toBe(true);
    expect(report.config.valid).toBe(true);
    expect(report.config.values?.pushApiKey).toBe('test****');
    expect(report.config.issues).toEqual([]);
    expect(report.backend).toEqual({ transport: 'http', state: 'active' });
    expect(process.exitCode).toBeUndefined();
  });

  test('diagnose exits with 1 when the configuration is invalid', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const cli = createCli('1.2.3', { config: { active: true }, backend: new MockBackend() });

    await cli.parseAsync(['node', 'vigil', 'diagnose', '--json']);

    const report = parseReport(logSpy.mock.calls[0]?.[0]);
    expect(report.config.valid).toBe(false);
    expect(report.config.values).toBeNull();
    expect(report.config.issues).toEqual(['pushApiKey: Required']);
    expect(report.backend).toEqual({ transport: null, state: 'failed' });
    expect(process.exitCode).toBe(1);
  });

  test('diagnose prints a readable report', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const cli = createCli('1.2.3', {
      config: { ...testConfig, active: false },
      backend: new MockBackend(),
    });

    await cli.parseAsync(['node', 'vigil', 'diagnose']);

    const lines = logSpy.mock.calls.map(([line]) => line);
    expect(lines.slice(0, 2)).toEqual(['Agent', '  version: 1.2.3']);
    expect(lines).toContain('  pushApiKey: test****');
    expect(lines).toContain('  filterParameters: password, password_confirmation');
    expect(lines.slice(-3)).toEqual(['Backend', '  transport: http', '  state: disabled']);
    expect(process.exitCode).toBeUndefined();
  });
});

describe('diagnostics', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateEnv();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    restoreEnv();
  });

  test('a backend that does not load is unhealthy', async () => {
    const backend = new MockBackend();
    backend.loadOnStart = false;

    const report = await collectDiagnostics('1.2.3', { config: testConfig, backend });

    expect(report.backend.state).toBe('failed');
    expect(isHealthy(report)).toBe(false);
    expect(backend.stopCalls).toBe(1);
  });

  test('lists validation issues in the readable report', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const report = await collectDiagnostics('1.2.3', { config: { active: true } });

    expect(formatReport(report)).toContain('  invalid pushApiKey: Required');
  });
});

describe('maskSecret', () => {
  test('keeps only the first four characters', () => {
    expect(maskSecret('test-secret')).toBe('test****');
    expect(maskSecret('abc')).toBe('****');
  });
});

describe('loadVersion', () => {
  test('reads the agent package version', async () => {
    expect(await loadVersion()).toBe('0.4.0');
  });
});
