import { Command } from 'commander';
import { registerDiagnoseCommand } from './commands/diagnose.js';
import { type CliDependencies, loadVersion } from './commands/shared.js';

export function createCli(version: string, dependencies: CliDependencies = {}): Command {
  const program = new Command()
    .name('vigil')
    .description('Vigil agent command line')
    .version(version)
    .showHelpAfterError('(run with --help for usage)')
    .showSuggestionAfterError(true);

  program.addHelpText(
    'after',
    ['', 'Examples:', '  vigil diagnose', '  vigil diagnose --json'].join('\n')
  );

  registerDiagnoseCommand(program, version, dependencies);

  program
    .command('version')
    .description('Print agent version')
    .action(() => {
      console.log(version);
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const version = await loadVersion();
  const program = createCli(version);
  await program.parseAsync(argv);
}
