import { Command, CommanderError } from 'commander';
import { EXIT_CODES } from '../server/utils/constants';
import { formatCommand } from './commands/format';
import { processOutput, type CliOutput } from './terminal';

export const VERSION = '0.3.0';

export function buildProgram(output: CliOutput, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('cfgfmt')
    .description('Whitespace formatter and aligner for game .cfg scripts (never changes what a line says)')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: text => output.stdout(text.trimEnd()),
      writeErr: text => output.stderr(text.trimEnd())
    });

  const format = formatCommand(output, setExitCode)
    .exitOverride()
    .configureOutput({
      writeOut: text => output.stdout(text.trimEnd()),
      writeErr: text => output.stderr(text.trimEnd()),
      outputError: (text, write) => write(`${text.trimEnd()}\nhint: run \`cfgfmt format --help\` for usage.`)
    });
  program.addCommand(format);

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and run
 * @returns The process exit code
 */
export async function runCli(args: string[], output: CliOutput = processOutput): Promise<number> {
  let exitCode: number = EXIT_CODES.SUCCESS;
  const program = buildProgram(output, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end parsing with exit code 0
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
    }
    throw error;
  }
  return exitCode;
}
