export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/**
 * Line-oriented output sinks, replaceable in tests
 */
export interface CliOutput {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
}

export const processOutput: CliOutput = {
  stdout: writeStdout,
  stderr: writeStderr
};
