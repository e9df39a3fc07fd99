import { Injectable } from '@nestjs/common';
import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order */
  output: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: { cwd: string }): Promise<CommandResult>;
}

/**
 * Runs a process without a shell and without a time limit; git fetches
 * on large repositories can take a long while.
 */
@Injectable()
export class CommandRunnerService implements CommandRunner {
  run(command: string, args: readonly string[], options: { cwd: string }): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      const chunks: string[] = [];
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: process.env,
        shell: false,
      });

      child.stdout?.on('data', (buf: Buffer) => chunks.push(buf.toString('utf8')));
      child.stderr?.on('data', (buf: Buffer) => chunks.push(buf.toString('utf8')));

      // 'error' (e.g. ENOENT) may be followed by 'close'; settle once.
      let settled = false;
      const settle = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      child.on('close', (code) => settle({ exitCode: code ?? 1, output: chunks.join('') }));
      child.on('error', (err) =>
        settle({ exitCode: 1, output: `${chunks.join('')}Execution error: ${err.message}` }),
      );
    });
  }
}
