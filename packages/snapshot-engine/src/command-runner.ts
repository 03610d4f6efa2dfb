/**
 * Thin wrapper over child_process.spawn.
 *
 * Engines depend on the CommandRunner type, so tests can substitute a fake.
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface CommandRequest {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
  /** Called for every complete stdout line while the process runs */
  onStdoutLine?: (line: string) => void;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

/**
 * Decode a byte stream as UTF-8. A character split across chunks is
 * delivered whole in the later chunk.
 */
export function readText(stream: Readable, onText: (text: string) => void): void {
  stream.setEncoding('utf8');
  stream.on('data', (text: string) => {
    onText(text);
  });
}

/**
 * Reassemble lines from text that arrives in arbitrary chunks
 */
export function createLineBuffer(onLine: (line: string) => void): {
  push: (text: string) => void;
  flush: () => void;
} {
  let pending = '';
  return {
    push(text) {
      pending += text;
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        onLine(line);
      }
    },
    flush() {
      if (pending.length > 0) {
        onLine(pending);
        pending = '';
      }
    },
  };
}

/**
 * Spawn the command without a shell and collect its output.
 * Rejects only when the process could not be started (e.g. ENOENT).
 */
export const spawnCommand: CommandRunner = (request) =>
  new Promise((resolve, reject) => {
    const child = spawn(request.command, request.args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    const lines = request.onStdoutLine ? createLineBuffer(request.onStdoutLine) : undefined;

    readText(child.stdout, (text) => {
      stdout += text;
      lines?.push(text);
    });

    readText(child.stderr, (text) => {
      stderr += text;
    });

    child.on('close', (code) => {
      lines?.flush();
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    child.on('error', (error) => {
      reject(error);
    });
  });
