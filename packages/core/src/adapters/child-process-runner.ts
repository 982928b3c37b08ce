import { spawn } from 'node:child_process';
import type { CommandSpec, ProcessResult, ProcessRunner, ProcessRunOptions } from '../ports/process-runner.js';
import { ToolNotFoundError, UserCancelledError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('process-runner');

const KILL_GRACE_MS = 3000;

function mergedEnv(commandEnv?: Record<string, string>): NodeJS.ProcessEnv {
  return { ...process.env, ...commandEnv };
}

export class ChildProcessRunner implements ProcessRunner {
  run(spec: CommandSpec, options: ProcessRunOptions = {}): Promise<ProcessResult> {
    const { abortSignal } = options;
    if (abortSignal?.aborted) return Promise.reject(new UserCancelledError());

    return new Promise((resolve, reject) => {
      log.debug(`run: ${spec.command} ${spec.args.join(' ')}`);

      const child = spawn(spec.command, spec.args, {
        cwd: options.cwd,
        env: mergedEnv(spec.env),
        stdio: options.inheritOutput ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      const terminate = () => {
        child.kill('SIGTERM');
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
        }, KILL_GRACE_MS).unref();
      };

      const timer = options.timeoutSeconds
        ? setTimeout(() => {
            timedOut = true;
            log.warn(`run: ${spec.command} timed out after ${options.timeoutSeconds}s`);
            terminate();
          }, options.timeoutSeconds * 1000)
        : undefined;

      abortSignal?.addEventListener('abort', terminate, { once: true });

      const finish = () => {
        settled = true;
        if (timer) clearTimeout(timer);
        abortSignal?.removeEventListener('abort', terminate);
      };

      child.stdout?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding('utf-8');
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        finish();
        if (err.code === 'ENOENT') {
          reject(new ToolNotFoundError(spec.command));
        } else {
          reject(err);
        }
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        finish();
        if (abortSignal?.aborted) {
          reject(new UserCancelledError());
          return;
        }
        resolve({ exitCode: code, signal, stdout, stderr, timedOut });
      });
    });
  }
}
