import { spawn } from 'child_process';

/**
 * Run this Node.js binary again with `args` and `env`, sharing stdio; resolves with its exit
 * code. Settings libuv reads once at startup, such as UV_THREADPOOL_SIZE, reach the new
 * process before anything starts the pool.
 */
export default function relaunch(args: string[], env: Record<string, string | undefined>): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, [...process.execArgv, ...args], { env, stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code, signal) => {
      resolve(code ?? (signal ? 1 : 0));
    });
  });
}
