import fs from 'fs';

export type FsMethod = 'close' | 'read' | 'rename' | 'rm' | 'rmdir' | 'unlink' | 'write' | 'writev';
export type Forward = (...args: unknown[]) => unknown;
export type Restore = () => void;

export function ioError(syscall: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`EIO: i/o error, ${syscall}`);
  err.code = 'EIO';
  err.errno = -5;
  err.syscall = syscall;
  return err;
}

/**
 * Route calls to an `fs` method through `replacement` until the returned function is called
 */
export function stubFs(method: FsMethod, replacement: (original: Forward, args: unknown[]) => void): Restore {
  const descriptor = Object.getOwnPropertyDescriptor(fs, method);
  const original: unknown = Reflect.get(fs, method);
  if (!descriptor || typeof original !== 'function') throw new Error(`fs.${method} is not a function`);

  const forward: Forward = (...args) => Reflect.apply(original, fs, args);
  Object.defineProperty(fs, method, {
    configurable: true,
    writable: true,
    value: (...args: unknown[]) => {
      replacement(forward, args);
    },
  });
  return () => {
    Object.defineProperty(fs, method, descriptor);
  };
}

/**
 * Make every call to an `fs` method fail with EIO through its callback
 */
export function failFs(method: FsMethod): Restore {
  return stubFs(method, (_original, args) => {
    const callback = args[args.length - 1];
    if (typeof callback !== 'function') throw new Error(`fs.${method} called without a callback`);
    process.nextTick(() => callback(ioError(method)));
  });
}

export function restoreAll(restores: Restore[]): void {
  while (restores.length) {
    const restore = restores.pop();
    if (restore) restore();
  }
}
