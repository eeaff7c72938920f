declare module 'mkdirp-classic' {
  type MkdirpCallback = (err: NodeJS.ErrnoException | null, made?: string | null) => void;

  interface Mkdirp {
    (dir: string, callback: MkdirpCallback): void;
    (dir: string, mode: number, callback: MkdirpCallback): void;
    sync(dir: string, mode?: number): string | null;
  }

  const mkdirp: Mkdirp;
  export = mkdirp;
}
