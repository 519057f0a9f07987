import { promises as fs, unlinkSync } from 'node:fs';

export interface LockHandle {
  readonly path: string;
  release(): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Take the single-writer lock of a store file. Fails if another writer holds it.
 */
export async function acquireLock(basePath: string): Promise<LockHandle> {
  const lockPath = `${basePath}.lock`;
  let fh: fs.FileHandle;
  try {
    fh = await fs.open(lockPath, 'wx'); // fail if exists
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Store is locked by another writer: ${reason}`);
  }
  const payload = Buffer.from(
    JSON.stringify({ pid: process.pid, startedAt: Date.now() }, null, 2),
    'utf8',
  );
  await fh.write(payload, 0, payload.length, 0);
  await fh.sync();
  await fh.close();

  // last resort when the process exits without close()
  const onExit = (): void => {
    try {
      unlinkSync(lockPath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  };
  process.once('exit', onExit);

  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) return;
      released = true;
      process.removeListener('exit', onExit);
      try {
        await fs.unlink(lockPath);
      } catch (error) {
        if (!isMissingFile(error)) throw error;
      }
    },
  };
}
