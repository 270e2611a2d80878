import { statfs } from 'node:fs/promises';

const BYTES_PER_GIB = 1024 ** 3;

/** Space available to this process under `dir`, in GiB with one decimal; -1 when it cannot be read. */
export async function diskFreeGb(dir: string): Promise<number> {
  try {
    const stats = await statfs(dir);
    return Math.round(((stats.bavail * stats.bsize) / BYTES_PER_GIB) * 10) / 10;
  } catch (err) {
    console.warn(`[disk-usage] cannot stat ${dir}`, err instanceof Error ? err.message : err);
    return -1;
  }
}
