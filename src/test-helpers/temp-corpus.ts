import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export interface TempCorpus {
  root: string;
  write(relativePath: string, content: string): Promise<string>;
  remove(relativePath: string): Promise<void>;
  cleanup(): Promise<void>;
}

/**
 * Corpus root in a fresh temp directory.
 * Paths are relative to the root, e.g. 'invoices/invoice_1.txt'.
 */
export async function createTempCorpus(
  files: Record<string, string> = {}
): Promise<TempCorpus> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-test-'));

  const write = async (relativePath: string, content: string) => {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    await write(relativePath, content);
  }

  return {
    root,
    write,
    remove: relativePath => fs.rm(path.join(root, relativePath)),
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
