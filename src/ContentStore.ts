import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { type Category, CATEGORY_DIRECTORIES } from './config';
import type { ConfigManager } from './ConfigManager';
import type { Document } from './document';
import { IOError } from './errors';
import { WithLogging } from './WithLogging';

/**
 * Holds the text of every loaded corpus file.
 * Files are read from disk once per load; lookups never touch disk.
 */
export class ContentStore extends WithLogging {
  protected readonly componentName = 'ContentStore';
  private documents: Map<Category, Map<string, Document>> = new Map();

  constructor(protected configManager: ConfigManager) {
    super();
  }

  /**
   * Scans the category directory below corpusRoot and caches each file.
   * Unreadable files are logged and skipped; a missing directory yields no
   * documents.
   */
  async load(corpusRoot: string, category: Category): Promise<Document[]> {
    const categoryDir = path.resolve(
      corpusRoot,
      CATEGORY_DIRECTORIES[category]
    );
    const extensions = this.configManager.get('fileExtensions');

    const files = await this.listFiles(categoryDir, extensions);
    const loaded = new Map<string, Document>();

    for (const filePath of files) {
      const id = toDocumentId(categoryDir, filePath);
      try {
        loaded.set(id, await readDocument(filePath, id, category));
      } catch (error) {
        const ioError = new IOError(filePath, error);
        this.warn(`Skipping document: ${ioError.message}`);
      }
    }

    this.documents.set(category, loaded);
    this.log(`Loaded ${loaded.size} ${category} documents from ${categoryDir}`);

    return this.list(category);
  }

  get(category: Category, documentId: string): Document | undefined {
    return this.documents.get(category)?.get(documentId);
  }

  /**
   * Documents of a category in lexical id order
   */
  list(category: Category): Document[] {
    const byId = this.documents.get(category);
    if (!byId) {
      return [];
    }
    return Array.from(byId.values()).sort((a, b) =>
      a.id < b.id ? -1 : a.id > b.id ? 1 : 0
    );
  }

  get size(): number {
    let total = 0;
    for (const byId of this.documents.values()) {
      total += byId.size;
    }
    return total;
  }

  private async listFiles(
    dir: string,
    extensions: string[]
  ): Promise<string[]> {
    const files: string[] = [];

    const walk = async (currentDir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(currentDir, { withFileTypes: true });
      } catch (error) {
        if (currentDir === dir && isNotFound(error)) {
          this.warn(`Category directory not found: ${dir}`);
        } else {
          const ioError = new IOError(currentDir, error);
          this.warn(`Skipping directory: ${ioError.message}`);
        }
        return;
      }

      for (const entry of entries) {
        const fullPath = path.join(currentDir, entry.name);

        if (entry.isDirectory() && !entry.name.startsWith('.')) {
          await walk(fullPath);
        } else if (
          entry.isFile() &&
          extensions.includes(path.extname(entry.name).toLowerCase())
        ) {
          files.push(fullPath);
        }
      }
    };

    await walk(dir);
    return files;
  }
}

async function readDocument(
  filePath: string,
  id: string,
  category: Category
): Promise<Document> {
  const buffer = await fs.readFile(filePath);
  return {
    id,
    category,
    path: filePath,
    content: buffer.toString('utf-8'),
    size: buffer.byteLength,
    loadedAt: Date.now(),
  };
}

function toDocumentId(categoryDir: string, filePath: string): string {
  return path.relative(categoryDir, filePath).split(path.sep).join('/');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
