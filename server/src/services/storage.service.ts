import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { isPlainFilename, sanitizeFilename } from "../utils/sanitizer";
import { FileNotFoundError, InvalidFilenameError } from "../errors";
import { FileRecord } from "../models/download.model";

export interface SavePath {
  path: string;
  name: string;
}

/** A write in progress: data goes to `tempPath` until it is committed. */
export interface StagedWrite {
  tempPath: string;
  commit(): Promise<void>;
  discard(): Promise<void>;
}

/**
 * Flat directory of received files. A file's name is its only identity;
 * size and modification time come from the filesystem.
 */
export class StorageService {
  readonly root: string;
  private reserved: Set<string> = new Set();

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async ensureRoot(): Promise<void> {
    try {
      await fs.promises.mkdir(this.root, { recursive: true });
      logger.info(`Downloads directory: ${this.root}`);
    } catch (error) {
      logger.error(`Error creating downloads directory ${this.root}:`, error);
      throw error;
    }
  }

  /**
   * Picks the target path for `name`. When the name is taken the result is
   * `<stem>_<disambiguator><ext>`, with a counter appended if that is taken
   * as well. The returned path stays reserved until the write staged for it
   * is committed or discarded.
   */
  async resolveSavePath(
    name: string,
    disambiguator: string | number,
  ): Promise<SavePath> {
    const safeName = sanitizeFilename(name, `file_${disambiguator}`);
    const ext = path.extname(safeName);
    const stem = path.basename(safeName, ext);

    for (let counter = 0; ; counter++) {
      let candidateName = safeName;
      if (counter === 1) candidateName = `${stem}_${disambiguator}${ext}`;
      if (counter > 1) candidateName = `${stem}_${disambiguator}_${counter}${ext}`;

      const candidate = path.join(this.root, candidateName);
      if (await this.reserve(candidate)) {
        return { path: candidate, name: candidateName };
      }
    }
  }

  stage(finalPath: string): StagedWrite {
    const tempPath = path.join(
      path.dirname(finalPath),
      `.${path.basename(finalPath)}.part`,
    );

    return {
      tempPath,
      commit: async () => {
        try {
          await fs.promises.rename(tempPath, finalPath);
        } finally {
          this.reserved.delete(finalPath);
        }
      },
      discard: async () => {
        try {
          await fs.promises.rm(tempPath, { force: true });
        } finally {
          this.reserved.delete(finalPath);
        }
      },
    };
  }

  /** Claims `filePath` for one writer; false when it exists or is claimed. */
  private async reserve(filePath: string): Promise<boolean> {
    if (this.reserved.has(filePath)) return false;
    if (await this.exists(filePath)) return false;
    // another writer may have claimed it while the disk was checked
    if (this.reserved.has(filePath)) return false;

    this.reserved.add(filePath);
    return true;
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async sizeOf(filePath: string): Promise<number> {
    const stat = await fs.promises.stat(filePath);
    return stat.size;
  }

  async list(): Promise<FileRecord[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.root, { withFileTypes: true });
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort();

    const records: FileRecord[] = [];
    for (const name of files) {
      const stat = await fs.promises.stat(path.join(this.root, name));
      records.push({
        name,
        size: stat.size,
        modified: stat.mtime.toISOString(),
      });
    }
    return records;
  }

  /** Absolute path and size of an existing file in the root. */
  async locate(name: string): Promise<{ path: string; size: number }> {
    // dot-files are staged writes still in progress
    if (!isPlainFilename(name) || name.startsWith(".")) {
      throw new InvalidFilenameError(name);
    }

    const filePath = path.resolve(this.root, name);
    if (path.dirname(filePath) !== this.root) {
      throw new InvalidFilenameError(name);
    }

    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) {
        throw new FileNotFoundError(name);
      }
      return { path: filePath, size: stat.size };
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        throw new FileNotFoundError(name);
      }
      throw error;
    }
  }

  async remove(name: string): Promise<void> {
    const { path: filePath } = await this.locate(name);
    await fs.promises.unlink(filePath);
    logger.info(`Deleted file: ${name}`);
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
