import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Blob storage for downloaded document bodies.
 * `save` returns a location that `read` understands, or null when the
 * implementation does not archive anything.
 */
export interface Storage {
  save(key: string, bytes: Uint8Array): Promise<string | null>;
  read(location: string): Promise<Uint8Array | null>;
}

/**
 * Archives nothing. Documents are analyzed in memory only.
 */
export class NoopStorage implements Storage {
  async save(): Promise<string | null> {
    return null;
  }

  async read(): Promise<Uint8Array | null> {
    return null;
  }
}

/**
 * Keys may only contain safe filename characters; anything else is replaced.
 */
export function toSafeKey(key: string): string {
  const cleaned = key.replace(/[^a-zA-Z0-9._-]+/g, "_").replace(/^\.+/, "");
  return cleaned || "document";
}

/**
 * Writes each blob as a file under `directory`.
 */
export class FileStorage implements Storage {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async save(key: string, bytes: Uint8Array): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const location = path.join(this.directory, toSafeKey(key));
    await writeFile(location, bytes);
    return location;
  }

  async read(location: string): Promise<Uint8Array | null> {
    const resolved = path.resolve(location);
    if (!resolved.startsWith(this.directory + path.sep)) {
      return null;
    }
    try {
      return new Uint8Array(await readFile(resolved));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * In-memory storage, handy for tests and short-lived runs.
 */
export class MemoryStorage implements Storage {
  private readonly blobs = new Map<string, Uint8Array>();

  async save(key: string, bytes: Uint8Array): Promise<string> {
    const location = `memory://${toSafeKey(key)}`;
    this.blobs.set(location, bytes);
    return location;
  }

  async read(location: string): Promise<Uint8Array | null> {
    return this.blobs.get(location) ?? null;
  }
}

export function createStorage(directory: string | undefined): Storage {
  return directory ? new FileStorage(directory) : new NoopStorage();
}
