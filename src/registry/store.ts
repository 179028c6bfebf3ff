/**
 * Recipient registry persisted as a single JSON document
 *
 * Every mutation reads the whole snapshot, changes it in memory and replaces
 * the file atomically (temp file + rename). Mutations made through one store
 * instance are serialised; separate processes sharing the file are not, and
 * the last writer wins.
 */

import {
  type FileSystem,
  nodeFileSystem,
  readJsonFile,
  writeFileAtomic,
} from "../lib/atomic-file";
import { StorageWriteError } from "../lib/errors";
import { type Logger, logger as defaultLogger } from "../lib/logger";
import { Mutex } from "../lib/mutex";
import {
  type Recipient,
  type RegistrySnapshot,
  RegistrySnapshotSchema,
} from "../types/schemas/registry";

export type { Recipient };

export type SubscriptionChange = "not_found" | "unchanged" | "changed";

interface Mutation<T> {
  next: Recipient[] | null;
  result: T;
}

export interface RegistryStoreOptions {
  filePath: string;
  fs?: FileSystem;
  logger?: Logger;
}

export class RegistryStore {
  readonly filePath: string;
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();

  constructor(opts: RegistryStoreOptions) {
    this.filePath = opts.filePath;
    this.fs = opts.fs ?? nodeFileSystem;
    this.logger = opts.logger ?? defaultLogger;
  }

  /** All recipients in registration order. */
  async list(): Promise<Recipient[]> {
    return this.read();
  }

  async get(id: number): Promise<Recipient | undefined> {
    const recipients = await this.read();
    return recipients.find((r) => r.id === id);
  }

  /**
   * Register a recipient. Returns false, without writing, when the id is
   * already present.
   */
  async add(id: number, displayName: string | null): Promise<boolean> {
    return this.mutate((recipients) =>
      recipients.some((r) => r.id === id)
        ? { next: null, result: false }
        : {
            next: [...recipients, { id, displayName, subscribed: false }],
            result: true,
          },
    );
  }

  async remove(id: number): Promise<boolean> {
    return this.mutate((recipients) => {
      const remaining = recipients.filter((r) => r.id !== id);
      return remaining.length === recipients.length
        ? { next: null, result: false }
        : { next: remaining, result: true };
    });
  }

  /**
   * Set the subscription flag. Returns true when the recipient exists,
   * including when the flag already had the requested value.
   */
  async setSubscribed(id: number, enabled: boolean): Promise<boolean> {
    return (await this.changeSubscription(id, enabled)) !== "not_found";
  }

  /**
   * Set the subscription flag and report what happened, decided inside the
   * same locked cycle as the write.
   */
  async changeSubscription(
    id: number,
    enabled: boolean,
  ): Promise<SubscriptionChange> {
    return this.mutate<SubscriptionChange>((recipients) => {
      const recipient = recipients.find((r) => r.id === id);
      if (!recipient) {
        return { next: null, result: "not_found" };
      }
      if (recipient.subscribed === enabled) {
        return { next: null, result: "unchanged" };
      }
      return {
        next: recipients.map((r) =>
          r.id === id ? { ...r, subscribed: enabled } : r,
        ),
        result: "changed",
      };
    });
  }

  /**
   * Run a read-modify-write cycle. `change` returns the new collection, or
   * null when nothing changes and no write should happen, plus the value
   * handed back to the caller.
   */
  private async mutate<T>(
    change: (recipients: Recipient[]) => Mutation<T>,
  ): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const { next, result } = change(await this.read());
      if (next !== null) {
        await this.write(next);
      }
      return result;
    });
  }

  private async read(): Promise<Recipient[]> {
    const result = await readJsonFile(this.filePath, this.fs);

    if (result.status === "missing") {
      return [];
    }
    if (result.status === "invalid") {
      this.logger.warn(
        { file: this.filePath, error: result.error },
        "Registry file unreadable, treating as empty",
      );
      return [];
    }

    const parsed = RegistrySnapshotSchema.safeParse(result.value);
    if (!parsed.success) {
      this.logger.warn(
        {
          file: this.filePath,
          issues: parsed.error.issues.map((i) => i.message),
        },
        "Registry file malformed, treating as empty",
      );
      return [];
    }

    return this.dropDuplicates(parsed.data.recipients);
  }

  /** Keep the first record per id; later ones are hand-edit leftovers. */
  private dropDuplicates(recipients: Recipient[]): Recipient[] {
    const seen = new Set<number>();
    const unique = recipients.filter((r) => {
      if (seen.has(r.id)) {
        return false;
      }
      seen.add(r.id);
      return true;
    });

    if (unique.length !== recipients.length) {
      this.logger.warn(
        {
          file: this.filePath,
          dropped: recipients.length - unique.length,
        },
        "Registry file has duplicate ids, keeping the first of each",
      );
    }
    return unique;
  }

  private async write(recipients: Recipient[]): Promise<void> {
    const snapshot: RegistrySnapshot = { recipients };
    try {
      await writeFileAtomic(
        this.filePath,
        `${JSON.stringify(snapshot, null, 2)}\n`,
        this.fs,
      );
    } catch (error) {
      this.logger.error(
        { file: this.filePath, error },
        "Failed to persist registry snapshot",
      );
      throw new StorageWriteError(this.filePath, error);
    }

    this.logger.debug(
      { file: this.filePath, recipients: recipients.length },
      "Registry snapshot written",
    );
  }
}
