import { constants } from "node:fs";
import { access, mkdir } from "node:fs/promises";
import type { Env } from "../config/environment.js";
import type { CheckpointStore, OutputSink } from "../types/clients.js";
import { CsvOutputSink } from "./csv-output-sink.js";
import { FileCheckpointStore } from "./file-checkpoint-store.js";

export interface Storage {
  driver: Env["STORAGE_DRIVER"];
  checkpoints: CheckpointStore;
  createSink: (runId: string) => OutputSink;
  /** Rejects when the backing store cannot be reached or written */
  ping: () => Promise<void>;
  /** Release connections held by the driver */
  close: () => Promise<void>;
}

/**
 * Storage for the configured driver
 * The database modules are only loaded for the postgres driver
 */
export async function createStorage(
  config: Pick<Env, "STORAGE_DRIVER" | "OUTPUT_DIR" | "DATABASE_URL">
): Promise<Storage> {
  if (config.STORAGE_DRIVER === "postgres") {
    const [{ connectDatabase }, { DrizzleCheckpointStore }, { DrizzleOutputSink }] =
      await Promise.all([
        import("../db/index.js"),
        import("./drizzle-checkpoint-store.js"),
        import("./drizzle-output-sink.js"),
      ]);
    const { db, ping, close } = connectDatabase(config.DATABASE_URL);
    return {
      driver: "postgres",
      checkpoints: new DrizzleCheckpointStore(db),
      createSink: (runId) => new DrizzleOutputSink(db, runId),
      ping,
      close,
    };
  }

  const checkpoints = new FileCheckpointStore(config.OUTPUT_DIR);
  return {
    driver: "file",
    checkpoints,
    createSink: (runId) => new CsvOutputSink(config.OUTPUT_DIR, runId, checkpoints),
    ping: async () => {
      await mkdir(config.OUTPUT_DIR, { recursive: true });
      await access(config.OUTPUT_DIR, constants.W_OK);
    },
    close: async () => {},
  };
}

export { CsvOutputSink, OUTPUT_FILES } from "./csv-output-sink.js";
export { FileCheckpointStore } from "./file-checkpoint-store.js";
