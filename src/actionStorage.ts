import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { ActionStore } from "./types.js";
import { logger } from "./config.js";

const ActionRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "timestamp must be an ISO-8601 date",
  }),
  actionType: z.string(),
  messageId: z.string(),
  messageSubject: z.string(),
  sender: z.string(),
  ruleName: z.string(),
  details: z.record(z.string()).default({}),
});

const ActionStoreSchema = z.object({
  actions: z.array(ActionRecordSchema).default([]),
  lastReportDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .nullable()
    .default(null),
});

export function emptyActionStore(): ActionStore {
  return { actions: [], lastReportDate: null };
}

/**
 * Whole-store persistence for the action log. Loading never rejects:
 * unreadable or invalid data yields an empty store. Saving never rejects either;
 * failures are logged and the write is lost.
 */
export interface ActionStorage {
  load(): Promise<ActionStore>;
  save(store: ActionStore): Promise<void>;
}

export class JsonFileActionStorage implements ActionStorage {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<ActionStore> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.debug(`Action store ${this.filePath} does not exist yet`);
      } else {
        logger.error(`Error loading actions from ${this.filePath}:`, error);
      }
      return emptyActionStore();
    }

    try {
      return ActionStoreSchema.parse(JSON.parse(content));
    } catch (error) {
      logger.error(`Action store ${this.filePath} is corrupt, starting empty:`, error);
      return emptyActionStore();
    }
  }

  async save(store: ActionStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(store, null, 2), "utf-8");
    } catch (error) {
      logger.error(`Error saving actions to ${this.filePath}:`, error);
    }
  }
}

/**
 * Keeps the store in memory; each load returns a deep copy
 */
export class InMemoryActionStorage implements ActionStorage {
  private store: ActionStore;

  constructor(initial: ActionStore = emptyActionStore()) {
    this.store = structuredClone(initial);
  }

  async load(): Promise<ActionStore> {
    return structuredClone(this.store);
  }

  async save(store: ActionStore): Promise<void> {
    this.store = structuredClone(store);
  }
}
