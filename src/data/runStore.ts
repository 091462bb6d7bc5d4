import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Low, Memory } from "lowdb";
import { JSONFile } from "lowdb/node";
import { z } from "zod";
import { errorMessage, RunNotFoundError } from "../errors.js";
import { createLogger } from "../logger.js";
import { MEMORY_STORE_PATH } from "../config.js";
import type { EthicsVerdict, FeasibilityLevel } from "../schema/stages.js";
import type { HypothesisRun, RunProgress, RunStatus } from "../schema/run.js";

const log = createLogger("run-store");

type DbSchema = { runs: HypothesisRun[] };

export interface ListRunsFilters {
  status?: RunStatus;
  domain?: string;
  query?: string;
}

export interface ListRunsOptions extends ListRunsFilters {
  pageSize?: number;
  cursor?: string;
}

export interface RunListItem {
  id: string;
  status: RunStatus;
  domain: string;
  goal: string;
  progress: RunProgress;
  title?: string;
  feasibility?: FeasibilityLevel;
  ethicsVerdict?: EthicsVerdict;
  createdAt: string;
  updatedAt: string;
}

export interface ListRunsResult {
  runs: RunListItem[];
  nextCursor?: string;
  total: number;
}

const MAX_LIST_TOTAL = 1000;

const cursorSchema = z.object({ offset: z.number().int().min(0), signature: z.string() });
type CursorPayload = z.infer<typeof cursorSchema>;

function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
}

function decodeCursor(cursor: string): CursorPayload | null {
  try {
    const parsed = cursorSchema.safeParse(JSON.parse(Buffer.from(cursor, "base64url").toString("utf8")));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    log.debug("Ignoring malformed cursor", { error: errorMessage(error) });
    return null;
  }
}

function filterSignature(filters: ListRunsFilters): string {
  return JSON.stringify({
    status: filters.status ?? null,
    domain: filters.domain ?? null,
    query: filters.query ?? null,
  });
}

function toListItem(run: HypothesisRun): RunListItem {
  return {
    id: run.id,
    status: run.status,
    domain: run.domain,
    goal: run.goal,
    progress: run.progress,
    title: run.summary?.title,
    feasibility: run.summary?.feasibility,
    ethicsVerdict: run.summary?.ethicsVerdict,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
  };
}

/** Hypothesis runs in a lowdb JSON file, or in memory for `:memory:`. */
export class RunStore {
  private constructor(private readonly db: Low<DbSchema>) {}

  static async open(path: string): Promise<RunStore> {
    if (path === MEMORY_STORE_PATH) {
      log.info("Using in-memory run store");
      return new RunStore(new Low<DbSchema>(new Memory<DbSchema>(), { runs: [] }));
    }
    await mkdir(dirname(path), { recursive: true });
    const db = new Low<DbSchema>(new JSONFile<DbSchema>(path), { runs: [] });
    await db.read();
    if (!Array.isArray(db.data.runs)) {
      db.data = { runs: [] };
    }
    log.info("Opened run store", { path, runs: db.data.runs.length });
    return new RunStore(db);
  }

  async create(run: HypothesisRun): Promise<HypothesisRun> {
    this.db.data.runs.push(run);
    await this.db.write();
    return run;
  }

  async get(id: string): Promise<HypothesisRun | null> {
    return this.db.data.runs.find((run) => run.id === id) ?? null;
  }

  /** Merges a patch into a stored run and stamps `updatedAt`. */
  async update(id: string, patch: Partial<Omit<HypothesisRun, "id" | "createdAt">>): Promise<HypothesisRun> {
    const runs = this.db.data.runs;
    const index = runs.findIndex((run) => run.id === id);
    if (index === -1) {
      throw new RunNotFoundError(id);
    }
    const updated: HypothesisRun = { ...runs[index], ...patch, updatedAt: new Date().toISOString() };
    runs[index] = updated;
    await this.db.write();
    return updated;
  }

  async delete(id: string): Promise<HypothesisRun> {
    const runs = this.db.data.runs;
    const index = runs.findIndex((run) => run.id === id);
    if (index === -1) {
      throw new RunNotFoundError(id);
    }
    const [removed] = runs.splice(index, 1);
    await this.db.write();
    return removed;
  }

  async list(options: ListRunsOptions = {}): Promise<ListRunsResult> {
    const filters: ListRunsFilters = {
      status: options.status,
      domain: options.domain,
      query: options.query?.trim().toLowerCase() || undefined,
    };

    const filtered = this.db.data.runs
      .filter((run) => {
        if (filters.status && run.status !== filters.status) {
          return false;
        }
        if (filters.domain && run.domain !== filters.domain) {
          return false;
        }
        if (filters.query && !run.goal.toLowerCase().startsWith(filters.query)) {
          return false;
        }
        return true;
      })
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));

    const pageSize = Math.min(Math.max(options.pageSize ?? 20, 1), 50);
    const signature = filterSignature(filters);
    let offset = 0;
    if (options.cursor) {
      const payload = decodeCursor(options.cursor);
      if (payload && payload.signature === signature) {
        offset = payload.offset;
      }
    }

    const nextOffset = offset + pageSize;
    return {
      runs: filtered.slice(offset, nextOffset).map(toListItem),
      nextCursor: nextOffset < filtered.length ? encodeCursor({ offset: nextOffset, signature }) : undefined,
      total: Math.min(filtered.length, MAX_LIST_TOTAL),
    };
  }
}
