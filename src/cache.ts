import path from "path";
import fs from "fs-extra";
import { z } from "zod";
import { STATE } from "./config.js";
import { StateLoadError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { SiteState, StateFile, StoredSiteState } from "./types.js";
import { parseTimestamp } from "./utils/dates.js";

const StoredSiteStateSchema = z.object({
  lastExpiry: z.string().nullable(),
  notifiedThresholds: z.array(z.number().int()),
  lastNotificationSent: z.string().nullable()
});

const StateFileSchema = z.object({
  version: z.number(),
  updatedAt: z.string(),
  entries: z.record(StoredSiteStateSchema)
});

type StoredEntries = { readonly [siteKey: string]: StoredSiteState };

/**
 * Outcome of reading the state file. Callers always receive usable entries.
 */
export type StateLoadResult =
  | { readonly ok: true; readonly entries: StoredEntries; readonly updatedAt: string }
  | { readonly ok: false; readonly entries: StoredEntries; readonly error: StateLoadError };

/**
 * Read the state file without throwing.
 *
 * A missing file is an empty store; a corrupt, unreadable or wrong-version file
 * is an empty store plus a {@link StateLoadError}.
 */
export async function readStateFile(filePath: string): Promise<StateLoadResult> {
  if (!(await fs.pathExists(filePath))) {
    return { ok: true, entries: {}, updatedAt: "" };
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(filePath);
  } catch (cause) {
    return {
      ok: false,
      entries: {},
      error: new StateLoadError(`State file unreadable: ${errorMessage(cause)}`, filePath, { cause })
    };
  }

  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      entries: {},
      error: new StateLoadError("State file has an unexpected shape", filePath, { cause: parsed.error })
    };
  }
  if (parsed.data.version !== STATE.VERSION) {
    return {
      ok: false,
      entries: {},
      error: new StateLoadError(
        `State file version ${parsed.data.version} does not match ${STATE.VERSION}`,
        filePath
      )
    };
  }
  return { ok: true, entries: parsed.data.entries, updatedAt: parsed.data.updatedAt };
}

export function toSiteState(stored: StoredSiteState): SiteState {
  return {
    lastExpiry: parseTimestamp(stored.lastExpiry),
    notifiedThresholds: [...stored.notifiedThresholds],
    lastNotificationSent: parseTimestamp(stored.lastNotificationSent)
  };
}

export function toStoredSiteState(state: SiteState): StoredSiteState {
  return {
    lastExpiry: state.lastExpiry?.toISOString() ?? null,
    notifiedThresholds: [...state.notifiedThresholds],
    lastNotificationSent: state.lastNotificationSent?.toISOString() ?? null
  };
}

/**
 * Whole-snapshot persistence of per-site expiry state with atomic writes.
 */
export class StateStore {
  private state: StateFile = { entries: {}, version: STATE.VERSION, updatedAt: "" };

  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger
  ) {}

  /**
   * Load the snapshot from disk, falling back to an empty store on any failure.
   */
  async load(): Promise<void> {
    const result = await readStateFile(this.filePath);
    if (!result.ok) {
      this.logger?.warn(`${result.error.message} (${this.filePath}); starting fresh.`);
      this.state = { entries: {}, version: STATE.VERSION, updatedAt: "" };
      return;
    }
    this.state = { entries: result.entries, version: STATE.VERSION, updatedAt: result.updatedAt };
    this.logger?.debug(`Loaded state for ${Object.keys(result.entries).length} site(s).`);
  }

  /**
   * @returns Prior state for the site key, or undefined on first observation.
   */
  get(key: string): SiteState | undefined {
    const stored = this.state.entries[key];
    return stored ? toSiteState(stored) : undefined;
  }

  /**
   * Replace a site's state in memory; persisted on save().
   */
  set(key: string, siteState: SiteState): void {
    this.state = {
      ...this.state,
      entries: {
        ...this.state.entries,
        [key]: toStoredSiteState(siteState)
      }
    };
  }

  /**
   * Persist the snapshot by writing a temporary file and renaming it into place.
   */
  async save(): Promise<void> {
    const payload: StateFile = {
      ...this.state,
      updatedAt: new Date().toISOString()
    };
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeJson(tempPath, payload, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    this.state = payload;
    this.logger?.debug(`State saved with ${Object.keys(this.state.entries).length} entries.`);
  }

  /**
   * Remove all entries and persist.
   */
  async clear(): Promise<void> {
    this.state = { entries: {}, version: STATE.VERSION, updatedAt: "" };
    await this.save();
  }

  stats(): { readonly count: number; readonly updatedAt: string } {
    return {
      count: Object.keys(this.state.entries).length,
      updatedAt: this.state.updatedAt
    };
  }

  /**
   * Snapshot of all entries keyed by site key.
   */
  entries(): ReadonlyArray<readonly [string, SiteState]> {
    return Object.entries(this.state.entries).map(([key, stored]) => [key, toSiteState(stored)] as const);
  }
}
