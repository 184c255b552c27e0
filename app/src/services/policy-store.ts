/**
 * Policy Store — immutable, versioned policy snapshots.
 *
 * The policy document (JSON) is parsed and validated once per load into a
 * deep-frozen PolicySnapshot. Reload is an explicit operation producing a
 * new snapshot; holders of the previous snapshot (an in-flight
 * reconciliation cycle, a concurrent admission) keep a consistent view.
 *
 * Fail closed: when a load fails the store holds no snapshot and
 * `current()` throws ConfigurationError until a valid document loads.
 * Stale or default-permissive policy is never served.
 *
 * Reload triggers: SIGHUP (wired in index.ts), a fixed interval, file
 * changes (fs.watch with polling fallback) and the admin API.
 */
import * as fs from 'node:fs';
import type { ZodIssue } from 'zod';
import { PolicyDocumentSchema } from '../types/policy.js';
import type { PolicyRule, PolicySnapshot } from '../types/policy.js';
import type { Tier } from '../types/claim.js';
import { isTier } from '../types/claim.js';
import { ConfigurationError } from './governance-errors.js';
import type { LogFn } from '../middleware/logger.js';

/** Read-only view of the active policy. */
export interface PolicySource {
  /** @throws {ConfigurationError} when no valid policy is loaded */
  current(): PolicySnapshot;
}

export interface PolicyStoreStatus {
  readonly loaded: boolean;
  readonly version: string | null;
  readonly loadedAt: string | null;
  readonly lastError: string | null;
  readonly reloadCount: number;
}

export interface PolicyStoreOptions {
  readonly log?: LogFn;
  /** Watch the document for changes. Default false. */
  readonly watch?: boolean;
  /** Reload on a fixed interval (ms). 0 or absent disables. */
  readonly reloadIntervalMs?: number;
  readonly now?: () => Date;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a raw policy document and build a frozen snapshot.
 * @throws {ConfigurationError} listing every schema issue
 */
export function parsePolicyDocument(raw: unknown, loadedAt: Date): PolicySnapshot {
  const parsed = PolicyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ConfigurationError(`Invalid policy document: ${issues.join('; ')}`, issues);
  }

  const doc = parsed.data;
  const rules: PolicyRule[] = doc.rules.map((rule) => ({
    id: rule.id,
    appliesToTier: rule.appliesToTier,
    requiredLabels: rule.requiredLabels,
    ...(rule.allowedNamespacePatterns ? { allowedNamespacePatterns: rule.allowedNamespacePatterns } : {}),
    ...(rule.maxAgeDays !== undefined ? { maxAgeDays: rule.maxAgeDays } : {}),
    ...(rule.maxStorageGB !== undefined ? { maxStorageGB: rule.maxStorageGB } : {}),
    ...(rule.requireBackups !== undefined ? { requireBackups: rule.requireBackups } : {}),
    ...(rule.allowedVersions ? { allowedVersions: rule.allowedVersions } : {}),
  }));

  return deepFreeze<PolicySnapshot>({
    version: doc.version,
    loadedAt: loadedAt.toISOString(),
    tiers: doc.tiers,
    rules,
    requiredLabels: doc.requiredLabels,
    costCeiling: doc.costCeiling,
    financeApprovalThreshold: doc.financeApprovalThreshold ?? null,
    ownerLabel: doc.ownerLabel,
    cleanupGracePeriodDays: doc.cleanupGracePeriodDays,
    managedBy: doc.managedBy,
    environmentNames: doc.environmentNames,
    namespaceOwnership: doc.namespaceOwnership,
    teamCostCenters: doc.teamCostCenters,
  });
}

// ---------------------------------------------------------------------------
// Snapshot queries
// ---------------------------------------------------------------------------

/** Rules targeting a tier, in document order. Empty for unknown tiers. */
export function rulesForTier(policy: PolicySnapshot, tier: string): PolicyRule[] {
  if (!isTier(tier) || !policy.tiers.includes(tier)) return [];
  return policy.rules.filter((rule) => rule.appliesToTier === tier);
}

/** Tiers stricter than `tier` in the policy's tier order. */
export function stricterTiers(policy: PolicySnapshot, tier: Tier): Tier[] {
  const idx = policy.tiers.indexOf(tier);
  return idx < 0 ? [] : policy.tiers.slice(idx + 1);
}

/**
 * Effective max age for a tier: the tightest limit across its rules.
 * Null when no rule sets one (unlimited).
 */
export function maxAgeDaysForTier(policy: PolicySnapshot, tier: string): number | null {
  let limit: number | null = null;
  for (const rule of rulesForTier(policy, tier)) {
    if (rule.maxAgeDays != null && (limit === null || rule.maxAgeDays < limit)) {
      limit = rule.maxAgeDays;
    }
  }
  return limit;
}

/** Global required labels plus those of every rule for the tier, de-duplicated and sorted. */
export function requiredLabelsForTier(policy: PolicySnapshot, tier: string): string[] {
  const keys = new Set<string>(policy.requiredLabels);
  for (const rule of rulesForTier(policy, tier)) {
    for (const key of rule.requiredLabels) keys.add(key);
  }
  return [...keys].sort();
}

// ---------------------------------------------------------------------------
// PolicyStore
// ---------------------------------------------------------------------------

export class PolicyStore implements PolicySource {
  private snapshot: PolicySnapshot | null = null;
  private lastError: string | null = null;
  private reloadCount = 0;
  private readonly filePath: string;
  private readonly log: LogFn;
  private readonly now: () => Date;
  private watcher: fs.FSWatcher | null = null;
  private pollInterval: ReturnType<typeof setInterval> | null = null;
  private reloadInterval: ReturnType<typeof setInterval> | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(filePath: string, opts: PolicyStoreOptions = {}) {
    this.filePath = filePath;
    this.log = opts.log ?? (() => {});
    this.now = opts.now ?? (() => new Date());

    if (opts.watch === true) {
      this.startWatching();
    }
    if (opts.reloadIntervalMs && opts.reloadIntervalMs > 0) {
      this.reloadInterval = setInterval(() => this.reloadQuietly('interval'), opts.reloadIntervalMs);
      this.reloadInterval.unref();
    }
  }

  /** @throws {ConfigurationError} when no valid policy is loaded */
  current(): PolicySnapshot {
    if (!this.snapshot) {
      throw new ConfigurationError(
        `Policy unavailable${this.lastError ? `: ${this.lastError}` : ' (not loaded)'}`,
      );
    }
    return this.snapshot;
  }

  /**
   * Load the document from disk and swap in a new snapshot.
   * On failure the store is left without a snapshot (fail closed).
   *
   * @throws {ConfigurationError} when the file is unreadable or invalid
   */
  reload(): PolicySnapshot {
    let snapshot: PolicySnapshot;
    try {
      snapshot = parsePolicyDocument(this.readDocument(), this.now());
    } catch (err) {
      const configErr = err instanceof ConfigurationError
        ? err
        : new ConfigurationError(`Policy unreadable: ${err instanceof Error ? err.message : String(err)}`);
      this.snapshot = null;
      this.lastError = configErr.message;
      this.log('error', {
        event: 'policy_load_failed',
        path: this.filePath,
        message: configErr.message,
      });
      throw configErr;
    }

    const previous = this.snapshot?.version ?? null;
    this.snapshot = snapshot;
    this.lastError = null;
    this.reloadCount++;
    this.log('info', {
      event: 'policy_loaded',
      path: this.filePath,
      version: snapshot.version,
      previous_version: previous,
      rules: snapshot.rules.length,
    });
    return snapshot;
  }

  getStatus(): PolicyStoreStatus {
    return {
      loaded: this.snapshot !== null,
      version: this.snapshot?.version ?? null,
      loadedAt: this.snapshot?.loadedAt ?? null,
      lastError: this.lastError,
      reloadCount: this.reloadCount,
    };
  }

  /** Stop watchers and timers. */
  close(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
    if (this.reloadInterval) {
      clearInterval(this.reloadInterval);
      this.reloadInterval = null;
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  /** Reload from a background trigger; failures are already logged by reload(). */
  reloadQuietly(trigger: string): boolean {
    try {
      this.reload();
      return true;
    } catch (err) {
      this.log('warn', {
        event: 'policy_reload_rejected',
        trigger,
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private readDocument(): unknown {
    const raw = fs.readFileSync(this.filePath, 'utf-8');
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err) {
      throw new ConfigurationError(
        `Policy document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  /** fs.watch with polling fallback for network filesystems. */
  private startWatching(): void {
    try {
      this.watcher = fs.watch(this.filePath, { persistent: false }, () => {
        this.debouncedReload();
      });
      this.watcher.on('error', () => {
        this.watcher?.close();
        this.watcher = null;
        this.startPolling();
      });
    } catch {
      this.startPolling();
    }
  }

  private startPolling(): void {
    let lastMtime = 0;
    try {
      lastMtime = fs.statSync(this.filePath).mtimeMs;
    } catch {
      lastMtime = 0;
    }

    this.pollInterval = setInterval(() => {
      let mtime: number;
      try {
        mtime = fs.statSync(this.filePath).mtimeMs;
      } catch {
        return; // file temporarily missing during an atomic replace
      }
      if (mtime > lastMtime) {
        lastMtime = mtime;
        this.debouncedReload();
      }
    }, 30_000);
    this.pollInterval.unref();
  }

  /** Collapse bursts of change events into one reload. */
  private debouncedReload(): void {
    if (this.debounceTimer) return;
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reloadQuietly('file_change');
    }, 500);
    this.debounceTimer.unref();
  }
}
