/**
 * Claim Type Definitions
 *
 * A claim is a team's declarative request for a governed resource
 * (e.g. a PostgreSQL instance). Claims are identified by a
 * namespace-qualified name (`namespace/name`).
 *
 * The zod schemas here are the boundary validators for payloads coming
 * from the admission hook; everything past the boundary uses the
 * TypeScript types.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums & Unions
// ---------------------------------------------------------------------------

/** Environment tiers known to the engine, least to most strict. */
export const KNOWN_TIERS = ['development', 'staging', 'production'] as const;

export type Tier = (typeof KNOWN_TIERS)[number];

/** Claim lifecycle status. */
export const CLAIM_STATUSES = [
  'pending',
  'ready',
  'denied',
  'flagged-for-cleanup',
  'deleted',
] as const;

export type ClaimStatus = (typeof CLAIM_STATUSES)[number];

/** Statuses of claims that still exist on the cluster. */
export const LIVE_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set<ClaimStatus>([
  'pending',
  'ready',
  'flagged-for-cleanup',
]);

export function isTier(value: string): value is Tier {
  return KNOWN_TIERS.some((tier) => tier === value);
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Blueprint parameters carried by a claim (PostgreSQL blueprint). */
export interface ClaimParameters {
  readonly storageSizeGB?: number;
  readonly version?: string;
  readonly enableBackups?: boolean;
}

/**
 * A governed claim as seen by the engine.
 *
 * `tier` is a plain string: a well-formed but unknown tier must reach the
 * validator so it can be denied, rather than being rejected as malformed.
 */
export interface Claim {
  readonly id: string;
  readonly namespace: string;
  readonly tier: string;
  readonly createdAt: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly status: ClaimStatus;
  /** Optimistic concurrency token from the claim source. */
  readonly version: number;
  readonly parameters?: ClaimParameters;
}

/** Fields a patch may change. Labels set to null are removed. */
export interface ClaimChanges {
  readonly status?: ClaimStatus;
  readonly labels?: Readonly<Record<string, string | null>>;
}

/** Own label value; keys inherited from Object.prototype are not labels. */
export function labelValue(labels: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(labels, key) ? labels[key] : undefined;
}

// ---------------------------------------------------------------------------
// Boundary schemas
// ---------------------------------------------------------------------------

/** RFC 1123 DNS label: lower-case alphanumerics and '-', 1-63 chars. */
export const DNS_LABEL_RE = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const DnsLabelSchema = z
  .string()
  .min(1)
  .max(63)
  .regex(DNS_LABEL_RE, 'must be a DNS label (lower-case alphanumerics and "-")');

/** Claim schema exposed to callers of the admission hook. */
export const ClaimPayloadSchema = z.object({
  name: DnsLabelSchema,
  namespace: DnsLabelSchema,
  tier: DnsLabelSchema,
  storageSizeGB: z.number().int().positive().optional(),
  version: z.string().min(1).max(32).optional(),
  enableBackups: z.boolean().optional(),
  labels: z.record(z.string().max(63)).default({}),
  createdAt: z.string().datetime({ offset: true }).optional(),
});

export type ClaimPayload = z.infer<typeof ClaimPayloadSchema>;

/**
 * Build the engine's view of a claim from an admission payload.
 * A claim under admission has not been persisted yet, so it is `pending`
 * at version 0.
 */
export function claimFromPayload(payload: ClaimPayload, now: Date): Claim {
  const parameters: ClaimParameters = {
    ...(payload.storageSizeGB !== undefined ? { storageSizeGB: payload.storageSizeGB } : {}),
    ...(payload.version !== undefined ? { version: payload.version } : {}),
    ...(payload.enableBackups !== undefined ? { enableBackups: payload.enableBackups } : {}),
  };
  return {
    id: `${payload.namespace}/${payload.name}`,
    namespace: payload.namespace,
    tier: payload.tier,
    createdAt: payload.createdAt ?? now.toISOString(),
    labels: payload.labels,
    status: 'pending',
    version: 0,
    parameters,
  };
}
