/**
 * Policy Type Definitions
 *
 * The policy document is the structured configuration the Policy Store
 * loads. A loaded document becomes a PolicySnapshot: immutable for the
 * duration of a reconciliation cycle and shared by concurrent admissions.
 */
import { z } from 'zod';
import { KNOWN_TIERS, DNS_LABEL_RE } from './claim.js';
import type { Tier } from './claim.js';

const TierSchema = z.enum(KNOWN_TIERS);

/** Glob over namespace names: DNS label characters plus '*'. */
const NamespacePatternSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9*]([-a-z0-9*]*[a-z0-9*])?$/, 'namespace pattern may only use DNS label characters and "*"');

const LabelKeySchema = z.string().min(1).max(253);

export const PolicyRuleSchema = z.object({
  id: z.string().min(1),
  appliesToTier: TierSchema,
  /** Absent means any namespace. */
  allowedNamespacePatterns: z.array(NamespacePatternSchema).min(1).optional(),
  /** Absent or null means unlimited age. */
  maxAgeDays: z.number().int().positive().nullable().optional(),
  requiredLabels: z.array(LabelKeySchema).default([]),
  maxStorageGB: z.number().int().positive().optional(),
  requireBackups: z.boolean().optional(),
  allowedVersions: z.array(z.string().min(1)).min(1).optional(),
});

const NamespaceOwnershipSchema = z.object({
  team: z.string().min(1),
  costCenter: z.string().min(1).optional(),
});

export const PolicyDocumentSchema = z
  .object({
    version: z.string().min(1),
    /** Tier order, least to most strict. Staging claims may float into stricter tiers' namespaces. */
    tiers: z.array(TierSchema).min(1),
    rules: z.array(PolicyRuleSchema).min(1),
    requiredLabels: z.array(LabelKeySchema).default([]),
    costCeiling: z.number().nonnegative(),
    financeApprovalThreshold: z.number().nonnegative().optional(),
    ownerLabel: LabelKeySchema.default('owner'),
    cleanupGracePeriodDays: z.number().int().nonnegative().default(7),
    managedBy: z.string().min(1).default('claimgate'),
    environmentNames: z.record(TierSchema, z.string().min(1)).default({}),
    namespaceOwnership: z.record(z.string().regex(DNS_LABEL_RE), NamespaceOwnershipSchema).default({}),
    teamCostCenters: z.record(z.string().min(1), z.string().min(1)).default({}),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    for (const tier of doc.tiers) {
      if (seen.has(tier)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tiers'], message: `duplicate tier '${tier}'` });
      }
      seen.add(tier);
    }
    doc.rules.forEach((rule, idx) => {
      if (!seen.has(rule.appliesToTier)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', idx, 'appliesToTier'],
          message: `rule '${rule.id}' targets tier '${rule.appliesToTier}' which is not listed in tiers`,
        });
      }
    });
  });

export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;

/** One governance constraint. */
export interface PolicyRule {
  readonly id: string;
  readonly appliesToTier: Tier;
  readonly allowedNamespacePatterns?: readonly string[];
  readonly maxAgeDays?: number | null;
  readonly requiredLabels: readonly string[];
  readonly maxStorageGB?: number;
  readonly requireBackups?: boolean;
  readonly allowedVersions?: readonly string[];
}

export interface NamespaceOwnership {
  readonly team: string;
  readonly costCenter?: string;
}

/** Immutable, versioned policy snapshot. */
export interface PolicySnapshot {
  readonly version: string;
  readonly loadedAt: string;
  readonly tiers: readonly Tier[];
  readonly rules: readonly PolicyRule[];
  readonly requiredLabels: readonly string[];
  readonly costCeiling: number;
  readonly financeApprovalThreshold: number | null;
  readonly ownerLabel: string;
  readonly cleanupGracePeriodDays: number;
  readonly managedBy: string;
  readonly environmentNames: Readonly<Partial<Record<Tier, string>>>;
  readonly namespaceOwnership: Readonly<Record<string, NamespaceOwnership>>;
  readonly teamCostCenters: Readonly<Record<string, string>>;
}
