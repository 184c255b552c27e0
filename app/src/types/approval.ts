/**
 * Approval Workflow Type Definitions
 *
 * Custom infrastructure requests that fall outside standard blueprints.
 */
import { z } from 'zod';

export const APPROVAL_STATES = [
  'submitted',
  'notified',
  'under_review',
  'approved',
  'rejected',
  'provisioned',
] as const;

export type ApprovalState = (typeof APPROVAL_STATES)[number];

export type ReviewDecision = 'approve' | 'reject';

/** Descriptor handed to the external provisioning engine. */
export interface ManifestDescriptor {
  readonly apiVersion: string;
  readonly kind: string;
  readonly metadata: {
    readonly name: string;
    readonly labels: Readonly<Record<string, string>>;
  };
  readonly spec: Readonly<Record<string, unknown>>;
}

export interface ApprovalRequest {
  readonly id: string;
  readonly requester: string;
  readonly description: string;
  readonly estimatedCost: number;
  readonly state: ApprovalState;
  readonly team: string | null;
  readonly resourceType: string | null;
  readonly specifications: Readonly<Record<string, unknown>>;
  readonly justification: string | null;
  /** Set at submission when the estimate is above the finance threshold. */
  readonly financeApprovalRequired: boolean;
  readonly reviewer: string | null;
  readonly reviewNotes: string | null;
  readonly costOverride: boolean;
  readonly manifest: ManifestDescriptor | null;
  readonly version: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Fields the workflow manager may change on a transition. */
export interface ApprovalUpdate {
  readonly reviewer?: string;
  readonly reviewNotes?: string | null;
  readonly costOverride?: boolean;
  readonly manifest?: ManifestDescriptor;
}

// ---------------------------------------------------------------------------
// Boundary schemas
// ---------------------------------------------------------------------------

/** estimated_cost is NUMERIC(14, 2). */
export const MAX_ESTIMATED_COST = 1_000_000_000_000;

export const SubmitApprovalSchema = z.object({
  requester: z.string().trim().min(1, 'requester is required').max(256),
  description: z.string().trim().min(1, 'description is required').max(4_000),
  estimatedCost: z
    .number()
    .finite()
    .nonnegative()
    .lt(MAX_ESTIMATED_COST, 'estimatedCost exceeds the storable range')
    .refine((v) => Math.round(v * 100) / 100 === v, 'estimatedCost allows at most two decimal places'),
  team: z.string().trim().min(1).max(128).optional(),
  resourceType: z.string().trim().min(1).max(128).optional(),
  specifications: z.record(z.unknown()).optional(),
  justification: z.string().trim().min(1, 'justification is required').max(4_000),
});

export type SubmitApprovalInput = z.infer<typeof SubmitApprovalSchema>;

export const ReviewApprovalSchema = z.object({
  decision: z.enum(['approve', 'reject']),
  reviewer: z.string().trim().min(1, 'reviewer is required').max(256),
  costOverride: z.boolean().optional(),
  notes: z.string().max(4_000).optional(),
});

export type ReviewApprovalInput = z.infer<typeof ReviewApprovalSchema>;
