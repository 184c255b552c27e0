/**
 * Tag Enforcer — derives the organizational labels stamped onto a claim's
 * rendered resources.
 *
 * Derived values always win over claim-supplied ones: organizational
 * metadata is not team-overridable. The output carries every label key the
 * policy requires for the claim's tier; a required key with no derived or
 * supplied value is a ValidationError.
 */
import type { Claim } from '../types/claim.js';
import { labelValue } from '../types/claim.js';
import type { PolicySnapshot } from '../types/policy.js';
import { ValidationError } from './governance-errors.js';
import { requiredLabelsForTier } from './policy-store.js';

export const TAG_KEYS = {
  team: 'team',
  costCenter: 'cost-center',
  environment: 'environment',
  managedBy: 'managed-by',
} as const;

/** Labels the policy can derive for a claim. */
export function deriveLabels(
  claim: Pick<Claim, 'namespace' | 'tier'>,
  policy: PolicySnapshot,
): Record<string, string> {
  const derived: Record<string, string> = {
    [TAG_KEYS.managedBy]: policy.managedBy,
  };

  // Namespaces and team names are user-chosen; only own keys count
  const ownership = Object.hasOwn(policy.namespaceOwnership, claim.namespace)
    ? policy.namespaceOwnership[claim.namespace]
    : undefined;
  if (ownership) {
    derived[TAG_KEYS.team] = ownership.team;
    const costCenter = ownership.costCenter ?? labelValue(policy.teamCostCenters, ownership.team);
    if (costCenter) derived[TAG_KEYS.costCenter] = costCenter;
  }

  const environment = Object.entries(policy.environmentNames).find(([tier]) => tier === claim.tier)?.[1];
  if (environment) derived[TAG_KEYS.environment] = environment;

  return derived;
}

/**
 * Merge claim labels with policy-derived labels.
 *
 * @throws {ValidationError} listing required keys that end up without a value
 */
export function enforce(
  claim: Pick<Claim, 'id' | 'namespace' | 'tier' | 'labels'>,
  policy: PolicySnapshot,
): Record<string, string> {
  const labels: Record<string, string> = { ...claim.labels, ...deriveLabels(claim, policy) };

  const missing = requiredLabelsForTier(policy, claim.tier).filter((key) => !labelValue(labels, key));
  if (missing.length > 0) {
    throw new ValidationError(
      `Cannot derive required labels for ${claim.id}: ${missing.join(', ')}`,
      missing.map((key) => `${key}: no derivable or supplied value`),
    );
  }

  return labels;
}
