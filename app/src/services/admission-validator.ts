/**
 * Admission Validator — tier/namespace guardrails evaluated at claim creation.
 *
 * `validate` is a pure decision function: no I/O, no mutation, so it can
 * be called synchronously from an admission hook. Every violated rule is
 * reported; evaluation never stops at the first failure.
 *
 * Deny-by-default: a tier without a rule in the policy is denied. An
 * absent rule is never read as "no constraint".
 *
 * Namespace placement floats up, never down: a claim may live in a
 * namespace allowed for its own tier or for any stricter tier (staging
 * claims are accepted in production namespaces, production claims are
 * not accepted in staging namespaces).
 */
import type { Claim, Tier } from '../types/claim.js';
import { ClaimPayloadSchema, DnsLabelSchema, claimFromPayload, isTier } from '../types/claim.js';
import type { PolicyRule, PolicySnapshot } from '../types/policy.js';
import { matchesAnyNamespacePattern } from '../utils/namespace-pattern.js';
import { ConfigurationError, ValidationError } from './governance-errors.js';
import { rulesForTier, stricterTiers } from './policy-store.js';
import type { PolicySource } from './policy-store.js';
import type { LogFn } from '../middleware/logger.js';

export interface Decision {
  readonly accepted: boolean;
  readonly reasons: readonly string[];
}

/** Response of the admission hook contract. */
export interface AdmissionResult {
  readonly allowed: boolean;
  readonly reasons: readonly string[];
  readonly claimId?: string;
  readonly policyVersion?: string;
}

export const UNKNOWN_TIER_REASON = 'unknown tier';
export const POLICY_UNAVAILABLE_REASON = 'policy unavailable';

/** Default latency budget for the admission hook. */
export const DEFAULT_ADMISSION_BUDGET_MS = 500;

/**
 * Check the claim fields the validator depends on.
 * @throws {ValidationError} listing every malformed field
 */
export function assertWellFormed(claim: Pick<Claim, 'id' | 'tier' | 'namespace'>): void {
  const issues: string[] = [];
  if (!claim.id) {
    issues.push('id: must not be empty');
  }
  for (const field of ['tier', 'namespace'] as const) {
    const result = DnsLabelSchema.safeParse(claim[field]);
    if (!result.success) {
      issues.push(`${field}: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(`Malformed claim: ${issues.join('; ')}`, issues);
  }
}

/**
 * Namespace patterns a claim under `rule` may use: the rule's own patterns
 * plus those of every rule for a stricter tier. Null means any namespace.
 */
function allowedNamespacePatterns(policy: PolicySnapshot, rule: PolicyRule): string[] | null {
  if (!rule.allowedNamespacePatterns) return null;
  const patterns = [...rule.allowedNamespacePatterns];
  for (const tier of stricterTiers(policy, rule.appliesToTier)) {
    for (const stricter of rulesForTier(policy, tier)) {
      if (!stricter.allowedNamespacePatterns) return null;
      patterns.push(...stricter.allowedNamespacePatterns);
    }
  }
  return patterns;
}

function ruleViolations(claim: Claim, tier: Tier, rule: PolicyRule, policy: PolicySnapshot): string[] {
  const violations: string[] = [];

  const patterns = allowedNamespacePatterns(policy, rule);
  if (patterns && !matchesAnyNamespacePattern(claim.namespace, patterns)) {
    violations.push(`namespace does not match ${tier} pattern`);
  }

  const params = claim.parameters;
  if (rule.maxStorageGB !== undefined && params?.storageSizeGB !== undefined
    && params.storageSizeGB > rule.maxStorageGB) {
    violations.push(`storage ${params.storageSizeGB}GB exceeds ${tier} limit of ${rule.maxStorageGB}GB`);
  }
  if (rule.requireBackups === true && params?.enableBackups !== true) {
    violations.push(`backups must be enabled for ${tier} tier`);
  }
  if (rule.allowedVersions && params?.version !== undefined
    && !rule.allowedVersions.includes(params.version)) {
    violations.push(`version ${params.version} is not allowed for ${tier} tier`);
  }

  return violations;
}

/**
 * Decide whether a claim may be admitted under a policy snapshot.
 *
 * @throws {ValidationError} when tier or namespace is malformed
 */
export function validate(claim: Claim, policy: PolicySnapshot): Decision {
  assertWellFormed(claim);

  const rules = rulesForTier(policy, claim.tier);
  if (!isTier(claim.tier) || rules.length === 0) {
    return { accepted: false, reasons: [UNKNOWN_TIER_REASON] };
  }

  const reasons: string[] = [];
  for (const rule of rules) {
    for (const violation of ruleViolations(claim, claim.tier, rule, policy)) {
      // Overlapping rules for a tier report a shared violation once
      if (!reasons.includes(violation)) reasons.push(violation);
    }
  }

  return { accepted: reasons.length === 0, reasons };
}

export interface AdmissionOptions {
  readonly log?: LogFn;
  readonly now?: () => Date;
  readonly budgetMs?: number;
}

/**
 * Admission hook: validate a raw claim payload against the active policy.
 *
 * Fails closed: when the policy cannot be read every claim is denied with
 * `policy unavailable`.
 *
 * @throws {ValidationError} when the payload does not match the claim schema
 */
export function reviewAdmission(
  payload: unknown,
  policySource: PolicySource,
  opts: AdmissionOptions = {},
): AdmissionResult {
  const started = performance.now();
  const log = opts.log ?? (() => {});

  const parsed = ClaimPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Malformed claim payload: ${issues.join('; ')}`, issues);
  }

  const claim = claimFromPayload(parsed.data, opts.now?.() ?? new Date());

  let policy: PolicySnapshot;
  try {
    policy = policySource.current();
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    log('error', {
      event: 'admission_fail_closed',
      claim_id: claim.id,
      message: err.message,
    });
    return { allowed: false, reasons: [POLICY_UNAVAILABLE_REASON], claimId: claim.id };
  }

  const decision = validate(claim, policy);
  const latencyMs = performance.now() - started;
  const budgetMs = opts.budgetMs ?? DEFAULT_ADMISSION_BUDGET_MS;

  log(decision.accepted ? 'info' : 'warn', {
    event: decision.accepted ? 'admission_allowed' : 'admission_denied',
    claim_id: claim.id,
    tier: claim.tier,
    namespace: claim.namespace,
    policy_version: policy.version,
    reasons: decision.reasons,
    latency_ms: Math.round(latencyMs * 100) / 100,
  });
  if (latencyMs > budgetMs) {
    log('warn', { event: 'admission_budget_exceeded', claim_id: claim.id, latency_ms: latencyMs, budget_ms: budgetMs });
  }

  return {
    allowed: decision.accepted,
    reasons: decision.reasons,
    claimId: claim.id,
    policyVersion: policy.version,
  };
}
