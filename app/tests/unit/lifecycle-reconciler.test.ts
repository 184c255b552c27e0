import { describe, it, expect } from 'vitest';
import {
  reconcile,
  claimAgeDays,
  hasOwner,
  CLEANUP_DEADLINE_LABEL,
  COMPLIANCE_LABEL,
} from '../../src/services/lifecycle-reconciler.js';
import { makeClaim, testPolicy, daysAgo, NOW } from '../fixtures/policy.js';

describe('reconcile', () => {
  const policy = testPolicy();

  it('flags an unowned development claim older than its max age', () => {
    const claim = makeClaim({ id: 'anything/db', namespace: 'anything', createdAt: daysAgo(40) });
    expect(reconcile([claim], policy, NOW)).toEqual({
      actions: [{ kind: 'flag-for-cleanup', claimId: 'anything/db', ageDays: 40, maxAgeDays: 30 }],
      skipped: [],
    });
  });

  it('exempts owned claims from age-based cleanup', () => {
    const claim = makeClaim({ createdAt: daysAgo(400), labels: { owner: 'alice' } });
    expect(reconcile([claim], policy, NOW).actions).toEqual([]);
  });

  it('treats a blank owner label as no owner', () => {
    const claim = makeClaim({ labels: { owner: '  ' } });
    expect(hasOwner(claim, policy)).toBe(false);
  });

  it('does not flag a claim exactly at its max age', () => {
    const claim = makeClaim({ createdAt: daysAgo(30) });
    expect(reconcile([claim], policy, NOW).actions).toEqual([]);
  });

  it('only flags claims that are ready', () => {
    const claim = makeClaim({ createdAt: daysAgo(40), status: 'pending' });
    expect(reconcile([claim], policy, NOW).actions).toEqual([]);
  });

  it('never ages out production claims', () => {
    const claim = makeClaim({
      id: 'production-a/db',
      namespace: 'production-a',
      tier: 'production',
      createdAt: daysAgo(1000),
      labels: { owner: 'alice', 'cost-center': 'CC-1' },
    });
    expect(reconcile([claim], policy, NOW).actions).toEqual([]);
  });

  it('requires an owner and the required labels on production claims', () => {
    const claim = makeClaim({ id: 'production-a/db', namespace: 'production-a', tier: 'production' });
    expect(reconcile([claim], policy, NOW).actions).toEqual([
      { kind: 'require-owner', claimId: 'production-a/db' },
      { kind: 'missing-required-label', claimId: 'production-a/db', missingKeys: ['cost-center'] },
    ]);
  });

  it('requires an owner on pending production claims too', () => {
    const claim = makeClaim({
      tier: 'production',
      status: 'pending',
      labels: { 'cost-center': 'CC-1' },
    });
    expect(reconcile([claim], policy, NOW).actions).toEqual([
      { kind: 'require-owner', claimId: claim.id },
    ]);
  });

  it('restores a flagged claim that gained an owner', () => {
    const claim = makeClaim({
      status: 'flagged-for-cleanup',
      createdAt: daysAgo(40),
      labels: { owner: 'alice', [CLEANUP_DEADLINE_LABEL]: daysAgo(-3) },
    });
    expect(reconcile([claim], policy, NOW).actions).toEqual([{ kind: 'restore', claimId: claim.id }]);
  });

  it('deletes a flagged claim whose deadline has passed', () => {
    const claim = makeClaim({
      status: 'flagged-for-cleanup',
      createdAt: daysAgo(40),
      labels: { [CLEANUP_DEADLINE_LABEL]: daysAgo(1) },
    });
    expect(reconcile([claim], policy, NOW).actions).toEqual([{ kind: 'delete', claimId: claim.id }]);
  });

  it('leaves a flagged claim inside its grace period alone', () => {
    const claim = makeClaim({
      status: 'flagged-for-cleanup',
      createdAt: daysAgo(35),
      labels: { [CLEANUP_DEADLINE_LABEL]: daysAgo(-2) },
    });
    expect(reconcile([claim], policy, NOW)).toEqual({ actions: [], skipped: [] });
  });

  it('skips a flagged claim without a readable deadline', () => {
    const claim = makeClaim({ status: 'flagged-for-cleanup', labels: { [CLEANUP_DEADLINE_LABEL]: 'soon' } });
    expect(reconcile([claim], policy, NOW)).toEqual({
      actions: [],
      skipped: [{ claimId: claim.id, reason: 'missing cleanup deadline' }],
    });
  });

  it('still checks ownership and labels when createdAt is unreadable', () => {
    const claim = makeClaim({ id: 'production-a/db', namespace: 'production-a', tier: 'production', createdAt: 'yesterday' });
    expect(reconcile([claim], policy, NOW)).toEqual({
      actions: [
        { kind: 'require-owner', claimId: 'production-a/db' },
        { kind: 'missing-required-label', claimId: 'production-a/db', missingKeys: ['cost-center'] },
      ],
      skipped: [{ claimId: 'production-a/db', reason: 'invalid createdAt' }],
    });
  });

  it('clears the compliance mark once a claim is back in policy', () => {
    const claim = makeClaim({
      tier: 'production',
      labels: { owner: 'alice', 'cost-center': 'CC-1', [COMPLIANCE_LABEL]: 'non-compliant' },
    });
    expect(reconcile([claim], policy, NOW).actions).toEqual([{ kind: 'clear-compliance', claimId: claim.id }]);
  });

  it('keeps the compliance mark while a violation remains', () => {
    const claim = makeClaim({
      tier: 'production',
      labels: { owner: 'alice', [COMPLIANCE_LABEL]: 'non-compliant' },
    });
    expect(reconcile([claim], policy, NOW).actions.map((a) => a.kind)).toEqual(['missing-required-label']);
  });

  it('ignores label keys inherited from Object.prototype', () => {
    const custom = testPolicy({ ownerLabel: 'constructor' });
    const claim = makeClaim({ tier: 'production', labels: { 'cost-center': 'CC-1' } });
    expect(hasOwner(claim, custom)).toBe(false);
    expect(reconcile([claim], custom, NOW).actions).toEqual([{ kind: 'require-owner', claimId: claim.id }]);
  });

  it('skips claims of unknown tiers', () => {
    const claim = makeClaim({ tier: 'qa', createdAt: daysAgo(400) });
    expect(reconcile([claim], policy, NOW)).toEqual({
      actions: [],
      skipped: [{ claimId: claim.id, reason: 'unknown tier' }],
    });
  });

  it('skips ready claims with an unparseable creation time', () => {
    const claim = makeClaim({ createdAt: 'yesterday' });
    expect(reconcile([claim], policy, NOW).skipped).toEqual([{ claimId: claim.id, reason: 'invalid createdAt' }]);
  });

  it('ignores deleted and denied claims', () => {
    const claims = [
      makeClaim({ id: 'a/db', status: 'deleted', createdAt: daysAgo(400) }),
      makeClaim({ id: 'b/db', status: 'denied', tier: 'production' }),
    ];
    expect(reconcile(claims, policy, NOW)).toEqual({ actions: [], skipped: [] });
  });

  it('orders actions by claim id', () => {
    const claims = [
      makeClaim({ id: 'zeta/db', createdAt: daysAgo(45) }),
      makeClaim({ id: 'alpha/db', createdAt: daysAgo(50) }),
    ];
    expect(reconcile(claims, policy, NOW).actions.map((a) => a.claimId)).toEqual(['alpha/db', 'zeta/db']);
  });

  it('yields the same plan for the same inputs', () => {
    const claims = [
      makeClaim({ id: 'a/db', createdAt: daysAgo(45) }),
      makeClaim({ id: 'b/db', tier: 'production' }),
    ];
    expect(reconcile(claims, policy, NOW)).toEqual(reconcile(claims, policy, NOW));
  });
});

describe('claimAgeDays', () => {
  it('measures fractional days from the creation timestamp', () => {
    expect(claimAgeDays(makeClaim({ createdAt: daysAgo(1.5) }), NOW)).toBe(1.5);
  });

  it('returns null for an unparseable timestamp', () => {
    expect(claimAgeDays(makeClaim({ createdAt: 'not-a-date' }), NOW)).toBeNull();
  });
});
