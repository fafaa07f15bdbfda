import { describe, it, expect } from 'vitest';
import os from 'os';
import { checkHandoff } from './handoff.js';
import { createRegistry } from '../lib/registry.js';

const registry = createRegistry(
  {
    contexts: [
      { id: 'oracle', file: 'ORACLE.md', prefix: 'O', is_coordinator: true },
      { id: 'dev', file: 'DEV.md', prefix: 'D' },
      { id: 'dash', file: 'DASH.md', prefix: 'B' },
      { id: 'crank', file: 'CRANK.md', prefix: 'C' },
    ],
    handoff_rules: {
      dev: [
        { to: ['dash'], types: ['new_feature_available', 'api_updated'] },
        { to: ['crank'], types: ['api_updated'] },
      ],
      dash: { to: ['dev'], types: ['backend_bug'] },
    },
  },
  os.tmpdir()
);

describe('checkHandoff', () => {
  it('should allow a type listed in the rule table', () => {
    expect(checkHandoff(registry, 'dev', 'dash', 'new_feature_available')).toEqual({
      allowed: true,
      reason: 'rule',
    });
  });

  it('should reject a type missing from the rule table', () => {
    expect(checkHandoff(registry, 'dev', 'dash', 'bug_report')).toEqual({
      allowed: false,
      allowedTypes: ['new_feature_available', 'api_updated'],
    });
  });

  it('should reject a pair with no rule at all', () => {
    expect(checkHandoff(registry, 'crank', 'dash', 'content_ready')).toEqual({
      allowed: false,
      allowedTypes: [],
    });
  });

  it('should let the coordinator send anything', () => {
    expect(checkHandoff(registry, 'oracle', 'dash', 'anything_at_all')).toEqual({
      allowed: true,
      reason: 'coordinator-sender',
    });
  });

  it('should let anyone send anything to the coordinator', () => {
    expect(checkHandoff(registry, 'crank', 'oracle', 'status_report')).toEqual({
      allowed: true,
      reason: 'coordinator-recipient',
    });
  });

  describe('broadcast', () => {
    it('should allow a type permitted towards every other context', () => {
      expect(checkHandoff(registry, 'dev', 'all', 'api_updated')).toEqual({
        allowed: true,
        reason: 'rule',
      });
    });

    it('should reject a type missing for one of the recipients', () => {
      expect(checkHandoff(registry, 'dev', 'all', 'new_feature_available')).toEqual({
        allowed: false,
        allowedTypes: ['api_updated'],
      });
    });

    it('should let the coordinator broadcast anything', () => {
      expect(checkHandoff(registry, 'oracle', 'all', 'health_alert').allowed).toBe(true);
    });

    it('should reject a sender without rules', () => {
      expect(checkHandoff(registry, 'crank', 'all', 'content_ready').allowed).toBe(false);
    });
  });
});
