import { describe, it, expect } from 'vitest';
import { AllowDenyPattern } from '../audit-lineage/allow-deny-pattern.js';

describe('AllowDenyPattern', () => {
  it('should allow everything by default', () => {
    const pattern = AllowDenyPattern.allowAll();

    expect(pattern.allowed('anything')).toBe(true);
    expect(pattern.allowed('')).toBe(true);
  });

  it('should match allow patterns from the start of the name', () => {
    const pattern = new AllowDenyPattern({ allow: ['sales'], deny: [], ignoreCase: true });

    expect(pattern.allowed('sales_eu')).toBe(true);
    expect(pattern.allowed('presales')).toBe(false);
  });

  it('should let deny win over allow', () => {
    const pattern = new AllowDenyPattern({ allow: ['sales.*'], deny: ['sales_tmp'], ignoreCase: true });

    expect(pattern.allowed('sales_prod')).toBe(true);
    expect(pattern.allowed('sales_tmp_1')).toBe(false);
  });

  it('should ignore case when configured', () => {
    const pattern = new AllowDenyPattern({ allow: ['sales'], deny: [], ignoreCase: true });

    expect(pattern.allowed('SALES')).toBe(true);
  });

  it('should respect case otherwise', () => {
    const pattern = new AllowDenyPattern({ allow: ['sales'], deny: [], ignoreCase: false });

    expect(pattern.allowed('SALES')).toBe(false);
  });

  it('should allow nothing with an empty allow list', () => {
    const pattern = new AllowDenyPattern({ allow: [], deny: [], ignoreCase: true });

    expect(pattern.allowed('sales')).toBe(false);
  });
});
