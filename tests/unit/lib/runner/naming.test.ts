import { describe, expect, it } from 'vitest';
import {
  generateVmName,
  isManagedVmName,
  slotIdFromVmName,
} from '../../../../src/lib/runner/naming.js';

describe('naming', () => {
  describe('generateVmName', () => {
    it('should embed the prefix, slot and a base36 timestamp', () => {
      const name = generateVmName('ephemeral-runner', 3, 1_700_000_000_000);

      expect(name.startsWith(`ephemeral-runner-3-${(1_700_000_000_000).toString(36)}`)).toBe(true);
      expect(name).toMatch(/^ephemeral-runner-3-[a-z0-9]+$/);
    });

    it('should produce distinct names for the same slot', () => {
      const names = new Set(Array.from({ length: 20 }, () => generateVmName('ci', 0)));

      expect(names.size).toBe(20);
    });
  });

  describe('isManagedVmName', () => {
    it('should recognise names it generated', () => {
      expect(isManagedVmName('ephemeral-runner', generateVmName('ephemeral-runner', 1))).toBe(true);
    });

    it('should reject names from another prefix or by hand', () => {
      expect(isManagedVmName('ephemeral-runner', 'dev-sandbox')).toBe(false);
      expect(isManagedVmName('ephemeral-runner', 'ephemeral-runner-base')).toBe(false);
      expect(isManagedVmName('ephemeral', 'ephemeral-runner-1-abc')).toBe(false);
      expect(isManagedVmName('ephemeral-runner', 'ephemeral-runner-1-ABC')).toBe(false);
    });
  });

  describe('slotIdFromVmName', () => {
    it('should read the slot back out of a managed name', () => {
      expect(slotIdFromVmName('ephemeral-runner', 'ephemeral-runner-12-lzx1abcd')).toBe(12);
    });

    it('should return null for unmanaged names', () => {
      expect(slotIdFromVmName('ephemeral-runner', 'golden-image')).toBeNull();
    });
  });
});
