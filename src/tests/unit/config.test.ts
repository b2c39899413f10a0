import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { parseRoleHierarchy } from '../../connections';
import { DEFAULT_ROLE_HIERARCHY } from '../../constants';

describe('parseRoleHierarchy', () => {
  it('falls back to the built-in table when unset', () => {
    expect(parseRoleHierarchy(undefined)).toEqual(DEFAULT_ROLE_HIERARCHY);
    expect(parseRoleHierarchy('  ')).toEqual(DEFAULT_ROLE_HIERARCHY);
  });

  it('reads a JSON rank table with extra roles', () => {
    const table = { ...DEFAULT_ROLE_HIERARCHY, coordinator: 6, lead: 5 };

    expect(parseRoleHierarchy(JSON.stringify(table))).toEqual(table);
  });

  it('requires a rank for every built-in role', () => {
    const raw = '{"superadmin": 9, "picker": 2, "guest": 1}';

    expect(() => parseRoleHierarchy(raw)).toThrow(ZodError);
    expect(() => parseRoleHierarchy(raw)).toThrow("rank for role 'coordinator' is required");
  });

  it('rejects ranks that are not positive integers', () => {
    expect(() => parseRoleHierarchy('{"lead": 0}')).toThrow(ZodError);
    expect(() => parseRoleHierarchy('{"lead": "high"}')).toThrow(ZodError);
  });
});
