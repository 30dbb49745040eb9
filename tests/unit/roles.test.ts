import { describe, it, expect, beforeEach, afterEach } from 'vitest';
/**
 * Unit tests for the role hierarchy
 * Configured ids (see vitest.config.ts): owner 111111111, admin 222222222, moderator 333333333
 */

import { canModerate, createAuthorityCheck, getRole, hasRoleAtLeast } from '../../src/utils/roles';
import { closeTestDatabase, createTestUser, initTestDatabase } from '../helpers/testDatabase';

const OWNER = 111111111;
const ADMIN = 222222222;
const MODERATOR = 333333333;

describe('roles', () => {
  beforeEach(() => {
    initTestDatabase();
  });

  afterEach(() => {
    closeTestDatabase();
  });

  describe('getRole', () => {
    it('takes configured ids first', () => {
      createTestUser(OWNER, 'owner', 'member');

      expect(getRole(OWNER)).toBe('owner');
      expect(getRole(ADMIN)).toBe('admin');
      expect(getRole(MODERATOR)).toBe('moderator');
    });

    it('falls back to the stored role, then member', () => {
      createTestUser(444, 'helper', 'moderator');

      expect(getRole(444)).toBe('moderator');
      expect(getRole(555)).toBe('member');
    });
  });

  describe('hasRoleAtLeast', () => {
    it('respects the hierarchy', () => {
      expect(hasRoleAtLeast(OWNER, 'admin')).toBe(true);
      expect(hasRoleAtLeast(MODERATOR, 'moderator')).toBe(true);
      expect(hasRoleAtLeast(MODERATOR, 'admin')).toBe(false);
      expect(hasRoleAtLeast(555, 'moderator')).toBe(false);
    });
  });

  describe('canModerate', () => {
    it('allows acting only on lower ranks', () => {
      expect(canModerate(MODERATOR, 555)).toBe(true);
      expect(canModerate(ADMIN, MODERATOR)).toBe(true);
      expect(canModerate(OWNER, ADMIN)).toBe(true);
      expect(canModerate(MODERATOR, ADMIN)).toBe(false);
      expect(canModerate(555, 556)).toBe(false);
    });

    it('refuses equal ranks and oneself', () => {
      createTestUser(444, 'helper', 'moderator');

      expect(canModerate(MODERATOR, 444)).toBe(false);
      expect(canModerate(OWNER, OWNER)).toBe(false);
    });

    it('backs the authority check', () => {
      const authority = createAuthorityCheck();

      expect(authority.canAct(ADMIN, 555)).toBe(true);
      expect(authority.canAct(555, ADMIN)).toBe(false);
    });
  });
});
