import { describe, it, expect, vi } from 'vitest';
import { ForbiddenError, UnauthenticatedError } from '../../src/errors';
import { isAdmin, requireAdmin, requireIdentity, runGuards, type Guard } from '../../src/middleware/guards';
import { ANONYMOUS, type Identity } from '../../src/types/blog';

const ADMIN_EMAIL = 'admin@example.com';

const admin: Identity = { kind: 'user', user: { id: 'u-admin', name: 'Admin', email: 'admin@example.com' } };
const alice: Identity = { kind: 'user', user: { id: 'u-alice', name: 'Alice', email: 'a@x.com' } };

describe('isAdmin', () => {
  it('is true only for the configured address', () => {
    expect(isAdmin(admin, ADMIN_EMAIL)).toBe(true);
    expect(isAdmin(alice, ADMIN_EMAIL)).toBe(false);
    expect(isAdmin(ANONYMOUS, ADMIN_EMAIL)).toBe(false);
  });

  it('ignores case', () => {
    expect(isAdmin(admin, 'Admin@Example.COM')).toBe(true);
  });
});

describe('runGuards', () => {
  const adminOnly = [requireIdentity, requireAdmin(ADMIN_EMAIL)];

  it('allows the admin through both guards', () => {
    expect(runGuards(adminOnly, admin)).toEqual({ allow: true });
  });

  it('denies a signed-in non-admin with Forbidden', () => {
    const result = runGuards(adminOnly, alice);
    expect(result.allow).toBe(false);
    expect(!result.allow && result.error).toBeInstanceOf(ForbiddenError);
  });

  it('denies an anonymous visitor with Unauthenticated', () => {
    const result = runGuards(adminOnly, ANONYMOUS);
    expect(result.allow).toBe(false);
    expect(!result.allow && result.error).toBeInstanceOf(UnauthenticatedError);
  });

  it('stops at the first denial', () => {
    const adminCheck = vi.fn<Guard>(() => ({ allow: true }));
    runGuards([requireIdentity, adminCheck], ANONYMOUS);
    expect(adminCheck).not.toHaveBeenCalled();
  });

  it('allows when there are no guards', () => {
    expect(runGuards([], ANONYMOUS)).toEqual({ allow: true });
  });
});
