import debug from 'debug';
import type { Auth } from '../auth';
import { AppError, DuplicateEmailError, InvalidCredentialsError } from '../errors';
import { ANONYMOUS, type Identity, type LoginInput, type RegisterInput, type UserSummary } from '../types/blog';
import type { UserService } from './userService';

const log = debug('blog:auth');

export interface AuthResult {
  user: UserSummary;
  /** Set-Cookie values that establish or clear the session. */
  cookies: string[];
}

/**
 * Registration, login and session lookup on top of Better Auth. Passwords are
 * hashed and sessions persisted by the library; this layer adds the blog's
 * error semantics and hands the session cookies back to the caller.
 */
export class AuthService {
  constructor(
    private readonly auth: Auth,
    private readonly userService: UserService,
  ) {}

  async register(input: RegisterInput, headers: Headers): Promise<AuthResult> {
    const existing = await this.userService.findByEmail(input.email);
    if (existing) {
      throw new DuplicateEmailError();
    }

    const response = await this.auth.api.signUpEmail({
      body: { name: input.name, email: input.email, password: input.password },
      headers,
      asResponse: true,
    });

    // A concurrent registration can win the race between lookup and insert
    if (response.status === 422) {
      throw new DuplicateEmailError();
    }
    if (!response.ok) {
      throw AppError.internal(`Registration failed with status ${response.status}`);
    }

    const user = await this.requireUser(input.email);
    log(`Registered user ${user.id}`);
    return { user, cookies: response.headers.getSetCookie() };
  }

  async login(input: LoginInput, headers: Headers): Promise<AuthResult> {
    const response = await this.auth.api.signInEmail({
      body: { email: input.email, password: input.password },
      headers,
      asResponse: true,
    });

    if (response.status >= 400 && response.status < 500) {
      throw new InvalidCredentialsError();
    }
    if (!response.ok) {
      throw AppError.internal(`Login failed with status ${response.status}`);
    }

    const user = await this.requireUser(input.email);
    log(`User ${user.id} logged in`);
    return { user, cookies: response.headers.getSetCookie() };
  }

  /** Revokes the caller's session. Returns the cookies that clear it. */
  async logout(identity: Identity, headers: Headers): Promise<string[]> {
    if (identity.kind === 'anonymous') {
      return [];
    }

    const response = await this.auth.api.signOut({ headers, asResponse: true });
    if (!response.ok) {
      throw AppError.internal(`Logout failed with status ${response.status}`);
    }

    log(`User ${identity.user.id} logged out`);
    return response.headers.getSetCookie();
  }

  async currentIdentity(headers: Headers): Promise<Identity> {
    const session = await this.auth.api.getSession({ headers });
    if (!session) {
      return ANONYMOUS;
    }

    const { id, name, email } = session.user;
    return { kind: 'user', user: { id, name, email } };
  }

  private async requireUser(email: string): Promise<UserSummary> {
    const user = await this.userService.findByEmail(email);
    if (!user) {
      throw AppError.internal(`User ${email} missing after authentication`);
    }
    return user;
  }
}
