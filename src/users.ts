import crypto from 'crypto';
import { z } from 'zod';
import { errorMessage } from './errors';
import type { ActionLog, Logger } from './logger';
import type { PortfolioRepository } from './portfolios';
import { fail, ok } from './result';
import type { Result } from './result';
import type { JsonDocumentStore } from './store/jsonStore';

const USERNAME_RE = /^[A-Za-z0-9]{3,20}$/;
const MIN_PASSWORD_LENGTH = 4;

const userRecordSchema = z.object({
  user_id: z.number().int().positive(),
  username: z.string().min(1),
  hashed_password: z.string().min(1),
  salt: z.string().min(1),
  registration_date: z.string(),
});

export type UserRecord = z.infer<typeof userRecordSchema>;

/** What callers see of a user; the hash and salt stay inside the manager. */
export interface UserInfo {
  userId: number;
  username: string;
  registrationDate: string;
}

export interface UserManagerDeps {
  store: JsonDocumentStore;
  portfolios: PortfolioRepository;
  actions: ActionLog;
  logger: Logger;
  now?: () => Date;
  salt?: () => string;
}

export function hashPassword(password: string, salt: string): string {
  return crypto.createHash('sha256').update(password + salt).digest('hex');
}

function toInfo(u: UserRecord): UserInfo {
  return { userId: u.user_id, username: u.username, registrationDate: u.registration_date };
}

export class UserManager {
  private users: UserRecord[] = [];
  private session: UserRecord | null = null;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly salt: () => string;

  constructor(private readonly deps: UserManagerDeps) {
    this.logger = deps.logger.child({ component: 'users' });
    this.now = deps.now ?? (() => new Date());
    this.salt = deps.salt ?? (() => crypto.randomBytes(8).toString('hex'));
    this.load();
  }

  load(): void {
    const raw = this.deps.store.read();
    const list = Array.isArray(raw) ? raw : [];
    this.users = [];
    for (const entry of list) {
      const parsed = userRecordSchema.safeParse(entry);
      if (parsed.success) this.users.push(parsed.data);
      else this.logger.warn({ issues: parsed.error.issues.length }, 'skipping invalid user entry');
    }
  }

  register(username: string, password: string): Result<UserInfo> {
    const handle = this.deps.actions.begin('REGISTER', { username });
    const result = this.doRegister(username, password);
    if (result.ok) handle.succeed({ userId: result.value.userId });
    else handle.fail(result.error);
    return result;
  }

  login(username: string, password: string): Result<UserInfo> {
    const handle = this.deps.actions.begin('LOGIN', { username });
    const user = this.users.find((u) => u.username === username);
    let result: Result<UserInfo>;
    if (!user) {
      result = fail('UNKNOWN_USER', `User '${username}' not found`);
    } else if (hashPassword(password, user.salt) !== user.hashed_password) {
      result = fail('BAD_CREDENTIALS', 'Wrong password');
    } else {
      this.session = user;
      result = ok(toInfo(user));
    }
    if (result.ok) handle.succeed({ userId: result.value.userId });
    else handle.fail(result.error);
    return result;
  }

  logout(): Result<string> {
    if (!this.session) return fail('NOT_LOGGED_IN', 'Nobody is logged in');
    const name = this.session.username;
    this.session = null;
    return ok(name);
  }

  whoami(): UserInfo | null {
    return this.session ? toInfo(this.session) : null;
  }

  changePassword(current: string, next: string): Result<void> {
    const user = this.session;
    if (!user) return fail('NOT_LOGGED_IN', 'Login required');
    if (hashPassword(current, user.salt) !== user.hashed_password) {
      return fail('BAD_CREDENTIALS', 'Current password is wrong');
    }
    if (next.length < MIN_PASSWORD_LENGTH) {
      return fail('INVALID_INPUT', `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    const previous = user.hashed_password;
    user.hashed_password = hashPassword(next, user.salt);
    try {
      this.persist();
    } catch (err) {
      user.hashed_password = previous;
      return fail('PERSISTENCE', `Could not save the new password: ${errorMessage(err)}`);
    }
    return ok(undefined);
  }

  getById(userId: number): UserInfo | undefined {
    const u = this.users.find((x) => x.user_id === userId);
    return u ? toInfo(u) : undefined;
  }

  private doRegister(username: string, password: string): Result<UserInfo> {
    if (!USERNAME_RE.test(username)) {
      return fail('INVALID_INPUT', 'Username must be 3-20 letters or digits');
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      return fail('INVALID_INPUT', `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    if (this.users.some((u) => u.username === username)) {
      return fail('DUPLICATE_USER', `Username '${username}' is already taken`);
    }

    const salt = this.salt();
    const user: UserRecord = {
      user_id: this.users.reduce((max, u) => Math.max(max, u.user_id), 0) + 1,
      username,
      hashed_password: hashPassword(password, salt),
      salt,
      registration_date: this.now().toISOString(),
    };

    this.users.push(user);
    try {
      this.persist();
    } catch (err) {
      this.users = this.users.filter((u) => u !== user);
      return fail('PERSISTENCE', `Could not save the user: ${errorMessage(err)}`);
    }

    try {
      this.deps.portfolios.create(user.user_id);
    } catch (err) {
      this.users = this.users.filter((u) => u !== user);
      try {
        this.persist();
      } catch (rollbackErr) {
        this.logger.error({ err: rollbackErr, userId: user.user_id }, 'could not remove user after portfolio failure');
      }
      return fail('PERSISTENCE', `Could not create the portfolio: ${errorMessage(err)}`);
    }

    return ok(toInfo(user));
  }

  private persist(): void {
    this.deps.store.write(this.users);
  }
}
