import { eq } from 'drizzle-orm';
import type { Database } from '../db/index';
import { users } from '../db/schema';
import type { UserSummary } from '../types/blog';

export class UserService {
  constructor(private readonly db: Database) {}

  async findByEmail(email: string): Promise<UserSummary | null> {
    const result = await this.db
      .select({ id: users.id, name: users.name, email: users.email })
      .from(users)
      .where(eq(users.email, email.trim().toLowerCase()))
      .limit(1);
    return result[0] ?? null;
  }
}
