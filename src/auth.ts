import { betterAuth } from "better-auth";
import { drizzleAdapter } from "better-auth/adapters/drizzle";
import type { AppConfig } from "./config";
import type { Database } from "./db/index";
import { MAX_PASSWORD_LENGTH } from "./validators/auth";
import { users, sessions, accounts, verifications } from "./db/schema";

export function createAuth(db: Database, config: AppConfig) {
  return betterAuth({
    baseURL: config.baseUrl,
    trustedOrigins: [config.baseUrl, config.frontendUrl].filter(
      (url): url is string => Boolean(url)
    ),
    database: drizzleAdapter(db, {
      provider: "pg",
      schema: {
        user: users,
        session: sessions,
        account: accounts,
        verification: verifications,
      },
    }),
    emailAndPassword: {
      enabled: true,
      autoSignIn: true,
      minPasswordLength: 1,
      maxPasswordLength: MAX_PASSWORD_LENGTH,
    },
    session: {
      expiresIn: 60 * 60 * 24 * 7, // 7 days
      updateAge: 60 * 60 * 24, // 1 day
    },
    advanced: {
      cookiePrefix: "blog",
      useSecureCookies: config.nodeEnv === "production",
    },
    secret: config.authSecret,
  });
}

export type Auth = ReturnType<typeof createAuth>;
