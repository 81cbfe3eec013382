import { jwtVerify } from "jose";
import type { MiddlewareHandler } from "hono";
import { users } from "../db/schema";
import type { ApiDatabase } from "../db/types";
import type { RuntimeEnv } from "../env";
import { buildDisplayName } from "../services/leaderboardService";
import { ensureProfile } from "../services/profileService";
import { log, logServerError } from "../utils/logger";

export type UserIdentity = {
  id: string;
  email: string | null;
};

export type ApiVariables = {
  requestId: string;
  user: UserIdentity | null;
};

const ensureUserRecords = (db: ApiDatabase, identity: UserIdentity) => {
  const now = Date.now();
  if (identity.email) {
    db.insert(users)
      .values({
        id: identity.id,
        email: identity.email,
        display_name: buildDisplayName(identity.email),
        created_at: now
      })
      .onConflictDoUpdate({
        target: users.id,
        set: { email: identity.email }
      })
      .run();
  } else {
    db.insert(users)
      .values({
        id: identity.id,
        email: `user-${identity.id}@example.invalid`,
        display_name: "Player",
        created_at: now
      })
      .onConflictDoNothing()
      .run();
  }

  ensureProfile(db, identity.id, new Date(now));
};

export const createUserAuth = (
  env: RuntimeEnv,
  db: ApiDatabase
): MiddlewareHandler<{ Variables: ApiVariables }> => {
  return async (c, next) => {
    const authHeader = c.req.header("Authorization");
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    if (!env.authJwtSecret) {
      logServerError("auth.jwt_secret.missing", new Error("AUTH_JWT_SECRET is not configured"), {
        requestId: c.get("requestId")
      });
      return c.json({ error: "AUTH_JWT_SECRET is not configured" }, 500);
    }

    const token = authHeader.replace("Bearer ", "").trim();

    let identity: UserIdentity;
    try {
      const { payload } = await jwtVerify(token, new TextEncoder().encode(env.authJwtSecret), {
        algorithms: ["HS256"]
      });
      const sub = typeof payload.sub === "string" ? payload.sub : null;
      const email = typeof payload.email === "string" ? payload.email : null;
      if (!sub) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      identity = { id: sub, email };
    } catch (error) {
      log("warn", "auth.jwt.rejected", {
        requestId: c.get("requestId"),
        reason: error instanceof Error ? error.message : "unknown"
      });
      return c.json({ error: "Unauthorized" }, 401);
    }

    ensureUserRecords(db, identity);
    c.set("user", identity);
    await next();
  };
};
