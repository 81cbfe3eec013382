import { serve } from "@hono/node-server";
import { createApiApp, resolveNodeEnv } from "./index";
import { ensureSchema } from "./db/init";
import { createSqliteDb } from "./db/sqlite";
import { seedDatabase } from "./seed";
import { createEngineContext } from "./services/context";
import { expireStaleSessions } from "./services/sessionService";
import { log } from "./utils/logger";

const runtimeEnv = resolveNodeEnv();
ensureSchema(runtimeEnv.dbPath);
const db = createSqliteDb(runtimeEnv.dbPath);
seedDatabase(db);

const expired = await expireStaleSessions(createEngineContext({ db, settings: runtimeEnv }));
log("info", "server.starting", { port: runtimeEnv.port, environment: runtimeEnv.environment, expired });

const app = createApiApp({ env: runtimeEnv, db });

serve({
  fetch: app.fetch,
  port: runtimeEnv.port
});
