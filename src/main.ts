/**
 * Storefront server entry point
 */

import { getPort } from "#lib/config.ts";
import { initDb } from "#lib/db/migrations/index.ts";
import { logDebug } from "#lib/logger.ts";
import { startServer } from "./server.ts";

await initDb();
const port = getPort();
await startServer(port);
logDebug("Server", `Listening on port ${port}`);
