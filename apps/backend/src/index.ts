import { createHTTPServer } from "@trpc/server/adapters/standalone";

import { createHomologyApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createRepositoryStore } from "./db/repositories/index.js";

const config = loadConfig();
const { router } = createHomologyApp(config, createRepositoryStore());

const server = createHTTPServer({ router });
server.listen(config.port);

console.log(`Assembly homology service listening on port ${config.port}`);
