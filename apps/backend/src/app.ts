import { createAppRouter } from "@homology/trpc";

import type { HomologyConfig } from "./config/env.js";
import {
  HomologyService,
  MashSketchProvider,
  SketchProviderRegistry,
  type HomologyStore,
  type SketchProvider,
} from "./lib/homology/index.js";
import { createHomologyImplementations } from "./trpc/homology.impl.js";

/**
 * Wire the service and router together. Kept apart from the entry point so
 * the database and HTTP server are only created when actually serving.
 */
export function createHomologyApp(
  config: HomologyConfig,
  store: HomologyStore,
  providers: SketchProvider[] = [
    new MashSketchProvider({ executable: config.mashExecutable }),
  ],
) {
  const service = new HomologyService({
    store,
    registry: new SketchProviderRegistry(providers),
    tempDirectory: config.tempDirectory,
  });
  const router = createAppRouter({
    homology: createHomologyImplementations(service, {
      tempDirectory: config.tempDirectory,
    }),
  });
  return { service, router };
}
