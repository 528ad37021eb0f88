import {
  createHomologyRouter,
  type HomologyImplementations,
} from "./routers/frontend/homology.js";
import { router } from "./trpc.js";

export { createCallerFactory, publicProcedure, router } from "./trpc.js";
export {
  createHomologyRouter,
  type HomologyImplementations,
} from "./routers/frontend/homology.js";

export const createAppRouter = (implementations: {
  homology: HomologyImplementations;
}) =>
  router({
    homology: createHomologyRouter(implementations.homology),
  });

export type AppRouter = ReturnType<typeof createAppRouter>;
