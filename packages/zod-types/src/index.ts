export * from "./homology.zod.js";
