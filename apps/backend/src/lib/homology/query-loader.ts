import { HomologyError } from "./errors.js";
import type { SketchDatabase } from "./sketch/sketch-database.js";
import {
  isSketchToolError,
  type SketchToolInstance,
} from "./sketch/sketch-interface.js";

/**
 * Name given to the query sketch database. Namespace IDs are restricted to
 * word characters so no stored database can have this name.
 */
export const QUERY_SKETCH_NAME = "<query>";

/**
 * Load an untrusted query sketch file and check it holds exactly one sequence
 *
 * @param instance - The capability selected by the target namespaces
 * @param sketchPath - Path to the uploaded sketch
 * @throws HomologyError INVALID_SKETCH if the file is not a single sequence
 * sketch, TOOL_FAILURE for any other capability failure
 */
export async function loadQuerySketch(
  instance: SketchToolInstance,
  sketchPath: string,
): Promise<SketchDatabase> {
  const implementation = instance.implementationInfo.implementationName;
  let query: SketchDatabase;
  try {
    query = await instance.loadSketchDatabase(QUERY_SKETCH_NAME, sketchPath);
  } catch (error) {
    if (isSketchToolError(error, "NOT_A_SKETCH")) {
      if (error.toolOutput) {
        console.error(
          `${implementation} output while loading query sketch:\n${error.toolOutput}`,
        );
      }
      throw new HomologyError(
        "INVALID_SKETCH",
        "The input sketch is not a valid sketch.",
        {
          details: { implementation, diagnostic: error.toolOutput },
          cause: error,
        },
      );
    }
    console.error("Error loading query sketch database:", error);
    throw new HomologyError(
      "TOOL_FAILURE",
      `Error loading query sketch database: ${error instanceof Error ? error.message : String(error)}`,
      {
        details: {
          implementation,
          diagnostic: isSketchToolError(error) ? error.toolOutput : undefined,
        },
        cause: error,
      },
    );
  }

  if (query.sequenceCount !== 1) {
    throw new HomologyError(
      "INVALID_SKETCH",
      "Query sketch database must have exactly one sketch",
      { details: { implementation, sequenceCount: query.sequenceCount } },
    );
  }
  return query;
}
