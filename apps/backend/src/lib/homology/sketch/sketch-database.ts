import { SketchToolError, type SketchParameters } from "./sketch-interface.js";

export interface SketchDatabaseInit {
  name: string;
  implementationName: string;
  location: string;
  parameters: SketchParameters;
  sequenceCount: number;
}

/**
 * A sketch database on disk and the parameters it was built with
 */
export class SketchDatabase {
  readonly name: string;
  readonly implementationName: string;
  readonly location: string;
  readonly parameters: SketchParameters;
  readonly sequenceCount: number;

  constructor(init: SketchDatabaseInit) {
    if (init.name.trim().length === 0) {
      throw new Error("Sketch database name cannot be empty");
    }
    if (!Number.isInteger(init.sequenceCount) || init.sequenceCount < 0) {
      throw new Error(
        `Invalid sequence count for sketch database ${init.name}: ${init.sequenceCount}`,
      );
    }
    const { sketchSize, scalingFactor } = init.parameters;
    if ((sketchSize === undefined) === (scalingFactor === undefined)) {
      throw new Error(
        `Sketch database ${init.name} must have exactly one of a sketch size or a scaling factor`,
      );
    }
    this.name = init.name;
    this.implementationName = init.implementationName;
    this.location = init.location;
    this.parameters = { ...init.parameters };
    this.sequenceCount = init.sequenceCount;
  }

  /**
   * Check whether `query` can be searched against this database
   *
   * @param query - The query sketch database
   * @param strict - Require an exact parameter match
   * @returns Warnings about tolerated parameter differences
   * @throws SketchToolError INCOMPATIBLE_SKETCHES if the sketches cannot be compared
   */
  checkQueryCompatibility(query: SketchDatabase, strict: boolean): string[] {
    const target = this.parameters;
    const source = query.parameters;

    if (
      this.implementationName.toLowerCase() !==
      query.implementationName.toLowerCase()
    ) {
      throw incompatible(
        `Implementations for sketches do not match: ${query.implementationName} ${this.implementationName}`,
      );
    }
    if (source.kmerSize !== target.kmerSize) {
      throw incompatible(
        `Kmer size for sketches are not compatible: ${source.kmerSize} ${target.kmerSize}`,
      );
    }
    if (source.hashSeed !== target.hashSeed) {
      throw incompatible(
        `Hash seed for sketches are not compatible: ${source.hashSeed} ${target.hashSeed}`,
      );
    }
    if (source.scalingFactor !== target.scalingFactor) {
      throw incompatible(
        `Scaling parameters for sketches are not compatible: ${describeScaling(source)} ${describeScaling(target)}`,
      );
    }

    const warnings: string[] = [];
    if (source.sketchSize !== undefined && target.sketchSize !== undefined) {
      if (source.sketchSize < target.sketchSize) {
        throw incompatible(
          `Query sketch size ${source.sketchSize} may not be smaller than the target sketch size ${target.sketchSize}`,
        );
      }
      if (source.sketchSize > target.sketchSize) {
        if (strict) {
          throw incompatible(
            `Query sketch size ${source.sketchSize} does not match target ${target.sketchSize}`,
          );
        }
        warnings.push(
          `Query sketch size ${source.sketchSize} is larger than target sketch size ${target.sketchSize}`,
        );
      }
    }
    return warnings;
  }
}

function incompatible(message: string): SketchToolError {
  return new SketchToolError("INCOMPATIBLE_SKETCHES", message);
}

function describeScaling(parameters: SketchParameters): string {
  return parameters.scalingFactor === undefined
    ? "unscaled"
    : String(parameters.scalingFactor);
}
