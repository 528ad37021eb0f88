/**
 * Mash Sketch Provider
 *
 * Runs the mash command line tool (https://github.com/marbl/Mash) to read
 * sketch headers and measure distances. Distance output is written to the
 * instance's temporary directory and streamed, so large reference databases
 * never have to fit in memory.
 */

import { createReadStream } from "node:fs";
import path from "node:path";
import { createInterface } from "node:readline";

import { execa } from "execa";

import { SketchDatabase } from "../sketch-database.js";
import {
  SketchToolError,
  type ImplementationInfo,
  type SketchDistance,
  type SketchDistanceSet,
  type SketchProvider,
  type SketchToolInstance,
} from "../sketch-interface.js";
import {
  extractMashWarnings,
  parseMashDistanceLine,
  parseMashInfoHeader,
} from "./mash-output.js";

export const MASH_IMPLEMENTATION_NAME = "mash";

export interface MashRunResult {
  /** Undefined when the process could not be started */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
}

/**
 * Runs mash with the given arguments. When `stdoutFile` is set, standard
 * output goes to that file and `stdout` in the result is empty.
 */
export type MashRunner = (
  args: string[],
  options?: { stdoutFile?: string },
) => Promise<MashRunResult>;

export function createExecaMashRunner(executable: string): MashRunner {
  return async (args, options = {}) => {
    if (options.stdoutFile) {
      const result = await execa(executable, args, {
        reject: false,
        stdout: { file: options.stdoutFile },
      });
      return { exitCode: result.exitCode, stdout: "", stderr: result.stderr };
    }
    const result = await execa(executable, args, { reject: false });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  };
}

export interface MashSketchProviderOptions {
  /** Path to the mash executable (default: "mash" on the PATH) */
  executable?: string;

  /** Replaces the process runner, mainly for tests */
  runner?: MashRunner;
}

export class MashSketchProvider implements SketchProvider {
  readonly implementationName = MASH_IMPLEMENTATION_NAME;
  readonly expectedFileExtension = ".msh";

  private readonly executable: string;
  private readonly runner: MashRunner;

  constructor(options: MashSketchProviderOptions = {}) {
    this.executable = options.executable ?? "mash";
    this.runner = options.runner ?? createExecaMashRunner(this.executable);
  }

  async instantiate(tempDir: string): Promise<SketchToolInstance> {
    const result = await this.runner(["--version"]);
    if (result.exitCode !== 0) {
      throw new SketchToolError(
        "INIT_FAILED",
        `Unable to run mash at ${this.executable}`,
        { toolOutput: result.stderr },
      );
    }
    const version = result.stdout.trim();
    return new MashInstance(
      this.runner,
      tempDir,
      version.length > 0 ? version : undefined,
    );
  }
}

class MashInstance implements SketchToolInstance {
  readonly implementationInfo: ImplementationInfo;

  constructor(
    private readonly runner: MashRunner,
    private readonly tempDir: string,
    version: string | undefined,
  ) {
    this.implementationInfo = {
      implementationName: MASH_IMPLEMENTATION_NAME,
      implementationVersion: version,
    };
  }

  async loadSketchDatabase(
    name: string,
    location: string,
  ): Promise<SketchDatabase> {
    const result = await this.runner(["info", "-H", location]);
    if (result.exitCode === undefined) {
      throw new SketchToolError("TOOL_FAILED", "Unable to start mash", {
        toolOutput: result.stderr,
      });
    }
    if (result.exitCode !== 0) {
      throw new SketchToolError(
        "NOT_A_SKETCH",
        `File ${location} is not a mash sketch`,
        { toolOutput: result.stderr },
      );
    }
    const header = parseMashInfoHeader(result.stdout);
    if (!header) {
      throw new SketchToolError(
        "TOOL_FAILED",
        `Unexpected output from mash info for ${location}`,
        { toolOutput: result.stdout },
      );
    }
    return new SketchDatabase({
      name,
      implementationName: MASH_IMPLEMENTATION_NAME,
      location,
      parameters: header.parameters,
      sequenceCount: header.sequenceCount,
    });
  }

  async computeDistances(
    query: SketchDatabase,
    references: SketchDatabase[],
    maxResults: number,
    // mash tolerates sketch size drift on its own; compatibility is checked upstream
    _strict: boolean,
  ): Promise<SketchDistanceSet> {
    const nearest = new NearestDistances(maxResults);
    const warnings: string[] = [];

    for (const [index, reference] of references.entries()) {
      const outputFile = path.join(this.tempDir, `mash-dist-${index}.tsv`);
      const result = await this.runner(
        ["dist", reference.location, query.location],
        { stdoutFile: outputFile },
      );
      if (result.exitCode !== 0) {
        throw new SketchToolError(
          "TOOL_FAILED",
          `mash dist failed for sketch database ${reference.name} with exit code ${result.exitCode ?? "none"}`,
          { toolOutput: result.stderr },
        );
      }
      warnings.push(...extractMashWarnings(result.stderr));
      await this.readDistances(outputFile, reference.name, nearest);
    }

    return { distances: nearest.toArray(), warnings };
  }

  private async readDistances(
    file: string,
    referenceDatabaseName: string,
    nearest: NearestDistances,
  ): Promise<void> {
    const lines = createInterface({
      input: createReadStream(file, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });
    for await (const line of lines) {
      if (line.trim().length === 0) {
        continue;
      }
      const row = parseMashDistanceLine(line);
      if (!row) {
        throw new SketchToolError(
          "TOOL_FAILED",
          `Unexpected mash dist output line for sketch database ${referenceDatabaseName}`,
          { toolOutput: line },
        );
      }
      nearest.offer({
        referenceDatabaseName,
        sequenceId: row.referenceId,
        distance: row.distance,
      });
    }
  }
}

/**
 * Keeps the `capacity` smallest distances seen, in ascending order
 */
export class NearestDistances {
  private readonly items: SketchDistance[] = [];

  constructor(private readonly capacity: number) {}

  offer(item: SketchDistance): void {
    if (this.capacity <= 0) {
      return;
    }
    if (
      this.items.length === this.capacity &&
      compareDistances(item, this.items[this.items.length - 1]) >= 0
    ) {
      return;
    }
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareDistances(this.items[mid], item) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, item);
    if (this.items.length > this.capacity) {
      this.items.pop();
    }
  }

  toArray(): SketchDistance[] {
    return [...this.items];
  }
}

function compareDistances(a: SketchDistance, b: SketchDistance): number {
  return (
    a.distance - b.distance ||
    compareText(a.referenceDatabaseName, b.referenceDatabaseName) ||
    compareText(a.sequenceId, b.sequenceId)
  );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
