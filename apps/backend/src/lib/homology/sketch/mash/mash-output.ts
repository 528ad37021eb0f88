/**
 * Parsers for the text output of the mash command line tool.
 */

import type { SketchParameters } from "../sketch-interface.js";

export interface MashSketchHeader {
  parameters: SketchParameters;
  sequenceCount: number;
}

export interface MashDistanceRow {
  referenceId: string;
  queryId: string;
  distance: number;
  pValue: number;
  sharedHashes: string;
}

const SEED_PATTERN = /^\s*Hash function \(seed\):\s+\S+\s+\((\d+)\)\s*$/m;
const KMER_PATTERN = /^\s*K-?mer size:\s+(\d+)/im;
const SKETCH_SIZE_PATTERN = /^\s*(?:Target min-hashes per sketch|Sketch size):\s+(\d+)\s*$/m;
const SKETCH_COUNT_PATTERN = /^\s*Sketches:\s+(\d+)\s*$/m;

/**
 * Parse the output of `mash info -H`
 *
 * @returns The header, or undefined if a required field is missing
 */
export function parseMashInfoHeader(output: string): MashSketchHeader | undefined {
  const seed = SEED_PATTERN.exec(output);
  const kmer = KMER_PATTERN.exec(output);
  const sketchSize = SKETCH_SIZE_PATTERN.exec(output);
  const count = SKETCH_COUNT_PATTERN.exec(output);
  if (!seed || !kmer || !sketchSize || !count) {
    return undefined;
  }
  return {
    parameters: {
      kmerSize: Number.parseInt(kmer[1], 10),
      hashSeed: Number.parseInt(seed[1], 10),
      sketchSize: Number.parseInt(sketchSize[1], 10),
    },
    sequenceCount: Number.parseInt(count[1], 10),
  };
}

/**
 * Parse one tab separated row of `mash dist` output
 *
 * @returns The row, or undefined for blank or malformed lines
 */
export function parseMashDistanceLine(line: string): MashDistanceRow | undefined {
  if (line.trim().length === 0) {
    return undefined;
  }
  const fields = line.split("\t");
  if (fields.length !== 5) {
    return undefined;
  }
  const [referenceId, queryId, distance, pValue, sharedHashes] = fields;
  const parsedDistance = Number(distance);
  const parsedPValue = Number(pValue);
  if (
    referenceId.length === 0 ||
    distance.trim().length === 0 ||
    !Number.isFinite(parsedDistance) ||
    !Number.isFinite(parsedPValue)
  ) {
    return undefined;
  }
  return {
    referenceId,
    queryId,
    distance: parsedDistance,
    pValue: parsedPValue,
    sharedHashes: sharedHashes.trim(),
  };
}

/**
 * Lines mash prints to stderr that start with WARNING
 */
export function extractMashWarnings(stderr: string): string[] {
  return stderr
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("WARNING"));
}
