import { describe, it, expect } from "vitest";
import { assembleSequenceMatches } from "./sequence-matches.js";
import { makeMetadata, makeNamespace } from "./testing/fakes.js";

describe("assembleSequenceMatches", () => {
  it("should order namespaces and de-duplicate warnings", () => {
    const nsB = makeNamespace("ns_b");
    const nsA = makeNamespace("ns_a");
    const match = {
      namespaceId: "ns_a",
      distance: { referenceDatabaseName: "ns_a", sequenceId: "s1", distance: 0.1 },
      metadata: makeMetadata("s1"),
    };

    const result = assembleSequenceMatches(
      [nsB, nsA],
      { implementationName: "mash", implementationVersion: "2.3" },
      [match],
      ["Namespace ns_b: drift", "Namespace ns_a: drift", "Namespace ns_b: drift"],
    );

    expect(result.namespaces.map((ns) => ns.id)).toEqual(["ns_a", "ns_b"]);
    expect(result.implementation).toEqual({
      implementationName: "mash",
      implementationVersion: "2.3",
    });
    expect(result.matches).toEqual([match]);
    expect(result.warnings).toEqual([
      "Namespace ns_b: drift",
      "Namespace ns_a: drift",
    ]);
  });

  it("should accept empty results", () => {
    const result = assembleSequenceMatches(
      [],
      { implementationName: "mash" },
      [],
      new Set<string>(),
    );

    expect(result).toEqual({
      namespaces: [],
      implementation: { implementationName: "mash" },
      matches: [],
      warnings: [],
    });
  });
});
