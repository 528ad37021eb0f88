import { describe, it, expect } from "vitest";
import {
  checkNamespaceCompatibility,
  resolveProvider,
} from "./compatibility.js";
import { SketchDatabase } from "./sketch/sketch-database.js";
import { SketchProviderRegistry } from "./sketch/sketch-provider-registry.js";
import {
  catchHomologyError,
  DEFAULT_PARAMETERS,
  FakeSketchProvider,
  makeNamespace,
} from "./testing/fakes.js";

const mash = new FakeSketchProvider({ implementationName: "mash" });
const sourmash = new FakeSketchProvider({ implementationName: "sourmash" });
const registry = new SketchProviderRegistry([mash, sourmash]);

const query = (sketchSize: number, kmerSize = 21) =>
  new SketchDatabase({
    name: "<query>",
    implementationName: "mash",
    location: "/uploads/query.msh",
    parameters: { ...DEFAULT_PARAMETERS, kmerSize, sketchSize },
    sequenceCount: 1,
  });

describe("resolveProvider", () => {
  it("should resolve the provider shared by all namespaces", () => {
    const namespaces = [
      makeNamespace("ns_a", { implementation: "mash" }),
      makeNamespace("ns_b", { implementation: "MASH" }),
    ];

    expect(resolveProvider(namespaces, registry)).toBe(mash);
  });

  it("should reject namespaces built with different implementations", async () => {
    const namespaces = [
      makeNamespace("ns_a", { implementation: "mash" }),
      makeNamespace("ns_b", { implementation: "sourmash" }),
    ];

    const error = await catchHomologyError(() =>
      resolveProvider(namespaces, registry),
    );
    expect(error.kind).toBe("INCOMPATIBLE_NAMESPACES");
    expect(error.message).toBe(
      "The selected namespaces must share the same implementation",
    );
    expect(error.isUserError).toBe(true);
  });

  it("should treat an unregistered stored implementation as misconfiguration", async () => {
    const error = await catchHomologyError(() =>
      resolveProvider([makeNamespace("ns_a", { implementation: "bbsketch" })], registry),
    );

    expect(error.kind).toBe("MISCONFIGURED");
    expect(error.isUserError).toBe(false);
    expect(error.message).toBe(
      "Application is misconfigured. Implementation bbsketch stored in database but not available.",
    );
  });
});

describe("checkNamespaceCompatibility", () => {
  const namespaces = [
    makeNamespace("ns_a", {
      implementation: "mash",
      parameters: { ...DEFAULT_PARAMETERS, sketchSize: 1000 },
    }),
    makeNamespace("ns_b", {
      implementation: "mash",
      parameters: { ...DEFAULT_PARAMETERS, sketchSize: 500 },
    }),
  ];

  it("should return no warnings when every namespace matches", () => {
    expect(
      checkNamespaceCompatibility(namespaces.slice(0, 1), query(1000), true),
    ).toEqual([]);
  });

  it("should prefix lenient warnings with the namespace ID", () => {
    expect(checkNamespaceCompatibility(namespaces, query(1000), false)).toEqual([
      "Namespace ns_b: Query sketch size 1000 is larger than target sketch size 500",
    ]);
  });

  it("should fail the whole check in strict mode", async () => {
    const error = await catchHomologyError(() =>
      checkNamespaceCompatibility(namespaces, query(1000), true),
    );

    expect(error.kind).toBe("INCOMPATIBLE_SKETCHES");
    expect(error.details.namespaceId).toBe("ns_b");
    expect(error.message).toBe(
      "Unable to query namespace ns_b with input sketch: Query sketch size 1000 does not match target 500",
    );
  });

  it("should fail on mismatches lenient mode cannot tolerate", async () => {
    const error = await catchHomologyError(() =>
      checkNamespaceCompatibility(namespaces, query(1000, 31), false),
    );

    expect(error.kind).toBe("INCOMPATIBLE_SKETCHES");
    expect(error.details.namespaceId).toBe("ns_a");
    expect(error.message).toBe(
      "Unable to query namespace ns_a with input sketch: Kmer size for sketches are not compatible: 31 21",
    );
  });
});
