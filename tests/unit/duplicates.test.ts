import { describe, it, expect } from "vitest";

import { DuplicateEntryDetector, normalizeIdentifier } from "../../src/duplicates/detector.js";
import { project } from "../fixtures/apis.js";

describe("normalizeIdentifier", () => {
  it("collapses dot segments and leading parent references", () => {
    expect(normalizeIdentifier("./a")).toBe("a");
    expect(normalizeIdentifier("../x/../a")).toBe("a");
    expect(normalizeIdentifier("sub//dir/./package.json")).toBe("sub/dir/package.json");
    expect(normalizeIdentifier("win\\path\\pom.xml")).toBe("win/path/pom.xml");
    expect(normalizeIdentifier(".")).toBe("");
  });
});

describe("DuplicateEntryDetector", () => {
  it("groups equivalent identifiers under one target and keeps the newest", () => {
    const detector = new DuplicateEntryDetector();
    const groups = detector.detect([
      project("p1", "proj:./a", "org1", "t1", [], "2024-01-01T00:00:00Z"),
      project("p2", "proj:a", "org1", "t1", [], "2024-03-01T00:00:00Z"),
      project("p3", "proj:../x/../a", "org1", "t1", [], "2024-02-01T00:00:00Z"),
    ]);

    expect(groups).toEqual([
      {
        orgId: "org1",
        targetId: "t1",
        identifier: "a",
        canonical: { id: "p2", name: "proj:a", created: "2024-03-01T00:00:00Z" },
        stale: [
          {
            id: "p3",
            name: "proj:../x/../a",
            created: "2024-02-01T00:00:00Z",
            reason: "newer version exists",
            duplicateOf: "p2",
            duplicateOfName: "proj:a",
          },
          {
            id: "p1",
            name: "proj:./a",
            created: "2024-01-01T00:00:00Z",
            reason: "newer version exists",
            duplicateOf: "p2",
            duplicateOfName: "proj:a",
          },
        ],
      },
    ]);
  });

  it("does not group across targets", () => {
    const detector = new DuplicateEntryDetector();
    const groups = detector.detect([
      project("p1", "repo:package.json", "org1", "t1", []),
      project("p2", "repo:package.json", "org1", "t2", []),
    ]);
    expect(groups).toEqual([]);
  });

  it("ignores names without the separator", () => {
    const detector = new DuplicateEntryDetector();
    expect(
      detector.detect([project("p1", "package.json", "org1", "t1", []), project("p2", "package.json", "org1", "t1", [])])
    ).toEqual([]);
  });

  it("splits at the first separator only", () => {
    const detector = new DuplicateEntryDetector();
    expect(detector.identifierOf("group/repo:path:with:colons")).toBe("path:with:colons");
    expect(detector.identifierOf("group/repo:")).toBeNull();
  });

  it("ignores whitespace around the identifier", () => {
    const detector = new DuplicateEntryDetector();
    expect(detector.identifierOf("g/r: package.json ")).toBe("package.json");
    expect(detector.identifierOf("g/r:   ")).toBeNull();

    const groups = detector.detect([
      project("p1", "g/r: package.json", "org1", "t1", [], "2024-01-01T00:00:00Z"),
      project("p2", "g/r:package.json", "org1", "t1", [], "2024-02-01T00:00:00Z"),
    ]);
    expect(groups.map((g) => [g.identifier, g.canonical.id, g.stale.map((s) => s.id)])).toEqual([
      ["package.json", "p2", ["p1"]],
    ]);
  });

  it("sorts members without timestamps last", () => {
    const detector = new DuplicateEntryDetector();
    const [group] = detector.detect([
      project("p1", "r:go.mod", "org1", "t1", []),
      project("p2", "r:go.mod", "org1", "t1", [], "2023-05-01T00:00:00Z"),
      project("p3", "r:go.mod", "org1", "t1", [], "not a date"),
    ]);
    expect(group?.canonical.id).toBe("p2");
    expect(group?.stale.map((s) => s.id)).toEqual(["p1", "p3"]);
  });

  it("honors a custom separator", () => {
    const detector = new DuplicateEntryDetector({ separator: "::" });
    const groups = detector.detect([
      project("p1", "svc::Dockerfile", "org1", "t1", [], "2024-01-01T00:00:00Z"),
      project("p2", "svc::./Dockerfile", "org1", "t1", [], "2024-01-02T00:00:00Z"),
    ]);
    expect(groups).toHaveLength(1);
    expect(groups[0]?.canonical.id).toBe("p2");
  });
});
