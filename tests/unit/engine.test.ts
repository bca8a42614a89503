import { describe, it, expect } from "vitest";

import { buildHostCatalog } from "../../src/catalog/host.js";
import { buildTargetCatalog } from "../../src/catalog/targets.js";
import { GitLabRepositoryHost } from "../../src/coverage/hosts.js";
import { FileCoverageValidator } from "../../src/coverage/validator.js";
import { DuplicateEntryDetector } from "../../src/duplicates/detector.js";
import { ReconciliationEngine } from "../../src/reconcile/engine.js";
import { FakeHostApi, FakeScanningApi, complete, hostProject, project, target } from "../fixtures/apis.js";

// ── Scenario ──

const REPO1 = "gitlab.com/group/repo1";
const REPO2 = "gitlab.com/group/repo2";
const REPO3 = "gitlab.com/group/repo3";

function scenario() {
  const host = new FakeHostApi();
  host.repositories = complete([hostProject(1, "group/repo1"), hostProject(3, "group/repo3")]);
  host.files.set("group/repo1", ["package.json", "Dockerfile", "api/requirements.txt", "README.md"]);

  const scanning = new FakeScanningApi();
  scanning.targets.set(
    "org1",
    complete([
      target("t1", "https://gitlab.com/group/repo1"),
      target("t2", "https://gitlab.com/group/repo2.git"),
      target("t3", null, "cli"),
    ])
  );
  scanning.projectsByOrg.set("org1", [
    project("p1", "group/repo1:package.json", "org1", "t1", ["package.json"], "2024-02-01T00:00:00Z"),
    project("p2", "group/repo1:./package.json", "org1", "t1", ["package.json"], "2024-01-01T00:00:00Z"),
    project("p3", "group/repo1:old/pom.xml", "org1", "t1", ["old/pom.xml"], "2024-01-15T00:00:00Z"),
    project("p4", "group/repo2:go.mod", "org1", "t2", ["go.mod"]),
  ]);

  return { host, scanning };
}

async function run(host: FakeHostApi, scanning: FakeScanningApi, withDuplicates = true) {
  const hostCatalog = await buildHostCatalog(host);
  const targetCatalog = await buildTargetCatalog(scanning, ["org1"], { integrationTypes: ["gitlab", "cli"] });
  const engine = new ReconciliationEngine({
    projects: scanning,
    validator: new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(host)] }),
    ...(withDuplicates ? { detector: new DuplicateEntryDetector() } : {}),
  });
  return engine.evaluate(hostCatalog.catalog, targetCatalog.catalog);
}

// ────────────────────────────────────────────────────────────────
// ReconciliationEngine.evaluate
// ────────────────────────────────────────────────────────────────

describe("ReconciliationEngine.evaluate", () => {
  it("classifies repositories across both catalogs", async () => {
    const { host, scanning } = scenario();
    const result = await run(host, scanning);

    expect(result.matched.map((m) => m.key)).toEqual([REPO1]);
    expect(result.targetOnly.map((t) => t.key)).toEqual([REPO2]);
    expect(result.targetOnly[0]?.targets.map((t) => t.targetId)).toEqual(["t2"]);
    expect(result.hostOnly.map((h) => h.key)).toEqual([REPO3]);
    expect(result.unresolvable.map((t) => t.targetId)).toEqual(["t3"]);
    expect(result.errors).toEqual([]);
  });

  it("reports tracked, stale and untracked files for matched repositories", async () => {
    const { host, scanning } = scenario();
    const [repo] = (await run(host, scanning)).matched;

    expect(repo?.tracked).toEqual(["package.json"]);
    expect(repo?.stale).toEqual(["old/pom.xml"]);
    expect(repo?.untracked.map((f) => f.path)).toEqual(["Dockerfile", "api/requirements.txt"]);
    expect(repo?.details.tracked.map((d) => d.projectId)).toEqual(["p1", "p2"]);
    expect(repo?.details.stale).toEqual([
      {
        path: "old/pom.xml",
        projectId: "p3",
        projectName: "group/repo1:old/pom.xml",
        orgId: "org1",
        targetId: "t1",
        projectUrl: "https://app.snyk.io/org/org1/project/p3",
      },
    ]);
  });

  it("matches projects listed without a target by their repository URL", async () => {
    const { host, scanning } = scenario();
    scanning.projectsByOrg.get("org1")?.push(
      {
        id: "p5",
        name: "repo1 image",
        orgId: "org1",
        targetReference: "http://GITLAB.com/group/repo1.git",
        type: "dockerfile",
        declaredFiles: ["Dockerfile"],
        root: "",
      },
      {
        id: "p6",
        name: "other image",
        orgId: "org1",
        targetReference: "https://gitlab.com/group/repo10",
        type: "dockerfile",
        declaredFiles: ["api/requirements.txt"],
        root: "",
      }
    );
    const [repo] = (await run(host, scanning, false)).matched;

    expect(repo?.tracked).toEqual(["Dockerfile", "package.json"]);
    expect(repo?.untracked.map((f) => f.path)).toEqual(["api/requirements.txt"]);
    expect(repo?.details.tracked.map((d) => d.projectId)).toEqual(["p5", "p1", "p2"]);
  });

  it("checks files on the catalog's default branch", async () => {
    const { host, scanning } = scenario();
    host.repositories = complete([hostProject(1, "group/repo1", "trunk")]);
    await run(host, scanning);

    expect(new Set(host.checks.map((c) => c.ref))).toEqual(new Set(["trunk"]));
  });

  it("flags duplicate projects under matched targets", async () => {
    const { host, scanning } = scenario();
    const result = await run(host, scanning);

    expect(result.duplicates).toHaveLength(1);
    expect(result.duplicates[0]?.identifier).toBe("package.json");
    expect(result.duplicates[0]?.canonical.id).toBe("p1");
    expect(result.duplicates[0]?.stale.map((s) => [s.id, s.duplicateOf])).toEqual([["p2", "p1"]]);
  });

  it("skips duplicate detection when no detector is given", async () => {
    const { host, scanning } = scenario();
    const result = await run(host, scanning, false);

    expect(result.duplicates).toEqual([]);
    expect(scanning.calls).not.toContain("listProjects:org1");
  });

  it("records file check failures and keeps going", async () => {
    const { host, scanning } = scenario();
    host.brokenPaths.add("old/pom.xml");
    const result = await run(host, scanning);

    expect(result.errors).toEqual([
      { scope: REPO1, message: "Could not check old/pom.xml in gitlab.com/group/repo1: Unexpected HTTP 500" },
    ]);
    expect(result.matched[0]?.tracked).toEqual(["package.json"]);
    expect(result.matched[0]?.stale).toEqual([]);
  });

  it("does not report a declared file as untracked when its check fails", async () => {
    const { host, scanning } = scenario();
    host.brokenPaths.add("package.json");
    const result = await run(host, scanning, false);
    const failure = "Could not check package.json in gitlab.com/group/repo1: Unexpected HTTP 500";

    expect(result.errors).toEqual([
      { scope: REPO1, message: failure },
      { scope: REPO1, message: failure },
    ]);
    expect(result.matched[0]?.tracked).toEqual([]);
    expect(result.matched[0]?.stale).toEqual(["old/pom.xml"]);
    expect(result.matched[0]?.untracked.map((f) => f.path)).toEqual(["Dockerfile", "api/requirements.txt"]);
  });

  it("records inaccessible target projects and a failed tree scan", async () => {
    const { host, scanning } = scenario();
    scanning.inaccessibleTargets.add("t1");
    host.files.delete("group/repo1");
    const result = await run(host, scanning, false);

    expect(result.errors).toEqual([
      { scope: REPO1, message: "Projects for target t1 are not accessible" },
      {
        scope: REPO1,
        message: "Could not check <tree> in gitlab.com/group/repo1: repository tree is not accessible (HTTP 404)",
      },
    ]);
    expect(result.matched[0]).toMatchObject({ tracked: [], stale: [], untracked: [] });
  });

  it("returns empty sets for empty catalogs", async () => {
    const engine = new ReconciliationEngine({
      projects: new FakeScanningApi(),
      validator: new FileCoverageValidator({ hosts: [] }),
    });
    expect(await engine.evaluate(new Map(), new Map())).toEqual({
      matched: [],
      targetOnly: [],
      hostOnly: [],
      unresolvable: [],
      duplicates: [],
      errors: [],
    });
  });
});
